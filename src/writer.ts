/**
 * Appends captured responses to a binary log: type, size, payload, no
 * delimiter, in the producer's byte order and size width.
 */

import { closeSync, openSync, writeSync } from 'node:fs';
import { MAX_PAYLOAD_SIZE, TYPE_FIELD_SIZE } from './constants.js';
import { LogWriteError, errorMessage } from './errors.js';
import { referenceLayout } from './layout.js';
import { encodeSocketAddress, encodeTimeValue } from './translator.js';
import { tagOf } from './types.js';
import type { ResponseKind, SocketAddress, TimeValue, WireFormat, WireTag } from './types.js';
import { validateReplayConfig } from './validation.js';
import type { ReplayConfig } from './validation.js';

export interface ByteSink {
  write(bytes: Buffer): void;
  close(): void;
}

class FileSink implements ByteSink {
  constructor(private readonly fd: number) {}

  write(bytes: Buffer): void {
    let written = 0;
    while (written < bytes.length) {
      written += writeSync(this.fd, bytes, written, bytes.length - written);
    }
  }

  close(): void {
    closeSync(this.fd);
  }
}

export class MemorySink implements ByteSink {
  private readonly chunks: Buffer[] = [];

  write(bytes: Buffer): void {
    this.chunks.push(Buffer.from(bytes));
  }

  close(): void {}

  contents(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

export class ResponseWriter {
  private failure: LogWriteError | null = null;
  private closed = false;

  constructor(
    private readonly sink: ByteSink,
    readonly wire: WireFormat
  ) {}

  /** Writes one record. `kind` may be a kind name or a raw wire tag. */
  append(kind: ResponseKind | WireTag, payload: Uint8Array): void {
    if (this.failure !== null) throw this.failure;
    if (this.closed) throw new LogWriteError('response log is closed');
    if (payload.length > MAX_PAYLOAD_SIZE) {
      throw new LogWriteError(`payload of ${payload.length} bytes exceeds the ${MAX_PAYLOAD_SIZE}-byte limit`);
    }
    const tag = typeof kind === 'number' ? kind : tagOf(kind);
    const { littleEndian, sizeWidth } = this.wire;
    const header = Buffer.alloc(TYPE_FIELD_SIZE + sizeWidth);
    if (littleEndian) header.writeInt32LE(tag, 0);
    else header.writeInt32BE(tag, 0);
    if (sizeWidth === 8) {
      if (littleEndian) header.writeBigUInt64LE(BigInt(payload.length), TYPE_FIELD_SIZE);
      else header.writeBigUInt64BE(BigInt(payload.length), TYPE_FIELD_SIZE);
    } else if (littleEndian) header.writeUInt32LE(payload.length, TYPE_FIELD_SIZE);
    else header.writeUInt32BE(payload.length, TYPE_FIELD_SIZE);

    try {
      this.sink.write(Buffer.concat([header, payload]));
    } catch (err) {
      this.failure = new LogWriteError(`cannot write response record: ${errorMessage(err)}`);
      throw this.failure;
    }
  }

  /** Socket address in the capture layout. */
  appendSocketAddress(kind: ResponseKind, addr: SocketAddress): void {
    this.append(kind, encodeSocketAddress(addr, referenceLayout(this.wire)));
  }

  appendTimeValue(tv: TimeValue): void {
    this.append('TIMEOFDAY', encodeTimeValue(tv, referenceLayout(this.wire)));
  }

  /** Unsigned scalar (TTL, protocol, length) of the given byte width. */
  appendScalar(kind: ResponseKind, value: number, width: 1 | 2 | 4): void {
    const buf = Buffer.alloc(width);
    const le = this.wire.littleEndian;
    if (width === 1) buf.writeUInt8(value, 0);
    else if (width === 2) {
      if (le) buf.writeUInt16LE(value, 0);
      else buf.writeUInt16BE(value, 0);
    } else if (le) buf.writeUInt32LE(value, 0);
    else buf.writeUInt32BE(value, 0);
    this.append(kind, buf);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.sink.close();
    } catch (err) {
      throw new LogWriteError(`cannot close response log: ${errorMessage(err)}`);
    }
  }
}

/** Creates (or truncates) a log file. Throws LogWriteError when it cannot be created. */
export function createFileWriter(path: string, config?: ReplayConfig): ResponseWriter {
  const { wire } = validateReplayConfig(config);
  let fd: number;
  try {
    fd = openSync(path, 'w');
  } catch (err) {
    throw new LogWriteError(`cannot create ${path}: ${errorMessage(err)}`);
  }
  return new ResponseWriter(new FileSink(fd), wire);
}

export function createBufferWriter(config?: ReplayConfig): { writer: ResponseWriter; sink: MemorySink } {
  const { wire } = validateReplayConfig(config);
  const sink = new MemorySink();
  return { writer: new ResponseWriter(sink, wire), sink };
}
