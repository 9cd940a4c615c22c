/**
 * Sequential decoder over a binary response log.
 *
 * Framing: [type: int32][size: uint32 or uint64][payload: size bytes], repeated
 * until end of file, in the producer's byte order. A peeked type stays pending
 * until a consuming read takes it.
 */

import { MAX_PAYLOAD_SIZE, TYPE_FIELD_SIZE } from './constants.js';
import { BufferTooSmallError, CodecError, FormatError, TypeMismatchError } from './errors.js';
import type { HostLayout } from './layout.js';
import { logDebug } from './logger.js';
import type { ByteSource } from './source.js';
import { decodeNative, translatePayload } from './translator.js';
import { tagOf } from './types.js';
import type {
  LogRecord,
  NativeValue,
  ReadResult,
  RecordSource,
  ResponseKind,
  WireFormat,
  WireTag,
} from './types.js';

export interface BinaryReaderOptions {
  wire: WireFormat;
  host: HostLayout;
  tool?: string;
}

export class BinaryRecordReader implements RecordSource {
  readonly mode = 'binary';
  private pendingTag: WireTag | null = null;
  private failure: CodecError | null = null;
  private tool: string | undefined;

  constructor(
    private readonly source: ByteSource,
    private readonly options: BinaryReaderOptions
  ) {
    this.tool = options.tool;
  }

  setCurrentTool(name: string): void {
    this.tool = name;
    logDebug('Response tool set', { tool: name, mode: this.mode });
  }

  peekType(): WireTag | null {
    this.throwIfFailed();
    if (this.pendingTag === null) {
      this.pendingTag = this.readTag();
    }
    return this.pendingTag;
  }

  readExpected(kind: ResponseKind, buffer: Buffer): ReadResult {
    const { tag, payload } = this.consume(kind, buffer.length);
    let out: Buffer;
    try {
      out = translatePayload(kind, payload, {
        wire: this.options.wire,
        host: this.options.host,
        capacity: buffer.length,
      });
    } catch (err) {
      if (err instanceof BufferTooSmallError) this.fail(err);
      throw err;
    }
    out.copy(buffer, 0);
    return { tag, length: out.length };
  }

  readValue(kind: ResponseKind): NativeValue {
    const { payload } = this.consume(kind, MAX_PAYLOAD_SIZE);
    return decodeNative(kind, payload, this.options.wire);
  }

  /** Next raw record regardless of type, or null at end of log. */
  next(): LogRecord | null {
    this.throwIfFailed();
    const tag = this.takeTag();
    if (tag === null) return null;
    const size = this.readSize();
    return { tag, payload: this.readExactly(size, 'payload') };
  }

  close(): void {
    this.source.close();
  }

  private consume(kind: ResponseKind, capacity: number): LogRecord {
    this.throwIfFailed();
    const expectedTag = tagOf(kind);
    const tag = this.takeTag();
    if (tag === null) {
      this.fail(new FormatError(`unexpected end of log while reading ${kind}`));
    }
    if (tag !== expectedTag) {
      // Leave the tag pending so the caller can read it as what it really is.
      this.pendingTag = tag;
      throw new TypeMismatchError(kind, expectedTag, tag, this.tool);
    }
    const size = this.readSize();
    if (size > capacity) {
      this.fail(new BufferTooSmallError(size, capacity));
    }
    return { tag, payload: this.readExactly(size, 'payload') };
  }

  private takeTag(): WireTag | null {
    if (this.pendingTag !== null) {
      const tag = this.pendingTag;
      this.pendingTag = null;
      return tag;
    }
    return this.readTag();
  }

  private readTag(): WireTag | null {
    const bytes = this.source.read(TYPE_FIELD_SIZE);
    if (bytes.length === 0) return null;
    if (bytes.length < TYPE_FIELD_SIZE) {
      this.fail(new FormatError(`short read on type field: ${bytes.length} of ${TYPE_FIELD_SIZE} bytes`));
    }
    return this.options.wire.littleEndian ? bytes.readInt32LE(0) : bytes.readInt32BE(0);
  }

  private readSize(): number {
    const { littleEndian, sizeWidth } = this.options.wire;
    const bytes = this.readExactly(sizeWidth, 'size field');
    const size =
      sizeWidth === 8
        ? littleEndian
          ? bytes.readBigUInt64LE(0)
          : bytes.readBigUInt64BE(0)
        : BigInt(littleEndian ? bytes.readUInt32LE(0) : bytes.readUInt32BE(0));
    if (size > BigInt(MAX_PAYLOAD_SIZE)) {
      this.fail(new FormatError(`declared payload size ${size} exceeds the ${MAX_PAYLOAD_SIZE}-byte limit`));
    }
    return Number(size);
  }

  private readExactly(length: number, what: string): Buffer {
    const bytes = length === 0 ? Buffer.alloc(0) : this.source.read(length);
    if (bytes.length < length) {
      this.fail(new FormatError(`short read on ${what}: ${bytes.length} of ${length} bytes`));
    }
    return bytes;
  }

  private fail(err: CodecError): never {
    this.failure = err;
    logDebug('Response log session failed', { tool: this.tool, code: err.code, error: err.message });
    throw err;
  }

  private throwIfFailed(): void {
    if (this.failure !== null) throw this.failure;
  }
}

/** Drains a reader into memory; used by conversion and by round-trip checks. */
export function readAllRecords(reader: BinaryRecordReader): LogRecord[] {
  const records: LogRecord[] = [];
  for (let record = reader.next(); record !== null; record = reader.next()) {
    records.push(record);
  }
  return records;
}
