/**
 * Synchronous byte sources the record readers pull from.
 */

import { closeSync, openSync, readSync } from 'node:fs';
import { PathError, errorMessage } from './errors.js';

export interface ByteSource {
  /** Up to `length` bytes; fewer only at end of stream. */
  read(length: number): Buffer;
  close(): void;
}

export class BufferSource implements ByteSource {
  private offset = 0;

  constructor(private readonly bytes: Buffer) {}

  read(length: number): Buffer {
    const end = Math.min(this.offset + length, this.bytes.length);
    const chunk = this.bytes.subarray(this.offset, end);
    this.offset = end;
    return chunk;
  }

  close(): void {
    this.offset = this.bytes.length;
  }
}

export class FileSource implements ByteSource {
  private fd: number | null;
  private position = 0;

  private constructor(fd: number) {
    this.fd = fd;
  }

  static open(path: string): FileSource {
    try {
      return new FileSource(openSync(path, 'r'));
    } catch (err) {
      throw new PathError(`cannot open ${path}: ${errorMessage(err)}`, path);
    }
  }

  read(length: number): Buffer {
    if (this.fd === null) return Buffer.alloc(0);
    const buf = Buffer.alloc(length);
    let filled = 0;
    while (filled < length) {
      const n = readSync(this.fd, buf, filled, length - filled, this.position);
      if (n === 0) break;
      filled += n;
      this.position += n;
    }
    return buf.subarray(0, filled);
  }

  /** Back to the start of the file, e.g. after sniffing its first bytes. */
  rewind(): void {
    this.position = 0;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}
