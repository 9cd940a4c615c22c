/**
 * Binary record reader: framing, peek/consume, mismatch recovery and session failure.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MAX_PAYLOAD_SIZE } from './constants.js';
import { BufferTooSmallError, FormatError, TypeMismatchError } from './errors.js';
import { BinaryRecordReader, readAllRecords } from './reader.js';
import { BufferSource } from './source.js';
import { kindsForTag } from './types.js';
import { validateReplayConfig } from './validation.js';
import type { ReplayConfig } from './validation.js';

const LITTLE: ReplayConfig = { byteOrder: 'little', sizeWidth: 8 };

function frame(tag: number, payload: Buffer | number[]): Buffer {
  const bytes = Buffer.from(payload);
  const header = Buffer.alloc(12);
  header.writeInt32LE(tag, 0);
  header.writeBigUInt64LE(BigInt(bytes.length), 4);
  return Buffer.concat([header, bytes]);
}

function readerOf(bytes: Buffer, config: ReplayConfig = LITTLE): BinaryRecordReader {
  return new BinaryRecordReader(new BufferSource(bytes), validateReplayConfig(config));
}

const IPV4 = Buffer.from([2, 0, 0x82, 0x9a, 192, 0, 2, 1, 0, 0, 0, 0, 0, 0, 0, 0]);

describe('BinaryRecordReader', () => {
  it('returns the same tag for repeated peeks until a read consumes it', () => {
    const reader = readerOf(Buffer.concat([frame(1, Buffer.from('abc')), frame(7, Buffer.from('xy'))]));
    assert.equal(reader.peekType(), 1);
    assert.equal(reader.peekType(), 1);

    const buf = Buffer.alloc(16);
    assert.deepEqual(reader.readExpected('PACKET', buf), { tag: 1, length: 3 });
    assert.equal(buf.subarray(0, 3).toString(), 'abc');

    assert.equal(reader.peekType(), 7);
    assert.deepEqual(reader.readExpected('SENDTO', buf), { tag: 7, length: 2 });
    assert.equal(buf.subarray(0, 2).toString(), 'xy');

    assert.equal(reader.peekType(), null);
    assert.equal(reader.peekType(), null);
  });

  it('reads without a prior peek', () => {
    const reader = readerOf(frame(2, IPV4));
    const buf = Buffer.alloc(128);
    assert.deepEqual(reader.readExpected('SOCKNAME', buf), { tag: 2, length: 16 });
    assert.deepEqual(buf.subarray(0, 16), IPV4);
  });

  it('leaves a mismatched tag pending for a retry', () => {
    const reader = readerOf(frame(2, IPV4));
    assert.throws(
      () => reader.readExpected('PACKET', Buffer.alloc(64)),
      (err: Error) =>
        err instanceof TypeMismatchError &&
        err.expectedTag === 1 &&
        err.actualTag === 2 &&
        err.message === 'wrong response type: expected PACKET (1), got RESP_SOCKNAME (2) - tool: unknown'
    );
    assert.equal(reader.peekType(), 2);
    const buf = Buffer.alloc(128);
    assert.deepEqual(reader.readExpected('SOCKNAME', buf), { tag: 2, length: 16 });
    assert.deepEqual(buf.subarray(0, 16), IPV4);
    assert.equal(reader.peekType(), null);
  });

  it('names the current tool in mismatch diagnostics', () => {
    const reader = readerOf(frame(9, []));
    reader.setCurrentTool('evtraceroute');
    assert.throws(
      () => reader.readValue('PACKET'),
      (err: Error) => err instanceof TypeMismatchError && err.message.endsWith('- tool: evtraceroute')
    );
  });

  it('fails the session when the payload exceeds the buffer and writes nothing', () => {
    const reader = readerOf(frame(1, Buffer.alloc(64, 0x5a)));
    const backing = Buffer.alloc(80, 0xee);
    assert.throws(
      () => reader.readExpected('PACKET', backing.subarray(0, 32)),
      (err: Error) => err instanceof BufferTooSmallError && err.declared === 64 && err.capacity === 32
    );
    assert.ok(backing.every((b) => b === 0xee));
    assert.throws(() => reader.peekType(), BufferTooSmallError);
  });

  it('fails the session when the translated address outgrows the buffer', () => {
    const reader = readerOf(frame(2, IPV4.subarray(0, 6)));
    assert.throws(
      () => reader.readExpected('SOCKNAME', Buffer.alloc(8)),
      (err: Error) => err instanceof BufferTooSmallError && err.declared === 16 && err.capacity === 8
    );
    assert.throws(() => reader.peekType(), BufferTooSmallError);
  });

  it('rejects a declared size above the ceiling', () => {
    const header = Buffer.alloc(12);
    header.writeInt32LE(1, 0);
    header.writeBigUInt64LE(BigInt(MAX_PAYLOAD_SIZE + 1), 4);
    const reader = readerOf(header);
    assert.equal(reader.peekType(), 1);
    assert.throws(
      () => reader.readExpected('PACKET', Buffer.alloc(16)),
      (err: Error) =>
        err instanceof FormatError && err.message === 'declared payload size 1048577 exceeds the 1048576-byte limit'
    );
    assert.throws(() => reader.peekType(), FormatError);
  });

  it('rejects a payload cut short', () => {
    const header = Buffer.alloc(12);
    header.writeInt32LE(1, 0);
    header.writeBigUInt64LE(BigInt(MAX_PAYLOAD_SIZE), 4);
    const reader = readerOf(header);
    assert.throws(
      () => reader.readValue('PACKET'),
      (err: Error) => err instanceof FormatError && err.message === 'short read on payload: 0 of 1048576 bytes'
    );
  });

  it('rejects a partial type field', () => {
    const reader = readerOf(Buffer.from([1, 0]));
    assert.throws(
      () => reader.peekType(),
      (err: Error) => err instanceof FormatError && err.message === 'short read on type field: 2 of 4 bytes'
    );
  });

  it('rejects a partial size field', () => {
    const reader = readerOf(Buffer.from([1, 0, 0, 0, 3, 0, 0]));
    assert.equal(reader.peekType(), 1);
    assert.throws(
      () => reader.readExpected('PACKET', Buffer.alloc(16)),
      (err: Error) => err instanceof FormatError && err.message === 'short read on size field: 3 of 8 bytes'
    );
  });

  it('raises FormatError when a read runs past the end', () => {
    const reader = readerOf(Buffer.alloc(0));
    assert.equal(reader.peekType(), null);
    assert.throws(
      () => reader.readExpected('PACKET', Buffer.alloc(16)),
      (err: Error) => err instanceof FormatError && err.message === 'unexpected end of log while reading PACKET'
    );
  });

  it('reads zero-length payloads', () => {
    const reader = readerOf(Buffer.concat([frame(4, []), frame(2, [])]));
    assert.deepEqual(reader.readExpected('TTL', Buffer.alloc(4)), { tag: 4, length: 0 });
    assert.deepEqual(reader.readExpected('SOCKNAME', Buffer.alloc(128)), { tag: 2, length: 0 });
  });

  it('resolves a shared tag by the kind the caller expects', () => {
    assert.deepEqual(kindsForTag(4), ['PEERNAME', 'TTL', 'READ_ERROR', 'PROTO', 'N_RESOLV', 'TIMEOFDAY']);
    const reader = readerOf(Buffer.concat([frame(4, IPV4), frame(4, [64]), frame(4, [17, 0, 0, 0])]));
    assert.deepEqual(reader.readValue('PEERNAME'), {
      kind: 'sockaddr',
      value: { family: 'AF_INET', address: '192.0.2.1', port: 33434 },
    });
    assert.deepEqual(reader.readValue('TTL'), { kind: 'bytes', value: Buffer.from([64]) });
    assert.deepEqual(reader.readValue('PROTO'), { kind: 'bytes', value: Buffer.from([17, 0, 0, 0]) });
  });

  it('decodes time values', () => {
    const tv = Buffer.alloc(16);
    tv.writeBigInt64LE(1_700_000_000n, 0);
    tv.writeBigInt64LE(42n, 8);
    const reader = readerOf(frame(4, tv));
    assert.deepEqual(reader.readValue('TIMEOFDAY'), {
      kind: 'timeval',
      value: { seconds: 1_700_000_000, microseconds: 42 },
    });
  });

  it('translates socket addresses into the configured host layout', () => {
    const reader = readerOf(frame(2, IPV4), { ...LITTLE, hostLayout: 'darwin-arm64' });
    const buf = Buffer.alloc(128);
    assert.deepEqual(reader.readExpected('SOCKNAME', buf), { tag: 2, length: 16 });
    assert.deepEqual(buf.subarray(0, 4), Buffer.from([16, 2, 0x82, 0x9a]));
  });

  it('reads big-endian logs with a 4-byte size field', () => {
    const bytes = Buffer.alloc(9);
    bytes.writeInt32BE(5, 0);
    bytes.writeUInt32BE(1, 4);
    bytes.writeUInt8(64, 8);
    const reader = readerOf(bytes, { byteOrder: 'big', sizeWidth: 4 });
    assert.equal(reader.peekType(), 5);
    assert.deepEqual(reader.readValue('RCVDTTL'), { kind: 'bytes', value: Buffer.from([64]) });
    assert.equal(reader.peekType(), null);
  });
});

describe('readAllRecords', () => {
  it('returns every raw record in order', () => {
    const reader = readerOf(Buffer.concat([frame(1, [1]), frame(6, [2, 3]), frame(42, [])]));
    const records = readAllRecords(reader);
    assert.deepEqual(
      records.map((r) => r.tag),
      [1, 6, 42]
    );
    assert.deepEqual(records[1].payload, Buffer.from([2, 3]));
    assert.equal(records[2].payload.length, 0);
  });

  it('includes a tag left pending by a peek', () => {
    const reader = readerOf(Buffer.concat([frame(3, [9]), frame(1, [])]));
    assert.equal(reader.peekType(), 3);
    assert.deepEqual(
      readAllRecords(reader).map((r) => r.tag),
      [3, 1]
    );
  });
});
