/**
 * Response writer: record framing, typed helpers and write failures.
 */

import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { MAX_PAYLOAD_SIZE } from './constants.js';
import { LogWriteError } from './errors.js';
import { BinaryRecordReader, readAllRecords } from './reader.js';
import { BufferSource } from './source.js';
import { validateReplayConfig } from './validation.js';
import type { ReplayConfig } from './validation.js';
import { ResponseWriter, createBufferWriter, createFileWriter } from './writer.js';
import type { ByteSink } from './writer.js';

const LITTLE: ReplayConfig = { byteOrder: 'little', sizeWidth: 8 };
const BIG: ReplayConfig = { byteOrder: 'big', sizeWidth: 4 };

function readBack(bytes: Buffer): BinaryRecordReader {
  return new BinaryRecordReader(new BufferSource(bytes), validateReplayConfig(LITTLE));
}

describe('ResponseWriter', () => {
  it('frames a record with a 4-byte type and an 8-byte size', () => {
    const { writer, sink } = createBufferWriter(LITTLE);
    writer.append('PACKET', Buffer.from('hi'));
    assert.deepEqual(sink.contents(), Buffer.from([1, 0, 0, 0, 2, 0, 0, 0, 0, 0, 0, 0, 0x68, 0x69]));
  });

  it('writes big-endian with a 4-byte size and accepts raw tags', () => {
    const { writer, sink } = createBufferWriter(BIG);
    writer.append(7, Buffer.from([0xaa]));
    assert.deepEqual(sink.contents(), Buffer.from([0, 0, 0, 7, 0, 0, 0, 1, 0xaa]));
  });

  it('reads back the same records in the same order', () => {
    const records = [
      { tag: 1, payload: Buffer.from([0x45, 0, 0, 0x54]) },
      { tag: 4, payload: Buffer.alloc(0) },
      { tag: 9, payload: Buffer.from('timeout') },
      { tag: -1, payload: Buffer.from([7]) },
    ];
    for (const config of [LITTLE, BIG]) {
      const { writer, sink } = createBufferWriter(config);
      for (const { tag, payload } of records) writer.append(tag, payload);
      const reader = new BinaryRecordReader(new BufferSource(sink.contents()), validateReplayConfig(config));
      assert.deepEqual(readAllRecords(reader), records);
    }
  });

  it('writes scalars in the producer byte order', () => {
    const { writer, sink } = createBufferWriter(LITTLE);
    writer.appendScalar('TTL', 64, 1);
    writer.appendScalar('PROTO', 17, 4);
    const reader = readBack(sink.contents());
    assert.deepEqual(reader.readValue('TTL'), { kind: 'bytes', value: Buffer.from([64]) });
    assert.deepEqual(reader.readValue('PROTO'), { kind: 'bytes', value: Buffer.from([17, 0, 0, 0]) });
  });

  it('writes socket addresses in the capture layout', () => {
    const { writer, sink } = createBufferWriter(LITTLE);
    writer.appendSocketAddress('PEERNAME', { family: 'AF_INET', address: '192.0.2.1', port: 33434 });
    const bytes = sink.contents();
    assert.deepEqual(bytes.subarray(12), Buffer.from([2, 0, 0x82, 0x9a, 192, 0, 2, 1, 0, 0, 0, 0, 0, 0, 0, 0]));
    assert.deepEqual(readBack(bytes).readValue('PEERNAME'), {
      kind: 'sockaddr',
      value: { family: 'AF_INET', address: '192.0.2.1', port: 33434 },
    });
  });

  it('writes time values', () => {
    const { writer, sink } = createBufferWriter(LITTLE);
    writer.appendTimeValue({ seconds: 1_700_000_000, microseconds: 125 });
    assert.equal(sink.contents().length, 12 + 16);
    assert.deepEqual(readBack(sink.contents()).readValue('TIMEOFDAY'), {
      kind: 'timeval',
      value: { seconds: 1_700_000_000, microseconds: 125 },
    });
  });

  it('rejects a payload above the ceiling without writing', () => {
    const { writer, sink } = createBufferWriter(LITTLE);
    assert.throws(() => writer.append('PACKET', Buffer.alloc(MAX_PAYLOAD_SIZE + 1)), LogWriteError);
    assert.equal(sink.contents().length, 0);
  });

  it('rejects appends after close', () => {
    const { writer } = createBufferWriter(LITTLE);
    writer.close();
    writer.close();
    assert.throws(
      () => writer.append('PACKET', Buffer.alloc(1)),
      (err: Error) => err instanceof LogWriteError && err.message === 'response log is closed'
    );
  });

  it('keeps failing after a sink error', () => {
    const broken: ByteSink = {
      write: () => {
        throw new Error('disk full');
      },
      close: () => {},
    };
    const writer = new ResponseWriter(broken, validateReplayConfig(LITTLE).wire);
    let first: unknown;
    try {
      writer.append('PACKET', Buffer.alloc(1));
    } catch (err) {
      first = err;
    }
    assert.ok(first instanceof LogWriteError);
    assert.equal(first.message, 'cannot write response record: disk full');
    assert.throws(
      () => writer.append('PACKET', Buffer.alloc(1)),
      (err: Error) => err === first
    );
  });
});

describe('createFileWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'netreplay-writer-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes records to a file', () => {
    const file = path.join(dir, 'capture.net');
    const writer = createFileWriter(file, LITTLE);
    writer.append('PACKET', Buffer.from('abc'));
    writer.appendScalar('TTL', 1, 1);
    writer.close();
    const bytes = readFileSync(file);
    assert.equal(bytes.length, 12 + 3 + 12 + 1);
    assert.equal(bytes.readInt32LE(15), 4);
  });

  it('raises LogWriteError when the file cannot be created', () => {
    assert.throws(() => createFileWriter(path.join(dir, 'missing', 'capture.net')), LogWriteError);
  });
});
