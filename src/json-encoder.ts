/**
 * Binary → JSON: renders framed records as the pretty-printed JSON log that
 * fixtures are inspected and authored in.
 */

import { JSON_FORMAT_VERSION, JSON_MAGIC, JSON_SOURCE } from './constants.js';
import { decodeSocketAddress } from './translator.js';
import { RESPONSE_TAGS, primaryKindName } from './types.js';
import type {
  JsonLogDocument,
  JsonResponse,
  JsonSocketAddress,
  LogRecord,
  SocketAddress,
  WireFormat,
  WireTag,
} from './types.js';

/** Smallest payload rendered as a socket address (a generic sockaddr). */
const MIN_SOCKADDR_SIZE = 16;

const SOCKADDR_TAGS: ReadonlySet<WireTag> = new Set([
  RESPONSE_TAGS.SOCKNAME,
  RESPONSE_TAGS.DSTADDR,
  RESPONSE_TAGS.PEERNAME,
]);

// TTL, RCVDTTL, RCVDTCLASS and the scalars sharing their tags (PROTO, LENGTH, RESOLVER).
const SCALAR_TAGS: ReadonlySet<WireTag> = new Set([
  RESPONSE_TAGS.TTL,
  RESPONSE_TAGS.RCVDTTL,
  RESPONSE_TAGS.RCVDTCLASS,
]);

export function toJsonSocketAddress(addr: SocketAddress): JsonSocketAddress {
  if (addr.family === 'AF_INET') {
    return { family: addr.family, address: addr.address, port: addr.port };
  }
  return {
    family: addr.family,
    address: addr.address,
    port: addr.port,
    flowinfo: addr.flowinfo,
    scope_id: addr.scopeId,
  };
}

function readScalar(payload: Buffer, littleEndian: boolean): number | undefined {
  switch (payload.length) {
    case 1:
      return payload.readUInt8(0);
    case 2:
      return littleEndian ? payload.readUInt16LE(0) : payload.readUInt16BE(0);
    case 4:
      return littleEndian ? payload.readUInt32LE(0) : payload.readUInt32BE(0);
    default:
      return undefined;
  }
}

/** One record as a JSON response entry. */
export function encodeRecordJson(record: LogRecord, wire: WireFormat): JsonResponse {
  const { tag, payload } = record;
  const entry: JsonResponse = { type: tag, type_name: primaryKindName(tag), size: payload.length };
  if (payload.length === 0) return entry;

  if (tag === RESPONSE_TAGS.PACKET) {
    entry.packet_data = payload.toString('hex');
    return entry;
  }
  if (SOCKADDR_TAGS.has(tag) && payload.length >= MIN_SOCKADDR_SIZE) {
    // Length-only matches stay raw; tag 4 also carries time values.
    const decoded = decodeSocketAddress(payload, wire);
    if (decoded.rule === 'family-tag') {
      entry.sockaddr = toJsonSocketAddress(decoded.address);
      return entry;
    }
  }
  if (SCALAR_TAGS.has(tag)) {
    const value = readScalar(payload, wire.littleEndian);
    if (value !== undefined) {
      entry.value = value;
      return entry;
    }
  }
  entry.raw_data = payload.toString('hex');
  return entry;
}

export function binaryToJsonDocument(
  records: readonly LogRecord[],
  originalFile: string,
  wire: WireFormat
): JsonLogDocument {
  return {
    version: JSON_FORMAT_VERSION,
    source: JSON_SOURCE,
    original_file: originalFile,
    responses: records.map((r) => encodeRecordJson(r, wire)),
    total_responses: records.length,
  };
}

/** Two-space indented text; always starts with the bytes isJsonLog() looks for. */
export function renderJsonDocument(doc: JsonLogDocument): string {
  return JSON.stringify(doc, null, 2) + '\n';
}

/** True when the first bytes of a log are the start of a pretty-printed JSON log. */
export function isJsonLog(head: Buffer): boolean {
  return head.length >= JSON_MAGIC.length && head.subarray(0, JSON_MAGIC.length).equals(JSON_MAGIC);
}
