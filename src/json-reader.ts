/**
 * JSON → records: replays a JSON response log through the same cursor
 * interface as the binary reader.
 *
 * Only socket addresses are rebuilt into native values. Every other kind reads
 * back as a zero-length payload, or raises UnsupportedConversionError when the
 * reader is strict.
 */

import { isIPv4, isIPv6 } from 'node:net';
import {
  BufferTooSmallError,
  CodecError,
  FormatError,
  TypeMismatchError,
  UnsupportedConversionError,
  errorMessage,
} from './errors.js';
import type { HostLayout } from './layout.js';
import { logDebug } from './logger.js';
import { anyAddress, encodeSocketAddress, isSocketAddressKind } from './translator.js';
import { parseKindName, tagOf } from './types.js';
import type {
  JsonLogDocument,
  JsonResponse,
  JsonSocketAddress,
  NativeValue,
  ReadResult,
  RecordSource,
  ResponseKind,
  SocketAddress,
  WireTag,
} from './types.js';

// --- Document validation ---

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function check(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new FormatError(`invalid JSON log: ${message}`);
  }
}

function optionalUint(obj: Record<string, unknown>, key: string, where: string, max: number): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  check(
    typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= max,
    `${where}.${key} must be an integer between 0 and ${max}`
  );
  return value;
}

function toSocketAddress(raw: unknown, where: string): JsonSocketAddress {
  check(isObject(raw), `${where} must be an object`);
  const family = raw.family;
  check(typeof family === 'string', `${where}.family must be a string`);
  const address = raw.address;
  check(
    address === undefined || address === null || typeof address === 'string',
    `${where}.address must be a string or null`
  );
  const known = family === 'AF_INET' || family === 'AF_INET6' ? family : 'AF_UNKNOWN';
  if (typeof address === 'string' && address !== '' && known !== 'AF_UNKNOWN') {
    const valid = known === 'AF_INET' ? isIPv4(address) : isIPv6(address);
    check(valid, `${where}.address is not a valid ${known} address: ${address}`);
  }
  const out: JsonSocketAddress = { family: known, address };
  const port = optionalUint(raw, 'port', where, 0xffff);
  const flowinfo = optionalUint(raw, 'flowinfo', where, 0xffffffff);
  const scopeId = optionalUint(raw, 'scope_id', where, 0xffffffff);
  if (port !== undefined) out.port = port;
  if (flowinfo !== undefined) out.flowinfo = flowinfo;
  if (scopeId !== undefined) out.scope_id = scopeId;
  return out;
}

function toResponse(raw: unknown, index: number): JsonResponse {
  const where = `responses[${index}]`;
  check(isObject(raw), `${where} must be an object`);
  const type = raw.type;
  check(
    (typeof type === 'number' && Number.isInteger(type)) || typeof type === 'string',
    `${where}.type must be an integer or a kind name`
  );
  const entry: JsonResponse = { type };
  if (raw.sockaddr !== undefined && raw.sockaddr !== null) {
    entry.sockaddr = toSocketAddress(raw.sockaddr, `${where}.sockaddr`);
  } else if (isObject(raw.data) && raw.data.family !== undefined) {
    entry.data = toSocketAddress(raw.data, `${where}.data`);
  }
  return entry;
}

/** Parses and validates a JSON log; throws FormatError on anything malformed. */
export function parseJsonLog(text: string): JsonLogDocument {
  const root = parseJson(text);
  check(isObject(root), 'document must be an object');
  const { version, responses: rawResponses, total_responses: total } = root;
  check(typeof version === 'string', 'version must be a string');
  check(Array.isArray(rawResponses), 'responses must be an array');
  const responses = rawResponses.map((r: unknown, i) => toResponse(r, i));
  check(
    total === undefined || total === responses.length,
    `total_responses is ${String(total)} but ${responses.length} responses are present`
  );
  return {
    version,
    source: typeof root.source === 'string' ? root.source : '',
    original_file: typeof root.original_file === 'string' ? root.original_file : '',
    responses,
    total_responses: responses.length,
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new FormatError(`invalid JSON log: ${errorMessage(err)}`);
  }
}

// --- Reader ---

export interface JsonReaderOptions {
  host: HostLayout;
  /** Raise UnsupportedConversionError instead of yielding empty payloads. */
  strict: boolean;
  tool?: string;
}

export function socketAddressFromJson(sa: JsonSocketAddress, kind?: ResponseKind): SocketAddress {
  const port = sa.port ?? 0;
  switch (sa.family) {
    case 'AF_INET':
      // A blank address is a lookup still in progress: the any-address.
      return { family: 'AF_INET', address: sa.address || anyAddress('AF_INET'), port };
    case 'AF_INET6':
      return {
        family: 'AF_INET6',
        address: sa.address || anyAddress('AF_INET6'),
        port,
        flowinfo: sa.flowinfo ?? 0,
        scopeId: sa.scope_id ?? 0,
      };
    case 'AF_UNKNOWN':
      throw new UnsupportedConversionError('cannot rebuild a socket address of unknown family', kind);
  }
}

export class JsonRecordReader implements RecordSource {
  readonly mode = 'json';
  private index = 0;
  private pendingTag: WireTag | null = null;
  private failure: CodecError | null = null;
  private tool: string | undefined;

  constructor(
    private readonly doc: JsonLogDocument,
    private readonly options: JsonReaderOptions
  ) {
    this.tool = options.tool;
  }

  get remaining(): number {
    return this.doc.responses.length - this.index;
  }

  setCurrentTool(name: string): void {
    this.tool = name;
    logDebug('Response tool set', { tool: name, mode: this.mode });
  }

  peekType(): WireTag | null {
    this.throwIfFailed();
    if (this.pendingTag === null && this.index < this.doc.responses.length) {
      this.pendingTag = this.resolveTag(this.doc.responses[this.index]);
    }
    return this.pendingTag;
  }

  readExpected(kind: ResponseKind, buffer: Buffer): ReadResult {
    const { tag, entry } = this.consume(kind);
    const address = this.socketAddressOf(kind, entry);
    const payload = address ? encodeSocketAddress(address, this.options.host) : Buffer.alloc(0);
    if (payload.length > buffer.length) {
      this.fail(new BufferTooSmallError(payload.length, buffer.length));
    }
    payload.copy(buffer, 0);
    return { tag, length: payload.length };
  }

  readValue(kind: ResponseKind): NativeValue {
    const { entry } = this.consume(kind);
    const address = this.socketAddressOf(kind, entry);
    return address ? { kind: 'sockaddr', value: address } : { kind: 'bytes', value: Buffer.alloc(0) };
  }

  close(): void {
    this.index = this.doc.responses.length;
    this.pendingTag = null;
  }

  private socketAddressOf(kind: ResponseKind, entry: JsonResponse): SocketAddress | null {
    if (!isSocketAddressKind(kind)) {
      if (this.options.strict) {
        throw new UnsupportedConversionError(`JSON logs cannot rebuild ${kind} payloads`, kind);
      }
      return null;
    }
    const sa = entry.sockaddr ?? entry.data;
    return sa ? socketAddressFromJson(sa, kind) : null;
  }

  private consume(kind: ResponseKind): { tag: WireTag; entry: JsonResponse } {
    const tag = this.peekType();
    if (tag === null) {
      this.fail(new FormatError(`unexpected end of JSON log while reading ${kind}`));
    }
    const expectedTag = tagOf(kind);
    if (tag !== expectedTag) {
      throw new TypeMismatchError(kind, expectedTag, tag, this.tool);
    }
    const entry = this.doc.responses[this.index];
    this.index++;
    this.pendingTag = null;
    return { tag, entry };
  }

  private resolveTag(entry: JsonResponse): WireTag {
    if (typeof entry.type === 'number') return entry.type;
    const kind = parseKindName(entry.type);
    if (kind === undefined) {
      this.fail(new FormatError(`unknown response type name: ${entry.type}`));
    }
    return tagOf(kind);
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
