/**
 * Shapes shared by the writer, the readers and the JSON transcoder.
 */

// --- Response kinds and their wire tags ---

/**
 * Wire tag of every response kind. Several kinds share a tag; the kind a caller
 * expects decides how a payload with that tag is interpreted.
 */
export const RESPONSE_TAGS = {
  PACKET: 1,
  SOCKNAME: 2,
  DSTADDR: 3,
  PEERNAME: 4,
  PROTO: 4,
  RCVDTTL: 5,
  RCVDTCLASS: 6,
  SENDTO: 7,
  ADDRINFO: 8,
  ADDRINFO_SA: 9,
  TTL: 4,
  TIMEOFDAY: 4,
  READ_ERROR: 4,
  N_RESOLV: 4,
  RESOLVER: 5,
  LENGTH: 6,
  DATA: 7,
  CMSG: 8,
  TIMEOUT: 9,
} as const;

export type ResponseKind = keyof typeof RESPONSE_TAGS;

/** Numeric value of the type field in a framed record. */
export type WireTag = number;

/** Every kind; for a shared tag the first one listed names it in JSON logs. */
export const RESPONSE_KINDS: readonly ResponseKind[] = [
  'PACKET',
  'SOCKNAME',
  'DSTADDR',
  'PEERNAME',
  'TTL',
  'TIMEOUT',
  'READ_ERROR',
  'LENGTH',
  'PROTO',
  'RCVDTTL',
  'RCVDTCLASS',
  'SENDTO',
  'CMSG',
  'DATA',
  'ADDRINFO',
  'ADDRINFO_SA',
  'RESOLVER',
  'N_RESOLV',
  'TIMEOFDAY',
];

export function isResponseKind(value: string): value is ResponseKind {
  return Object.prototype.hasOwnProperty.call(RESPONSE_TAGS, value);
}

export function tagOf(kind: ResponseKind): WireTag {
  return RESPONSE_TAGS[kind];
}

/** All kinds that share a wire tag. */
export function kindsForTag(tag: WireTag): ResponseKind[] {
  return RESPONSE_KINDS.filter((k) => RESPONSE_TAGS[k] === tag);
}

/** `RESP_<KIND>` name shown for a tag in JSON logs, or `UNKNOWN`. */
export function primaryKindName(tag: WireTag): string {
  const kind = RESPONSE_KINDS.find((k) => RESPONSE_TAGS[k] === tag);
  return kind !== undefined ? `RESP_${kind}` : 'UNKNOWN';
}

/** Accepts `SOCKNAME` or `RESP_SOCKNAME`; returns undefined for anything else. */
export function parseKindName(name: string): ResponseKind | undefined {
  const bare = name.startsWith('RESP_') ? name.slice(5) : name;
  return isResponseKind(bare) ? bare : undefined;
}

// --- Framing ---

/** Byte order and size-field width of the producer that wrote a binary log. */
export interface WireFormat {
  littleEndian: boolean;
  sizeWidth: 4 | 8;
}

/** One framed record as stored in a log. */
export interface LogRecord {
  tag: WireTag;
  payload: Buffer;
}

// --- Decoded (native) values ---

export type AddressFamily = 'AF_INET' | 'AF_INET6';

export interface Ipv4SocketAddress {
  family: 'AF_INET';
  /** Dotted-quad text. */
  address: string;
  port: number;
}

export interface Ipv6SocketAddress {
  family: 'AF_INET6';
  address: string;
  port: number;
  flowinfo: number;
  scopeId: number;
}

export type SocketAddress = Ipv4SocketAddress | Ipv6SocketAddress;

/**
 * Address-info node with its pointers dropped. Callers that need the canonical
 * name, the address or the next node materialize them on their own.
 */
export interface AddrInfo {
  flags: number;
  family: number;
  socktype: number;
  protocol: number;
  addrlen: number;
  canonicalName: null;
  addr: null;
  next: null;
}

export interface TimeValue {
  seconds: number;
  microseconds: number;
}

export type NativeValue =
  | { kind: 'sockaddr'; value: SocketAddress }
  | { kind: 'addrinfo'; value: AddrInfo }
  | { kind: 'timeval'; value: TimeValue }
  | { kind: 'bytes'; value: Buffer };

// --- Readers ---

/** Result of a consuming read: the caller's buffer was filled with `length` bytes. */
export interface ReadResult {
  tag: WireTag;
  length: number;
}

/**
 * Decode cursor over one open log. At most one peeked tag is pending at a time;
 * peekType() returns null at end of log.
 */
export interface RecordSource {
  readonly mode: 'binary' | 'json';
  setCurrentTool(name: string): void;
  peekType(): WireTag | null;
  readExpected(kind: ResponseKind, buffer: Buffer): ReadResult;
  readValue(kind: ResponseKind): NativeValue;
  close(): void;
}

// --- JSON log document ---

export interface JsonSocketAddress {
  family: AddressFamily | 'AF_UNKNOWN';
  address?: string | null;
  port?: number;
  flowinfo?: number;
  scope_id?: number;
}

export interface JsonResponse {
  type: number | string;
  type_name?: string;
  size?: number;
  sockaddr?: JsonSocketAddress;
  /** Older fixtures carry the socket address under `data`. */
  data?: JsonSocketAddress;
  packet_data?: string;
  raw_data?: string;
  value?: number;
}

export interface JsonLogDocument {
  version: string;
  source: string;
  original_file: string;
  responses: JsonResponse[];
  total_responses: number;
}
