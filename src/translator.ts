/**
 * Struct translation: payload bytes captured under the reference layout are
 * decoded field by field and re-encoded in the decoding host's layout.
 *
 * Socket addresses go through an ordered decision chain. The order matters:
 * each step covers a producer quirk the earlier ones miss.
 *   1. IPv4 record size with an IPv4 (or unset) family tag
 *   2. IPv6 record size with an IPv6 alias (or unset) family tag
 *   3. length alone: up to 16 bytes is IPv4, 28 or more is IPv6
 *   4. verbatim copy, truncated to the destination
 */

import { isIPv4, isIPv6 } from 'node:net';
import { BufferTooSmallError, FormatError } from './errors.js';
import {
  AF_INET,
  AF_INET6_ALIASES,
  AF_UNSPEC,
  REFERENCE_ADDRINFO,
  REFERENCE_SOCKADDR_IN,
  REFERENCE_SOCKADDR_IN6,
  REFERENCE_TIMEVAL,
  REFERENCE_TIMEVAL32,
  readField,
  writeField,
} from './layout.js';
import type { HostLayout, TimevalSpec } from './layout.js';
import type {
  AddressFamily,
  AddrInfo,
  NativeValue,
  ResponseKind,
  SocketAddress,
  TimeValue,
  WireFormat,
} from './types.js';

// --- Address text ---

function formatIpv4(bytes: Buffer): string {
  return `${bytes[0]}.${bytes[1]}.${bytes[2]}.${bytes[3]}`;
}

/** Presentation form of a 4- or 16-byte address (RFC 5952 for IPv6). */
export function formatAddress(bytes: Buffer): string {
  if (bytes.length === 4) return formatIpv4(bytes);
  if (bytes.length !== 16) {
    throw new FormatError(`cannot format a ${bytes.length}-byte address`);
  }
  const mapped = bytes.subarray(0, 10).every((b) => b === 0) && bytes[10] === 0xff && bytes[11] === 0xff;
  if (mapped) return `::ffff:${formatIpv4(bytes.subarray(12))}`;

  const groups: number[] = [];
  for (let i = 0; i < 16; i += 2) groups.push(bytes.readUInt16BE(i));

  // Longest run of zero groups, at least two long; the first one wins a tie.
  let bestStart = -1;
  let bestLen = 0;
  for (let i = 0; i < 8; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < 8 && groups[j] === 0) j++;
    if (j - i > bestLen) {
      bestStart = i;
      bestLen = j - i;
    }
    i = j;
  }
  const hex = groups.map((g) => g.toString(16));
  if (bestLen < 2) return hex.join(':');
  const head = hex.slice(0, bestStart).join(':');
  const tail = hex.slice(bestStart + bestLen).join(':');
  return `${head}::${tail}`;
}

function parseIpv4(text: string): Buffer {
  return Buffer.from(text.split('.').map((part) => parseInt(part, 10)));
}

function parseIpv6(text: string): Buffer {
  const zone = text.indexOf('%');
  let body = zone >= 0 ? text.slice(0, zone) : text;
  const out = Buffer.alloc(16);

  let tailV4: Buffer | undefined;
  const lastColon = body.lastIndexOf(':');
  if (body.slice(lastColon + 1).includes('.')) {
    tailV4 = parseIpv4(body.slice(lastColon + 1));
    body = body.slice(0, lastColon + 1) + '0:0';
  }

  const toGroups = (part: string): number[] =>
    part === '' ? [] : part.split(':').map((g) => parseInt(g, 16));
  const gap = body.indexOf('::');
  let groups: number[];
  if (gap >= 0) {
    const head = toGroups(body.slice(0, gap));
    const tail = toGroups(body.slice(gap + 2));
    groups = [...head, ...new Array<number>(8 - head.length - tail.length).fill(0), ...tail];
  } else {
    groups = toGroups(body);
  }
  groups.forEach((g, i) => out.writeUInt16BE(g, i * 2));
  if (tailV4) tailV4.copy(out, 12);
  return out;
}

/** Address bytes for presentation text; throws FormatError when the text is not an address of that family. */
export function parseAddress(text: string, family: AddressFamily): Buffer {
  if (family === 'AF_INET') {
    if (!isIPv4(text)) throw new FormatError(`invalid IPv4 address: ${text}`);
    return parseIpv4(text);
  }
  if (!isIPv6(text)) throw new FormatError(`invalid IPv6 address: ${text}`);
  return parseIpv6(text);
}

export function anyAddress(family: AddressFamily): string {
  return family === 'AF_INET' ? '0.0.0.0' : '::';
}

// --- Socket addresses ---

export type SocketAddressRule = 'family-tag' | 'length-fallback';

export type SocketAddressDecode =
  | { rule: SocketAddressRule; address: SocketAddress }
  | { rule: 'verbatim' };

function decodeIpv4(ref: Buffer): SocketAddress {
  const { port, addr } = REFERENCE_SOCKADDR_IN;
  return {
    family: 'AF_INET',
    port: ref.readUInt16BE(port.offset),
    address: formatIpv4(ref.subarray(addr.offset, addr.offset + addr.length)),
  };
}

function decodeIpv6(ref: Buffer, littleEndian: boolean): SocketAddress {
  const { port, flowinfo, addr, scopeId } = REFERENCE_SOCKADDR_IN6;
  return {
    family: 'AF_INET6',
    port: ref.readUInt16BE(port.offset),
    flowinfo: readField(ref, flowinfo, littleEndian),
    address: formatAddress(ref.subarray(addr.offset, addr.offset + addr.length)),
    scopeId: readField(ref, scopeId, littleEndian),
  };
}

/** Copies `payload` into a zeroed buffer of `size` bytes, truncating or padding as needed. */
function fitTo(payload: Buffer, size: number): Buffer {
  const out = Buffer.alloc(size);
  payload.copy(out, 0, 0, Math.min(payload.length, size));
  return out;
}

export function decodeSocketAddress(payload: Buffer, wire: WireFormat): SocketAddressDecode {
  const len = payload.length;
  const tag = len >= 2 ? readField(payload, REFERENCE_SOCKADDR_IN.family, wire.littleEndian) : AF_UNSPEC;

  if (len === REFERENCE_SOCKADDR_IN.size && (tag === AF_INET || tag === AF_UNSPEC)) {
    return { rule: 'family-tag', address: decodeIpv4(payload) };
  }
  if (len === REFERENCE_SOCKADDR_IN6.size && (AF_INET6_ALIASES.includes(tag) || tag === AF_UNSPEC)) {
    return { rule: 'family-tag', address: decodeIpv6(payload, wire.littleEndian) };
  }
  if (len <= REFERENCE_SOCKADDR_IN.size) {
    return { rule: 'length-fallback', address: decodeIpv4(fitTo(payload, REFERENCE_SOCKADDR_IN.size)) };
  }
  if (len >= REFERENCE_SOCKADDR_IN6.size) {
    return {
      rule: 'length-fallback',
      address: decodeIpv6(payload.subarray(0, REFERENCE_SOCKADDR_IN6.size), wire.littleEndian),
    };
  }
  return { rule: 'verbatim' };
}

function writeFamily(out: Buffer, host: HostLayout, family: number, size: number): void {
  if (host.sockaddrLengthByte) {
    out.writeUInt8(size, 0);
    out.writeUInt8(family, 1);
  } else {
    writeField(out, { offset: 0, width: 2 }, family, host.littleEndian);
  }
}

/** Socket address in the host's native layout. */
export function encodeSocketAddress(addr: SocketAddress, host: HostLayout): Buffer {
  if (addr.family === 'AF_INET') {
    const spec = REFERENCE_SOCKADDR_IN;
    const out = Buffer.alloc(spec.size);
    writeFamily(out, host, host.afInet, spec.size);
    out.writeUInt16BE(addr.port, spec.port.offset);
    parseAddress(addr.address, 'AF_INET').copy(out, spec.addr.offset);
    return out;
  }
  const spec = REFERENCE_SOCKADDR_IN6;
  const out = Buffer.alloc(spec.size);
  writeFamily(out, host, host.afInet6, spec.size);
  out.writeUInt16BE(addr.port, spec.port.offset);
  writeField(out, spec.flowinfo, addr.flowinfo, host.littleEndian);
  parseAddress(addr.address, 'AF_INET6').copy(out, spec.addr.offset);
  writeField(out, spec.scopeId, addr.scopeId, host.littleEndian);
  return out;
}

// --- Address info ---

/** Null when the payload is shorter than a reference addrinfo. */
export function decodeAddrInfo(payload: Buffer, wire: WireFormat): AddrInfo | null {
  const spec = REFERENCE_ADDRINFO;
  if (payload.length < spec.size) return null;
  const le = wire.littleEndian;
  return {
    flags: readField(payload, spec.flags, le),
    family: readField(payload, spec.family, le),
    socktype: readField(payload, spec.socktype, le),
    protocol: readField(payload, spec.protocol, le),
    addrlen: readField(payload, spec.addrlen, le),
    canonicalName: null,
    addr: null,
    next: null,
  };
}

/** Address info in the host layout; pointer slots stay zero. */
export function encodeAddrInfo(info: AddrInfo, host: HostLayout): Buffer {
  const spec = host.addrinfo;
  const out = Buffer.alloc(spec.size);
  const le = host.littleEndian;
  writeField(out, REFERENCE_ADDRINFO.flags, info.flags, le);
  writeField(out, REFERENCE_ADDRINFO.family, info.family, le);
  writeField(out, REFERENCE_ADDRINFO.socktype, info.socktype, le);
  writeField(out, REFERENCE_ADDRINFO.protocol, info.protocol, le);
  writeField(out, spec.addrlen, info.addrlen, le);
  return out;
}

// --- Time values ---

/** Null when the payload is too short for either reference timeval. */
export function decodeTimeValue(payload: Buffer, wire: WireFormat): TimeValue | null {
  let spec: TimevalSpec;
  if (payload.length >= REFERENCE_TIMEVAL.size) spec = REFERENCE_TIMEVAL;
  else if (payload.length >= REFERENCE_TIMEVAL32.size) spec = REFERENCE_TIMEVAL32;
  else return null;
  return {
    seconds: readField(payload, spec.seconds, wire.littleEndian),
    microseconds: readField(payload, spec.microseconds, wire.littleEndian),
  };
}

export function encodeTimeValue(tv: TimeValue, host: HostLayout): Buffer {
  const spec = host.timeval;
  const out = Buffer.alloc(spec.size);
  writeField(out, spec.seconds, tv.seconds, host.littleEndian);
  writeField(out, spec.microseconds, tv.microseconds, host.littleEndian);
  return out;
}

// --- Dispatch on the expected kind ---

/** Host-layout bytes of a decoded value. */
export function encodeNative(native: NativeValue, host: HostLayout): Buffer {
  switch (native.kind) {
    case 'sockaddr':
      return encodeSocketAddress(native.value, host);
    case 'addrinfo':
      return encodeAddrInfo(native.value, host);
    case 'timeval':
      return encodeTimeValue(native.value, host);
    case 'bytes':
      return Buffer.from(native.value);
  }
}

const SOCKADDR_KINDS: ReadonlySet<ResponseKind> = new Set<ResponseKind>([
  'SOCKNAME',
  'DSTADDR',
  'PEERNAME',
  'ADDRINFO_SA',
]);

export function isSocketAddressKind(kind: ResponseKind): boolean {
  return SOCKADDR_KINDS.has(kind);
}

export interface TranslateOptions {
  wire: WireFormat;
  host: HostLayout;
  /** Destination capacity in bytes. */
  capacity: number;
}

/** Decoded form of a reference payload; anything without structure comes back as bytes. */
export function decodeNative(kind: ResponseKind, payload: Buffer, wire: WireFormat): NativeValue {
  if (payload.length > 0) {
    if (isSocketAddressKind(kind)) {
      const decoded = decodeSocketAddress(payload, wire);
      if (decoded.rule !== 'verbatim') return { kind: 'sockaddr', value: decoded.address };
    } else if (kind === 'ADDRINFO') {
      const info = decodeAddrInfo(payload, wire);
      if (info) return { kind: 'addrinfo', value: info };
    } else if (kind === 'TIMEOFDAY') {
      const tv = decodeTimeValue(payload, wire);
      if (tv) return { kind: 'timeval', value: tv };
    }
  }
  return { kind: 'bytes', value: Buffer.from(payload) };
}

/**
 * Host-layout bytes for a payload read as `kind`. Structured results that do
 * not fit the destination raise BufferTooSmallError; verbatim copies are
 * truncated to the capacity.
 */
export function translatePayload(kind: ResponseKind, payload: Buffer, opts: TranslateOptions): Buffer {
  const native = decodeNative(kind, payload, opts.wire);
  if (native.kind === 'bytes') {
    return native.value.subarray(0, Math.min(native.value.length, opts.capacity));
  }
  const out = encodeNative(native, opts.host);
  if (out.length > opts.capacity) {
    throw new BufferTooSmallError(out.length, opts.capacity);
  }
  return out;
}
