/**
 * Declared structure layouts. Every field is read or written at a fixed offset
 * with a fixed width and byte order; payloads are never reinterpreted wholesale.
 *
 * The reference layout is the one logs are captured under (Linux x86-64 field
 * offsets, producer byte order). Host layouts describe where a decoding host
 * expects the same fields.
 */

import type { WireFormat } from './types.js';

export type FieldWidth = 1 | 2 | 4 | 8;

export interface FieldSpec {
  offset: number;
  width: FieldWidth;
  signed?: boolean;
}

// --- Reference (capture) layout ---

export const AF_INET = 2;
/** IPv6 family values seen across producers: Linux, Net/OpenBSD, FreeBSD, Darwin. */
export const AF_INET6_ALIASES: readonly number[] = [10, 24, 28, 30];
/** Family tag some producers leave unset. */
export const AF_UNSPEC = 0;

export const REFERENCE_SOCKADDR_IN = {
  size: 16,
  family: { offset: 0, width: 2 },
  /** Network byte order; copied verbatim. */
  port: { offset: 2, width: 2 },
  addr: { offset: 4, length: 4 },
} as const;

export const REFERENCE_SOCKADDR_IN6 = {
  size: 28,
  family: { offset: 0, width: 2 },
  port: { offset: 2, width: 2 },
  flowinfo: { offset: 4, width: 4 },
  addr: { offset: 8, length: 16 },
  scopeId: { offset: 24, width: 4 },
} as const;

export interface TimevalSpec {
  size: number;
  seconds: FieldSpec;
  microseconds: FieldSpec;
}

export const REFERENCE_TIMEVAL: TimevalSpec = {
  size: 16,
  seconds: { offset: 0, width: 8, signed: true },
  microseconds: { offset: 8, width: 8, signed: true },
};

/** Older captures recorded a timeval with 32-bit fields. */
export const REFERENCE_TIMEVAL32: TimevalSpec = {
  size: 8,
  seconds: { offset: 0, width: 4, signed: true },
  microseconds: { offset: 4, width: 4, signed: true },
};

export const REFERENCE_ADDRINFO = {
  size: 48,
  flags: { offset: 0, width: 4, signed: true },
  family: { offset: 4, width: 4, signed: true },
  socktype: { offset: 8, width: 4, signed: true },
  protocol: { offset: 12, width: 4, signed: true },
  addrlen: { offset: 16, width: 4 },
  // ai_addr, ai_canonname and ai_next occupy 24, 32 and 40; never read.
} as const satisfies Record<string, number | FieldSpec>;

// --- Host layouts ---

/** Pointer slots follow `addrlen` and are always written as zero. */
export interface AddrInfoSpec {
  size: number;
  addrlen: FieldSpec;
}

export interface HostLayout {
  name: HostLayoutName;
  littleEndian: boolean;
  /** BSD-style socket addresses start with a one-byte length before a one-byte family. */
  sockaddrLengthByte: boolean;
  afInet: number;
  afInet6: number;
  timeval: TimevalSpec;
  addrinfo: AddrInfoSpec;
}

export const HOST_LAYOUT_NAMES = ['linux-x64', 'linux-ia32', 'freebsd-x64', 'darwin-arm64'] as const;

export type HostLayoutName = (typeof HOST_LAYOUT_NAMES)[number];

export const HOST_LAYOUTS: Record<HostLayoutName, HostLayout> = {
  'linux-x64': {
    name: 'linux-x64',
    littleEndian: true,
    sockaddrLengthByte: false,
    afInet: AF_INET,
    afInet6: 10,
    timeval: REFERENCE_TIMEVAL,
    addrinfo: {
      size: 48,
      addrlen: { offset: 16, width: 4 },
    },
  },
  'linux-ia32': {
    name: 'linux-ia32',
    littleEndian: true,
    sockaddrLengthByte: false,
    afInet: AF_INET,
    afInet6: 10,
    timeval: REFERENCE_TIMEVAL32,
    addrinfo: {
      size: 32,
      addrlen: { offset: 16, width: 4 },
    },
  },
  'freebsd-x64': {
    name: 'freebsd-x64',
    littleEndian: true,
    sockaddrLengthByte: true,
    afInet: AF_INET,
    afInet6: 28,
    timeval: REFERENCE_TIMEVAL,
    addrinfo: {
      size: 48,
      addrlen: { offset: 16, width: 4 },
    },
  },
  'darwin-arm64': {
    name: 'darwin-arm64',
    littleEndian: true,
    sockaddrLengthByte: true,
    afInet: AF_INET,
    afInet6: 30,
    // suseconds_t is 32-bit; the struct is padded back to 16 bytes.
    timeval: {
      size: 16,
      seconds: { offset: 0, width: 8, signed: true },
      microseconds: { offset: 8, width: 4, signed: true },
    },
    addrinfo: {
      size: 48,
      addrlen: { offset: 16, width: 4 },
    },
  },
};

export function isHostLayoutName(value: string): value is HostLayoutName {
  return HOST_LAYOUT_NAMES.some((name) => name === value);
}

/** The capture layout written in a given producer byte order (used when authoring fixtures). */
export function referenceLayout(wire: WireFormat): HostLayout {
  return { ...HOST_LAYOUTS['linux-x64'], littleEndian: wire.littleEndian };
}

// --- Field access ---

export function readField(buf: Buffer, field: FieldSpec, littleEndian: boolean): number {
  const { offset, width, signed } = field;
  switch (width) {
    case 1:
      return signed ? buf.readInt8(offset) : buf.readUInt8(offset);
    case 2:
      if (signed) return littleEndian ? buf.readInt16LE(offset) : buf.readInt16BE(offset);
      return littleEndian ? buf.readUInt16LE(offset) : buf.readUInt16BE(offset);
    case 4:
      if (signed) return littleEndian ? buf.readInt32LE(offset) : buf.readInt32BE(offset);
      return littleEndian ? buf.readUInt32LE(offset) : buf.readUInt32BE(offset);
    case 8: {
      if (signed) {
        return Number(littleEndian ? buf.readBigInt64LE(offset) : buf.readBigInt64BE(offset));
      }
      return Number(littleEndian ? buf.readBigUInt64LE(offset) : buf.readBigUInt64BE(offset));
    }
  }
}

export function writeField(buf: Buffer, field: FieldSpec, value: number, littleEndian: boolean): void {
  const { offset, width, signed } = field;
  switch (width) {
    case 1:
      if (signed) buf.writeInt8(value, offset);
      else buf.writeUInt8(value, offset);
      return;
    case 2:
      if (signed) {
        if (littleEndian) buf.writeInt16LE(value, offset);
        else buf.writeInt16BE(value, offset);
      } else if (littleEndian) buf.writeUInt16LE(value, offset);
      else buf.writeUInt16BE(value, offset);
      return;
    case 4:
      if (signed) {
        if (littleEndian) buf.writeInt32LE(value, offset);
        else buf.writeInt32BE(value, offset);
      } else if (littleEndian) buf.writeUInt32LE(value, offset);
      else buf.writeUInt32BE(value, offset);
      return;
    case 8: {
      const big = BigInt(value);
      if (signed) {
        if (littleEndian) buf.writeBigInt64LE(big, offset);
        else buf.writeBigInt64BE(big, offset);
      } else if (littleEndian) buf.writeBigUInt64LE(big, offset);
      else buf.writeBigUInt64BE(big, offset);
      return;
    }
  }
}
