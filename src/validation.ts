/**
 * Replay configuration: validation, defaults and environment overrides.
 * Invalid config produces a ValidationError naming the offending field.
 */

import { endianness } from 'node:os';
import { REPLAY_DEFAULTS } from './constants.js';
import { HOST_LAYOUTS, HOST_LAYOUT_NAMES, isHostLayoutName } from './layout.js';
import type { HostLayout } from './layout.js';
import type { WireFormat } from './types.js';

export type ByteOrder = 'little' | 'big' | 'host';

/** User-facing options for opening or writing a log; every field is optional. */
export interface ReplayConfig {
  /** Native layout of the decoding host (see HOST_LAYOUT_NAMES). */
  hostLayout?: string;
  /** Byte order the log's producer wrote in. */
  byteOrder?: ByteOrder;
  /** Width in bytes of the size field (the producer's word size). */
  sizeWidth?: number;
  /** JSON logs: fail on kinds that cannot be rebuilt instead of yielding empty payloads. */
  strictJson?: boolean;
  /** Probe tool name used in diagnostics. */
  tool?: string;
}

/** Normalized options every reader and writer is built from. */
export interface SessionOptions {
  wire: WireFormat;
  host: HostLayout;
  strictJson: boolean;
  tool?: string;
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

function assert(condition: boolean, message: string, field?: string): asserts condition {
  if (!condition) {
    throw new ValidationError(message, field);
  }
}

function isByteOrder(value: unknown): value is ByteOrder {
  return value === 'little' || value === 'big' || value === 'host';
}

/**
 * Validates user config and applies REPLAY_DEFAULTS.
 * Throws ValidationError with a clear message (and the field) on invalid config.
 */
export function validateReplayConfig(config: ReplayConfig = {}): SessionOptions {
  assert(config != null && typeof config === 'object', 'config must be an object');

  const hostLayout = config.hostLayout ?? REPLAY_DEFAULTS.hostLayout;
  assert(
    typeof hostLayout === 'string' && isHostLayoutName(hostLayout),
    `hostLayout must be one of ${HOST_LAYOUT_NAMES.join(', ')}`,
    'hostLayout'
  );

  const byteOrder: unknown = config.byteOrder ?? REPLAY_DEFAULTS.byteOrder;
  assert(isByteOrder(byteOrder), 'byteOrder must be little, big or host', 'byteOrder');

  const sizeWidth = config.sizeWidth ?? REPLAY_DEFAULTS.sizeWidth;
  assert(sizeWidth === 4 || sizeWidth === 8, 'sizeWidth must be 4 or 8', 'sizeWidth');

  const strictJson = config.strictJson ?? REPLAY_DEFAULTS.strictJson;
  assert(typeof strictJson === 'boolean', 'strictJson must be a boolean', 'strictJson');

  assert(
    config.tool === undefined || (typeof config.tool === 'string' && config.tool !== ''),
    'tool must be a non-empty string',
    'tool'
  );

  const littleEndian = byteOrder === 'host' ? endianness() === 'LE' : byteOrder === 'little';
  return {
    wire: { littleEndian, sizeWidth },
    host: HOST_LAYOUTS[hostLayout],
    strictJson,
    ...(config.tool !== undefined && { tool: config.tool }),
  };
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === '1' || value === 'true';
}

/**
 * Config from NETREPLAY_HOST_LAYOUT, NETREPLAY_BYTE_ORDER, NETREPLAY_SIZE_WIDTH
 * and NETREPLAY_STRICT_JSON. Unset variables leave the field to its default;
 * values are checked by validateReplayConfig, not here.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ReplayConfig {
  const config: ReplayConfig = {};
  if (env.NETREPLAY_HOST_LAYOUT) config.hostLayout = env.NETREPLAY_HOST_LAYOUT;
  const byteOrder = env.NETREPLAY_BYTE_ORDER;
  if (byteOrder) {
    if (!isByteOrder(byteOrder)) {
      throw new ValidationError('NETREPLAY_BYTE_ORDER must be little, big or host', 'byteOrder');
    }
    config.byteOrder = byteOrder;
  }
  if (env.NETREPLAY_SIZE_WIDTH) config.sizeWidth = parseInt(env.NETREPLAY_SIZE_WIDTH, 10);
  const strictJson = envFlag(env.NETREPLAY_STRICT_JSON);
  if (strictJson !== undefined) config.strictJson = strictJson;
  return config;
}
