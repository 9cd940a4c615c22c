/**
 * Typed failures raised by the codec, the writer and the converter.
 * Format, type and buffer failures are fatal for the log session they occur in.
 */

import { primaryKindName } from './types.js';
import type { ResponseKind, WireTag } from './types.js';

export const CODEC_ERROR_CODES = {
  FORMAT_ERROR: 'FORMAT_ERROR',
  TYPE_MISMATCH: 'TYPE_MISMATCH',
  BUFFER_TOO_SMALL: 'BUFFER_TOO_SMALL',
  UNSUPPORTED_CONVERSION: 'UNSUPPORTED_CONVERSION',
  PATH_ERROR: 'PATH_ERROR',
  WRITE_ERROR: 'WRITE_ERROR',
} as const;

export type CodecErrorCode = (typeof CODEC_ERROR_CODES)[keyof typeof CODEC_ERROR_CODES];

export class CodecError extends Error {
  constructor(
    message: string,
    public readonly code: CodecErrorCode
  ) {
    super(message);
    this.name = 'CodecError';
    Object.setPrototypeOf(this, CodecError.prototype);
  }
}

/** Short read on a framing field, a declared size above the ceiling, or a malformed JSON log. */
export class FormatError extends CodecError {
  constructor(message: string) {
    super(message, CODEC_ERROR_CODES.FORMAT_ERROR);
    this.name = 'FormatError';
    Object.setPrototypeOf(this, FormatError.prototype);
  }
}

export class TypeMismatchError extends CodecError {
  constructor(
    public readonly expected: ResponseKind,
    public readonly expectedTag: WireTag,
    public readonly actualTag: WireTag,
    public readonly tool?: string
  ) {
    super(
      `wrong response type: expected ${expected} (${expectedTag}), got ${primaryKindName(actualTag)} (${actualTag})` +
        ` - tool: ${tool ?? 'unknown'}`,
      CODEC_ERROR_CODES.TYPE_MISMATCH
    );
    this.name = 'TypeMismatchError';
    Object.setPrototypeOf(this, TypeMismatchError.prototype);
  }
}

export class BufferTooSmallError extends CodecError {
  constructor(
    public readonly declared: number,
    public readonly capacity: number
  ) {
    super(
      `payload of ${declared} bytes does not fit in a ${capacity}-byte buffer`,
      CODEC_ERROR_CODES.BUFFER_TOO_SMALL
    );
    this.name = 'BufferTooSmallError';
    Object.setPrototypeOf(this, BufferTooSmallError.prototype);
  }
}

export class UnsupportedConversionError extends CodecError {
  constructor(
    message: string,
    public readonly kind?: ResponseKind
  ) {
    super(message, CODEC_ERROR_CODES.UNSUPPORTED_CONVERSION);
    this.name = 'UnsupportedConversionError';
    Object.setPrototypeOf(this, UnsupportedConversionError.prototype);
  }
}

export class PathError extends CodecError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message, CODEC_ERROR_CODES.PATH_ERROR);
    this.name = 'PathError';
    Object.setPrototypeOf(this, PathError.prototype);
  }
}

export class LogWriteError extends CodecError {
  constructor(message: string) {
    super(message, CODEC_ERROR_CODES.WRITE_ERROR);
    this.name = 'LogWriteError';
    Object.setPrototypeOf(this, LogWriteError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
