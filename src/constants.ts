/** Exit code: bad command-line usage. */
export const EXIT_USAGE = 1;
/** Exit code: input path missing, unreadable, or the single-file conversion failed. */
export const EXIT_PATH = 2;

/** Hard ceiling on a declared payload length; anything larger means a corrupted size field. */
export const MAX_PAYLOAD_SIZE = 1_048_576;

/** Width of the type field in the binary framing (signed 32-bit). */
export const TYPE_FIELD_SIZE = 4;

export const JSON_FORMAT_VERSION = '2.0';
export const JSON_SOURCE = 'netreplay converter';

/**
 * First bytes of a pretty-printed JSON log: an opening brace, a newline,
 * two spaces of indent and the start of the "version" key.
 */
export const JSON_MAGIC = Buffer.from('{\n  "v', 'latin1');

/** Extension of binary logs picked up in directory mode. */
export const BINARY_LOG_EXTENSION = '.net';
export const JSON_LOG_EXTENSION = '.json';

/**
 * Defaults applied by validateReplayConfig. Byte order and size width describe
 * the producer of the log; 'host' means the decoding host's own byte order.
 */
export const REPLAY_DEFAULTS = {
  hostLayout: 'linux-x64',
  byteOrder: 'host',
  sizeWidth: 8,
  strictJson: false,
} as const;
