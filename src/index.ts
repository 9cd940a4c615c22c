/**
 * netreplay: capture and replay of network probe responses.
 * Binary record framing, cross-platform struct translation and JSON transcoding.
 */

export { openResponseLog, openResponseLogFromBuffer } from './session.js';
export type { ResponseLog } from './session.js';

export { BinaryRecordReader, readAllRecords } from './reader.js';
export type { BinaryReaderOptions } from './reader.js';
export { JsonRecordReader, parseJsonLog, socketAddressFromJson } from './json-reader.js';
export type { JsonReaderOptions } from './json-reader.js';
export {
  binaryToJsonDocument,
  encodeRecordJson,
  isJsonLog,
  renderJsonDocument,
  toJsonSocketAddress,
} from './json-encoder.js';

export { MemorySink, ResponseWriter, createBufferWriter, createFileWriter } from './writer.js';
export type { ByteSink } from './writer.js';
export { BufferSource, FileSource } from './source.js';
export type { ByteSource } from './source.js';

export {
  decodeAddrInfo,
  decodeNative,
  decodeSocketAddress,
  decodeTimeValue,
  encodeAddrInfo,
  encodeNative,
  encodeSocketAddress,
  encodeTimeValue,
  formatAddress,
  parseAddress,
  translatePayload,
} from './translator.js';
export type { SocketAddressDecode, SocketAddressRule, TranslateOptions } from './translator.js';
export { HOST_LAYOUTS, HOST_LAYOUT_NAMES, referenceLayout } from './layout.js';
export type { HostLayout, HostLayoutName } from './layout.js';

export { convertDirectory, convertFile, defaultOutputPath } from './convert.js';
export type { ConversionFailure, DirectorySummary } from './convert.js';

export {
  EXIT_PATH,
  EXIT_USAGE,
  JSON_FORMAT_VERSION,
  MAX_PAYLOAD_SIZE,
  REPLAY_DEFAULTS,
} from './constants.js';

export {
  RESPONSE_KINDS,
  RESPONSE_TAGS,
  kindsForTag,
  parseKindName,
  primaryKindName,
  tagOf,
} from './types.js';
export type {
  AddrInfo,
  JsonLogDocument,
  JsonResponse,
  JsonSocketAddress,
  LogRecord,
  NativeValue,
  ReadResult,
  RecordSource,
  ResponseKind,
  SocketAddress,
  TimeValue,
  WireFormat,
  WireTag,
} from './types.js';

export {
  BufferTooSmallError,
  CODEC_ERROR_CODES,
  CodecError,
  FormatError,
  LogWriteError,
  PathError,
  TypeMismatchError,
  UnsupportedConversionError,
} from './errors.js';
export type { CodecErrorCode } from './errors.js';

export { ValidationError, configFromEnv, validateReplayConfig } from './validation.js';
export type { ByteOrder, ReplayConfig, SessionOptions } from './validation.js';
