/**
 * Opening a response log for replay. The first bytes decide, once, whether the
 * session decodes binary records or a JSON log; the choice and the peek cache
 * live on the returned reader, so any number of logs can be open at once.
 */

import { readFileSync } from 'node:fs';
import { JSON_MAGIC } from './constants.js';
import { PathError, errorMessage } from './errors.js';
import { isJsonLog } from './json-encoder.js';
import { JsonRecordReader, parseJsonLog } from './json-reader.js';
import { logDebug } from './logger.js';
import { BinaryRecordReader } from './reader.js';
import { BufferSource, FileSource } from './source.js';
import type { RecordSource } from './types.js';
import { validateReplayConfig } from './validation.js';
import type { ReplayConfig, SessionOptions } from './validation.js';

export type ResponseLog = RecordSource;

function openJson(text: string, options: SessionOptions): JsonRecordReader {
  return new JsonRecordReader(parseJsonLog(text), {
    host: options.host,
    strict: options.strictJson,
    tool: options.tool,
  });
}

/** Opens an in-memory log (binary or JSON). */
export function openResponseLogFromBuffer(bytes: Buffer, config?: ReplayConfig): ResponseLog {
  const options = validateReplayConfig(config);
  if (isJsonLog(bytes)) {
    logDebug('JSON response log detected', { tool: options.tool });
    return openJson(bytes.toString('utf8'), options);
  }
  logDebug('Binary response log detected', { tool: options.tool });
  return new BinaryRecordReader(new BufferSource(bytes), options);
}

/**
 * Opens a log file. Binary logs are streamed with synchronous reads; JSON logs
 * are parsed whole. Throws PathError when the file cannot be opened.
 */
export function openResponseLog(path: string, config?: ReplayConfig): ResponseLog {
  const options = validateReplayConfig(config);
  const source = FileSource.open(path);
  let head: Buffer;
  try {
    head = source.read(JSON_MAGIC.length);
  } catch (err) {
    source.close();
    throw new PathError(`cannot read ${path}: ${errorMessage(err)}`, path);
  }
  if (isJsonLog(head)) {
    source.close();
    logDebug('JSON response log detected', { path, tool: options.tool });
    let text: string;
    try {
      text = readFileSync(path, 'utf8');
    } catch (err) {
      throw new PathError(`cannot read ${path}: ${errorMessage(err)}`, path);
    }
    return openJson(text, options);
  }
  source.rewind();
  logDebug('Binary response log detected', { path, tool: options.tool });
  return new BinaryRecordReader(source, options);
}
