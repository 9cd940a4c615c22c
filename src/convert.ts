/**
 * Batch conversion of binary logs into JSON logs. Directory mode keeps going
 * past a file that fails and reports it in the summary.
 */

import { mkdirSync, readdirSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { BINARY_LOG_EXTENSION, JSON_LOG_EXTENSION } from './constants.js';
import { PathError, errorMessage } from './errors.js';
import { binaryToJsonDocument, renderJsonDocument } from './json-encoder.js';
import { logError, logInfo, logWarn } from './logger.js';
import { BinaryRecordReader, readAllRecords } from './reader.js';
import { FileSource } from './source.js';
import type { LogRecord } from './types.js';
import { validateReplayConfig } from './validation.js';
import type { ReplayConfig } from './validation.js';

export interface ConversionFailure {
  input: string;
  error: string;
}

export interface DirectorySummary {
  converted: { input: string; output: string; responses: number }[];
  failed: ConversionFailure[];
}

/** Input path with its extension replaced by `.json`. */
export function defaultOutputPath(input: string): string {
  const parsed = path.parse(input);
  return path.join(parsed.dir, parsed.name + JSON_LOG_EXTENSION);
}

/**
 * Converts one binary log; returns the number of responses written.
 * Throws PathError when the input cannot be opened or the output cannot be created.
 */
export function convertFile(input: string, output: string, config?: ReplayConfig): number {
  const options = validateReplayConfig(config);
  const reader = new BinaryRecordReader(FileSource.open(input), options);
  let records: LogRecord[];
  try {
    records = readAllRecords(reader);
  } finally {
    reader.close();
  }
  const doc = binaryToJsonDocument(records, input, options.wire);
  try {
    writeFileSync(output, renderJsonDocument(doc));
  } catch (err) {
    throw new PathError(`cannot create ${output}: ${errorMessage(err)}`, output);
  }
  logInfo('Converted response log', { input, output, responses: doc.total_responses });
  return doc.total_responses;
}

/**
 * Converts every top-level `*.net` file of `inputDir` into `outputDir/<name>.json`.
 * Only a missing or unreadable input directory is fatal.
 */
export function convertDirectory(inputDir: string, outputDir: string, config?: ReplayConfig): DirectorySummary {
  let names: string[];
  try {
    names = readdirSync(inputDir);
  } catch (err) {
    throw new PathError(`cannot read directory ${inputDir}: ${errorMessage(err)}`, inputDir);
  }
  try {
    mkdirSync(outputDir, { recursive: true });
  } catch (err) {
    throw new PathError(`cannot create directory ${outputDir}: ${errorMessage(err)}`, outputDir);
  }

  const summary: DirectorySummary = { converted: [], failed: [] };
  for (const name of names.filter((n) => n.endsWith(BINARY_LOG_EXTENSION)).sort()) {
    const input = path.join(inputDir, name);
    const output = path.join(outputDir, path.parse(name).name + JSON_LOG_EXTENSION);
    try {
      if (!statSync(input).isFile()) {
        logWarn('Skipping non-file entry', { input });
        continue;
      }
      const responses = convertFile(input, output, config);
      summary.converted.push({ input, output, responses });
    } catch (err) {
      const error = errorMessage(err);
      logError('Conversion failed', { input, error });
      summary.failed.push({ input, error });
    }
  }
  return summary;
}
