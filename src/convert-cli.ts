/**
 * `netreplay-convert <input-file> [output-file]`
 * `netreplay-convert <input-dir> <output-dir>`
 *
 * Exit codes: 0 = success (directory mode even when some files failed),
 * EXIT_USAGE (1) = bad arguments, EXIT_PATH (2) = input missing or the
 * single-file conversion failed.
 */

import { statSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { EXIT_PATH, EXIT_USAGE } from './constants.js';
import { errorMessage } from './errors.js';
import { convertDirectory, convertFile, defaultOutputPath } from './convert.js';
import { logError, logInfo } from './logger.js';
import { ValidationError, configFromEnv, validateReplayConfig } from './validation.js';
import type { ReplayConfig } from './validation.js';

export const USAGE = [
  'Usage: netreplay-convert [options] <input_file> [output_file]',
  '       netreplay-convert [options] <input_dir> <output_dir>',
  '',
  'Options:',
  '  -h, --help     Show this help message',
  '',
  'Examples:',
  '  netreplay-convert evping-4.net evping-4.json',
  '  netreplay-convert testsuite/evping-data/ testsuite-json/',
].join('\n');

export interface CliIo {
  out: (text: string) => void;
  env: NodeJS.ProcessEnv;
}

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(text + '\n'),
  env: process.env,
};

function parse(argv: string[]): { help: boolean; positionals: string[] } | null {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: { help: { type: 'boolean', short: 'h' } },
      allowPositionals: true,
      strict: true,
    });
    return { help: values.help === true, positionals };
  } catch (err) {
    logError('Invalid arguments', { error: errorMessage(err) });
    return null;
  }
}

export function runConvertCli(argv: string[], io: CliIo = defaultIo): number {
  const args = parse(argv);
  if (args === null) {
    io.out(USAGE);
    return EXIT_USAGE;
  }
  if (args.help) {
    io.out(USAGE);
    return 0;
  }
  const [input, outputArg, ...extra] = args.positionals;
  if (input === undefined || extra.length > 0) {
    io.out(USAGE);
    return EXIT_USAGE;
  }

  let config: ReplayConfig;
  try {
    config = configFromEnv(io.env);
    validateReplayConfig(config);
  } catch (err) {
    const field = err instanceof ValidationError ? err.field : undefined;
    logError('Invalid config: ' + errorMessage(err), field ? { field } : undefined);
    return EXIT_USAGE;
  }

  let isDirectory: boolean;
  try {
    isDirectory = statSync(input).isDirectory();
  } catch (err) {
    logError('Input path does not exist', { input, error: errorMessage(err) });
    return EXIT_PATH;
  }

  if (isDirectory) {
    if (outputArg === undefined) {
      io.out(USAGE);
      return EXIT_USAGE;
    }
    try {
      const summary = convertDirectory(input, outputArg, config);
      logInfo('Directory conversion finished', {
        input,
        output: outputArg,
        converted: summary.converted.length,
        failed: summary.failed.length,
      });
      return 0;
    } catch (err) {
      logError('Directory conversion failed', { input, error: errorMessage(err) });
      return EXIT_PATH;
    }
  }

  const output = outputArg ?? defaultOutputPath(input);
  try {
    convertFile(input, output, config);
    return 0;
  } catch (err) {
    logError('Conversion failed', { input, output, error: errorMessage(err) });
    return EXIT_PATH;
  }
}
