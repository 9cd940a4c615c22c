#!/usr/bin/env node
/**
 * CLI entrypoint for netreplay-convert; see convert-cli.ts for usage and exit codes.
 */

import { EXIT_PATH } from './constants.js';
import { runConvertCli } from './convert-cli.js';
import { logError } from './logger.js';

try {
  process.exitCode = runConvertCli(process.argv.slice(2));
} catch (err) {
  logError('Converter failed', { err: String(err) });
  process.exitCode = EXIT_PATH;
}
