/**
 * Structured logging: one JSON object per line with timestamp, level and message.
 * Errors go to stderr, everything else to stdout. Debug lines are dropped unless
 * NETREPLAY_DEBUG=1.
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogLine {
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Probe tool the log session belongs to, when one was set. */
  tool?: string;
  [key: string]: unknown;
}

const DEBUG_ENV = 'NETREPLAY_DEBUG';

function isoTimestamp(): string {
  return new Date().toISOString();
}

export function isDebugEnabled(): boolean {
  const value = process.env[DEBUG_ENV];
  return value === '1' || value === 'true';
}

function write(line: LogLine): void {
  const out = line.level === 'error' ? process.stderr : process.stdout;
  out.write(JSON.stringify(line) + '\n');
}

function emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
  write({
    timestamp: isoTimestamp(),
    level,
    message,
    ...extra,
  });
}

export function logInfo(message: string, extra?: Record<string, unknown>): void {
  emit('info', message, extra);
}

export function logWarn(message: string, extra?: Record<string, unknown>): void {
  emit('warn', message, extra);
}

export function logError(message: string, extra?: Record<string, unknown>): void {
  emit('error', message, extra);
}

export function logDebug(message: string, extra?: Record<string, unknown>): void {
  if (!isDebugEnabled()) return;
  emit('debug', message, extra);
}
