/**
 * Structured training logs.
 *
 * Emits one JSON line per event with `ts`, `level`, `msg` and the event's
 * fields, to stdout by default. The threshold comes from `ARBOR_LOG_LEVEL`
 * unless a level is passed.
 */

import type { LogLevel } from './config.js';
import { resolveLogLevel } from './config.js';

export type LogFields = Record<string, unknown>;

export interface TreeLogger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Sink for serialized lines (newline included). */
  write?: (line: string) => void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Infinity,
};

export function createLogger(options: LoggerOptions = {}): TreeLogger {
  const threshold = SEVERITY[options.level ?? resolveLogLevel()];
  const write = options.write ?? ((line: string) => process.stdout.write(line));

  const emit = (level: Exclude<LogLevel, 'silent'>, msg: string, fields?: LogFields) => {
    if (SEVERITY[level] < threshold) return;
    const entry = { ts: new Date().toISOString(), level, msg, ...fields };
    write(JSON.stringify(entry) + '\n');
  };

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  };
}

export const silentLogger: TreeLogger = createLogger({ level: 'silent' });
