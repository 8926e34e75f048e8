/**
 * Structured JSON-lines logger.
 *
 * Every line written to `logs.jsonl` is one LogEntry. Data payloads are
 * redacted before they are buffered or written anywhere.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { redact } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  action: string;
  message: string;
  run_id?: string;
  data?: Record<string, unknown>;
}

export interface StructuredLogger {
  debug(action: string, message: string, data?: Record<string, unknown>): void;
  info(action: string, message: string, data?: Record<string, unknown>): void;
  warn(action: string, message: string, data?: Record<string, unknown>): void;
  error(action: string, message: string, data?: Record<string, unknown>): void;
  fatal(action: string, message: string, data?: Record<string, unknown>): void;
  /** Logger for a sub-module sharing this logger's outputs and buffer. */
  child(module: string): StructuredLogger;
  /** Return all entries collected so far (for summary/artifact output). */
  entries(): readonly LogEntry[];
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export interface LoggerOptions {
  module: string;
  filePath?: string;
  minLevel?: LogLevel;
  /** Echo every entry to the sink, not just error and fatal. */
  json?: boolean;
  runId?: string;
  /** Defaults to stderr. */
  sink?: (line: string) => void;
}

export function createLogger(opts: LoggerOptions): StructuredLogger {
  return buildLogger(opts, []);
}

function buildLogger(opts: LoggerOptions, buffer: LogEntry[]): StructuredLogger {
  const minPriority = LEVEL_PRIORITY[opts.minLevel ?? 'info'];
  const sink = opts.sink ?? ((line: string): void => { process.stderr.write(line + '\n'); });

  function emit(level: LogLevel, action: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: opts.module,
      action,
      message,
      ...(opts.runId && { run_id: opts.runId }),
      ...(data && { data: redactRecord(data) }),
    };

    buffer.push(entry);

    const line = JSON.stringify(entry);

    if (opts.filePath) {
      mkdirSync(dirname(opts.filePath), { recursive: true });
      appendFileSync(opts.filePath, line + '\n', 'utf-8');
    }

    if (opts.json || level === 'error' || level === 'fatal') {
      sink(line);
    }
  }

  return {
    debug: (action, message, data) => emit('debug', action, message, data),
    info: (action, message, data) => emit('info', action, message, data),
    warn: (action, message, data) => emit('warn', action, message, data),
    error: (action, message, data) => emit('error', action, message, data),
    fatal: (action, message, data) => emit('fatal', action, message, data),
    child: (module) => buildLogger({ ...opts, module: `${opts.module}.${module}` }, buffer),
    entries: (): readonly LogEntry[] => buffer,
  };
}

function redactRecord(data: Record<string, unknown>): Record<string, unknown> {
  const out = redact(data);
  return typeof out === 'object' && out !== null ? Object.fromEntries(Object.entries(out)) : {};
}

/** Logger that drops everything. Default for library calls made without one. */
export const silentLogger: StructuredLogger = createLogger({
  module: 'silent',
  minLevel: 'fatal',
  sink: () => undefined,
});
