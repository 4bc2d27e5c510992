/**
 * Structured logging.
 *
 * Emits one JSON line per entry to stdout with ts, level, msg and any extra
 * fields. The threshold comes from DIRICHLET_LOG_LEVEL; the sink can be
 * swapped (tests capture entries instead of writing them).
 */

import { settings, type LogLevel } from '@dirichlet-counts/config';

export type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  ts: string;
  level: EntryLevel;
  msg: string;
  [field: string]: unknown;
}

export type LogSink = (entry: LogEntry) => void;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const stdoutSink: LogSink = (entry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

let threshold: LogLevel = settings.logLevel;
let sink: LogSink = stdoutSink;

/** Change the minimum level that reaches the sink. Returns the previous level. */
export function setLogLevel(level: LogLevel): LogLevel {
  const previous = threshold;
  threshold = level;
  return previous;
}

/** Replace the sink. Returns the previous one so callers can restore it. */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

function emit(level: EntryLevel, msg: string, fields: Record<string, unknown> = {}): void {
  if (RANK[level] < RANK[threshold]) return;
  sink({ ...fields, ts: new Date().toISOString(), level, msg });
}

export const log = {
  debug: (msg: string, fields?: Record<string, unknown>) => emit('debug', msg, fields),
  info: (msg: string, fields?: Record<string, unknown>) => emit('info', msg, fields),
  warn: (msg: string, fields?: Record<string, unknown>) => emit('warn', msg, fields),
  error: (msg: string, fields?: Record<string, unknown>) => emit('error', msg, fields),
};
