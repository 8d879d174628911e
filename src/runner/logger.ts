/**
 * Structured JSON-lines logger for provisioning runs.
 *
 * Every entry is appended to `logs.jsonl` inside the run's artifact
 * directory and echoed to stderr, either as the raw JSON line or as a
 * `[LEVEL] message` line for an operator watching the terminal.  Data
 * payloads are redacted before they leave the process.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { redact, redactString } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  action: string;
  message: string;
  run_id?: string;
  profile?: string;
  data?: Record<string, unknown>;
}

export interface StructuredLogger {
  debug(action: string, message: string, data?: Record<string, unknown>): void;
  info(action: string, message: string, data?: Record<string, unknown>): void;
  warn(action: string, message: string, data?: Record<string, unknown>): void;
  error(action: string, message: string, data?: Record<string, unknown>): void;
  /** Return all entries collected so far (for summary/artifact output). */
  entries(): readonly LogEntry[];
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** How entries are mirrored to stderr. */
export type LogEcho = 'text' | 'json' | 'none';

export interface LoggerOptions {
  module: string;
  filePath?: string;
  minLevel?: LogLevel;
  echo?: LogEcho;
  runId?: string;
  profile?: string;
}

export function formatTextLine(entry: LogEntry): string {
  return `[${entry.level.toUpperCase()}] ${entry.message}`;
}

export function createLogger(opts: LoggerOptions): StructuredLogger {
  const buffer: LogEntry[] = [];
  const minPriority = LEVEL_PRIORITY[opts.minLevel ?? 'info'];
  const echo = opts.echo ?? 'none';

  if (opts.filePath) {
    mkdirSync(dirname(opts.filePath), { recursive: true });
  }

  function emit(level: LogLevel, action: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: opts.module,
      action,
      message: redactString(message),
      ...(opts.runId && { run_id: opts.runId }),
      ...(opts.profile && { profile: opts.profile }),
      ...(data && { data: redact(data) as Record<string, unknown> }),
    };

    buffer.push(entry);

    const line = JSON.stringify(entry);

    if (opts.filePath) {
      appendFileSync(opts.filePath, line + '\n', 'utf-8');
    }

    if (echo === 'json') {
      process.stderr.write(line + '\n');
    } else if (echo === 'text') {
      process.stderr.write(formatTextLine(entry) + '\n');
    }
  }

  return {
    debug: (action, message, data) => emit('debug', action, message, data),
    info: (action, message, data) => emit('info', action, message, data),
    warn: (action, message, data) => emit('warn', action, message, data),
    error: (action, message, data) => emit('error', action, message, data),
    entries: (): readonly LogEntry[] => buffer,
  };
}
