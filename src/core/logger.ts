/**
 * Structured JSON logging for pipestep.
 *
 * Provides component-scoped loggers with level filtering and injectable
 * sinks for testing. All log output is JSON-formatted with level, ts,
 * component and msg fields. Invocation fields (pipeline, invocation,
 * step) are promoted to top-level so a single run can be followed
 * across entries.
 *
 * @example
 * ```ts
 * const logger = createLogger('pipeline:user-summary');
 * logger.debug('step completed', { step: 'fetch-user', duration_ms: 3 });
 * // → {"level":"debug","ts":"...","component":"pipeline:user-summary","msg":"step completed","step":"fetch-user","duration_ms":3}
 * ```
 */

import { mkdirSync, appendFileSync } from 'node:fs';
import { dirname } from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  pipeline?: string;
  invocation?: string;
  step?: string;
  duration_ms?: number;
  ok?: boolean;
  error_code?: string;
  classification?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields that are automatically promoted to every log entry. */
export interface LogContext {
  pipeline?: string;
  invocation?: string;
  step?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = defaultSink;

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: info, sink: stdout JSON). */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = defaultSink;
}

function defaultSink(entry: LogEntry): void {
  process.stdout.write(JSON.stringify(entry) + '\n');
}

// ---------------------------------------------------------------------------
// NEVER_LOG_FIELDS: deny-listed metadata keys
// ---------------------------------------------------------------------------

/** Metadata keys that must never appear in log output. */
export const NEVER_LOG_FIELDS = new Set([
  'apiKey',
  'api_key',
  'password',
  'secret',
  'token',
  'credential',
  'authorization',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

/**
 * Strip denied keys, truncate long strings, and serialize Errors in metadata.
 */
function sanitizeMeta(meta?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!meta) return undefined;

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

const PROMOTED_KEYS: ReadonlySet<string> = new Set([
  'pipeline',
  'invocation',
  'step',
  'duration_ms',
  'ok',
  'error_code',
  'classification',
]);

function promote(entry: LogEntry, meta: Record<string, unknown>): void {
  const { pipeline, invocation, step, duration_ms, ok, error_code, classification } = meta;
  if (typeof pipeline === 'string') entry.pipeline = pipeline;
  if (typeof invocation === 'string') entry.invocation = invocation;
  if (typeof step === 'string') entry.step = step;
  if (typeof duration_ms === 'number') entry.duration_ms = duration_ms;
  if (typeof ok === 'boolean') entry.ok = ok;
  if (typeof error_code === 'string') entry.error_code = error_code;
  if (typeof classification === 'string') entry.classification = classification;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'pipeline:create-order'`).
 * @param boundContext - Optional context fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext) {
      if (boundContext.pipeline) entry.pipeline = boundContext.pipeline;
      if (boundContext.invocation) entry.invocation = boundContext.invocation;
      if (boundContext.step) entry.step = boundContext.step;
    }

    const sanitized = sanitizeMeta(meta);
    if (sanitized !== undefined) {
      promote(entry, sanitized);

      const remaining: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(sanitized)) {
        if (!PROMOTED_KEYS.has(key)) {
          remaining[key] = value;
        }
      }
      if (Object.keys(remaining).length > 0) {
        entry.meta = remaining;
      }
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => createLogger(component, { ...boundContext, ...ctx }),
  };
}

// ---------------------------------------------------------------------------
// FileLogSink: JSONL log files
// ---------------------------------------------------------------------------

/** A LogSink that appends JSONL to a file, with a close() method. */
export interface FileLogSink extends LogSink {
  (entry: LogEntry): void;
  close(): void;
}

/**
 * Create a LogSink that appends JSONL to a file at the given path.
 * The parent directory is created if missing. Entries written after
 * `close()` are dropped.
 *
 * @param fs - Optional filesystem abstraction for testing.
 */
export function createFileLogSink(
  filePath: string,
  fs?: {
    mkdirSync: (path: string, options: { recursive: boolean }) => void;
    appendFileSync: (path: string, data: string) => void;
  },
): FileLogSink {
  const fsMkdir = fs?.mkdirSync ?? mkdirSync;
  const fsAppend = fs?.appendFileSync ?? appendFileSync;

  fsMkdir(dirname(filePath), { recursive: true });

  let closed = false;

  const sink: LogSink = (entry: LogEntry): void => {
    if (closed) return;
    fsAppend(filePath, JSON.stringify(entry) + '\n');
  };

  return Object.assign(sink, {
    close: () => {
      closed = true;
    },
  });
}
