/**
 * pipestep configuration schema and config file resolution.
 *
 * Defines the TypeScript types for the `pipestep.toml` sections, the
 * config path resolution, and `parseConfig()` which validates a raw
 * parsed object into a typed `EngineConfig`.
 */

import { join } from 'node:path';
import type { LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

const VALID_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error']);

/** `[logging]` section of pipestep.toml. */
export interface LoggingConfig {
  level: LogLevel;
}

/** `[errors]` section of pipestep.toml. */
export interface ErrorsConfig {
  /** Include error names and internal codes in mapped error responses. */
  include_debug_info: boolean;
  /** Include stack traces in mapped error responses. Requires debug info. */
  include_stack_trace: boolean;
}

/** `[performance]` section of pipestep.toml. */
export interface PerformanceConfig {
  enabled: boolean;
  log_slow_executions: boolean;
  slow_threshold_ms: number;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

/**
 * Full engine configuration.
 *
 * Known sections are strongly typed. Unknown top-level keys are
 * preserved as-is so embedding applications can keep their own
 * sections in the same file.
 */
export interface EngineConfig {
  logging: LoggingConfig;
  errors: ErrorsConfig;
  performance: PerformanceConfig;
  [section: string]: unknown;
}

/** Default configuration applied when pipestep.toml is absent or partial. */
export const DEFAULT_CONFIG: EngineConfig = {
  logging: { level: 'info' },
  errors: { include_debug_info: false, include_stack_trace: false },
  performance: { enabled: true, log_slow_executions: true, slow_threshold_ms: 1000 },
};

const KNOWN_SECTIONS: ReadonlySet<string> = new Set(['logging', 'errors', 'performance']);

// ---------------------------------------------------------------------------
// resolveConfigPath()
// ---------------------------------------------------------------------------

/**
 * Resolve the config file path.
 *
 * Precedence:
 *  1. `$PIPESTEP_CONFIG` environment variable (if non-empty)
 *  2. `pipestep.toml` in the given directory (defaults to the cwd)
 */
export function resolveConfigPath(dir: string = process.cwd()): string {
  const envValue = process.env['PIPESTEP_CONFIG'];
  if (envValue && envValue.length > 0) {
    return envValue;
  }
  return join(dir, 'pipestep.toml');
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

function readSection(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = raw[name];
  if (section === undefined) return {};
  if (typeof section !== 'object' || section === null || Array.isArray(section)) {
    throw new Error(`[${name}] must be a table`);
  }
  return { ...section };
}

function readBoolean(
  section: Record<string, unknown>,
  sectionName: string,
  key: string,
  fallback: boolean,
): boolean {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new Error(`${sectionName}.${key} must be a boolean`);
  }
  return value;
}

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into
 * a fully typed `EngineConfig`. Applies defaults for missing sections
 * and validates known fields.
 */
export function parseConfig(raw: Record<string, unknown>): EngineConfig {
  const extra: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.has(key)) {
      extra[key] = raw[key];
    }
  }

  // --- logging ---
  const rawLogging = readSection(raw, 'logging');
  const level = rawLogging['level'] ?? DEFAULT_CONFIG.logging.level;
  if (typeof level !== 'string' || !isLogLevel(level)) {
    throw new Error(
      `Invalid logging.level: "${String(level)}". ` +
        `Must be one of: ${[...VALID_LEVELS].join(', ')}`,
    );
  }

  // --- errors ---
  const rawErrors = readSection(raw, 'errors');
  const includeDebugInfo = readBoolean(
    rawErrors,
    'errors',
    'include_debug_info',
    DEFAULT_CONFIG.errors.include_debug_info,
  );
  const includeStackTrace = readBoolean(
    rawErrors,
    'errors',
    'include_stack_trace',
    DEFAULT_CONFIG.errors.include_stack_trace,
  );
  if (includeStackTrace && !includeDebugInfo) {
    throw new Error('errors.include_stack_trace requires errors.include_debug_info');
  }

  // --- performance ---
  const rawPerformance = readSection(raw, 'performance');
  const threshold =
    rawPerformance['slow_threshold_ms'] ?? DEFAULT_CONFIG.performance.slow_threshold_ms;
  if (typeof threshold !== 'number' || !Number.isInteger(threshold) || threshold < 0) {
    throw new Error('performance.slow_threshold_ms must be a non-negative integer');
  }

  return {
    ...extra,
    logging: { level },
    errors: { include_debug_info: includeDebugInfo, include_stack_trace: includeStackTrace },
    performance: {
      enabled: readBoolean(
        rawPerformance,
        'performance',
        'enabled',
        DEFAULT_CONFIG.performance.enabled,
      ),
      log_slow_executions: readBoolean(
        rawPerformance,
        'performance',
        'log_slow_executions',
        DEFAULT_CONFIG.performance.log_slow_executions,
      ),
      slow_threshold_ms: threshold,
    },
  };
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.has(value);
}
