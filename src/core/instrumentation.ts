/**
 * Timing and outcome logging for pipelines and steps.
 *
 * Both factories return middleware that can be passed to a pipeline's
 * `middleware` / `stepMiddleware` options. Thresholds come from the
 * `[performance]` config section; with `enabled = false` the middleware
 * passes straight through.
 *
 * Pipelines defined with `logRequestResponse` get their request and
 * response logged as well, after masking (see payload-masker.ts).
 */

import type { PerformanceConfig } from '../types/config.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { createLogger, type Logger } from './logger.js';
import { maskPayload } from './payload-masker.js';
import { isPipelineError } from './pipeline-error.js';
import type { PipelineMiddleware, StepMiddleware } from './pipeline/types.js';

export interface InstrumentationOptions {
  /** Defaults to `createLogger('instrumentation')`. */
  logger?: Logger;
  performance?: PerformanceConfig;
}

function isSlow(performance: PerformanceConfig, durationMs: number): boolean {
  return performance.log_slow_executions && durationMs > performance.slow_threshold_ms;
}

// ---------------------------------------------------------------------------
// Pipeline middleware
// ---------------------------------------------------------------------------

export function createLoggingMiddleware(options: InstrumentationOptions = {}): PipelineMiddleware {
  const logger = options.logger ?? createLogger('instrumentation');
  const performance = options.performance ?? DEFAULT_CONFIG.performance;

  if (!performance.enabled) {
    return (_invocation, next) => next();
  }

  return async (invocation, next) => {
    const scoped = logger.withContext({ pipeline: invocation.pipeline, invocation: invocation.id });
    const logPayloads = invocation.logRequestResponse === true;
    const started = Date.now();

    const startMeta: Record<string, unknown> = {};
    if (invocation.description !== undefined) startMeta['description'] = invocation.description;
    if (invocation.tags !== undefined && invocation.tags.length > 0) startMeta['tags'] = invocation.tags;
    if (logPayloads) {
      startMeta['request'] = maskPayload(invocation.request).value;
      scoped.info(`${invocation.kind} started`, startMeta);
    } else {
      scoped.debug(`${invocation.kind} started`, startMeta);
    }

    try {
      const response = await next();
      const duration_ms = Date.now() - started;
      scoped.info(
        `${invocation.kind} finished`,
        logPayloads
          ? { ok: true, duration_ms, response: maskPayload(response).value }
          : { ok: true, duration_ms },
      );
      if (isSlow(performance, duration_ms)) {
        scoped.warn(`slow ${invocation.kind}`, {
          duration_ms,
          threshold_ms: performance.slow_threshold_ms,
        });
      }
      return response;
    } catch (err: unknown) {
      const duration_ms = Date.now() - started;
      if (isPipelineError(err)) {
        scoped.warn(`${invocation.kind} failed`, {
          ok: false,
          duration_ms,
          error_code: err.code,
          classification: err.classification,
        });
      } else {
        scoped.error(`${invocation.kind} failed`, { ok: false, duration_ms, error: err });
      }
      throw err;
    }
  };
}

// ---------------------------------------------------------------------------
// Step middleware
// ---------------------------------------------------------------------------

export function createStepLoggingMiddleware(options: InstrumentationOptions = {}): StepMiddleware {
  const logger = options.logger ?? createLogger('instrumentation');
  const performance = options.performance ?? DEFAULT_CONFIG.performance;

  if (!performance.enabled) {
    return (_step, next) => next();
  }

  return async (step, next) => {
    const scoped = logger.withContext({
      pipeline: step.pipeline,
      invocation: step.invocation,
      step: step.step,
    });
    const started = Date.now();

    const result = await next();
    const duration_ms = Date.now() - started;

    if (result.ok) {
      scoped.debug('step finished', { ok: true, duration_ms, index: step.index });
    } else {
      scoped.warn('step finished', {
        ok: false,
        duration_ms,
        index: step.index,
        error_code: result.error.code,
        classification: result.error.classification,
      });
    }

    if (isSlow(performance, duration_ms)) {
      scoped.warn('slow step', { duration_ms, threshold_ms: performance.slow_threshold_ms });
    }

    return result;
  };
}
