/**
 * Shared execution helpers for query and command pipelines: step list
 * resolution, the fail-fast step loop, and masking of unexpected errors.
 */

import { ErrorClassification, ErrorCode } from '../../types/errors.js';
import type { Logger } from '../logger.js';
import { PipelineError, isPipelineError } from '../pipeline-error.js';
import { composeStepMiddleware } from './middleware.js';
import type { StepFailure, StepResult } from './step-result.js';
import type { MaybePromise, PipelineKind, StepMiddleware, StepSource } from './types.js';

// ---------------------------------------------------------------------------
// Masking
// ---------------------------------------------------------------------------

/** Caller-safe messages for unexpected failures. */
export const SYSTEM_ERROR_MESSAGES: Readonly<Record<PipelineKind, string>> = {
  query: 'System error during query',
  command: 'System error during command',
};

export function maskedSystemFailure(kind: PipelineKind): StepFailure {
  return {
    message: SYSTEM_ERROR_MESSAGES[kind],
    code: ErrorCode.SYS_001,
    classification: ErrorClassification.SYSTEM,
  };
}

export function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Pass PipelineErrors through; log anything else with its full detail and
 * replace it with the generic SYSTEM error.
 */
export function toPipelineError(err: unknown, kind: PipelineKind, logger: Logger): PipelineError {
  if (isPipelineError(err)) {
    return err;
  }

  logger.error(`unexpected error during ${kind}`, { error: asError(err) });
  return PipelineError.fromFailure(maskedSystemFailure(kind));
}

// ---------------------------------------------------------------------------
// Step resolution
// ---------------------------------------------------------------------------

/** Resolve the step list once; later changes to the source are not seen. */
export function resolveSteps<TIn, TContext, TStep>(
  source: StepSource<TIn, TContext, TStep>,
  request: TIn,
  context: TContext,
): readonly TStep[] {
  const steps = typeof source === 'function' ? source(request, context) : source;
  return [...steps];
}

// ---------------------------------------------------------------------------
// Step loop
// ---------------------------------------------------------------------------

interface RunnableStep<TContext> {
  name?: string;
  execute(context: TContext): MaybePromise<StepResult<unknown>>;
}

export interface StepRunDeps {
  pipeline: string;
  invocation: string;
  kind: PipelineKind;
  logger: Logger;
  stepMiddleware: readonly StepMiddleware[];
}

export type StepRunOutcome = { ok: true } | { ok: false; failure: StepFailure; step: string };

/**
 * Run steps strictly in order. Stops at the first failure result or throw;
 * the remaining steps are never called.
 *
 * A thrown PipelineError keeps its classification. Any other throw is
 * logged here, with the step name, and becomes the masked SYSTEM failure.
 */
export async function runSteps<TContext>(
  steps: readonly RunnableStep<TContext>[],
  context: TContext,
  deps: StepRunDeps,
): Promise<StepRunOutcome> {
  const { logger } = deps;

  for (const [index, step] of steps.entries()) {
    const name = step.name ?? `step-${index + 1}`;
    const started = Date.now();
    const call = composeStepMiddleware(
      { pipeline: deps.pipeline, invocation: deps.invocation, step: name, index },
      async () => step.execute(context),
      deps.stepMiddleware,
    );

    logger.debug('step started', { step: name, index });

    let result: StepResult<unknown>;
    try {
      result = await call();
    } catch (err: unknown) {
      const duration_ms = Date.now() - started;

      if (isPipelineError(err)) {
        logger.warn('step raised classified error', {
          step: name,
          index,
          duration_ms,
          error_code: err.code,
          classification: err.classification,
          reason: err.message,
        });
        return {
          ok: false,
          failure: { message: err.message, code: err.code, classification: err.classification },
          step: name,
        };
      }

      logger.error('step threw unexpected error', {
        step: name,
        index,
        duration_ms,
        error: asError(err),
      });
      return { ok: false, failure: maskedSystemFailure(deps.kind), step: name };
    }

    const duration_ms = Date.now() - started;

    if (!result.ok) {
      logger.warn('step failed', {
        step: name,
        index,
        duration_ms,
        error_code: result.error.code,
        classification: result.error.classification,
        reason: result.error.message,
      });
      return { ok: false, failure: result.error, step: name };
    }

    logger.debug('step completed', { step: name, index, duration_ms });
  }

  return { ok: true };
}
