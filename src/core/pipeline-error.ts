/**
 * PipelineError: the single classified error a failed invocation surfaces.
 *
 * Pipelines reject with a PipelineError for every failure: validation,
 * a step's failure result, or an unexpected throw that was masked to
 * SYSTEM. Callers discriminate it from other throws with
 * `isPipelineError()`.
 */

import type { ErrorClassificationValue, ErrorPayload } from '../types/errors.js';
import { ERROR_RETRIABLE_DEFAULTS } from '../types/errors.js';
import type { StepFailure } from './pipeline/step-result.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

/**
 * Private symbol used to brand PipelineError instances so that copies of
 * this module loaded twice still recognise each other's errors.
 */
const PIPELINE_ERROR_BRAND = Symbol.for('pipestep.PipelineError');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface PipelineErrorOptions {
  message: string;
  code: string;
  classification: ErrorClassificationValue;
  /** Defaults to ERROR_RETRIABLE_DEFAULTS for the classification. */
  retriable?: boolean;
  /** Name of the step that produced the failure. */
  step?: string;
}

// ---------------------------------------------------------------------------
// PipelineError class
// ---------------------------------------------------------------------------

export class PipelineError extends Error {
  readonly code: string;
  readonly classification: ErrorClassificationValue;
  readonly retriable: boolean;
  readonly step?: string;

  /** @internal Brand for safe instanceof checks across module boundaries. */
  readonly [PIPELINE_ERROR_BRAND] = true as const;

  constructor(options: PipelineErrorOptions) {
    super(options.message);
    this.name = 'PipelineError';
    this.code = options.code;
    this.classification = options.classification;
    this.retriable = options.retriable ?? ERROR_RETRIABLE_DEFAULTS[options.classification];

    if (options.step !== undefined) {
      this.step = options.step;
    }
  }

  /** Lift a failed step or validation result into an error. */
  static fromFailure(failure: StepFailure, step?: string): PipelineError {
    return new PipelineError({ ...failure, step });
  }

  /** Caller-visible payload. No stack traces or causes are included. */
  toErrorPayload(): ErrorPayload {
    const payload: ErrorPayload = {
      code: this.code,
      message: this.message,
      classification: this.classification,
      retriable: this.retriable,
    };

    if (this.step !== undefined) {
      payload.step = this.step;
    }

    return payload;
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

/**
 * Type guard for PipelineError instances, including instances created by
 * another copy of this module.
 */
export function isPipelineError(value: unknown): value is PipelineError {
  if (value instanceof PipelineError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    PIPELINE_ERROR_BRAND in value &&
    Reflect.get(value, PIPELINE_ERROR_BRAND) === true
  );
}
