/**
 * Error classification and error payload types for pipestep.
 *
 * Every failure that leaves a pipeline, whether it came from validation,
 * from a step, or from an unexpected throw, is tagged with exactly one
 * classification from a closed set.
 */

// ---------------------------------------------------------------------------
// ErrorClassification
// ---------------------------------------------------------------------------

/**
 * Closed set of error kinds.
 *
 * - `VALIDATION`: malformed or out-of-range input, detected before any step runs
 * - `BUSINESS`: a step recognized a domain rule violation
 * - `SYSTEM`: an unexpected internal failure
 */
export const ErrorClassification = {
  VALIDATION: 'VALIDATION',
  BUSINESS: 'BUSINESS',
  SYSTEM: 'SYSTEM',
} as const;

export type ErrorClassificationValue =
  (typeof ErrorClassification)[keyof typeof ErrorClassification];

const CLASSIFICATIONS: ReadonlySet<string> = new Set(Object.values(ErrorClassification));

/** Type guard for classification strings coming from untyped sources. */
export function isErrorClassification(value: unknown): value is ErrorClassificationValue {
  return typeof value === 'string' && CLASSIFICATIONS.has(value);
}

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

/** Codes the engine itself produces. Steps are free to use their own. */
export const ErrorCode = {
  /** Default code for `StepResult.failure(message)`. */
  GENERIC_ERROR: 'GENERIC_ERROR',
  /** Code for `StepResult.validationFailure(message)`. */
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  /** Code for `StepResult.systemFailure(message)`. */
  SYSTEM_ERROR: 'SYSTEM_ERROR',
  /** Code for unexpected errors masked at the pipeline boundary. */
  SYS_001: 'SYS_001',
  /** Code for non-pipeline errors mapped by `toErrorResponse`. */
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Whether a failure of each classification might succeed if retried.
 * Only system failures are transient; bad input and rule violations are not.
 */
export const ERROR_RETRIABLE_DEFAULTS: Readonly<Record<ErrorClassificationValue, boolean>> = {
  [ErrorClassification.VALIDATION]: false,
  [ErrorClassification.BUSINESS]: false,
  [ErrorClassification.SYSTEM]: true,
};

// ---------------------------------------------------------------------------
// ErrorPayload
// ---------------------------------------------------------------------------

/** Caller-visible description of a failed invocation. */
export interface ErrorPayload {
  /** Machine-readable error code (engine codes or step-defined codes). */
  code: string;
  /** Human-readable explanation. Never carries internal error details. */
  message: string;
  classification: ErrorClassificationValue;
  /** Whether the same request might succeed if retried. */
  retriable: boolean;
  /** Name of the step that failed, when the failure came from a step. */
  step?: string;
}
