/**
 * StepResult: tagged outcome of one step, validation, or pipeline run.
 *
 * A result is either a success carrying optional data or a failure carrying
 * a classified error. The constructors below are the only way results are
 * built inside pipestep, so a failure always has a non-empty message and a
 * classification, and a success never carries error fields.
 */

import {
  ErrorClassification,
  ErrorCode,
  type ErrorClassificationValue,
} from '../../types/errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Classified error carried by a failed result. */
export interface StepFailure {
  message: string;
  code: string;
  classification: ErrorClassificationValue;
}

export interface SuccessResult<T> {
  readonly ok: true;
  readonly data: T | undefined;
}

export interface FailureResult {
  readonly ok: false;
  readonly error: StepFailure;
}

export type StepResult<T> = SuccessResult<T> | FailureResult;

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

function success<T>(data: T): SuccessResult<T>;
function success<T = never>(): SuccessResult<T>;
function success<T>(data?: T): SuccessResult<T> {
  return { ok: true, data };
}

/**
 * Build a failed result. Without an explicit code and classification the
 * failure is a BUSINESS failure with code `GENERIC_ERROR`.
 *
 * @throws TypeError if `message` is empty.
 */
function failure(
  message: string,
  code: string = ErrorCode.GENERIC_ERROR,
  classification: ErrorClassificationValue = ErrorClassification.BUSINESS,
): FailureResult {
  if (message.trim().length === 0) {
    throw new TypeError('Step failure message must be non-empty');
  }
  if (code.length === 0) {
    throw new TypeError('Step failure code must be non-empty');
  }
  return { ok: false, error: { message, code, classification } };
}

/** VALIDATION failure with code `VALIDATION_ERROR`. */
function validationFailure(message: string): FailureResult {
  return failure(message, ErrorCode.VALIDATION_ERROR, ErrorClassification.VALIDATION);
}

/** SYSTEM failure with code `SYSTEM_ERROR`. */
function systemFailure(message: string): FailureResult {
  return failure(message, ErrorCode.SYSTEM_ERROR, ErrorClassification.SYSTEM);
}

function isSuccess<T>(result: StepResult<T>): result is SuccessResult<T> {
  return result.ok;
}

function isFailure<T>(result: StepResult<T>): result is FailureResult {
  return !result.ok;
}

export const StepResult = {
  success,
  failure,
  validationFailure,
  systemFailure,
  isSuccess,
  isFailure,
} as const;
