/**
 * Error mapping for pipestep callers.
 *
 * Turns anything a pipeline call may throw into a caller-safe response:
 * - PipelineError → its own code, message and classification
 * - anything else → INTERNAL_ERROR, no internals leaked
 *
 * Debug details are attached only when the `[errors]` config allows it.
 */

import type { ErrorsConfig } from '../types/config.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import type { ErrorClassificationValue } from '../types/errors.js';
import { ErrorClassification, ErrorCode, ERROR_RETRIABLE_DEFAULTS } from '../types/errors.js';
import { isPipelineError } from './pipeline-error.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ErrorDebugInfo {
  /** Name of the thrown error (e.g. `TypeError`). */
  name: string;
  /** Message of the thrown error, which may carry internals. */
  detail: string;
  stack?: string;
}

export interface ErrorResponse {
  code: string;
  message: string;
  classification: ErrorClassificationValue;
  retriable: boolean;
  step?: string;
  debug?: ErrorDebugInfo;
}

const INTERNAL_ERROR_MESSAGE = 'An internal error occurred';

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map a thrown value to an `ErrorResponse`.
 *
 * @param options - The `[errors]` config section. Defaults to no debug info.
 */
export function toErrorResponse(
  error: unknown,
  options: ErrorsConfig = DEFAULT_CONFIG.errors,
): ErrorResponse {
  let response: ErrorResponse;

  if (isPipelineError(error)) {
    response = error.toErrorPayload();
  } else {
    response = {
      code: ErrorCode.INTERNAL_ERROR,
      message: INTERNAL_ERROR_MESSAGE,
      classification: ErrorClassification.SYSTEM,
      retriable: ERROR_RETRIABLE_DEFAULTS[ErrorClassification.SYSTEM],
    };
  }

  if (options.include_debug_info) {
    response.debug = debugInfo(error, options.include_stack_trace);
  }

  return response;
}

function debugInfo(error: unknown, includeStack: boolean): ErrorDebugInfo {
  if (!(error instanceof Error)) {
    return { name: typeof error, detail: String(error) };
  }

  const info: ErrorDebugInfo = { name: error.name, detail: error.message };
  if (includeStack && error.stack !== undefined) {
    info.stack = error.stack;
  }
  return info;
}
