import { describe, it, expect } from 'vitest';
import { toErrorResponse } from './error-handler.js';
import { PipelineError } from './pipeline-error.js';

const businessError = new PipelineError({
  message: 'Insufficient stock',
  code: 'OUT_OF_STOCK',
  classification: 'BUSINESS',
  step: 'reserve-stock',
});

describe('toErrorResponse', () => {
  it('keeps the fields of a PipelineError', () => {
    expect(toErrorResponse(businessError)).toEqual({
      code: 'OUT_OF_STOCK',
      message: 'Insufficient stock',
      classification: 'BUSINESS',
      retriable: false,
      step: 'reserve-stock',
    });
  });

  it('maps any other error to INTERNAL_ERROR without leaking its message', () => {
    expect(toErrorResponse(new Error('connection string postgres://db'))).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An internal error occurred',
      classification: 'SYSTEM',
      retriable: true,
    });
  });

  it('maps non-Error throws', () => {
    expect(toErrorResponse('oops').code).toBe('INTERNAL_ERROR');
  });

  it('adds debug info when enabled', () => {
    const response = toErrorResponse(new TypeError('bad input'), {
      include_debug_info: true,
      include_stack_trace: false,
    });

    expect(response.debug).toEqual({ name: 'TypeError', detail: 'bad input' });
  });

  it('adds the stack trace only when both flags are enabled', () => {
    const err = new Error('deep failure');
    const response = toErrorResponse(err, { include_debug_info: true, include_stack_trace: true });

    expect(response.debug).toEqual({ name: 'Error', detail: 'deep failure', stack: err.stack });
  });

  it('describes non-Error values in debug info', () => {
    const response = toErrorResponse(42, { include_debug_info: true, include_stack_trace: true });
    expect(response.debug).toEqual({ name: 'number', detail: '42' });
  });

  it('adds debug info for pipeline errors too', () => {
    const response = toErrorResponse(businessError, {
      include_debug_info: true,
      include_stack_trace: false,
    });
    expect(response.debug).toEqual({ name: 'PipelineError', detail: 'Insufficient stock' });
  });
});
