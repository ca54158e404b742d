/**
 * Middleware chain composition.
 *
 * Wraps middlewares right-to-left around a handler so the first entry in
 * the list is the outermost wrapper. Pipelines compose their entry-point
 * chain once at construction; step chains are composed per step call
 * because each call carries its own StepInvocation.
 */

import type { StepResult } from './step-result.js';
import type {
  PipelineInvocation,
  PipelineMiddleware,
  StepInvocation,
  StepMiddleware,
} from './types.js';

export function composePipelineMiddleware<TIn, TOut>(
  handler: (invocation: PipelineInvocation<TIn>) => Promise<TOut>,
  middleware: readonly PipelineMiddleware[],
): (invocation: PipelineInvocation<TIn>) => Promise<TOut> {
  let chain = handler;

  for (let i = middleware.length - 1; i >= 0; i--) {
    const mw = middleware[i];
    if (!mw) continue;
    const nextFn = chain;
    chain = (invocation) => mw(invocation, () => nextFn(invocation));
  }

  return chain;
}

export function composeStepMiddleware<T>(
  step: StepInvocation,
  handler: () => Promise<StepResult<T>>,
  middleware: readonly StepMiddleware[],
): () => Promise<StepResult<T>> {
  let chain = handler;

  for (let i = middleware.length - 1; i >= 0; i--) {
    const mw = middleware[i];
    if (!mw) continue;
    const nextFn = chain;
    chain = () => mw(step, nextFn);
  }

  return chain;
}
