/**
 * QueryPipeline: read-only multi-step execution.
 *
 * Each call flows through: validate → resolve steps → run steps in order →
 * build response. The first failure aborts the call and is surfaced as one
 * PipelineError; unexpected throws are logged and masked to a generic
 * SYSTEM error. "Read-only" is a property of the steps a query is given,
 * not something the pipeline enforces.
 */

import { createLogger, type Logger } from '../logger.js';
import { PipelineError } from '../pipeline-error.js';
import { ExecutionContext } from './context.js';
import { resolveSteps, runSteps, toPipelineError } from './executor.js';
import { composePipelineMiddleware } from './middleware.js';
import { StepResult } from './step-result.js';
import type {
  PipelineInvocation,
  PipelineOptions,
  PipelineOutcome,
  PipelinePhase,
  QueryDefinition,
  StepMiddleware,
} from './types.js';

// ---------------------------------------------------------------------------
// QueryPipeline
// ---------------------------------------------------------------------------

export class QueryPipeline<TIn, TOut> {
  readonly name: string;

  private readonly definition: QueryDefinition<TIn, TOut>;
  private readonly logger: Logger;
  private readonly stepMiddleware: readonly StepMiddleware[];
  private readonly onPhase: PipelineOptions['onPhase'];
  private readonly chain: (invocation: PipelineInvocation<TIn>) => Promise<TOut>;

  constructor(definition: QueryDefinition<TIn, TOut>, options: PipelineOptions = {}) {
    this.name = definition.name;
    this.definition = definition;
    this.logger = options.logger ?? createLogger(`pipeline:${definition.name}`);
    this.stepMiddleware = options.stepMiddleware ?? [];
    this.onPhase = options.onPhase;
    this.chain = composePipelineMiddleware<TIn, TOut>(
      (invocation) => this.run(invocation),
      options.middleware ?? [],
    );
  }

  /**
   * Run the query for one request.
   *
   * @returns The assembled response.
   * @throws PipelineError for every failure (validation, step, or masked system error).
   */
  async execute(request: TIn): Promise<TOut> {
    const invocation: PipelineInvocation<TIn> = {
      id: crypto.randomUUID(),
      pipeline: this.name,
      kind: 'query',
      request,
      description: this.definition.description,
      tags: this.definition.tags ?? [],
      logRequestResponse: this.definition.logRequestResponse ?? false,
    };

    try {
      return await this.chain(invocation);
    } catch (err: unknown) {
      throw toPipelineError(err, 'query', this.scopedLogger(invocation));
    }
  }

  /** Like `execute()`, but resolves with the outcome instead of rejecting. */
  async tryExecute(request: TIn): Promise<PipelineOutcome<TOut>> {
    try {
      return { ok: true, value: await this.execute(request) };
    } catch (err: unknown) {
      return { ok: false, error: toPipelineError(err, 'query', this.logger).toErrorPayload() };
    }
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async run(invocation: PipelineInvocation<TIn>): Promise<TOut> {
    const logger = this.scopedLogger(invocation);
    const { request } = invocation;

    try {
      const context = new ExecutionContext(request);
      this.transition('CREATED', invocation);
      logger.debug('query started');

      this.transition('VALIDATING', invocation);
      const validation = this.definition.validate
        ? await this.definition.validate(request)
        : StepResult.success();
      if (!validation.ok) {
        logger.warn('query validation failed', {
          error_code: validation.error.code,
          classification: validation.error.classification,
          reason: validation.error.message,
        });
        throw PipelineError.fromFailure(validation.error);
      }

      this.transition('RESOLVING_STEPS', invocation);
      const steps = resolveSteps(this.definition.steps, request, context);
      logger.debug('executing query steps', { count: steps.length });

      this.transition('EXECUTING_STEPS', invocation);
      const outcome = await runSteps(steps, context, {
        pipeline: this.name,
        invocation: invocation.id,
        kind: 'query',
        logger,
        stepMiddleware: this.stepMiddleware,
      });
      if (!outcome.ok) {
        throw PipelineError.fromFailure(outcome.failure, outcome.step);
      }

      this.transition('BUILDING_RESPONSE', invocation);
      const response = await this.definition.buildResponse(context);

      this.transition('DONE', invocation);
      logger.debug('query completed', { ok: true, duration_ms: context.elapsedMs() });
      return response;
    } catch (err: unknown) {
      this.transition('FAILED', invocation);
      throw toPipelineError(err, 'query', logger);
    }
  }

  private scopedLogger(invocation: PipelineInvocation<TIn>): Logger {
    return this.logger.withContext({ pipeline: this.name, invocation: invocation.id });
  }

  private transition(phase: PipelinePhase, invocation: PipelineInvocation<TIn>): void {
    this.onPhase?.(phase, invocation);
  }
}
