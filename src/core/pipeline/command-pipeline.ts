/**
 * CommandPipeline: transactional multi-step execution.
 *
 * Validation runs before any transaction exists. Everything after it
 * (initialize, step resolution, the steps, response assembly) runs inside
 * one transaction that is committed only when all of it succeeded, and
 * rolled back otherwise. Post-execution work and event publication happen
 * strictly after commit and can no longer fail the call.
 */

import { createLogger, type Logger } from '../logger.js';
import { PipelineError } from '../pipeline-error.js';
import { CommandContext } from './context.js';
import { asError, resolveSteps, runSteps, toPipelineError } from './executor.js';
import { composePipelineMiddleware } from './middleware.js';
import { StepResult } from './step-result.js';
import type {
  CommandDefinition,
  CommandPipelineOptions,
  EventSink,
  PipelineInvocation,
  PipelineOutcome,
  PipelinePhase,
  StepMiddleware,
  Transaction,
  TransactionManager,
} from './types.js';

// ---------------------------------------------------------------------------
// CommandPipeline
// ---------------------------------------------------------------------------

export class CommandPipeline<TIn, TOut> {
  readonly name: string;

  private readonly definition: CommandDefinition<TIn, TOut>;
  private readonly logger: Logger;
  private readonly transactions: TransactionManager;
  private readonly eventSink: EventSink | undefined;
  private readonly stepMiddleware: readonly StepMiddleware[];
  private readonly onPhase: CommandPipelineOptions['onPhase'];
  private readonly chain: (invocation: PipelineInvocation<TIn>) => Promise<TOut>;

  constructor(definition: CommandDefinition<TIn, TOut>, options: CommandPipelineOptions) {
    this.name = definition.name;
    this.definition = definition;
    this.logger = options.logger ?? createLogger(`pipeline:${definition.name}`);
    this.transactions = options.transactions;
    this.eventSink = options.eventSink;
    this.stepMiddleware = options.stepMiddleware ?? [];
    this.onPhase = options.onPhase;
    this.chain = composePipelineMiddleware<TIn, TOut>(
      (invocation) => this.run(invocation),
      options.middleware ?? [],
    );
  }

  /**
   * Run the command.
   *
   * @returns The response built from the context, after commit.
   * @throws PipelineError for every failure; the transaction has been rolled back.
   */
  async execute(command: TIn): Promise<TOut> {
    const invocation: PipelineInvocation<TIn> = {
      id: crypto.randomUUID(),
      pipeline: this.name,
      kind: 'command',
      request: command,
      description: this.definition.description,
      tags: this.definition.tags ?? [],
      logRequestResponse: this.definition.logRequestResponse ?? false,
    };

    try {
      return await this.chain(invocation);
    } catch (err: unknown) {
      throw toPipelineError(err, 'command', this.scopedLogger(invocation));
    }
  }

  /** Like `execute()`, but resolves with the outcome instead of rejecting. */
  async tryExecute(command: TIn): Promise<PipelineOutcome<TOut>> {
    try {
      return { ok: true, value: await this.execute(command) };
    } catch (err: unknown) {
      return { ok: false, error: toPipelineError(err, 'command', this.logger).toErrorPayload() };
    }
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async run(invocation: PipelineInvocation<TIn>): Promise<TOut> {
    const logger = this.scopedLogger(invocation);
    const command = invocation.request;
    const context = new CommandContext(command);
    let response: TOut;

    // Phase 1: validation and the transactional body. Any failure here
    // leaves no committed state behind.
    try {
      this.transition('CREATED', invocation);
      logger.debug('command started');

      this.transition('VALIDATING', invocation);
      const validation = this.definition.validate
        ? await this.definition.validate(command)
        : StepResult.success();
      if (!validation.ok) {
        logger.warn('command validation failed', {
          error_code: validation.error.code,
          classification: validation.error.classification,
          reason: validation.error.message,
        });
        throw PipelineError.fromFailure(validation.error);
      }

      const tx = await this.transactions.begin();
      context.setTransactionId(tx.id);
      logger.debug('transaction started', { transaction: tx.id });

      response = await this.runInTransaction(tx, context, invocation, logger);
    } catch (err: unknown) {
      this.transition('FAILED', invocation);
      throw toPipelineError(err, 'command', logger);
    }

    this.transition('DONE', invocation);
    logger.info('command committed', {
      ok: true,
      duration_ms: context.elapsedMs(),
      events: context.getEvents().length,
    });

    // Phase 2: after commit. The response stands whatever happens here.
    this.transition('POST_EXECUTION', invocation);
    await this.afterCommit(context, logger);

    return response;
  }

  /** Steps, response and commit. Rolls back on any failure before commit completes. */
  private async runInTransaction(
    tx: Transaction,
    context: CommandContext<TIn>,
    invocation: PipelineInvocation<TIn>,
    logger: Logger,
  ): Promise<TOut> {
    try {
      if (this.definition.initialize) {
        await this.definition.initialize(context, context.command);
      }

      this.transition('RESOLVING_STEPS', invocation);
      const steps = resolveSteps(this.definition.steps, context.command, context);
      logger.debug('executing command steps', { count: steps.length });

      this.transition('EXECUTING_STEPS', invocation);
      const outcome = await runSteps<CommandContext<TIn>>(steps, context, {
        pipeline: this.name,
        invocation: invocation.id,
        kind: 'command',
        logger,
        stepMiddleware: this.stepMiddleware,
      });
      if (!outcome.ok) {
        throw PipelineError.fromFailure(outcome.failure, outcome.step);
      }

      this.transition('BUILDING_RESPONSE', invocation);
      const response = await this.definition.buildResponse(context);

      this.transition('COMMITTING', invocation);
      await tx.commit();
      logger.debug('transaction committed', { transaction: tx.id });

      return response;
    } catch (err: unknown) {
      await this.rollback(tx, logger);
      throw err;
    }
  }

  private async rollback(tx: Transaction, logger: Logger): Promise<void> {
    try {
      await tx.rollback();
      logger.debug('transaction rolled back', { transaction: tx.id });
    } catch (rollbackErr: unknown) {
      logger.error('transaction rollback failed', {
        transaction: tx.id,
        error: asError(rollbackErr),
      });
    }
  }

  private async afterCommit(context: CommandContext<TIn>, logger: Logger): Promise<void> {
    if (this.definition.postExecution) {
      try {
        await this.definition.postExecution(context);
      } catch (err: unknown) {
        logger.error('post-execution failed after commit', { error: asError(err) });
      }
    }

    const events = context.getEvents();
    if (!this.eventSink || events.length === 0) {
      return;
    }

    try {
      await this.eventSink.publish(events, context.getAuditInfo());
      logger.debug('events published', { count: events.length });
    } catch (err: unknown) {
      logger.error('event publication failed after commit', {
        count: events.length,
        error: asError(err),
      });
    }
  }

  private scopedLogger(invocation: PipelineInvocation<TIn>): Logger {
    return this.logger.withContext({ pipeline: this.name, invocation: invocation.id });
  }

  private transition(phase: PipelinePhase, invocation: PipelineInvocation<TIn>): void {
    this.onPhase?.(phase, invocation);
  }
}
