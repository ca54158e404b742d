/**
 * Pipeline types for the pipestep query/command engine.
 *
 * A pipeline is built from a definition (validate, steps, buildResponse)
 * plus options carrying its collaborators: logger, middleware, and for
 * commands the transaction manager and event sink. Steps are plain
 * objects with a name and an `execute(context)` method.
 */

import type { ErrorPayload } from '../../types/errors.js';
import type { Logger } from '../logger.js';
import type {
  AuditInfo,
  CommandContext,
  CommandEvent,
  ExecutionContext,
} from './context.js';
import type { StepResult } from './step-result.js';

export type MaybePromise<T> = T | Promise<T>;

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

/**
 * A read step. Accepts the base context, so it also runs inside command
 * pipelines.
 *
 * Step instances are shared between concurrent invocations: keep every
 * piece of per-call state in the context, never on the step.
 */
export interface QueryStep<T = unknown, TRequest = unknown> {
  /** Used in logs and errors. Defaults to `step-<position>`, counting from 1. */
  name?: string;
  execute(context: ExecutionContext<TRequest>): MaybePromise<StepResult<T>>;
}

/** A write step. Needs the command context (audit info, events). */
export interface CommandStep<T = unknown, TCommand = unknown> {
  name?: string;
  execute(context: CommandContext<TCommand>): MaybePromise<StepResult<T>>;
}

/** Anything a command pipeline may run. */
export type CommandPipelineStep<TCommand> =
  | CommandStep<unknown, TCommand>
  | QueryStep<unknown, TCommand>;

/**
 * Either a fixed step list or a resolver called once per invocation,
 * before the first step runs.
 */
export type StepSource<TIn, TContext, TStep> =
  | readonly TStep[]
  | ((request: TIn, context: TContext) => readonly TStep[]);

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

/** Descriptive fields shared by query and command definitions. */
export interface PipelineMetadata {
  /** Used in logs and as the invocation's pipeline name. */
  name: string;
  description?: string;
  tags?: readonly string[];
  /**
   * Log the masked request and response through the logging middleware.
   * Off by default.
   */
  logRequestResponse?: boolean;
}

export interface QueryDefinition<TIn, TOut> extends PipelineMetadata {
  /** Defaults to success. */
  validate?(request: TIn): MaybePromise<StepResult<void>>;
  steps: StepSource<TIn, ExecutionContext<TIn>, QueryStep<unknown, TIn>>;
  buildResponse(context: ExecutionContext<TIn>): MaybePromise<TOut>;
}

export interface CommandDefinition<TIn, TOut> extends PipelineMetadata {
  validate?(command: TIn): MaybePromise<StepResult<void>>;
  /**
   * Runs inside the transaction before the steps are resolved. Typical use:
   * audit fields such as the actor and source.
   */
  initialize?(context: CommandContext<TIn>, command: TIn): MaybePromise<void>;
  steps: StepSource<TIn, CommandContext<TIn>, CommandPipelineStep<TIn>>;
  buildResponse(context: CommandContext<TIn>): MaybePromise<TOut>;
  /** Runs once, after a successful commit, before events are published. */
  postExecution?(context: CommandContext<TIn>): MaybePromise<void>;
}

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

export type PipelinePhase =
  | 'CREATED'
  | 'VALIDATING'
  | 'RESOLVING_STEPS'
  | 'EXECUTING_STEPS'
  | 'BUILDING_RESPONSE'
  | 'COMMITTING'
  | 'DONE'
  | 'POST_EXECUTION'
  | 'FAILED';

// ---------------------------------------------------------------------------
// Invocations and middleware
// ---------------------------------------------------------------------------

export type PipelineKind = 'query' | 'command';

/** One call of `execute()`. */
export interface PipelineInvocation<TIn> {
  /** Random per-call id, also bound to every log entry of the call. */
  readonly id: string;
  readonly pipeline: string;
  readonly kind: PipelineKind;
  readonly request: TIn;
  readonly description?: string;
  readonly tags?: readonly string[];
  readonly logRequestResponse?: boolean;
}

/** One step call within an invocation. */
export interface StepInvocation {
  readonly pipeline: string;
  readonly invocation: string;
  readonly step: string;
  /** Zero-based position in the resolved step list. */
  readonly index: number;
}

/**
 * Wraps a pipeline's entry point. Call `next()` to continue; its promise
 * rejects with the PipelineError when the invocation fails.
 */
export type PipelineMiddleware = <TIn, TOut>(
  invocation: PipelineInvocation<TIn>,
  next: () => Promise<TOut>,
) => Promise<TOut>;

/**
 * Wraps each step call. A step that throws surfaces as a rejection of
 * `next()`.
 */
export type StepMiddleware = <T>(
  step: StepInvocation,
  next: () => Promise<StepResult<T>>,
) => Promise<StepResult<T>>;

export type PhaseListener = (phase: PipelinePhase, invocation: PipelineInvocation<unknown>) => void;

export interface PipelineOptions {
  /** Defaults to `createLogger('pipeline:<name>')`. */
  logger?: Logger;
  /** Outermost first. */
  middleware?: readonly PipelineMiddleware[];
  /** Outermost first. */
  stepMiddleware?: readonly StepMiddleware[];
  onPhase?: PhaseListener;
}

// ---------------------------------------------------------------------------
// Collaborators consumed by command pipelines
// ---------------------------------------------------------------------------

/** One open transaction. Exactly one of commit/rollback is called. */
export interface Transaction {
  readonly id: string;
  commit(): MaybePromise<void>;
  rollback(): MaybePromise<void>;
}

export interface TransactionManager {
  begin(): MaybePromise<Transaction>;
}

export interface EventSink {
  publish(events: readonly CommandEvent[], audit: AuditInfo): MaybePromise<void>;
}

export interface CommandPipelineOptions extends PipelineOptions {
  transactions: TransactionManager;
  eventSink?: EventSink;
}

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

/** Result of `tryExecute()`: the response or exactly one classified error. */
export type PipelineOutcome<TOut> = { ok: true; value: TOut } | { ok: false; error: ErrorPayload };
