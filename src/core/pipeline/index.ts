export {
  type StepFailure,
  type SuccessResult,
  type FailureResult,
  StepResult,
} from './step-result.js';

export {
  type ContextKey,
  type CommandEvent,
  type AuditInfo,
  RESERVED_KEYS,
  contextKey,
  MissingContextValueError,
  ExecutionContext,
  CommandContext,
} from './context.js';

export {
  type MaybePromise,
  type QueryStep,
  type CommandStep,
  type CommandPipelineStep,
  type StepSource,
  type QueryDefinition,
  type PipelineMetadata,
  type CommandDefinition,
  type PipelinePhase,
  type PipelineKind,
  type PipelineInvocation,
  type StepInvocation,
  type PipelineMiddleware,
  type StepMiddleware,
  type PhaseListener,
  type PipelineOptions,
  type Transaction,
  type TransactionManager,
  type EventSink,
  type CommandPipelineOptions,
  type PipelineOutcome,
} from './types.js';

export { SYSTEM_ERROR_MESSAGES } from './executor.js';
export { composePipelineMiddleware, composeStepMiddleware } from './middleware.js';
export { QueryPipeline } from './query-pipeline.js';
export { CommandPipeline } from './command-pipeline.js';
