/**
 * pipestep: multi-step query and command pipelines with typed execution
 * contexts, classified errors and transactional commands.
 */

export const VERSION = '0.1.0';

export * from './core/pipeline/index.js';
export * from './types/index.js';

export {
  type PipelineErrorOptions,
  PipelineError,
  isPipelineError,
} from './core/pipeline-error.js';

export {
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LogContext,
  type Logger,
  type FileLogSink,
  configureLogging,
  resetLogging,
  createLogger,
  createFileLogSink,
} from './core/logger.js';

export { loadConfig, initialize } from './core/config-loader.js';
export { type ErrorDebugInfo, type ErrorResponse, toErrorResponse } from './core/error-handler.js';
export {
  type InstrumentationOptions,
  createLoggingMiddleware,
  createStepLoggingMiddleware,
} from './core/instrumentation.js';
export {
  type MaskResult,
  MASKED_PLACEHOLDER,
  maskPayload,
  isSensitiveField,
} from './core/payload-masker.js';
export { type RequestValidator, createSchemaValidator } from './core/schema-validator.js';
export {
  type SqliteTransactionManagerOptions,
  SqliteTransactionManager,
  TransactionReleasedError,
} from './core/sqlite-transaction.js';
export { type EventRecord, JsonlEventSink, createLoggingEventSink } from './core/event-sinks.js';
