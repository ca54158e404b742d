export {
  ErrorClassification,
  type ErrorClassificationValue,
  isErrorClassification,
  ErrorCode,
  type ErrorCodeValue,
  type ErrorPayload,
  ERROR_RETRIABLE_DEFAULTS,
} from './errors.js';

export {
  type LoggingConfig,
  type ErrorsConfig,
  type PerformanceConfig,
  type EngineConfig,
  DEFAULT_CONFIG,
  resolveConfigPath,
  parseConfig,
} from './config.js';
