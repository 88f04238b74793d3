/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runInChildContext,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export {
  config,
  loadConfig,
  type Config,
  type FieldSetName,
  type SpreadsheetEnginePreference,
} from './config';

// Types
export * from './types';

// Errors
export { UnknownFieldError, InvalidRegistryError, SpreadsheetUnavailableError } from './errors';

// Metrics
export {
  register,
  documentsProcessedCounter,
  fieldOutcomesCounter,
  batchDurationHistogram,
  exportsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validatePatternFile,
  validateExportRequest,
  validateBatchResult,
  isPatternFile,
  isExportRequest,
  type ValidationResult,
} from './schemas';

// Extractors
export {
  PatternRegistry,
  getBuiltInRegistry,
  countCaptureGroups,
  compilePatternFile,
  parsePatternFile,
  loadRegistryFromFile,
  resolveRegistry,
  extractDocument,
  matchField,
  condenseWhitespace,
  isExtractableText,
  prepareText,
  processBatch,
  POLICY_SCHEDULE_FIELDS,
  POLICY_SCHEDULE_BASIC_FIELDS,
  BASIC_FIELD_NAMES,
  type NormalizeOptions,
  type BatchOptions,
} from './extractors';
