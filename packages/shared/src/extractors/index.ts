/**
 * Extractors Module
 *
 * Pattern registry, field extraction engine and the batch driver that
 * feeds uploaded documents through them.
 */

// Registry
export { PatternRegistry, getBuiltInRegistry, countCaptureGroups } from './registry';
export {
  compilePatternFile,
  parsePatternFile,
  loadRegistryFromFile,
  resolveRegistry,
} from './pattern-file';

// Engine
export { extractDocument, matchField, condenseWhitespace, isExtractableText } from './engine';
export { prepareText, type NormalizeOptions } from './normalize';

// Batches
export { processBatch, type BatchOptions } from './batch';

// Policy schedule rules
export {
  POLICY_SCHEDULE_FIELDS,
  POLICY_SCHEDULE_BASIC_FIELDS,
  BASIC_FIELD_NAMES,
} from './policy-schedule/patterns';
