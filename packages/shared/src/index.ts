/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  newCorrelationId,
  runWithContext,
  type RunContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, isOutputFormat, type Config, type LogLevel, type OutputFormat } from './config';

// Types
export * from './types';

// Metrics
export {
  documentsProcessedCounter,
  fieldMissesCounter,
  extractionDurationHistogram,
  getMetrics,
  resetMetrics,
} from './metrics';

// Schemas
export { validateStatementRecord, schemas, type ValidationResult } from './schemas';

// Issuer profiles
export {
  type ExtractionRule,
  type IssuerProfile,
  type FallbackRuleSet,
  ICICI_PROFILE,
  AXIS_PROFILE,
  IDFC_FIRST_PROFILE,
  RBL_PROFILE,
  AMEX_PROFILE,
  GENERIC_RULES,
  BUILT_IN_PROFILES,
} from './profiles';

// Extraction pipeline
export { normalizeText, normalizePageLines, type TextNormalizer } from './extraction/normalize';
export {
  normalizeAmount,
  normalizeDate,
  normalizeCardNumber,
  CANONICAL_DATE_FORMAT,
  DEFAULT_DATE_FORMATS,
} from './extraction/values';
export { IssuerRegistry, createDefaultRegistry, validateProfile } from './extraction/registry';
export { IssuerDetector, type DetectionResult } from './extraction/detector';
export {
  extractFields,
  extractField,
  applyRule,
  type FieldExtractionResult,
} from './extraction/field-extractor';
export { formatIssue } from './extraction/issues';
export {
  buildStatementRecord,
  failedRecord,
  determineStatus,
  type RecordInput,
} from './extraction/record-builder';
export {
  StatementBatchProcessor,
  documentsFromMap,
  type BatchProcessorOptions,
} from './extraction/orchestrator';
