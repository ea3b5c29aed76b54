export * from './types';
export { TextNormalizer, normalizeText } from './TextNormalizer';
export { PatternMatcher } from './PatternMatcher';
export { DEFAULT_SERIAL_PATTERNS, SerialNumberExtractor } from './SerialNumberExtractor';
export {
  AxisScoringEngine,
  BODY_WEIGHT,
  SUBJECT_WEIGHT,
  SYNONYM_BONUS,
  getBestCandidate,
  getBestConfidence,
} from './AxisScoringEngine';
export { AxisRegistry, defaultAxisRegistry, loadAxisRegistry } from './AxisRegistry';
export type { AxisDefinition, AxisKeywordFile } from './AxisRegistry';
export {
  ARBITRATED_LABEL_CONFIDENCE,
  ARBITRATED_NONE_CONFIDENCE,
  CONFIDENCE_CUTOFF,
  FALLBACK_CONFIDENCE_FACTOR,
  HybridAxisDecision,
} from './HybridAxisDecision';
export {
  BODY_EXCERPT_LIMIT,
  BODY_SEPARATOR,
  DEFAULT_AXIS_ORDER,
  MultiAxisOrchestrator,
  SUBJECT_SEPARATOR,
} from './MultiAxisOrchestrator';
export type { MultiAxisOrchestratorOptions } from './MultiAxisOrchestrator';
export {
  parseClassificationContext,
  serializeClassificationContext,
  toClassificationContext,
} from './ClassificationContext';
export { BatchClassifier } from './BatchClassifier';
export type {
  BatchClassificationOptions,
  BatchClassificationSummary,
  BatchItem,
  BatchItemResult,
  BatchProgressEvent,
} from './BatchClassifier';
export { CategoryValidator, FUZZY_MATCH_THRESHOLD } from './CategoryValidator';
export type {
  CategoryValidationReport,
  FormatCheckResult,
  LabelCorrection,
  LabelRejection,
} from './CategoryValidator';
