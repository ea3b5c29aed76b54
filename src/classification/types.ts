/**
 * Classification Types
 * Shared type definitions for the heuristic engine, the hybrid decision
 * layer and the multi-axis orchestrator.
 */

// ============================================================================
// Axis Configuration
// ============================================================================

/** Label → list of patterns (keywords or synonyms). */
export type LabelPatternMap = Readonly<Record<string, readonly string[]>>;

/**
 * Immutable keyword configuration for one classification axis.
 */
export interface AxisConfiguration {
  /** Axis identifier, e.g. "message_type" */
  readonly id: string;
  /** Label prefix shared by every label of the axis, e.g. "T_" */
  readonly prefix: string;
  readonly description?: string;
  /** Plain keyword hits */
  readonly keywords: LabelPatternMap;
  /** Synonym hits score SYNONYM_BONUS on top of the base weight */
  readonly synonyms: LabelPatternMap;
  /** Serial/part-number patterns; only the equipment-designation axis has any */
  readonly extractionPatterns: readonly string[];
  /** Gap ratio between rank 1 and rank 2 below which the result is ambiguous */
  readonly ambiguityThreshold: number;
  /** Candidates scoring at or below this value are discarded */
  readonly minScore: number;
  readonly maxCandidates: number;
}

// ============================================================================
// Heuristic Results
// ============================================================================

export interface PatternHit {
  /** Normalized pattern that matched */
  pattern: string;
  label: string;
  isSynonym: boolean;
}

export interface CandidateMatch {
  label: string;
  score: number;
  /** Provenance, e.g. ["subj:commande", "body:bdc"] */
  hits: string[];
}

export interface HeuristicDebug {
  /** Hits per qualified label (before truncation to maxCandidates) */
  rawHits: Record<string, string[]>;
  /** Scores per qualified label (before truncation to maxCandidates) */
  scores: Record<string, number>;
}

export interface AxisHeuristicResult {
  axisId: string;
  prefix: string;
  /** Ranked, at most maxCandidates long */
  candidates: CandidateMatch[];
  isAmbiguous: boolean;
  serialNumbers: string[];
  debug: HeuristicDebug;
}

// ============================================================================
// Hybrid Decision
// ============================================================================

export type DecisionMethod = 'heuristic' | 'llm' | 'none';

export type ArbitrationReason = 'no_match' | 'ambiguous' | 'low_confidence';

export interface AxisDecisionDebug extends HeuristicDebug {
  /** Why the heuristic best was used without confirmation */
  note?: 'ambiguous_no_llm' | 'arbitration_failed';
  arbitrationReason?: ArbitrationReason;
  arbitrationResponse?: string;
  /** Set when the response matched no candidate */
  arbitrationAnomaly?: string;
  arbitrationError?: string;
  /** Set when the axis itself failed unexpectedly */
  error?: string;
}

export interface AxisClassificationResult {
  readonly axisId: string;
  readonly prefix: string;
  readonly value: string | null;
  /** In [0, 1] */
  readonly confidence: number;
  readonly method: DecisionMethod;
  readonly candidates: readonly CandidateMatch[];
  readonly serialNumbers: readonly string[];
  readonly debug: AxisDecisionDebug;
}

// ============================================================================
// Orchestrator
// ============================================================================

export interface EmailMessage {
  subject?: string;
  body?: string;
}

export interface HybridClassificationOutput {
  /** Per-axis results, in processing order */
  axes: Record<string, AxisClassificationResult>;
  /** Deduplicated, sorted serial/part numbers across all axes */
  serialNumbers: string[];
  /** Accepted labels, in processing order */
  categories: string[];
}

export interface AxisContextEntry {
  value: string | null;
  confidence: number;
  method: DecisionMethod;
}

/**
 * Serializable summary of a classification run, consumed by summarization
 * prompts, validators and audit logging.
 */
export interface ClassificationContext {
  axes: Record<string, AxisContextEntry>;
  serialNumbers: string[];
  debug: {
    rawHits: Record<string, Record<string, string[]>>;
    scores: Record<string, Record<string, number>>;
  };
}
