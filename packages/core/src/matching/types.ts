export const MATCH_LEVELS = ['Low', 'Moderate', 'Good'] as const;

/**
 * Ordered Low < Moderate < Good
 */
export type MatchLevel = (typeof MATCH_LEVELS)[number];

export type ContentType = 'ApplicationNarrative' | 'NoGoRationale';

/**
 * Tagged optional result of a parser
 */
export type Extraction<T> = { readonly found: true; readonly value: T } | { readonly found: false };

export const NOT_FOUND: Extraction<never> = Object.freeze({ found: false });

export function found<T>(value: T): Extraction<T> {
  return { found: true, value };
}

export function valueOr<T>(extraction: Extraction<T>, fallback: T): T {
  return extraction.found ? extraction.value : fallback;
}

export interface ExtractedContent {
  readonly contentType: ContentType;
  readonly text: string;
  /** The response carried the other kind of section than its match level asks for */
  readonly mismatch: boolean;
}

/**
 * Outcome of one logical run (the attempt that was kept)
 */
export interface EvaluationRun {
  readonly runIndex: number;
  readonly rawText: string;
  readonly extractedMatchLevel?: MatchLevel;
  /** Index of the recorded attempt within the run, 0 = first try */
  readonly retryIndex: number;
  readonly attempts: number;
  readonly nonce: string;
  readonly error?: string;
}

export type AdjustmentReason =
  | 'forced-low'
  | 'content-mismatch'
  | 'critical-domain-gap'
  | 'moderate-domain-gap'
  | 'short-content-fallback';

export interface Adjustment {
  readonly reason: AdjustmentReason;
  readonly from: MatchLevel;
  readonly to: MatchLevel;
  readonly detail: string;
}

export interface DomainGapAnalysis {
  readonly severity: number;
  readonly hasDomainRequirements: boolean;
  readonly requirementDensityPct: number;
  readonly criticalPhrases: readonly string[];
  readonly requirementPhrases: readonly string[];
}

export interface MatchSuccess {
  readonly status: 'ok';
  readonly finalMatchLevel: MatchLevel;
  readonly domainKnowledgeAssessment: string;
  readonly contentType: ContentType;
  readonly contentText: string;
  readonly contentMismatch: boolean;
  readonly domainGap?: DomainGapAnalysis;
  readonly adjustments: readonly Adjustment[];
  readonly runs: readonly EvaluationRun[];
  readonly promptHash: string;
}

export interface MatchFailure {
  readonly status: 'error';
  readonly error: 'ExtractionFailure';
  readonly runs: readonly EvaluationRun[];
  readonly promptHash: string;
}

export type MatchResult = MatchSuccess | MatchFailure;
