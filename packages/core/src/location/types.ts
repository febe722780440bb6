export type RiskLevel = 'none' | 'low' | 'medium' | 'high' | 'critical';

export type ValidationMethod = 'gazetteer' | 'llm_adjudicated' | 'error_fallback';

export type SafetyOverride = 'same-city' | 'unsupported-claim' | 'metadata-mentioned';

/**
 * Outcome of validating one job's declared location against its body text
 */
export interface LocationAnalysis {
  readonly metadataLocation: string;
  readonly authoritativeLocation: string;
  readonly conflictDetected: boolean;
  readonly confidence: number;
  readonly riskLevel: RiskLevel;
  readonly method: ValidationMethod;
  readonly reasoning: string;
  /** Canonical city keys found in the body */
  readonly extractedCities: readonly string[];
  readonly overrides: readonly SafetyOverride[];
  readonly processingTimeMs: number;
}

/**
 * Intermediate verdict of either phase, before overrides and risk
 */
export interface PhaseVerdict {
  readonly conflictDetected: boolean;
  readonly authoritativeLocation: string;
  readonly confidence: number;
  readonly reasoning: string;
}
