import { LocationAnalysis, SafetyOverride, ValidationMethod } from './types';

export interface LocationStatsSnapshot {
  jobsProcessed: number;
  conflictsDetected: number;
  /** Conflicts classified high or critical */
  highRiskConflicts: number;
  conflictRatePct: number;
  methodDistribution: Record<ValidationMethod, number>;
  overridesApplied: Record<SafetyOverride, number>;
  averageProcessingTimeMs: number;
}

/**
 * Running counters over every analysis a validator produced
 */
export class LocationValidationStats {
  private jobsProcessed = 0;
  private conflictsDetected = 0;
  private highRiskConflicts = 0;
  private totalProcessingTimeMs = 0;
  private methodDistribution: Record<ValidationMethod, number> = emptyMethods();
  private overridesApplied: Record<SafetyOverride, number> = emptyOverrides();

  record(analysis: LocationAnalysis): void {
    this.jobsProcessed++;
    this.totalProcessingTimeMs += analysis.processingTimeMs;
    this.methodDistribution[analysis.method]++;
    for (const override of analysis.overrides) {
      this.overridesApplied[override]++;
    }
    if (analysis.conflictDetected) {
      this.conflictsDetected++;
      if (analysis.riskLevel === 'high' || analysis.riskLevel === 'critical') {
        this.highRiskConflicts++;
      }
    }
  }

  snapshot(): LocationStatsSnapshot {
    return {
      jobsProcessed: this.jobsProcessed,
      conflictsDetected: this.conflictsDetected,
      highRiskConflicts: this.highRiskConflicts,
      conflictRatePct: this.jobsProcessed === 0 ? 0 : (100 * this.conflictsDetected) / this.jobsProcessed,
      methodDistribution: { ...this.methodDistribution },
      overridesApplied: { ...this.overridesApplied },
      averageProcessingTimeMs:
        this.jobsProcessed === 0 ? 0 : this.totalProcessingTimeMs / this.jobsProcessed,
    };
  }

  reset(): void {
    this.jobsProcessed = 0;
    this.conflictsDetected = 0;
    this.highRiskConflicts = 0;
    this.totalProcessingTimeMs = 0;
    this.methodDistribution = emptyMethods();
    this.overridesApplied = emptyOverrides();
  }
}

function emptyMethods(): Record<ValidationMethod, number> {
  return { gazetteer: 0, llm_adjudicated: 0, error_fallback: 0 };
}

function emptyOverrides(): Record<SafetyOverride, number> {
  return { 'same-city': 0, 'unsupported-claim': 0, 'metadata-mentioned': 0 };
}
