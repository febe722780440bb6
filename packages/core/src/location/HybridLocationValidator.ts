import { EvaluationCancelledError, describeError } from '../errors';
import { EvaluationClient } from '../llm/EvaluationClient';
import { Availability } from '../llm/availability';
import { PromptTemplate } from '../prompts/PromptTemplate';
import { LOCATION_ADJUDICATION_PROMPT, LocationPromptSlot } from '../prompts/templates';
import { Logger } from '../utils/logger';
import { parseAdjudication } from './adjudication-parser';
import { Gazetteer, LocationMentions, foldText } from './Gazetteer';
import { LocationValidationStats } from './LocationValidationStats';
import { classifyRisk } from './risk';
import { LocationAnalysis, PhaseVerdict, SafetyOverride, ValidationMethod } from './types';

export interface LocationValidatorConfig {
  /** Gazetteer verdicts at or above this confidence skip adjudication */
  gateThreshold: number;
  /** Characters of the job body sent for adjudication */
  excerptLength: number;
  callTimeoutMs: number;
}

export const DEFAULT_LOCATION_CONFIG: Readonly<LocationValidatorConfig> = Object.freeze({
  gateThreshold: 0.8,
  excerptLength: 1000,
  callTimeoutMs: 30000,
});

export const LOCATION_CONFIDENCE = Object.freeze({
  noCitiesMentioned: 0.95,
  sameCityMentioned: 0.95,
  differentCityMentioned: 0.85,
  unknownPlacesOnly: 0.6,
  unparseableMetadata: 0.5,
  adjudicated: 0.75,
  incompleteAnswer: 0.6,
  errorFallback: 0,
});

export interface ValidateLocationOptions {
  signal?: AbortSignal;
}

interface GazetteerPhase extends PhaseVerdict {
  readonly mentions: LocationMentions;
}

/**
 * Two-phase location check: gazetteer lookup first, constrained LLM
 * adjudication only below the confidence gate. Every conflict must survive the
 * safety overrides before it is reported.
 *
 * Never throws except for caller cancellation.
 */
export class HybridLocationValidator {
  private readonly config: LocationValidatorConfig;
  readonly stats = new LocationValidationStats();

  constructor(
    private readonly client: EvaluationClient,
    private readonly availability: Availability,
    config: Partial<LocationValidatorConfig> = {},
    private readonly gazetteer: Gazetteer = Gazetteer.default(),
    private readonly template: PromptTemplate<LocationPromptSlot> = LOCATION_ADJUDICATION_PROMPT
  ) {
    this.config = { ...DEFAULT_LOCATION_CONFIG, ...config };
  }

  async validate(
    metadataLocation: string,
    jobDescription: string,
    options: ValidateLocationOptions = {}
  ): Promise<LocationAnalysis> {
    const startTime = Date.now();
    const { signal } = options;
    if (signal?.aborted) {
      throw new EvaluationCancelledError();
    }

    const phase1 = this.gazetteerPhase(metadataLocation, jobDescription);
    Logger.debug(
      `[HybridLocationValidator] Gazetteer: ${phase1.reasoning} (confidence ${phase1.confidence})`
    );

    let verdict: PhaseVerdict = phase1;
    let method: ValidationMethod = 'gazetteer';

    if (phase1.confidence < this.config.gateThreshold) {
      if (!this.availability.llm) {
        verdict = this.errorFallback(metadataLocation, 'LLM unavailable');
        method = 'error_fallback';
      } else {
        try {
          verdict = await this.adjudicate(metadataLocation, jobDescription, phase1.reasoning, signal);
          method = 'llm_adjudicated';
        } catch (error) {
          if (error instanceof EvaluationCancelledError || signal?.aborted) {
            throw error instanceof EvaluationCancelledError ? error : new EvaluationCancelledError();
          }
          Logger.warn(`[HybridLocationValidator] Adjudication failed: ${describeError(error)}`);
          verdict = this.errorFallback(metadataLocation, describeError(error));
          method = 'error_fallback';
        }
      }
    }

    const overrides: SafetyOverride[] = [];
    if (method !== 'error_fallback') {
      verdict = this.applyOverrides(verdict, metadataLocation, jobDescription, method, overrides);
    }

    const analysis: LocationAnalysis = Object.freeze({
      metadataLocation,
      authoritativeLocation: verdict.authoritativeLocation,
      conflictDetected: verdict.conflictDetected,
      confidence: verdict.confidence,
      riskLevel: classifyRisk(
        this.gazetteer,
        metadataLocation,
        verdict.authoritativeLocation,
        verdict.conflictDetected
      ),
      method,
      reasoning: verdict.reasoning,
      extractedCities: phase1.mentions.cities,
      overrides,
      processingTimeMs: Date.now() - startTime,
    });

    if (analysis.conflictDetected) {
      Logger.warn(
        `[HybridLocationValidator] Conflict: "${metadataLocation}" → "${analysis.authoritativeLocation}" (${analysis.riskLevel} risk, ${method})`
      );
    } else {
      Logger.debug(`[HybridLocationValidator] ✓ No conflict for "${metadataLocation}" (${method})`);
    }

    this.stats.record(analysis);
    return analysis;
  }

  /**
   * Deterministic pass over the gazetteer tables
   */
  gazetteerPhase(metadataLocation: string, jobDescription: string): GazetteerPhase {
    const mentions = this.gazetteer.extractMentions(jobDescription);
    const unknownPlaces = this.gazetteer.findUnknownPlaces(jobDescription);
    const metadataCity = this.gazetteer.normalize(metadataLocation).city;

    const undecided = (confidence: number, reasoning: string): GazetteerPhase => ({
      conflictDetected: false,
      authoritativeLocation: metadataLocation,
      confidence,
      reasoning,
      mentions,
    });

    if (mentions.cities.length === 0 && unknownPlaces.length === 0) {
      return undecided(
        LOCATION_CONFIDENCE.noCitiesMentioned,
        'No specific cities mentioned in job description - using metadata location'
      );
    }

    if (metadataCity === undefined) {
      return undecided(
        LOCATION_CONFIDENCE.unparseableMetadata,
        `Cannot parse metadata city from "${metadataLocation}" - needs review`
      );
    }

    if (mentions.cities.includes(metadataCity)) {
      return undecided(
        LOCATION_CONFIDENCE.sameCityMentioned,
        `Same city "${this.gazetteer.city(metadataCity)?.name ?? metadataCity}" found in job description`
      );
    }

    if (mentions.cities.length > 0) {
      const dominant = [...mentions.cities].sort(
        (a, b) =>
          (mentions.cityCounts[b] ?? 0) - (mentions.cityCounts[a] ?? 0) ||
          (mentions.firstIndex[a] ?? 0) - (mentions.firstIndex[b] ?? 0)
      )[0];
      const authoritative = this.gazetteer.describe(dominant) ?? dominant;
      return {
        conflictDetected: true,
        authoritativeLocation: authoritative,
        confidence: LOCATION_CONFIDENCE.differentCityMentioned,
        reasoning: `Different city mentioned in job description: ${authoritative}`,
        mentions,
      };
    }

    return undecided(
      LOCATION_CONFIDENCE.unknownPlacesOnly,
      `Places outside the gazetteer mentioned: ${unknownPlaces.join(', ')} - needs review`
    );
  }

  private async adjudicate(
    metadataLocation: string,
    jobDescription: string,
    gazetteerNote: string,
    signal: AbortSignal | undefined
  ): Promise<PhaseVerdict> {
    const prompt = this.template.render({
      metadataLocation,
      gazetteerNote,
      excerptLength: String(this.config.excerptLength),
      excerpt: jobDescription.slice(0, this.config.excerptLength),
    });

    const raw = await this.client.evaluate(prompt, { timeoutMs: this.config.callTimeoutMs, signal });
    const answer = parseAdjudication(raw);

    if (answer.conflict === undefined || (answer.conflict && answer.location === undefined)) {
      Logger.warn('[HybridLocationValidator] Incomplete adjudication answer, keeping metadata location');
      return {
        conflictDetected: false,
        authoritativeLocation: metadataLocation,
        confidence: LOCATION_CONFIDENCE.incompleteAnswer,
        reasoning: `LLM analysis: incomplete answer - using metadata location`,
      };
    }

    return {
      conflictDetected: answer.conflict,
      authoritativeLocation: answer.conflict && answer.location !== undefined ? answer.location : metadataLocation,
      confidence: LOCATION_CONFIDENCE.adjudicated,
      reasoning: `LLM analysis: ${answer.reasoning ?? 'LLM validation completed'}`,
    };
  }

  private errorFallback(metadataLocation: string, cause: string): PhaseVerdict {
    return {
      conflictDetected: false,
      authoritativeLocation: metadataLocation,
      confidence: LOCATION_CONFIDENCE.errorFallback,
      reasoning: `LLM validation failed (${cause}) - using metadata location`,
    };
  }

  /**
   * Clear conflicts that are formatting variants or not backed by the
   * reasoning text. Fired overrides are appended to `fired`.
   */
  private applyOverrides(
    verdict: PhaseVerdict,
    metadataLocation: string,
    jobDescription: string,
    method: ValidationMethod,
    fired: SafetyOverride[]
  ): PhaseVerdict {
    if (!verdict.conflictDetected) {
      return verdict;
    }

    const cleared = (override: SafetyOverride, note: string): PhaseVerdict => {
      fired.push(override);
      Logger.info(`[HybridLocationValidator] Override ${override}: ${note}`);
      return {
        conflictDetected: false,
        authoritativeLocation: metadataLocation,
        confidence: verdict.confidence,
        reasoning: `${verdict.reasoning} (Override: ${note})`,
      };
    };

    const authoritative = verdict.authoritativeLocation;

    if (this.gazetteer.sameCity(metadataLocation, authoritative)) {
      return cleared('same-city', 'locations refer to the same city');
    }

    if (!this.isGroundedInReasoning(authoritative, verdict.reasoning)) {
      return cleared('unsupported-claim', `"${authoritative}" is not supported by the reasoning`);
    }

    const foldedMetadata = foldText(metadataLocation);
    if (
      method === 'llm_adjudicated' &&
      foldedMetadata.length > 0 &&
      foldText(jobDescription).includes(foldedMetadata)
    ) {
      return cleared('metadata-mentioned', 'metadata location is named in the job description');
    }

    return verdict;
  }

  private isGroundedInReasoning(authoritative: string, reasoning: string): boolean {
    const foldedAuthoritative = foldText(authoritative);
    if (foldedAuthoritative.length > 0 && foldText(reasoning).includes(foldedAuthoritative)) {
      return true;
    }
    const city = this.gazetteer.normalize(authoritative).city;
    return city !== undefined && this.gazetteer.extractMentions(reasoning).cities.includes(city);
  }
}
