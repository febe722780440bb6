import { EvaluationClient } from '../llm/EvaluationClient';
import { Availability } from '../llm/availability';
import { EvaluationCancelledError, describeError } from '../errors';
import { PromptTemplate } from '../prompts/PromptTemplate';
import { MATCH_EVALUATION_PROMPT, MatchPromptSlot } from '../prompts/templates';
import { ExecutionStrategy, batched } from '../utils/execution';
import { Logger } from '../utils/logger';
import { createNonce } from '../utils/promptHasher';
import { resolveConsensus, selectRepresentative, rankOf } from './consensus';
import { analyzeDomainGap, hasModerateSignals, mentionsGap } from './domain-gap';
import { extractContent, extractDomainAssessment, extractMatchLevel } from './extraction';
import {
  Adjustment,
  DomainGapAnalysis,
  EvaluationRun,
  MatchFailure,
  MatchLevel,
  MatchResult,
} from './types';

export interface MatchEvaluatorConfig {
  /** Independent evaluations per job */
  runs: number;
  /** Attempts for one logical run, including the first */
  retriesPerRun: number;
  minContentLength: number;
  callTimeoutMs: number;
  /** 1 = sequential, >1 = bounded parallel runs */
  batchSize: number;
  severityThreshold: number;
  densityThresholdPct: number;
}

export const DEFAULT_MATCH_CONFIG: Readonly<MatchEvaluatorConfig> = Object.freeze({
  runs: 5,
  retriesPerRun: 3,
  minContentLength: 15,
  callTimeoutMs: 30000,
  batchSize: 1,
  severityThreshold: 1,
  densityThresholdPct: 15,
});

export const GENERIC_NARRATIVE =
  'My skills and experience align well with this position based on the match assessment.';

export const GENERIC_RATIONALE =
  'I have compared my CV and the role description and decided not to apply due to the missing skills or experience that would be required for this position.';

const DECLINE_PREFIX = 'I have compared my CV and the role description and decided not to apply due to';

export interface MatchEvaluateOptions {
  signal?: AbortSignal;
}

/**
 * Runs the match prompt several times against the same CV and role and keeps
 * the most conservative verdict.
 *
 * Transport failures and unparseable responses become failed runs; the only
 * error reported to the caller is an ExtractionFailure result when no run
 * produced a level. Aborting the signal rejects with EvaluationCancelledError.
 */
export class MatchConsensusEvaluator {
  private readonly config: MatchEvaluatorConfig;
  private readonly strategy: ExecutionStrategy;

  constructor(
    private readonly client: EvaluationClient,
    private readonly availability: Availability,
    config: Partial<MatchEvaluatorConfig> = {},
    private readonly template: PromptTemplate<MatchPromptSlot> = MATCH_EVALUATION_PROMPT,
    strategy?: ExecutionStrategy
  ) {
    this.config = { ...DEFAULT_MATCH_CONFIG, ...config };
    for (const key of ['runs', 'retriesPerRun', 'batchSize'] as const) {
      if (!Number.isInteger(this.config[key]) || this.config[key] < 1) {
        throw new RangeError(`${key} must be a positive integer, got ${this.config[key]}`);
      }
    }
    this.strategy = strategy ?? batched(this.config.batchSize);
  }

  async evaluate(
    candidateProfile: string,
    jobDescription: string,
    options: MatchEvaluateOptions = {}
  ): Promise<MatchResult> {
    const { signal } = options;
    throwIfCancelled(signal);

    Logger.debug(
      `[MatchConsensusEvaluator] ${this.config.runs} run(s), ${this.config.retriesPerRun} attempt(s) each, strategy ${this.strategy.name}`
    );

    const tasks = Array.from(
      { length: this.config.runs },
      (_, runIndex) => () => this.executeRun(runIndex, candidateProfile, jobDescription, signal)
    );
    const runs = await this.strategy.run(tasks);
    throwIfCancelled(signal);

    return this.assemble(runs);
  }

  private async executeRun(
    runIndex: number,
    cv: string,
    job: string,
    signal: AbortSignal | undefined
  ): Promise<EvaluationRun> {
    if (!this.availability.llm) {
      return { runIndex, rawText: '', retryIndex: 0, attempts: 0, nonce: '', error: 'LLM unavailable' };
    }

    let record: EvaluationRun = { runIndex, rawText: '', retryIndex: 0, attempts: 0, nonce: '' };

    for (let attempt = 0; attempt < this.config.retriesPerRun; attempt++) {
      throwIfCancelled(signal);
      const nonce = createNonce(runIndex, attempt);
      const prompt = this.template.render({ cv, job, nonce });

      try {
        const rawText = await this.client.evaluate(prompt, {
          timeoutMs: this.config.callTimeoutMs,
          signal,
        });
        const level = extractMatchLevel(rawText);
        if (level.found) {
          Logger.debug(
            `[MatchConsensusEvaluator] Run ${runIndex + 1}: ${level.value} match (attempt ${attempt + 1})`
          );
          return {
            runIndex,
            rawText,
            extractedMatchLevel: level.value,
            retryIndex: attempt,
            attempts: attempt + 1,
            nonce,
          };
        }
        Logger.warn(
          `[MatchConsensusEvaluator] Run ${runIndex + 1}, attempt ${attempt + 1}: no match level in response`
        );
        record = { runIndex, rawText, retryIndex: attempt, attempts: attempt + 1, nonce };
      } catch (error) {
        if (error instanceof EvaluationCancelledError || signal?.aborted) {
          throw error instanceof EvaluationCancelledError ? error : new EvaluationCancelledError();
        }
        Logger.warn(
          `[MatchConsensusEvaluator] Run ${runIndex + 1}, attempt ${attempt + 1} failed: ${describeError(error)}`
        );
        record = {
          runIndex,
          rawText: '',
          retryIndex: attempt,
          attempts: attempt + 1,
          nonce,
          error: describeError(error),
        };
      }
    }

    return record;
  }

  private assemble(runs: EvaluationRun[]): MatchResult {
    const levels = runs.flatMap(run => (run.extractedMatchLevel ? [run.extractedMatchLevel] : []));
    const consensus = resolveConsensus(levels);
    const representative = consensus ? selectRepresentative(runs, consensus) : undefined;

    if (!consensus || !representative) {
      if (!this.availability.llm) {
        Logger.warn('[MatchConsensusEvaluator] LLM unavailable, no runs executed');
      }
      Logger.error(`[MatchConsensusEvaluator] ✗ No match level extracted from ${runs.length} run(s)`);
      const failure: MatchFailure = {
        status: 'error',
        error: 'ExtractionFailure',
        runs,
        promptHash: this.template.hash,
      };
      return failure;
    }

    const adjustments: Adjustment[] = [];
    let level: MatchLevel = consensus;

    const highest = levels.reduce((a, b) => (rankOf(b) > rankOf(a) ? b : a));
    if (consensus === 'Low' && highest !== 'Low') {
      adjustments.push({
        reason: 'forced-low',
        from: highest,
        to: 'Low',
        detail: `Levels across runs: ${levels.join(', ')}`,
      });
    }

    const assessment = extractDomainAssessment(representative.rawText);
    const content = extractContent(representative.rawText, level);
    let contentText = content.found ? content.value.text : '';
    const contentMismatch = content.found && content.value.mismatch;

    if (level === 'Good' && contentMismatch) {
      adjustments.push({
        reason: 'content-mismatch',
        from: 'Good',
        to: 'Moderate',
        detail: 'Good match carried a no-go rationale instead of an application narrative',
      });
      level = 'Moderate';
    }

    let domainGap: DomainGapAnalysis | undefined;
    if (assessment.length > 0) {
      domainGap = analyzeDomainGap(assessment);
      if (level === 'Good') {
        if (
          domainGap.severity >= this.config.severityThreshold ||
          domainGap.requirementDensityPct > this.config.densityThresholdPct ||
          mentionsGap(assessment)
        ) {
          level = 'Low';
          contentText = `${DECLINE_PREFIX} critical domain knowledge gaps: ${assessment}`;
          adjustments.push({
            reason: 'critical-domain-gap',
            from: 'Good',
            to: 'Low',
            detail: `severity ${domainGap.severity}, requirement density ${domainGap.requirementDensityPct.toFixed(1)}%`,
          });
        } else if (hasModerateSignals(assessment, domainGap)) {
          level = 'Moderate';
          contentText = `${DECLINE_PREFIX} the following domain knowledge gaps: ${assessment}`;
          adjustments.push({
            reason: 'moderate-domain-gap',
            from: 'Good',
            to: 'Moderate',
            detail: 'Assessment names domain requirements or experience',
          });
        }
      }
    }

    if (contentText.trim().length < this.config.minContentLength) {
      contentText = level === 'Good' ? GENERIC_NARRATIVE : GENERIC_RATIONALE;
      adjustments.push({
        reason: 'short-content-fallback',
        from: level,
        to: level,
        detail: `Content shorter than ${this.config.minContentLength} characters`,
      });
    }

    Logger.info(
      `[MatchConsensusEvaluator] ✓ ${level} match (consensus ${consensus} from ${levels.length}/${runs.length} run(s))`
    );

    return {
      status: 'ok',
      finalMatchLevel: level,
      domainKnowledgeAssessment: assessment,
      contentType: level === 'Good' ? 'ApplicationNarrative' : 'NoGoRationale',
      contentText,
      contentMismatch,
      domainGap,
      adjustments,
      runs,
      promptHash: this.template.hash,
    };
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new EvaluationCancelledError();
  }
}
