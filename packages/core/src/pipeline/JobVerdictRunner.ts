import { ChatEvaluationClient, EvaluationClient } from '../llm/EvaluationClient';
import { Availability, probeAvailability } from '../llm/availability';
import { ILLMClient, LLMClientFactory } from '../llm/client';
import { HybridLocationValidator } from '../location/HybridLocationValidator';
import { LocationAnalysis } from '../location/types';
import { LocationStatsSnapshot } from '../location/LocationValidationStats';
import { MatchConsensusEvaluator } from '../matching/MatchConsensusEvaluator';
import { JobDomainAnalysis, analyzeJobDomain } from '../matching/job-domain';
import { MatchResult } from '../matching/types';
import { JobInput, ResolvedEngineConfig } from '../schemas';
import { ConfigLoader } from '../utils/ConfigLoader';
import { Logger } from '../utils/logger';

export interface JobVerdict {
  jobId: string;
  match: MatchResult;
  location: LocationAnalysis;
  domain: JobDomainAnalysis;
  /** ISO-8601 time the verdict was assembled */
  timestamp: string;
}

export interface JobVerdictRunnerOptions {
  /** Chat client to use instead of the one LLMClientFactory picks */
  client?: ILLMClient;
  /** Skip the endpoint health check */
  availability?: Availability;
}

export interface EvaluateJobOptions {
  signal?: AbortSignal;
}

/**
 * Evaluates one job at a time: match consensus and location validation run
 * concurrently and share nothing but the caller's abort signal.
 */
export class JobVerdictRunner {
  constructor(
    private readonly evaluator: MatchConsensusEvaluator,
    private readonly validator: HybridLocationValidator,
    private readonly client?: ILLMClient
  ) {}

  /**
   * Wire a runner from a resolved engine config
   */
  static async create(
    config: ResolvedEngineConfig,
    options: JobVerdictRunnerOptions = {}
  ): Promise<JobVerdictRunner> {
    const client =
      options.client ?? LLMClientFactory.create({ provider: config.llm.provider, baseUrl: config.llm.baseUrl });
    const availability = options.availability ?? (await probeAvailability(client));

    const evaluationClient: EvaluationClient = new ChatEvaluationClient(client, {
      model: config.llm.model,
      temperature: config.llm.temperature,
      topP: config.llm.topP,
      maxTokens: config.llm.maxTokens,
    });
    const prompts = ConfigLoader.loadPrompts(config);
    const gazetteer = ConfigLoader.loadGazetteer(config);

    Logger.debug(
      `[JobVerdictRunner] model=${config.llm.model}, runs=${config.matching.runs}, gate=${config.location.gateThreshold}`
    );

    return new JobVerdictRunner(
      new MatchConsensusEvaluator(evaluationClient, availability, config.matching, prompts.match),
      new HybridLocationValidator(evaluationClient, availability, config.location, gazetteer, prompts.location),
      client
    );
  }

  async evaluateJob(input: JobInput, options: EvaluateJobOptions = {}): Promise<JobVerdict> {
    Logger.info(`[JobVerdictRunner] Evaluating job ${input.jobId}`);

    const [match, location] = await Promise.all([
      this.evaluator.evaluate(input.candidateProfile, input.jobDescription, { signal: options.signal }),
      this.validator.validate(input.metadataLocation, input.jobDescription, { signal: options.signal }),
    ]);
    const domain = analyzeJobDomain(input.jobDescription);

    if (match.status === 'ok') {
      Logger.info(
        `[JobVerdictRunner] ✓ ${input.jobId}: ${match.finalMatchLevel} match, location ${location.conflictDetected ? `conflict (${location.riskLevel})` : 'confirmed'}`
      );
    } else {
      Logger.error(`[JobVerdictRunner] ✗ ${input.jobId}: ${match.error}, job must be re-run`);
    }

    return {
      jobId: input.jobId,
      match,
      location,
      domain,
      timestamp: new Date().toISOString(),
    };
  }

  locationStats(): LocationStatsSnapshot {
    return this.validator.stats.snapshot();
  }

  destroy(): void {
    this.client?.destroy();
  }
}
