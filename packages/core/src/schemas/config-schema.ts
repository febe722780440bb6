import { z } from 'zod';
import { SUPPORTED_SCHEMA_VERSIONS } from './version';
import { DEFAULT_MATCH_CONFIG, MatchEvaluatorConfig } from '../matching/MatchConsensusEvaluator';
import { DEFAULT_LOCATION_CONFIG, LocationValidatorConfig } from '../location/HybridLocationValidator';
import { LLMProvider } from '../llm/client/types';

export const DEFAULT_MODEL = 'llama3.2:latest';

const LlmSectionSchema = z.object({
  provider: z.enum(['litellm', 'ollama', 'mock']).optional(),
  model: z.string().min(1, 'model must not be empty').optional(),
  baseUrl: z.string().url('baseUrl must be a URL').optional(),
  temperature: z.number().min(0).max(2, 'temperature must be between 0 and 2').optional(),
  topP: z.number().min(0).max(1, 'topP must be between 0 and 1').optional(),
  maxTokens: z.number().int().positive('maxTokens must be a positive integer').optional(),
});

const MatchingSectionSchema = z.object({
  runs: z.number().int().min(1).max(20, 'runs must be between 1 and 20').optional(),
  retriesPerRun: z.number().int().min(1).max(10, 'retriesPerRun must be between 1 and 10').optional(),
  minContentLength: z.number().int().nonnegative().optional(),
  callTimeoutMs: z.number().int().positive('callTimeoutMs must be a positive integer').optional(),
  batchSize: z.number().int().positive('batchSize must be a positive integer').optional(),
  severityThreshold: z.number().int().nonnegative().optional(),
  densityThresholdPct: z.number().min(0).max(100).optional(),
  promptPath: z.string().min(1).optional(),
});

const LocationSectionSchema = z.object({
  gateThreshold: z.number().min(0).max(1, 'gateThreshold must be between 0 and 1').optional(),
  excerptLength: z.number().int().positive('excerptLength must be a positive integer').optional(),
  callTimeoutMs: z.number().int().positive('callTimeoutMs must be a positive integer').optional(),
  gazetteerPath: z.string().min(1).optional(),
  promptPath: z.string().min(1).optional(),
});

export const EngineConfigSchema = z
  .object({
    schemaVersion: z.enum(SUPPORTED_SCHEMA_VERSIONS),
    llm: LlmSectionSchema.optional(),
    matching: MatchingSectionSchema.optional(),
    location: LocationSectionSchema.optional(),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export interface ResolvedLlmConfig {
  provider?: LLMProvider;
  model: string;
  baseUrl?: string;
  temperature: number;
  topP: number;
  maxTokens: number;
}

export interface ResolvedEngineConfig {
  schemaVersion: string;
  llm: ResolvedLlmConfig;
  matching: MatchEvaluatorConfig & { promptPath?: string };
  location: LocationValidatorConfig & { gazetteerPath?: string; promptPath?: string };
}

/**
 * Fill every optional field. The model falls back to LLM_MODEL before the
 * built-in default; the provider is left to LLMClientFactory when unset.
 */
export function applyEngineDefaults(config: EngineConfig): ResolvedEngineConfig {
  const llm = config.llm ?? {};
  return {
    schemaVersion: config.schemaVersion,
    llm: {
      provider: llm.provider,
      model: llm.model ?? (process.env.LLM_MODEL || DEFAULT_MODEL),
      baseUrl: llm.baseUrl,
      temperature: llm.temperature ?? 0.7,
      topP: llm.topP ?? 0.9,
      maxTokens: llm.maxTokens ?? 2000,
    },
    matching: { ...DEFAULT_MATCH_CONFIG, ...config.matching },
    location: { ...DEFAULT_LOCATION_CONFIG, ...config.location },
  };
}

const JobInputBaseSchema = z.object({
  jobId: z.string().min(1, 'jobId is required'),
  candidateProfile: z.string().min(1).optional(),
  candidateProfilePath: z.string().min(1).optional(),
  jobDescription: z.string().min(1, 'jobDescription is required'),
  metadataLocation: z.string(),
});

export const JobInputSchema = JobInputBaseSchema.refine(
  job => (job.candidateProfile === undefined) !== (job.candidateProfilePath === undefined),
  {
    message: 'exactly one of candidateProfile or candidateProfilePath is required',
    path: ['candidateProfile'],
  }
);

export type JobInputFile = z.infer<typeof JobInputSchema>;

/**
 * A job with its candidate profile text resolved
 */
export interface JobInput {
  jobId: string;
  candidateProfile: string;
  jobDescription: string;
  metadataLocation: string;
}
