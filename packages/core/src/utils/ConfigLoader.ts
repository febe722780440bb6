import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { Logger } from './logger';
import { ConfigValidationError } from '../errors';
import { Gazetteer } from '../location/Gazetteer';
import { PromptLoader } from '../prompts/PromptLoader';
import { PromptTemplate } from '../prompts/PromptTemplate';
import {
  LOCATION_ADJUDICATION_PROMPT,
  LocationPromptSlot,
  MATCH_EVALUATION_PROMPT,
  MatchPromptSlot,
} from '../prompts/templates';
import {
  CURRENT_SCHEMA_VERSION,
  JobInput,
  ResolvedEngineConfig,
  applyEngineDefaults,
  validateEngineConfig,
  validateJobInput,
} from '../schemas';

export const DEFAULT_CONFIG_FILE = 'jobfit.config.yaml';

export interface EnginePrompts {
  match: PromptTemplate<MatchPromptSlot>;
  location: PromptTemplate<LocationPromptSlot>;
}

export class ConfigLoader {
  /**
   * Load and validate the engine config. Without an explicit path a missing
   * jobfit.config.yaml in the working directory means built-in defaults.
   * Relative prompt and gazetteer paths resolve against the config file.
   */
  static async load(configPath?: string): Promise<ResolvedEngineConfig> {
    const resolvedPath = path.resolve(configPath ?? DEFAULT_CONFIG_FILE);

    if (!fs.existsSync(resolvedPath)) {
      if (configPath) {
        throw new ConfigValidationError(resolvedPath, [{ path: 'file', message: 'Config file not found' }]);
      }
      Logger.debug(`[ConfigLoader] No ${DEFAULT_CONFIG_FILE} found, using defaults`);
      return applyEngineDefaults({ schemaVersion: CURRENT_SCHEMA_VERSION });
    }

    Logger.debug(`[ConfigLoader] Validating config with Zod schema`);
    const result = validateEngineConfig(resolvedPath);
    if (!result.valid) {
      throw new ConfigValidationError(resolvedPath, result.errors);
    }
    Logger.debug(`[ConfigLoader] ✓ Config validated successfully (schema: ${result.data.schemaVersion})`);

    const config = applyEngineDefaults(result.data);
    const baseDir = path.dirname(resolvedPath);
    const resolve = (p: string | undefined) => (p === undefined ? undefined : path.resolve(baseDir, p));

    return {
      ...config,
      matching: { ...config.matching, promptPath: resolve(config.matching.promptPath) },
      location: {
        ...config.location,
        promptPath: resolve(config.location.promptPath),
        gazetteerPath: resolve(config.location.gazetteerPath),
      },
    };
  }

  /**
   * Validate a job file and read its candidate profile (relative to the job file)
   */
  static loadJob(filePath: string): JobInput {
    const result = validateJobInput(filePath);
    if (!result.valid) {
      throw new ConfigValidationError(filePath, result.errors);
    }

    const job = result.data;
    let candidateProfile = job.candidateProfile;
    if (candidateProfile === undefined && job.candidateProfilePath !== undefined) {
      const profilePath = path.resolve(path.dirname(filePath), job.candidateProfilePath);
      if (!fs.existsSync(profilePath)) {
        throw new ConfigValidationError(filePath, [
          { path: 'candidateProfilePath', message: `Candidate profile not found: ${profilePath}` },
        ]);
      }
      candidateProfile = fs.readFileSync(profilePath, 'utf-8');
    }

    return {
      jobId: job.jobId,
      candidateProfile: candidateProfile ?? '',
      jobDescription: job.jobDescription,
      metadataLocation: job.metadataLocation,
    };
  }

  /**
   * Job files matching a glob pattern, sorted for a stable processing order
   */
  static async findJobFiles(pattern: string): Promise<string[]> {
    const files = await glob(pattern, { nodir: true });
    if (files.length === 0) {
      Logger.warn(`[ConfigLoader] No job files found matching pattern: ${pattern}`);
    }
    return files.sort();
  }

  static loadGazetteer(config: ResolvedEngineConfig): Gazetteer {
    return config.location.gazetteerPath ? Gazetteer.load(config.location.gazetteerPath) : Gazetteer.default();
  }

  static loadPrompts(config: ResolvedEngineConfig): EnginePrompts {
    return {
      match: config.matching.promptPath
        ? PromptLoader.load(config.matching.promptPath, MATCH_EVALUATION_PROMPT)
        : MATCH_EVALUATION_PROMPT,
      location: config.location.promptPath
        ? PromptLoader.load(config.location.promptPath, LOCATION_ADJUDICATION_PROMPT)
        : LOCATION_ADJUDICATION_PROMPT,
    };
  }
}
