/**
 * Schema exports for engine config and job input validation
 */

export {
  EngineConfigSchema,
  JobInputSchema,
  applyEngineDefaults,
  DEFAULT_MODEL,
  type EngineConfig,
  type ResolvedEngineConfig,
  type ResolvedLlmConfig,
  type JobInputFile,
  type JobInput,
} from './config-schema';

export {
  validateWithSchema,
  validateEngineConfig,
  validateJobInput,
  formatValidationResult,
  type ValidationResult,
} from './schema-validator';

export {
  CURRENT_SCHEMA_VERSION,
  SUPPORTED_SCHEMA_VERSIONS,
  isSupportedVersion,
  isValidSemver,
  validateSchemaVersion,
  type SupportedSchemaVersion,
  type SchemaVersionValidation,
} from './version';
