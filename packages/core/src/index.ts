/**
 * @jobfit-verdict/core
 *
 * Conservative job verdicts: match consensus over repeated LLM evaluations
 * and hybrid (gazetteer + LLM) location validation.
 */

// ============================================================================
// Pipeline
// ============================================================================
export {
  JobVerdictRunner,
  type JobVerdict,
  type JobVerdictRunnerOptions,
  type EvaluateJobOptions,
} from './pipeline/JobVerdictRunner';

// ============================================================================
// Match Consensus
// ============================================================================
export * from './matching';

// ============================================================================
// Location Validation
// ============================================================================
export * from './location';

// ============================================================================
// LLM Client Abstraction
// ============================================================================
export {
  type ILLMClient,
  type ChatRequest,
  type ChatResponse,
  type ChatMessage,
  type LLMProvider,
  type LLMClientConfig,
  type MockReply,
  LLMClientFactory,
  LiteLLMAdapter,
  OllamaAdapter,
  MockAdapter,
  ChatEvaluationClient,
  type EvaluationClient,
  type EvaluateOptions,
  type InferenceSettings,
  ALL_AVAILABLE,
  LLM_UNAVAILABLE,
  probeAvailability,
  type Availability,
} from './llm';

// ============================================================================
// Prompts
// ============================================================================
export * from './prompts';

// ============================================================================
// Schemas & Config
// ============================================================================
export * from './schemas';
export { ConfigLoader, DEFAULT_CONFIG_FILE, type EnginePrompts } from './utils/ConfigLoader';
export { EnvLoader } from './utils/env-loader';

// ============================================================================
// Errors
// ============================================================================
export {
  VerdictError,
  TransportError,
  EvaluationCancelledError,
  ConfigValidationError,
  PromptTemplateError,
  describeError,
  formatZodErrors,
  type VerdictErrorCode,
  type ConfigIssue,
} from './errors';

// ============================================================================
// Utilities
// ============================================================================
export { Logger } from './utils/logger';
export { sequential, batched, type ExecutionStrategy, type Task } from './utils/execution';
export { calculatePromptHash, createNonce } from './utils/promptHasher';
export * from './utils/artifacts';
