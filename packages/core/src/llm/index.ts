/**
 * LLM Module
 *
 * Client abstraction (LiteLLM, Ollama, Mock), the EvaluationClient seam used by
 * the orchestrators, and the injected Availability value.
 */

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
} from './client';

export {
  ChatEvaluationClient,
  type EvaluationClient,
  type EvaluateOptions,
  type InferenceSettings,
} from './EvaluationClient';

export { ALL_AVAILABLE, LLM_UNAVAILABLE, probeAvailability, type Availability } from './availability';
