/**
 * LLM Client Module
 *
 * Supported providers:
 * - litellm: LiteLLM proxy server (OpenAI-compatible)
 * - ollama: local Ollama server
 * - mock: Mock for testing
 */

export type { ILLMClient, ChatRequest, ChatResponse, ChatMessage, LLMProvider, LLMClientConfig } from './types';

export { LLMClientFactory } from './ClientFactory';

export { LiteLLMAdapter } from './LiteLLMAdapter';
export { OllamaAdapter } from './OllamaAdapter';
export { MockAdapter, type MockReply } from './MockAdapter';
