/**
 * LLM Client Types
 *
 * Defines the interface for LLM clients, enabling:
 * - Swappable implementations (LiteLLM, Ollama, Mock)
 * - Easy testing with mock clients
 */

/**
 * Chat message in OpenAI-compatible format
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Chat completion request
 */
export interface ChatRequest {
  /** Model ID (e.g., "llama3.2:latest") */
  model: string;

  /** Conversation messages */
  messages: ChatMessage[];

  /** Temperature (0-1), defaults to 0 */
  temperature?: number;

  /** Top-p sampling (0-1), defaults to 1.0 */
  top_p?: number;

  /** Maximum output tokens */
  max_tokens?: number;

  /** Aborts the in-flight request (caller cancellation or per-call timeout) */
  signal?: AbortSignal;
}

/**
 * Chat completion response
 * Normalized format across all adapters
 */
export interface ChatResponse {
  /** Generated text content */
  content: string;

  /** Model that generated the response */
  model: string;

  /** Token usage statistics */
  usage: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };

  /** Request latency in milliseconds */
  latency_ms: number;
}

/**
 * LLM Client Interface
 *
 * All LLM adapters must implement this interface.
 */
export interface ILLMClient {
  /**
   * Send a chat completion request
   *
   * @returns Chat response with content, usage, and latency
   */
  chat(request: ChatRequest): Promise<ChatResponse>;

  /**
   * Check that the endpoint answers at all. Used to build an Availability value
   * before any evaluation starts.
   */
  ping(): Promise<boolean>;

  /**
   * Clean up resources (close connections)
   */
  destroy(): void;
}

/**
 * LLM Provider type
 */
export type LLMProvider = 'litellm' | 'ollama' | 'mock';

/**
 * Client configuration
 */
export interface LLMClientConfig {
  /** Provider type */
  provider?: LLMProvider;

  /** Base URL of the inference endpoint */
  baseUrl?: string;

  /** API key (LiteLLM only) */
  apiKey?: string;
}
