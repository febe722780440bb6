/**
 * Ollama Adapter
 *
 * Local Ollama inference server implementation of ILLMClient.
 * Uses the non-streaming POST /api/generate endpoint; chat messages are
 * flattened into a single prompt.
 */

import { ILLMClient, ChatRequest, ChatResponse, LLMClientConfig } from './types';
import { Logger } from '../../utils/logger';

interface OllamaGenerateResponse {
  response?: string;
  model?: string;
  prompt_eval_count?: number;
  eval_count?: number;
}

export class OllamaAdapter implements ILLMClient {
  private baseUrl: string;

  constructor(config?: LLMClientConfig) {
    this.baseUrl = config?.baseUrl || process.env.OLLAMA_URL || 'http://localhost:11434';

    Logger.debug(`[OllamaAdapter] Initialized for endpoint: ${this.baseUrl}`);
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const startTime = Date.now();

    Logger.debug(`[OllamaAdapter] Invoking model: ${request.model}`);

    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: request.model,
          prompt: request.messages.map(m => m.content).join('\n\n'),
          stream: false,
          options: {
            temperature: request.temperature ?? 0,
            top_p: request.top_p ?? 1.0,
            num_predict: request.max_tokens ?? 4000,
          },
        }),
        signal: request.signal,
      });

      const latencyMs = Date.now() - startTime;

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error (${response.status}): ${errorText}`);
      }

      const data = (await response.json()) as OllamaGenerateResponse;
      if (typeof data.response !== 'string') {
        throw new Error('Ollama response is missing the "response" field');
      }

      const promptTokens = data.prompt_eval_count || 0;
      const completionTokens = data.eval_count || 0;

      Logger.debug(`[OllamaAdapter] ✓ Response received (${latencyMs}ms)`);

      return {
        content: data.response,
        model: data.model || request.model,
        usage: {
          prompt_tokens: promptTokens,
          completion_tokens: completionTokens,
          total_tokens: promptTokens + completionTokens,
        },
        latency_ms: latencyMs,
      };
    } catch (error) {
      Logger.error(`[OllamaAdapter] ✗ Request failed for model ${request.model}`, error);
      throw error;
    }
  }

  async ping(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch (error) {
      Logger.warn(`[OllamaAdapter] Ollama not reachable at ${this.baseUrl}`, error);
      return false;
    }
  }

  destroy(): void {
    Logger.debug('[OllamaAdapter] ✓ Destroyed (no cleanup needed)');
  }
}
