/**
 * OpenAI-compatible chat completions, as served by a LiteLLM proxy.
 * A body without message text is a malformed response, not an empty answer.
 */

import { ILLMClient, ChatRequest, ChatResponse, LLMClientConfig } from './types';
import { Logger } from '../../utils/logger';

interface ChatCompletion {
  choices?: Array<{ message?: { content?: string | null } }>;
  model?: string;
  usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number };
}

export class LiteLLMAdapter implements ILLMClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(config?: LLMClientConfig) {
    this.baseUrl = (config?.baseUrl || process.env.LITELLM_URL || 'http://localhost:4000').replace(/\/+$/, '');
    const apiKey = config?.apiKey || process.env.LITELLM_API_KEY;
    this.headers = {
      'Content-Type': 'application/json',
      ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
    };
    Logger.debug(`[LiteLLMAdapter] Endpoint ${this.baseUrl}`);
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const startTime = Date.now();
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: this.headers,
      body: JSON.stringify({
        model: request.model,
        messages: request.messages,
        temperature: request.temperature ?? 0,
        top_p: request.top_p ?? 1.0,
        max_tokens: request.max_tokens ?? 4000,
      }),
      signal: request.signal,
    });
    const latencyMs = Date.now() - startTime;

    if (!response.ok) {
      throw new Error(`LiteLLM error (${response.status}): ${await response.text()}`);
    }

    const data = (await response.json()) as ChatCompletion;
    const content = data.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new Error('LiteLLM response has no message content');
    }

    Logger.debug(`[LiteLLMAdapter] ✓ ${request.model} answered in ${latencyMs}ms`);
    const promptTokens = data.usage?.prompt_tokens ?? 0;
    const completionTokens = data.usage?.completion_tokens ?? 0;
    return {
      content,
      model: data.model || request.model,
      usage: {
        prompt_tokens: promptTokens,
        completion_tokens: completionTokens,
        total_tokens: data.usage?.total_tokens ?? promptTokens + completionTokens,
      },
      latency_ms: latencyMs,
    };
  }

  async ping(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/models`, {
        headers: this.headers,
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch (error) {
      Logger.warn(`[LiteLLMAdapter] Endpoint ${this.baseUrl} not reachable`, error);
      return false;
    }
  }

  destroy(): void {}
}
