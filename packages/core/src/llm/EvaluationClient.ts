import { ILLMClient } from './client';
import { TransportError, EvaluationCancelledError, describeError } from '../errors';
import { Logger } from '../utils/logger';

export interface EvaluateOptions {
  /** Upper bound for this single call */
  timeoutMs: number;
  /** Caller cancellation for the whole job evaluation */
  signal?: AbortSignal;
}

/**
 * Request/response seam to the inference endpoint: opaque prompt in, raw text out.
 *
 * Implementations reject with TransportError for anything that is not a
 * response body (unreachable endpoint, HTTP error, timeout), and with
 * EvaluationCancelledError when the caller's signal fires.
 */
export interface EvaluationClient {
  evaluate(prompt: string, options: EvaluateOptions): Promise<string>;
}

export interface InferenceSettings {
  model: string;
  temperature: number;
  topP: number;
  maxTokens: number;
}

/**
 * EvaluationClient over one of the chat adapters
 */
export class ChatEvaluationClient implements EvaluationClient {
  constructor(
    private readonly client: ILLMClient,
    private readonly settings: InferenceSettings
  ) {}

  async evaluate(prompt: string, options: EvaluateOptions): Promise<string> {
    if (options.signal?.aborted) {
      throw new EvaluationCancelledError();
    }

    const timeoutSignal = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal;

    try {
      const response = await this.client.chat({
        model: this.settings.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.settings.temperature,
        top_p: this.settings.topP,
        max_tokens: this.settings.maxTokens,
        signal,
      });
      Logger.debug(
        `[ChatEvaluationClient] ${response.usage.total_tokens} tokens in ${response.latency_ms}ms`
      );
      return response.content;
    } catch (error) {
      if (options.signal?.aborted) {
        throw new EvaluationCancelledError();
      }
      if (timeoutSignal.aborted) {
        throw new TransportError(`LLM call timed out after ${options.timeoutMs}ms`, true, {
          cause: error,
        });
      }
      throw new TransportError(`LLM call failed: ${describeError(error)}`, false, { cause: error });
    }
  }

  destroy(): void {
    this.client.destroy();
  }
}
