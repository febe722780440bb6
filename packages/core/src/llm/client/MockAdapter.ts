/**
 * Mock Adapter
 *
 * Mock implementation of ILLMClient for unit testing.
 * Serves scripted responses in order, falls back to a default response,
 * and records every call for assertions.
 */

import { ILLMClient, ChatRequest, ChatResponse, LLMClientConfig } from './types';
import { Logger } from '../../utils/logger';

/**
 * A scripted reply: text to return, or an Error to reject with
 */
export type MockReply = string | Error;

export class MockAdapter implements ILLMClient {
  private queue: MockReply[] = [];
  private defaultReply: MockReply | undefined;
  private callHistory: ChatRequest[] = [];
  private simulatedLatencyMs: number = 0;
  private reachable: boolean = true;

  constructor(_config?: LLMClientConfig) {
    Logger.debug('[MockAdapter] Initialized for testing');
  }

  /**
   * Queue replies, served one per call in order
   */
  enqueue(...replies: MockReply[]): void {
    this.queue.push(...replies);
  }

  /**
   * Reply used once the queue is empty
   */
  setDefaultResponse(reply: MockReply): void {
    this.defaultReply = reply;
  }

  setLatency(ms: number): void {
    this.simulatedLatencyMs = ms;
  }

  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }

  getCalls(): ChatRequest[] {
    return [...this.callHistory];
  }

  getLastCall(): ChatRequest | undefined {
    return this.callHistory[this.callHistory.length - 1];
  }

  reset(): void {
    this.queue = [];
    this.defaultReply = undefined;
    this.callHistory = [];
    this.simulatedLatencyMs = 0;
    this.reachable = true;
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const { signal, ...recorded } = request;
    this.callHistory.push(recorded);

    if (this.simulatedLatencyMs > 0) {
      await sleep(this.simulatedLatencyMs, signal);
    }
    signal?.throwIfAborted();

    const reply = this.queue.length > 0 ? this.queue.shift() : this.defaultReply;
    if (reply === undefined) {
      throw new Error('No mock response configured');
    }
    if (reply instanceof Error) {
      throw reply;
    }

    const promptText = request.messages.map(m => m.content).join(' ');
    const promptTokens = Math.ceil(promptText.length / 4);
    const completionTokens = Math.ceil(reply.length / 4);

    return {
      content: reply,
      model: request.model,
      usage: {
        prompt_tokens: promptTokens,
        completion_tokens: completionTokens,
        total_tokens: promptTokens + completionTokens,
      },
      latency_ms: this.simulatedLatencyMs,
    };
  }

  async ping(): Promise<boolean> {
    return this.reachable;
  }

  destroy(): void {
    Logger.debug('[MockAdapter] ✓ Destroyed');
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
