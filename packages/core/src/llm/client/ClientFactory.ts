/**
 * LLM Client Factory
 *
 * Creates LLM client instances based on configuration and environment variables.
 *
 * Environment Variables:
 * - LLM_PROVIDER: 'litellm' | 'ollama' | 'mock' (default: 'ollama')
 * - LITELLM_URL: LiteLLM proxy URL (default: 'http://localhost:4000')
 * - LITELLM_API_KEY: LiteLLM API key
 * - OLLAMA_URL: Ollama server URL (default: 'http://localhost:11434')
 *
 * Usage:
 *   const client = LLMClientFactory.create();
 *   const client = LLMClientFactory.create({ provider: 'litellm', baseUrl: '...' });
 *   const mockClient = LLMClientFactory.create({ provider: 'mock' });
 */

import { ILLMClient, LLMClientConfig, LLMProvider } from './types';
import { LiteLLMAdapter } from './LiteLLMAdapter';
import { OllamaAdapter } from './OllamaAdapter';
import { MockAdapter } from './MockAdapter';
import { Logger } from '../../utils/logger';

const PROVIDERS: readonly LLMProvider[] = ['litellm', 'ollama', 'mock'];

function isProvider(value: string): value is LLMProvider {
  return (PROVIDERS as readonly string[]).includes(value);
}

export class LLMClientFactory {
  /**
   * Create an LLM client based on configuration and environment variables
   *
   * Priority:
   * 1. Config parameter (if provided)
   * 2. Environment variables
   * 3. Defaults (local Ollama)
   */
  static create(config?: Partial<LLMClientConfig>): ILLMClient {
    const provider = this.resolveProvider(config?.provider);

    Logger.info(`[LLMClientFactory] Creating client: provider=${provider}`);

    switch (provider) {
      case 'litellm':
        return new LiteLLMAdapter(config);

      case 'ollama':
        return new OllamaAdapter(config);

      case 'mock':
        return new MockAdapter(config);
    }
  }

  /**
   * Resolve provider from config or environment
   */
  static resolveProvider(configProvider?: LLMProvider): LLMProvider {
    if (configProvider) {
      return configProvider;
    }

    const envProvider = process.env.LLM_PROVIDER?.toLowerCase();
    if (envProvider) {
      if (isProvider(envProvider)) {
        return envProvider;
      }
      Logger.warn(`[LLMClientFactory] Invalid LLM_PROVIDER="${envProvider}", using default "ollama"`);
    }

    return 'ollama';
  }
}
