import { ILLMClient } from './client';
import { Logger } from '../utils/logger';

/**
 * Which external collaborators may be used. Injected into the orchestrators at
 * construction so tests can simulate an unavailable endpoint deterministically.
 */
export interface Availability {
  readonly llm: boolean;
}

export const ALL_AVAILABLE: Availability = Object.freeze({ llm: true });

export const LLM_UNAVAILABLE: Availability = Object.freeze({ llm: false });

/**
 * Build an Availability value from a health check of the configured client
 */
export async function probeAvailability(client: ILLMClient): Promise<Availability> {
  const llm = await client.ping();
  if (llm) {
    Logger.info('[Availability] ✓ LLM endpoint reachable');
  } else {
    Logger.warn('[Availability] LLM endpoint unreachable; LLM-backed steps will be skipped');
  }
  return Object.freeze({ llm });
}
