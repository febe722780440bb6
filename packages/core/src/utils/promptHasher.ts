import * as crypto from 'crypto';

/**
 * Calculate SHA256 hash of prompt content
 * Recorded with results so a verdict can be traced to the exact template text
 */
export function calculatePromptHash(promptContent: string): string {
  const hash = crypto.createHash('sha256');
  hash.update(promptContent);
  return hash.digest('hex');
}

/**
 * Unique per-attempt marker appended to prompts so the inference layer cannot
 * serve a cached completion for a retried or repeated run
 */
export function createNonce(runIndex: number, attempt: number): string {
  return `run-${runIndex + 1}-attempt-${attempt + 1}-${crypto.randomBytes(6).toString('hex')}`;
}
