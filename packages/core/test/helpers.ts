import { EvaluateOptions, EvaluationClient } from '../src/llm/EvaluationClient';

export type ScriptedReply = string | Error;

/**
 * EvaluationClient that serves replies in order and records prompts
 */
export class ScriptedEvaluationClient implements EvaluationClient {
  readonly prompts: string[] = [];
  private readonly replies: ScriptedReply[];

  constructor(
    replies: ScriptedReply[] = [],
    private readonly fallback?: ScriptedReply
  ) {
    this.replies = [...replies];
  }

  async evaluate(prompt: string, _options: EvaluateOptions): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.length > 0 ? this.replies.shift() : this.fallback;
    if (reply === undefined) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export function goodResponse(narrative: string, assessment?: string): string {
  return [
    'CV-to-role match: Good match',
    ...(assessment === undefined ? [] : [`Domain knowledge assessment: ${assessment}`]),
    `Application narrative: ${narrative}`,
  ].join('\n');
}

export function declineResponse(level: 'Low' | 'Moderate', rationale: string): string {
  return [`CV-to-role match: ${level} match`, `No-go rationale: ${rationale}`].join('\n');
}
