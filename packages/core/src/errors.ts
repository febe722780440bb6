/**
 * Error taxonomy
 *
 * Only the orchestrators touch a fallible client. TransportError is always
 * recovered locally; ExtractionFailure is reported inside a MatchResult rather
 * than thrown; cancellation and configuration errors are the only throws that
 * reach a caller.
 */

import type { ZodError } from 'zod';

export type VerdictErrorCode =
  | 'TRANSPORT_ERROR'
  | 'EVALUATION_CANCELLED'
  | 'CONFIG_VALIDATION'
  | 'PROMPT_TEMPLATE';

export abstract class VerdictError extends Error {
  abstract readonly code: VerdictErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * LLM endpoint unreachable, non-2xx response, malformed body or timeout
 */
export class TransportError extends VerdictError {
  readonly code = 'TRANSPORT_ERROR';

  constructor(
    message: string,
    readonly timedOut: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class EvaluationCancelledError extends VerdictError {
  readonly code = 'EVALUATION_CANCELLED';

  constructor(message: string = 'Evaluation cancelled by caller') {
    super(message);
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
  expected?: string;
}

export class ConfigValidationError extends VerdictError {
  readonly code = 'CONFIG_VALIDATION';

  constructor(
    readonly filePath: string,
    readonly issues: ConfigIssue[]
  ) {
    super(
      `Config validation failed for ${filePath}:\n` +
        issues
          .map(issue => `  [${issue.path}]: ${issue.message}${issue.expected ? ` (${issue.expected})` : ''}`)
          .join('\n')
    );
  }
}

/**
 * Zod issues as config issues, "root" for top-level problems
 */
export function formatZodErrors(error: ZodError): ConfigIssue[] {
  return error.errors.map(err => ({
    path: err.path.join('.') || 'root',
    message: err.message,
    expected:
      err.code === 'invalid_type' ? `expected ${err.expected}, got ${err.received}` : undefined,
  }));
}

export class PromptTemplateError extends VerdictError {
  readonly code = 'PROMPT_TEMPLATE';
}

/**
 * Normalize an unknown thrown value into a message for logs and run records
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
