/**
 * Tolerant parsing of the CONFLICT / LOCATION / REASONING answer format.
 * Markdown bold, brackets and lower case are accepted; each field is optional.
 */

export interface AdjudicationAnswer {
  readonly conflict?: boolean;
  readonly location?: string;
  readonly reasoning?: string;
}

const CONFLICT_FIELD = /^[\s*#>-]*CONFLICT[\s*]*:[\s*]*\[?\s*(yes|no)\b/im;
const LOCATION_FIELD = /^[\s*#>-]*LOCATION[\s*]*:[\s*]*(.+)$/im;
const REASONING_FIELD = /^[\s*#>-]*REASONING[\s*]*:[\s*]*(.+)$/im;

function cleanValue(value: string): string | undefined {
  const cleaned = value
    .trim()
    .replace(/^\[|\]$/g, '')
    .replace(/^\*+|\*+$/g, '')
    .trim();
  return cleaned.length > 0 ? cleaned : undefined;
}

function field(pattern: RegExp, text: string): string | undefined {
  const match = pattern.exec(text);
  return match ? cleanValue(match[1]) : undefined;
}

export function parseAdjudication(text: string): AdjudicationAnswer {
  const conflict = field(CONFLICT_FIELD, text);
  const location = field(LOCATION_FIELD, text);
  const reasoning = field(REASONING_FIELD, text);

  return {
    ...(conflict !== undefined ? { conflict: conflict.toLowerCase() === 'yes' } : {}),
    ...(location !== undefined ? { location } : {}),
    ...(reasoning !== undefined ? { reasoning } : {}),
  };
}
