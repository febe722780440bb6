/**
 * Response parsing for match evaluations.
 *
 * Pure and total: every function returns a value for any input string and
 * never throws. The evaluator owns retry and fallback policy.
 */

import {
  ExtractedContent,
  Extraction,
  MatchLevel,
  NOT_FOUND,
  found,
  valueOr,
} from './types';

export const RATIONALE_PREFIX =
  'I have compared my CV and the role description and decided not to apply due to the following reasons:';

const MATCH_HEADER = 'CV-to-role match';
const DOMAIN_HEADER = 'Domain knowledge assessment';
const NARRATIVE_HEADER = 'Application narrative';
const RATIONALE_HEADERS = ['No-go rationale', 'No go rationale', 'Nogo rationale'];

const ALL_HEADERS = [MATCH_HEADER, DOMAIN_HEADER, NARRATIVE_HEADER, ...RATIONALE_HEADERS];

const LEVEL_BY_WORD: Record<string, MatchLevel> = {
  low: 'Low',
  moderate: 'Moderate',
  good: 'Good',
};

// "[Low match/Moderate match/Good match]" echoed back from the prompt is not an answer
const NOT_AN_OPTION_LIST = String.raw`(?!\s*(?:match\s*)?\/)`;

const STRUCTURED_LEVEL_PATTERNS = [
  new RegExp(
    String.raw`CV[\s-]?to[\s-]?role[\s-]?match\s*(?:\*\*)?\s*:\s*(?:\*\*)?\s*\[?\s*(low|moderate|good)\b(?:\s+match\b)?${NOT_AN_OPTION_LIST}`,
    'i'
  ),
  new RegExp(String.raw`match level is\s*(?:\*\*)?\s*(low|moderate|good)\b${NOT_AN_OPTION_LIST}`, 'i'),
];

const LOOSE_LEVEL_PATTERN = /(?<!\/\s*)\b(low|moderate|good)\s+match\b(?!\s*\/)/i;

const PLACEHOLDER_CONTENT = /^(?:\[[^\]]*\]|n\/?a|none|-+|)$/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function headerPattern(label: string, flags: string = 'i'): RegExp {
  // **Label:**, **Label**:, Label:, ## Label:
  return new RegExp(
    String.raw`(?:\*\*)?\s*${escapeRegExp(label).replace(/[-\s]/g, String.raw`[\s-]?`)}\s*(?:\*\*)?\s*:\s*(?:\*\*)?`,
    flags
  );
}

const ANY_HEADER = new RegExp(ALL_HEADERS.map(h => headerPattern(h).source).join('|'), 'gi');

function levelFromWord(word: string): MatchLevel {
  return LEVEL_BY_WORD[word.toLowerCase()];
}

/**
 * Text between a labelled header and the next recognized header (or end of text)
 */
export function findSection(text: string, labels: readonly string[]): Extraction<string> {
  let start = -1;
  for (const label of labels) {
    const match = headerPattern(label).exec(text);
    if (match && (start === -1 || match.index + match[0].length < start)) {
      start = match.index + match[0].length;
    }
  }
  if (start === -1) {
    return NOT_FOUND;
  }

  ANY_HEADER.lastIndex = start;
  const next = ANY_HEADER.exec(text);
  ANY_HEADER.lastIndex = 0;
  const end = next ? next.index : text.length;

  const content = text
    .slice(start, end)
    .trim()
    .replace(/^\*+|\*+$/g, '')
    .trim();

  return PLACEHOLDER_CONTENT.test(content) ? NOT_FOUND : found(content);
}

/**
 * Categorical match level: structured markers first, then the first loose
 * "<level> match" mention anywhere in the text
 */
export function extractMatchLevel(text: string): Extraction<MatchLevel> {
  for (const pattern of STRUCTURED_LEVEL_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return found(levelFromWord(match[1]));
    }
  }

  const loose = LOOSE_LEVEL_PATTERN.exec(text);
  return loose ? found(levelFromWord(loose[1])) : NOT_FOUND;
}

/**
 * Domain knowledge assessment passage, or '' when the response has none
 */
export function extractDomainAssessment(text: string): string {
  return valueOr(findSection(text, [DOMAIN_HEADER]), '');
}

function liftDueToReason(text: string): Extraction<string> {
  const patterns = [
    /decided not to apply due to\s+(.+?)(?=\n\s*\n|$)/is,
    /\bdue to\s+(.+?)(?=\n\s*\n|$)/is,
  ];
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match && match[1].trim().length > 0) {
      return found(match[1].trim());
    }
  }
  return NOT_FOUND;
}

/**
 * Application narrative (Good) or no-go rationale (Low/Moderate).
 *
 * The wrong kind of section for the level is returned with `mismatch: true`
 * instead of being accepted as-is.
 */
export function extractContent(text: string, level: MatchLevel): Extraction<ExtractedContent> {
  const narrative = findSection(text, [NARRATIVE_HEADER]);
  const rationale = findSection(text, RATIONALE_HEADERS);

  if (level === 'Good') {
    if (narrative.found) {
      return found({ contentType: 'ApplicationNarrative', text: narrative.value, mismatch: false });
    }
    if (rationale.found) {
      return found({ contentType: 'NoGoRationale', text: rationale.value, mismatch: true });
    }
    return NOT_FOUND;
  }

  if (rationale.found) {
    return found({ contentType: 'NoGoRationale', text: rationale.value, mismatch: false });
  }
  if (narrative.found) {
    return found({
      contentType: 'NoGoRationale',
      text: `${RATIONALE_PREFIX} [Extracted from incorrectly formatted narrative: ${narrative.value}]`,
      mismatch: true,
    });
  }

  const reason = liftDueToReason(text);
  if (reason.found) {
    return found({
      contentType: 'NoGoRationale',
      text: `I have compared my CV and the role description and decided not to apply due to ${reason.value}`,
      mismatch: false,
    });
  }
  return NOT_FOUND;
}
