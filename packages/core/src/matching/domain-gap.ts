import phrases from '../../config/domain-gap-phrases.json';
import { DomainGapAnalysis } from './types';

const CRITICAL_GAP_PHRASES: readonly string[] = Object.freeze(phrases.criticalGap.map(p => p.toLowerCase()));
const REQUIREMENT_PHRASES: readonly string[] = Object.freeze(phrases.requirement.map(p => p.toLowerCase()));

const GAP_SUBSTRING = 'gap';
// substrings, so "experienced", "skillset" and "knowledgeable" count too
const MODERATE_SIGNAL_SUBSTRINGS: readonly string[] = ['experience', 'skill', 'knowledge'];

const EMPTY_ANALYSIS: DomainGapAnalysis = Object.freeze({
  severity: 0,
  hasDomainRequirements: false,
  requirementDensityPct: 0,
  criticalPhrases: [],
  requirementPhrases: [],
});

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

function tally(text: string, list: readonly string[]): { total: number; matched: string[] } {
  let total = 0;
  const matched: string[] = [];
  for (const phrase of list) {
    const n = countOccurrences(text, phrase);
    if (n > 0) {
      total += n;
      matched.push(phrase);
    }
  }
  return { total, matched };
}

/**
 * Heuristic scan of a domain knowledge assessment.
 *
 * severity: critical-gap phrase occurrences.
 * requirementDensityPct: 100 * requirement-phrase mentions / word count.
 */
export function analyzeDomainGap(text: string): DomainGapAnalysis {
  const lowered = text.toLowerCase().trim();
  if (lowered.length === 0) {
    return EMPTY_ANALYSIS;
  }

  const critical = tally(lowered, CRITICAL_GAP_PHRASES);
  const requirements = tally(lowered, REQUIREMENT_PHRASES);
  const wordCount = lowered.split(/\s+/).length;

  return {
    severity: critical.total,
    hasDomainRequirements: requirements.total > 0,
    requirementDensityPct: (100 * requirements.total) / wordCount,
    criticalPhrases: critical.matched,
    requirementPhrases: requirements.matched,
  };
}

/**
 * "gap" anywhere in the text, including "gaps" and "gapped"
 */
export function mentionsGap(text: string): boolean {
  return text.toLowerCase().includes(GAP_SUBSTRING);
}

export function hasModerateSignals(text: string, analysis: DomainGapAnalysis): boolean {
  const lowered = text.toLowerCase();
  return analysis.hasDomainRequirements || MODERATE_SIGNAL_SUBSTRINGS.some(word => lowered.includes(word));
}
