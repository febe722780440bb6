import keywords from '../../config/job-domains.json';

export interface JobDomainAnalysis {
  /** Domain with the most keyword hits, or 'unclassified' */
  readonly primaryDomain: string;
  readonly domainScores: Readonly<Record<string, number>>;
  readonly requirements: readonly string[];
}

const DOMAINS: ReadonlyArray<readonly [string, readonly string[]]> = Object.entries(keywords.domains);

const REQUIREMENT_PATTERNS: readonly RegExp[] = [
  /knowledge of ([^,.\n]+)/gi,
  /expertise (?:in|with) ([^,.\n]+)/gi,
  /background (?:in|with) ([^,.\n]+)/gi,
  /specialist (?:in|with) ([^,.\n]+)/gi,
  /proficiency (?:in|with) ([^,.\n]+)/gi,
  /understanding of ([^,.\n]+)/gi,
  /familiarity with ([^,.\n]+)/gi,
  /experience (?:in|with) ([^,.\n]+)/gi,
  /skills (?:in|with) ([^,.\n]+)/gi,
  /certification in ([^,.\n]+)/gi,
  /degree in ([^,.\n]+)/gi,
];

// "5-7 years of experience in asset management"
const YEARS_PATTERN = /(\d+)[-\s](\d+) years? (?:of )?experience (?:in|with) ([^,.\n]+)/gi;
const MIN_SENIOR_YEARS = 3;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function countWord(text: string, keyword: string): number {
  // Acronyms like IT and HR only count in upper case
  const flags = keyword === keyword.toUpperCase() && keyword.length <= 3 ? 'g' : 'gi';
  return text.match(new RegExp(`\\b${escapeRegExp(keyword)}\\b`, flags))?.length ?? 0;
}

/**
 * Domain-specific requirements stated in a job description, lower-cased and
 * de-duplicated in order of first appearance
 */
export function getDomainRequirements(jobDescription: string): string[] {
  const found = new Set<string>();

  for (const match of jobDescription.matchAll(YEARS_PATTERN)) {
    if (Number(match[1]) >= MIN_SENIOR_YEARS) {
      found.add(`${match[3].trim().toLowerCase()} (${match[1]}-${match[2]} years)`);
    }
  }
  for (const pattern of REQUIREMENT_PATTERNS) {
    for (const match of jobDescription.matchAll(pattern)) {
      found.add(match[1].trim().toLowerCase());
    }
  }

  const lowered = jobDescription.toLowerCase();
  for (const industry of keywords.industries) {
    if (lowered.includes(industry)) {
      found.add(`${industry} industry knowledge`);
    }
  }

  return [...found];
}

export function analyzeJobDomain(jobDescription: string): JobDomainAnalysis {
  const domainScores: Record<string, number> = {};
  let primaryDomain = 'unclassified';
  let best = 0;

  for (const [domain, words] of DOMAINS) {
    const score = words.reduce((sum, word) => sum + countWord(jobDescription, word), 0);
    domainScores[domain] = score;
    if (score > best) {
      best = score;
      primaryDomain = domain;
    }
  }

  return {
    primaryDomain,
    domainScores,
    requirements: getDomainRequirements(jobDescription),
  };
}
