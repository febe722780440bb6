import { describe, expect, it } from 'vitest';
import { analyzeJobDomain, getDomainRequirements } from '../src/matching/job-domain';

describe('analyzeJobDomain', () => {
  it('picks the domain with the most keyword hits', () => {
    const analysis = analyzeJobDomain(
      'We are a banking group hiring a trader. Requires 5-7 years of experience in asset management. Knowledge of derivatives pricing is a plus.'
    );

    expect(analysis.primaryDomain).toBe('finance');
    expect(analysis.domainScores.finance).toBe(3);
    expect(analysis.requirements).toEqual([
      'asset management (5-7 years)',
      'derivatives pricing is a plus',
      'asset management',
      'banking industry knowledge',
    ]);
  });

  it('is unclassified without keywords', () => {
    const analysis = analyzeJobDomain('Frontend role: 2-3 years experience with React.');
    expect(analysis.primaryDomain).toBe('unclassified');
    expect(Object.values(analysis.domainScores).every(score => score === 0)).toBe(true);
  });

  it('counts short acronyms only in upper case', () => {
    expect(analyzeJobDomain('Join our IT team').domainScores.technology).toBe(1);
    expect(analyzeJobDomain('Make it happen').domainScores.technology).toBe(0);
  });
});

describe('getDomainRequirements', () => {
  it('ignores junior year ranges', () => {
    expect(getDomainRequirements('Frontend role: 2-3 years experience with React.')).toEqual(['react']);
  });
});
