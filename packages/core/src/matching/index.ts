export * from './types';
export {
  extractMatchLevel,
  extractDomainAssessment,
  extractContent,
  findSection,
  RATIONALE_PREFIX,
} from './extraction';
export { analyzeDomainGap, mentionsGap, hasModerateSignals } from './domain-gap';
export { resolveConsensus, selectRepresentative, rankOf } from './consensus';
export { analyzeJobDomain, getDomainRequirements, type JobDomainAnalysis } from './job-domain';
export {
  MatchConsensusEvaluator,
  DEFAULT_MATCH_CONFIG,
  GENERIC_NARRATIVE,
  GENERIC_RATIONALE,
  type MatchEvaluatorConfig,
  type MatchEvaluateOptions,
} from './MatchConsensusEvaluator';
