import { EvaluationRun, MATCH_LEVELS, MatchLevel } from './types';

export function rankOf(level: MatchLevel): number {
  return MATCH_LEVELS.indexOf(level);
}

/**
 * Lowest-match-wins across the runs that produced a level.
 * Returns undefined when no run did.
 */
export function resolveConsensus(levels: readonly MatchLevel[]): MatchLevel | undefined {
  if (levels.length === 0) {
    return undefined;
  }
  // any Low forces Low
  if (levels.includes('Low')) {
    return 'Low';
  }
  return levels.reduce((lowest, level) => (rankOf(level) < rankOf(lowest) ? level : lowest));
}

/**
 * First run, by run index, whose extracted level equals the consensus level
 */
export function selectRepresentative(
  runs: readonly EvaluationRun[],
  level: MatchLevel
): EvaluationRun | undefined {
  return [...runs]
    .sort((a, b) => a.runIndex - b.runIndex)
    .find(run => run.extractedMatchLevel === level);
}
