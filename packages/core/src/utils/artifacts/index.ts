/**
 * Artifacts module
 *
 * Per-job verdict files and run summaries.
 */

export {
  ArtifactWriter,
  generateRunTimestamp,
  summarizeRun,
  formatVerdictSummary,
  type RunSummary,
} from './ArtifactWriter';
