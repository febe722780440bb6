/**
 * ArtifactWriter
 *
 * Writes verdict artifacts to the file system, one directory per job inside a
 * timestamped run directory:
 *
 *   <outputDir>/<runTimestamp>/<jobId>/1-job-input.yaml
 *                                      2-match-runs.yaml
 *                                      3-verdict.json
 *                                      4-reporting-summary.md
 *   <outputDir>/<runTimestamp>/summary.json
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { Logger } from '../logger';
import { JobVerdict } from '../../pipeline/JobVerdictRunner';
import { JobInput } from '../../schemas';
import { LocationStatsSnapshot } from '../../location/LocationValidationStats';
import { MatchLevel } from '../../matching/types';

export interface RunSummary {
  timestamp: string;
  totalJobs: number;
  extractionFailures: string[];
  matchLevels: Record<MatchLevel, number>;
  locationConflicts: string[];
  locationStats: LocationStatsSnapshot;
}

const YAML_OPTIONS: yaml.DumpOptions = { lineWidth: -1, noRefs: true };

/**
 * Standardized run timestamp: yyyy-MM-dd_HH-mm-ss
 */
export function generateRunTimestamp(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}_${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
}

export class ArtifactWriter {
  readonly runDir: string;

  constructor(
    outputDir: string,
    private readonly runTimestamp: string
  ) {
    this.runDir = path.join(outputDir, runTimestamp);
    if (!fs.existsSync(this.runDir)) {
      fs.mkdirSync(this.runDir, { recursive: true });
      Logger.debug(`[ArtifactWriter] Created run directory: ${this.runDir}`);
    }
  }

  /**
   * Returns the job directory
   */
  writeVerdict(input: JobInput, verdict: JobVerdict): string {
    const jobDir = path.join(this.runDir, sanitize(verdict.jobId));
    fs.mkdirSync(jobDir, { recursive: true });

    const inputData = {
      jobId: input.jobId,
      metadataLocation: input.metadataLocation,
      jobDescription: input.jobDescription,
      candidateProfile: input.candidateProfile,
    };
    fs.writeFileSync(path.join(jobDir, '1-job-input.yaml'), yaml.dump(inputData, YAML_OPTIONS), 'utf-8');

    const runsData = {
      jobId: verdict.jobId,
      promptHash: verdict.match.promptHash,
      runs: verdict.match.runs,
    };
    fs.writeFileSync(path.join(jobDir, '2-match-runs.yaml'), yaml.dump(runsData, YAML_OPTIONS), 'utf-8');

    fs.writeFileSync(path.join(jobDir, '3-verdict.json'), JSON.stringify(verdict, null, 2), 'utf-8');
    fs.writeFileSync(path.join(jobDir, '4-reporting-summary.md'), formatVerdictSummary(verdict), 'utf-8');

    Logger.info(`[ArtifactWriter] ✓ Artifact written: ${jobDir}`);
    return jobDir;
  }

  writeSummary(verdicts: JobVerdict[], locationStats: LocationStatsSnapshot): RunSummary {
    const summary = summarizeRun(this.runTimestamp, verdicts, locationStats);
    const filepath = path.join(this.runDir, 'summary.json');
    fs.writeFileSync(filepath, JSON.stringify(summary, null, 2), 'utf-8');
    Logger.info(`[ArtifactWriter] ✓ Summary written: ${filepath}`);
    return summary;
  }
}

export function summarizeRun(
  timestamp: string,
  verdicts: JobVerdict[],
  locationStats: LocationStatsSnapshot
): RunSummary {
  const matchLevels: Record<MatchLevel, number> = { Low: 0, Moderate: 0, Good: 0 };
  const extractionFailures: string[] = [];
  for (const verdict of verdicts) {
    if (verdict.match.status === 'ok') {
      matchLevels[verdict.match.finalMatchLevel]++;
    } else {
      extractionFailures.push(verdict.jobId);
    }
  }

  return {
    timestamp,
    totalJobs: verdicts.length,
    extractionFailures,
    matchLevels,
    locationConflicts: verdicts.filter(v => v.location.conflictDetected).map(v => v.jobId),
    locationStats,
  };
}

function sanitize(jobId: string): string {
  return jobId.replace(/[^A-Za-z0-9._-]/g, '_');
}

/**
 * Human-readable markdown for one verdict
 */
export function formatVerdictSummary(verdict: JobVerdict): string {
  const { match, location, domain } = verdict;
  const lines = [`# Job ${verdict.jobId}`, '', `Evaluated: ${verdict.timestamp}`, '', '## Match', ''];

  if (match.status === 'ok') {
    lines.push(`- **Level:** ${match.finalMatchLevel}`);
    lines.push(`- **Content type:** ${match.contentType}`);
    lines.push(`- **Runs:** ${match.runs.filter(r => r.extractedMatchLevel).length}/${match.runs.length} produced a level`);
    if (match.adjustments.length > 0) {
      lines.push('- **Adjustments:**');
      match.adjustments.forEach(a => lines.push(`  - ${a.reason}: ${a.from} → ${a.to} (${a.detail})`));
    }
    lines.push('', match.contentText);
    if (match.domainKnowledgeAssessment) {
      lines.push('', '### Domain knowledge assessment', '', match.domainKnowledgeAssessment);
    }
  } else {
    lines.push(`**${match.error}**: no run produced a match level. Re-run this job.`);
  }

  lines.push('', '## Location', '');
  lines.push(`- **Declared:** ${location.metadataLocation}`);
  lines.push(`- **Authoritative:** ${location.authoritativeLocation}`);
  lines.push(`- **Conflict:** ${location.conflictDetected ? `yes (${location.riskLevel} risk)` : 'no'}`);
  lines.push(`- **Method:** ${location.method}, confidence ${location.confidence.toFixed(2)}`);
  lines.push(`- **Reasoning:** ${location.reasoning}`);

  lines.push('', '## Domain', '', `- **Primary domain:** ${domain.primaryDomain}`);
  if (domain.requirements.length > 0) {
    lines.push(`- **Requirements:** ${domain.requirements.join('; ')}`);
  }

  return lines.join('\n') + '\n';
}
