/**
 * Batch Command
 *
 * Evaluates every job file matching a glob pattern, one job at a time, and
 * writes artifacts per job plus a run summary.
 *
 * Usage:
 *   jobfit batch "jobs/*.job.yaml"
 *   jobfit batch "jobs/**\/*.job.json" --out outputs
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  ArtifactWriter,
  ConfigLoader,
  JobVerdict,
  JobVerdictRunner,
  JobVerdictRunnerOptions,
  describeError,
  generateRunTimestamp,
} from '@jobfit-verdict/core';
import { ConfigOption, loadConfig, printError } from './shared';

export interface BatchCommandOptions extends ConfigOption {
  out: string;
}

export async function batchCommand(
  pattern: string,
  options: BatchCommandOptions,
  runnerOptions: JobVerdictRunnerOptions = {}
): Promise<number> {
  console.log(chalk.bold('\n🧪 jobfit - Batch Evaluation\n'));

  const config = await loadConfig(options);
  if (!config) {
    return 1;
  }

  const files = await ConfigLoader.findJobFiles(pattern);
  if (files.length === 0) {
    console.error(chalk.red(`No job files match ${pattern}`));
    return 1;
  }

  const writer = new ArtifactWriter(options.out, generateRunTimestamp());
  const verdicts: JobVerdict[] = [];
  const invalidFiles: string[] = [];
  let runner: JobVerdictRunner | undefined;

  try {
    runner = await JobVerdictRunner.create(config, runnerOptions);

    for (const [index, file] of files.entries()) {
      const spinner = ora(`[${index + 1}/${files.length}] ${file}`).start();
      try {
        const input = ConfigLoader.loadJob(file);
        const verdict = await runner.evaluateJob(input);
        writer.writeVerdict(input, verdict);
        verdicts.push(verdict);

        if (verdict.match.status === 'ok') {
          const location = verdict.location.conflictDetected
            ? chalk.red(`location conflict (${verdict.location.riskLevel})`)
            : 'location confirmed';
          spinner.succeed(`${input.jobId}: ${verdict.match.finalMatchLevel} match, ${location}`);
        } else {
          spinner.fail(`${input.jobId}: ${verdict.match.error}`);
        }
      } catch (error) {
        invalidFiles.push(file);
        spinner.fail(`${file}: ${describeError(error)}`);
      }
    }

    const summary = writer.writeSummary(verdicts, runner.locationStats());

    console.log(chalk.bold('\n📊 Results:\n'));
    console.log(`  Jobs evaluated: ${summary.totalJobs}`);
    console.log(
      `  Good: ${chalk.green(summary.matchLevels.Good)}  Moderate: ${chalk.yellow(summary.matchLevels.Moderate)}  Low: ${chalk.red(summary.matchLevels.Low)}`
    );
    console.log(`  Location conflicts: ${summary.locationConflicts.length}`);
    if (summary.extractionFailures.length > 0) {
      console.log(chalk.red(`  Extraction failures (re-run): ${summary.extractionFailures.join(', ')}`));
    }
    if (invalidFiles.length > 0) {
      console.log(chalk.red(`  Invalid job files: ${invalidFiles.join(', ')}`));
    }
    console.log(`\n  Output directory: ${chalk.cyan(writer.runDir)}\n`);

    return summary.extractionFailures.length > 0 || invalidFiles.length > 0 ? 1 : 0;
  } catch (error) {
    printError(error);
    return 1;
  } finally {
    runner?.destroy();
  }
}
