/**
 * Evaluate Command
 *
 * Full verdict (match consensus + location + domain) for one job file.
 *
 * Usage:
 *   jobfit evaluate jobs/acme.job.yaml
 *   jobfit evaluate jobs/acme.job.yaml --json
 *   jobfit evaluate jobs/acme.job.yaml --out outputs
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  ArtifactWriter,
  ConfigLoader,
  JobVerdictRunner,
  JobVerdictRunnerOptions,
  generateRunTimestamp,
} from '@jobfit-verdict/core';
import { ConfigOption, loadConfig, printError, printVerdict } from './shared';

export interface EvaluateCommandOptions extends ConfigOption {
  json?: boolean;
  out?: string;
}

/**
 * Returns the process exit code
 */
export async function evaluateCommand(
  jobFile: string,
  options: EvaluateCommandOptions,
  runnerOptions: JobVerdictRunnerOptions = {}
): Promise<number> {
  const config = await loadConfig(options);
  if (!config) {
    return 1;
  }

  const spinner = options.json ? undefined : ora(`Evaluating ${jobFile}...`).start();
  let runner: JobVerdictRunner | undefined;

  try {
    const input = ConfigLoader.loadJob(jobFile);
    runner = await JobVerdictRunner.create(config, runnerOptions);
    const verdict = await runner.evaluateJob(input);

    if (verdict.match.status === 'ok') {
      spinner?.succeed(`Evaluated ${input.jobId}`);
    } else {
      spinner?.fail(`${input.jobId}: ${verdict.match.error}`);
    }

    if (options.json) {
      console.log(JSON.stringify(verdict, null, 2));
    } else {
      printVerdict(verdict);
    }

    if (options.out) {
      const writer = new ArtifactWriter(options.out, generateRunTimestamp());
      const jobDir = writer.writeVerdict(input, verdict);
      writer.writeSummary([verdict], runner.locationStats());
      if (!options.json) {
        console.log(`  Artifacts: ${chalk.cyan(jobDir)}\n`);
      }
    }

    return verdict.match.status === 'ok' ? 0 : 1;
  } catch (error) {
    spinner?.fail('Evaluation failed');
    printError(error);
    return 1;
  } finally {
    runner?.destroy();
  }
}
