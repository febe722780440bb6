import chalk from 'chalk';
import {
  ConfigLoader,
  ConfigValidationError,
  JobVerdict,
  ResolvedEngineConfig,
  describeError,
} from '@jobfit-verdict/core';

export interface ConfigOption {
  config?: string;
}

/**
 * Resolved engine config, or undefined after printing why it could not be loaded
 */
export async function loadConfig(options: ConfigOption): Promise<ResolvedEngineConfig | undefined> {
  try {
    return await ConfigLoader.load(options.config);
  } catch (error) {
    printError(error);
    return undefined;
  }
}

export function printError(error: unknown): void {
  if (error instanceof ConfigValidationError) {
    console.error(chalk.red(`\n✗ Invalid configuration: ${error.filePath}`));
    error.issues.forEach(issue => {
      console.error(`  ${chalk.red('•')} [${issue.path}] ${issue.message}${issue.expected ? ` (${issue.expected})` : ''}`);
    });
    return;
  }
  console.error(chalk.red(`\nError: ${describeError(error)}`));
}

export function printVerdict(verdict: JobVerdict): void {
  const { match, location, domain } = verdict;
  console.log(chalk.bold(`\n📋 ${verdict.jobId}\n`));

  if (match.status === 'ok') {
    const colour = match.finalMatchLevel === 'Good' ? chalk.green : match.finalMatchLevel === 'Moderate' ? chalk.yellow : chalk.red;
    console.log(`  Match: ${colour(match.finalMatchLevel)} (${match.contentType})`);
    match.adjustments.forEach(a => console.log(chalk.dim(`    ${a.reason}: ${a.from} → ${a.to}`)));
    console.log(`\n  ${match.contentText}\n`);
  } else {
    console.log(`  Match: ${chalk.red(match.error)} - re-run this job`);
  }

  const locationLine = location.conflictDetected
    ? chalk.red(`conflict → ${location.authoritativeLocation} (${location.riskLevel} risk)`)
    : chalk.green(`confirmed ${location.authoritativeLocation}`);
  console.log(`  Location: ${locationLine}`);
  console.log(chalk.dim(`    ${location.method}, confidence ${location.confidence.toFixed(2)}: ${location.reasoning}`));
  console.log(`  Domain: ${domain.primaryDomain}\n`);
}
