#!/usr/bin/env node

/**
 * jobfit CLI
 *
 * Usage:
 *   jobfit evaluate <job-file>                       Verdict for one job
 *   jobfit batch <pattern>                           Verdicts for every matching job file
 *   jobfit validate-location <location> <file>       Location check only
 *   jobfit validate                                  Validate engine config
 *   jobfit schema-version                            Show schema versions
 */

import { Command } from 'commander';
import { EnvLoader } from '@jobfit-verdict/core';
import { evaluateCommand } from '../commands/evaluate';
import { batchCommand } from '../commands/batch';
import { validateLocationCommand } from '../commands/validate-location';
import { validateCommand } from '../commands/validate';
import { versionCommand } from '../commands/version';

EnvLoader.load();

const program = new Command();

program.name('jobfit').description('Conservative job fit and location verdicts').version('1.0.0');

program
  .command('evaluate <job-file>')
  .description('Evaluate one job file (match consensus, location, domain)')
  .option('-c, --config <file>', 'Engine config file')
  .option('--json', 'Print the verdict as JSON')
  .option('-o, --out <dir>', 'Write artifacts to this directory')
  .action(async (jobFile: string, options: { config?: string; json?: boolean; out?: string }) => {
    process.exitCode = await evaluateCommand(jobFile, options);
  });

program
  .command('batch <pattern>')
  .description('Evaluate every job file matching a glob pattern')
  .option('-c, --config <file>', 'Engine config file')
  .option('-o, --out <dir>', 'Output directory', 'outputs')
  .action(async (pattern: string, options: { config?: string; out: string }) => {
    process.exitCode = await batchCommand(pattern, options);
  });

program
  .command('validate-location <metadata-location> <description-file>')
  .description('Check a declared location against a job description')
  .option('-c, --config <file>', 'Engine config file')
  .option('--json', 'Print the analysis as JSON')
  .action(async (metadataLocation: string, descriptionFile: string, options: { config?: string; json?: boolean }) => {
    process.exitCode = await validateLocationCommand(metadataLocation, descriptionFile, options);
  });

program
  .command('validate')
  .description('Validate the engine configuration')
  .option('-c, --config <file>', 'Config file to validate')
  .action(async (options: { config?: string }) => {
    process.exitCode = await validateCommand(options);
  });

program
  .command('schema-version')
  .description('Show current schema version')
  .action(() => {
    process.exitCode = versionCommand();
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
