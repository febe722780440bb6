/**
 * Validate Command
 *
 * Validates the engine config and the files it points at (prompt overrides,
 * gazetteer).
 *
 * Usage:
 *   jobfit validate
 *   jobfit validate --config=staging.config.yaml
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import {
  CURRENT_SCHEMA_VERSION,
  ConfigLoader,
  DEFAULT_CONFIG_FILE,
  ResolvedEngineConfig,
  describeError,
  validateEngineConfig,
} from '@jobfit-verdict/core';

export interface ValidateCommandOptions {
  config?: string;
}

interface ValidationSummary {
  errors: string[];
  warnings: string[];
}

export async function validateCommand(options: ValidateCommandOptions): Promise<number> {
  console.log(chalk.bold('\n✅ jobfit - Validate Configuration\n'));

  const configFile = options.config ?? DEFAULT_CONFIG_FILE;
  const summary: ValidationSummary = { errors: [], warnings: [] };

  if (!fs.existsSync(configFile)) {
    if (options.config) {
      summary.errors.push(`Config file not found: ${configFile}`);
    } else {
      summary.warnings.push(`${DEFAULT_CONFIG_FILE} not found, built-in defaults apply`);
      console.log(chalk.yellow(`  ⚠ ${DEFAULT_CONFIG_FILE} not found`));
    }
    return printResults(summary);
  }

  const result = validateEngineConfig(configFile);
  if (!result.valid) {
    console.log(chalk.red(`  ✗ ${configFile} - VALIDATION FAILED`));
    result.errors.forEach(err => {
      summary.errors.push(`${configFile} [${err.path}]: ${err.message}${err.expected ? ` (${err.expected})` : ''}`);
    });
    return printResults(summary);
  }
  console.log(chalk.green(`  ✓ ${configFile} (schema: ${result.data.schemaVersion})`));

  let config: ResolvedEngineConfig;
  try {
    config = await ConfigLoader.load(configFile);
  } catch (error) {
    summary.errors.push(`${configFile}: ${describeError(error)}`);
    return printResults(summary);
  }

  checkReferencedFile('gazetteer', config.location.gazetteerPath, summary, () => {
    ConfigLoader.loadGazetteer(config);
  });
  checkReferencedFile('prompts', config.matching.promptPath ?? config.location.promptPath, summary, () => {
    ConfigLoader.loadPrompts(config);
  });

  return printResults(summary);
}

function checkReferencedFile(
  label: string,
  filePath: string | undefined,
  summary: ValidationSummary,
  load: () => void
): void {
  if (filePath === undefined) {
    console.log(chalk.dim(`  - No ${label} override (built-in)`));
    return;
  }
  try {
    load();
    console.log(chalk.green(`  ✓ ${label}: ${path.relative(process.cwd(), filePath) || filePath}`));
  } catch (error) {
    console.log(chalk.red(`  ✗ ${label} - VALIDATION FAILED`));
    summary.errors.push(`${label}: ${describeError(error)}`);
  }
}

function printResults(summary: ValidationSummary): number {
  console.log('\n' + '='.repeat(60));
  console.log('VALIDATION RESULTS');
  console.log('='.repeat(60) + '\n');

  if (summary.warnings.length > 0) {
    console.log(chalk.yellow(`⚠  Warnings (${summary.warnings.length}):`));
    summary.warnings.forEach(w => console.log(`   ${w}`));
    console.log('');
  }

  if (summary.errors.length > 0) {
    console.log(chalk.red(`✗  Errors (${summary.errors.length}):`));
    summary.errors.forEach(e => console.log(`   ${e}`));
    console.log(chalk.red('\n✗ VALIDATION FAILED\n'));
    console.log(`Schema version: ${CURRENT_SCHEMA_VERSION}`);
    return 1;
  }

  console.log(chalk.green('✓ VALIDATION PASSED'));
  console.log(`\nConfiguration validated (schema version ${CURRENT_SCHEMA_VERSION})\n`);
  return 0;
}
