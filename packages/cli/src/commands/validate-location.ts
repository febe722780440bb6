/**
 * Validate Location Command
 *
 * Runs only the hybrid location validator for a declared location and a job
 * description file.
 *
 * Usage:
 *   jobfit validate-location "Frankfurt, Germany" jobs/acme-description.txt
 */

import * as fs from 'fs';
import chalk from 'chalk';
import {
  ChatEvaluationClient,
  ConfigLoader,
  HybridLocationValidator,
  JobVerdictRunnerOptions,
  LLMClientFactory,
  probeAvailability,
} from '@jobfit-verdict/core';
import { ConfigOption, loadConfig, printError } from './shared';

export interface ValidateLocationCommandOptions extends ConfigOption {
  json?: boolean;
}

export async function validateLocationCommand(
  metadataLocation: string,
  descriptionFile: string,
  options: ValidateLocationCommandOptions,
  runnerOptions: JobVerdictRunnerOptions = {}
): Promise<number> {
  const config = await loadConfig(options);
  if (!config) {
    return 1;
  }

  if (!fs.existsSync(descriptionFile)) {
    console.error(chalk.red(`Description file not found: ${descriptionFile}`));
    return 1;
  }

  const client =
    runnerOptions.client ?? LLMClientFactory.create({ provider: config.llm.provider, baseUrl: config.llm.baseUrl });

  try {
    const availability = runnerOptions.availability ?? (await probeAvailability(client));
    const validator = new HybridLocationValidator(
      new ChatEvaluationClient(client, {
        model: config.llm.model,
        temperature: config.llm.temperature,
        topP: config.llm.topP,
        maxTokens: config.llm.maxTokens,
      }),
      availability,
      config.location,
      ConfigLoader.loadGazetteer(config),
      ConfigLoader.loadPrompts(config).location
    );

    const analysis = await validator.validate(metadataLocation, fs.readFileSync(descriptionFile, 'utf-8'));

    if (options.json) {
      console.log(JSON.stringify(analysis, null, 2));
      return 0;
    }

    console.log(chalk.bold('\n📍 Location Validation\n'));
    console.log(`  Declared:      ${analysis.metadataLocation}`);
    console.log(`  Authoritative: ${analysis.authoritativeLocation}`);
    console.log(
      `  Conflict:      ${analysis.conflictDetected ? chalk.red(`yes (${analysis.riskLevel} risk)`) : chalk.green('no')}`
    );
    console.log(`  Method:        ${analysis.method} (confidence ${analysis.confidence.toFixed(2)})`);
    console.log(`  Reasoning:     ${analysis.reasoning}`);
    if (analysis.overrides.length > 0) {
      console.log(`  Overrides:     ${analysis.overrides.join(', ')}`);
    }
    console.log('');
    return 0;
  } catch (error) {
    printError(error);
    return 1;
  } finally {
    client.destroy();
  }
}
