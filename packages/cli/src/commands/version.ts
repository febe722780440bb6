/**
 * Displays the current schema version and supported versions.
 */

import chalk from 'chalk';
import { CURRENT_SCHEMA_VERSION, SUPPORTED_SCHEMA_VERSIONS } from '@jobfit-verdict/core';

export function versionCommand(): number {
  console.log(chalk.bold('\n📋 jobfit - Schema Version\n'));
  console.log(`Current Version: ${chalk.cyan(CURRENT_SCHEMA_VERSION)}`);
  console.log('Supported Versions:');
  SUPPORTED_SCHEMA_VERSIONS.forEach(version => {
    const isCurrent = version === CURRENT_SCHEMA_VERSION;
    console.log(`  ${isCurrent ? chalk.green('→') : ' '} ${version}${isCurrent ? chalk.dim(' (current)') : ''}`);
  });
  console.log('');
  return 0;
}
