/**
 * @jobfit-verdict/cli
 *
 * Command implementations behind the jobfit binary. Each returns the exit code.
 */

export { evaluateCommand, type EvaluateCommandOptions } from './commands/evaluate';
export { batchCommand, type BatchCommandOptions } from './commands/batch';
export { validateLocationCommand, type ValidateLocationCommandOptions } from './commands/validate-location';
export { validateCommand, type ValidateCommandOptions } from './commands/validate';
export { versionCommand } from './commands/version';
