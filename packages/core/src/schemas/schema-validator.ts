/**
 * Schema Validator Utility
 *
 * Validation of engine config and job input files with Zod schemas
 */

import { z } from 'zod';
import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigIssue, describeError, formatZodErrors } from '../errors';
import { EngineConfig, EngineConfigSchema, JobInputFile, JobInputSchema } from './config-schema';
import { validateSchemaVersion } from './version';

export type ValidationResult<T> =
  | { valid: true; filePath: string; data: T }
  | { valid: false; filePath: string; errors: ConfigIssue[] };

/**
 * YAML for .yaml/.yml, JSON otherwise
 */
function loadDataFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to read file: ${describeError(error)}`, { cause: error });
  }

  const ext = path.extname(filePath).toLowerCase();
  try {
    return ext === '.yaml' || ext === '.yml' ? yaml.load(content) : JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to parse ${ext === '.json' ? 'JSON' : 'YAML'} file: ${describeError(error)}`, {
      cause: error,
    });
  }
}

function schemaVersionOf(data: unknown): unknown {
  return typeof data === 'object' && data !== null && 'schemaVersion' in data
    ? data.schemaVersion
    : undefined;
}

/**
 * Validates schema version first (when required), then validates with the Zod schema
 */
export function validateWithSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  filePath: string,
  requireSchemaVersion: boolean = false
): ValidationResult<T> {
  if (requireSchemaVersion) {
    const versionCheck = validateSchemaVersion(schemaVersionOf(data));
    if (!versionCheck.valid) {
      return {
        valid: false,
        filePath,
        errors: [
          {
            path: 'schemaVersion',
            message: versionCheck.error ?? 'Invalid schema version',
            expected: versionCheck.suggestion,
          },
        ],
      };
    }
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return { valid: false, filePath, errors: formatZodErrors(parsed.error) };
  }
  return { valid: true, filePath, data: parsed.data };
}

function validateFile<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  filePath: string,
  requireSchemaVersion: boolean
): ValidationResult<T> {
  try {
    return validateWithSchema(schema, loadDataFile(filePath), filePath, requireSchemaVersion);
  } catch (error) {
    return { valid: false, filePath, errors: [{ path: 'file', message: describeError(error) }] };
  }
}

/**
 * Validates a jobfit.config.yaml file
 */
export function validateEngineConfig(filePath: string): ValidationResult<EngineConfig> {
  return validateFile(EngineConfigSchema, filePath, true);
}

/**
 * Validates a *.job.yaml / *.job.json file
 */
export function validateJobInput(filePath: string): ValidationResult<JobInputFile> {
  return validateFile(JobInputSchema, filePath, false);
}

/**
 * Formats validation result for CLI output
 */
export function formatValidationResult<T>(result: ValidationResult<T>): string {
  if (result.valid) {
    return `✓ ${result.filePath} - Valid`;
  }

  const lines = [`✗ ${result.filePath} - Invalid`];
  result.errors.forEach(err => {
    lines.push(`  Field: ${err.path}`);
    lines.push(`  Error: ${err.message}`);
    if (err.expected) {
      lines.push(`  ${err.expected}`);
    }
    lines.push('');
  });

  return lines.join('\n');
}
