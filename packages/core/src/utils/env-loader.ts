import * as fs from 'fs';
import * as path from 'path';
import { Logger } from './logger';

const ASSIGNMENT = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

/**
 * Reads KEY=value lines from a .env file into process.env.
 * Variables already set (even to an empty string) are left alone.
 * Returns the names it assigned.
 */
export class EnvLoader {
  static load(envFile: string = path.resolve(process.cwd(), '.env')): string[] {
    if (!fs.existsSync(envFile)) {
      Logger.debug(`[EnvLoader] No environment file at ${envFile}`);
      return [];
    }

    const assigned: string[] = [];
    for (const line of fs.readFileSync(envFile, 'utf-8').split(/\r?\n/)) {
      const match = ASSIGNMENT.exec(line.trim());
      if (!match) {
        continue;
      }
      const [, key, rawValue] = match;
      if (process.env[key] !== undefined) {
        continue;
      }
      process.env[key] = rawValue.trim().replace(/^(['"])(.*)\1$/, '$2');
      assigned.push(key);
    }

    Logger.debug(`[EnvLoader] ✓ ${assigned.length} variable(s) from ${envFile}`);
    return assigned;
  }
}
