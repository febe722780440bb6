import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { Logger } from '../utils/logger';
import { PromptTemplate } from './PromptTemplate';
import { PromptTemplateError, describeError } from '../errors';

const PromptManifestSchema = z.object({
  metadata: z.object({
    name: z.string().min(1, 'metadata.name is required'),
    version: z.string().optional(),
    description: z.string().optional(),
  }),
  template: z.string().min(1, 'template text is required'),
});

export type PromptManifest = z.infer<typeof PromptManifestSchema>;

/**
 * Load a prompt override from a YAML manifest:
 *
 *   metadata:
 *     name: match-evaluation-strict
 *   template: |
 *     ... {cv} ... {job} ... {nonce}
 *
 * The override keeps the slots of the built-in template it replaces and must
 * use every one of them.
 */
export class PromptLoader {
  static load<Slot extends string>(filePath: string, base: PromptTemplate<Slot>): PromptTemplate<Slot> {
    if (!fs.existsSync(filePath)) {
      throw new PromptTemplateError(`Prompt file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = yaml.load(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new PromptTemplateError(`Failed to parse prompt file ${filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }

    const parsed = PromptManifestSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.errors.map(e => `[${e.path.join('.') || 'root'}]: ${e.message}`);
      throw new PromptTemplateError(`Invalid prompt manifest ${filePath}: ${details.join(', ')}`);
    }

    const template = base.withText(parsed.data.template, parsed.data.metadata.name);
    Logger.info(
      `[PromptLoader] ✓ Loaded prompt override "${template.name}" for ${base.name} (${template.hash.slice(0, 12)})`
    );
    return template;
  }
}
