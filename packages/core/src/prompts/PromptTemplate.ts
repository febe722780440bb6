import { PromptTemplateError } from '../errors';
import { calculatePromptHash } from '../utils/promptHasher';

const PLACEHOLDER = /\{([A-Za-z][A-Za-z0-9_]*)\}/g;

/**
 * Prompt text with named `{slot}` placeholders.
 *
 * The slot union is part of the type, so `render` cannot be called with a
 * missing value. Construction fails when the text lacks one of the slots.
 */
export class PromptTemplate<Slot extends string> {
  readonly hash: string;

  constructor(
    readonly name: string,
    readonly slots: readonly Slot[],
    readonly text: string
  ) {
    const present = new Set(Array.from(text.matchAll(PLACEHOLDER), m => m[1]));
    const missing = slots.filter(slot => !present.has(slot));
    if (missing.length > 0) {
      throw new PromptTemplateError(
        `Prompt "${name}" is missing required slot(s): ${missing.map(s => `{${s}}`).join(', ')}`
      );
    }
    this.hash = calculatePromptHash(text);
  }

  /**
   * Single pass substitution; placeholders inside inserted values stay untouched
   */
  render(values: Record<Slot, string>): string {
    return this.text.replace(PLACEHOLDER, (placeholder, name: string) =>
      this.isSlot(name) ? values[name] : placeholder
    );
  }

  /**
   * Same slots, different wording (used for file-based overrides)
   */
  withText(text: string, name: string = this.name): PromptTemplate<Slot> {
    return new PromptTemplate(name, this.slots, text);
  }

  private isSlot(name: string): name is Slot {
    return (this.slots as readonly string[]).includes(name);
  }
}
