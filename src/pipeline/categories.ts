import type { CategoryDefinition } from '../jobs/JobConfig.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Sentinel label for anything that cannot be matched or recovered
 */
export const FALLBACK_CATEGORY = 'Other';

/**
 * Closed, ordered label set with case-insensitive lookup.
 */
export class CategorySet {
  readonly definitions: readonly CategoryDefinition[];
  private byKey: Map<string, string>;

  constructor(definitions: readonly CategoryDefinition[]) {
    this.byKey = new Map();
    for (const definition of definitions) {
      const key = definition.label.trim().toLowerCase();
      if (this.byKey.has(key)) {
        throw new ConfigError(`Duplicate category label: ${definition.label}`);
      }
      this.byKey.set(key, definition.label);
    }

    if (this.byKey.get(FALLBACK_CATEGORY.toLowerCase()) !== FALLBACK_CATEGORY) {
      throw new ConfigError(`Category set must include "${FALLBACK_CATEGORY}"`);
    }

    this.definitions = Object.freeze([...definitions]);
  }

  get labels(): string[] {
    return this.definitions.map((definition) => definition.label);
  }

  get size(): number {
    return this.definitions.length;
  }

  has(label: string): boolean {
    return this.byKey.get(label.toLowerCase()) === label;
  }

  /**
   * Map any value to a canonical label. Trimmed, case-insensitive exact match;
   * non-strings and unknown labels become "Other".
   */
  normalize(value: unknown): string {
    if (typeof value !== 'string') {
      return FALLBACK_CATEGORY;
    }
    return this.byKey.get(value.trim().toLowerCase()) ?? FALLBACK_CATEGORY;
  }

  /**
   * "- Label: description" lines, in set order
   */
  renderList(): string {
    return this.definitions
      .map((definition) => `- ${definition.label}: ${definition.description}`)
      .join('\n');
  }
}
