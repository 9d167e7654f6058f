import type { TestTags } from './test_tags.types';

/**
 * Side-table mapping test unit identity to its declared tags.
 *
 * Populated once while discovery runs, then sealed. Lookups are by unit id
 * only; nothing inspects the test callables themselves.
 */
export class MetadataRegistry {
  private readonly entries = new Map<string, Readonly<TestTags>>();
  private sealed = false;

  register(unitId: string, tagSet: TestTags): void {
    if (this.sealed) {
      throw new Error(`MetadataRegistry is sealed; cannot register ${unitId}`);
    }
    if (this.entries.has(unitId)) {
      throw new Error(`Duplicate test unit id: ${unitId}`);
    }
    this.entries.set(unitId, Object.freeze({ ...tagSet }));
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  get(unitId: string): Readonly<TestTags> | undefined {
    return this.entries.get(unitId);
  }

  has(unitId: string): boolean {
    return this.entries.has(unitId);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * True when at least one unit carries an explicit category tag.
   */
  hasCategoryTags(): boolean {
    for (const tagSet of this.entries.values()) {
      if (tagSet.category !== undefined) {
        return true;
      }
    }
    return false;
  }
}
