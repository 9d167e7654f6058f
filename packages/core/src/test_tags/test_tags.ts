import type { TaggableCategory, TestCategory, TestTags, CategoryFilter } from './test_tags.types';
import { CATEGORY_FILTERS, TAGGABLE_CATEGORIES } from './test_tags.types';

/**
 * Tag builders for test authors.
 *
 * @example
 * ```typescript
 * test('persists an order', tags.integration('database'), tags.slow(), async () => { ... });
 * ```
 */
export const tags = {
  regression: (): TestTags => ({ category: 'regression' }),
  integration: (scope?: string): TestTags => ({
    category: 'integration',
    ...(scope !== undefined && { scope }),
  }),
  development: (phase?: string): TestTags => ({
    category: 'development',
    ...(phase !== undefined && { phase }),
  }),
  slow: (): TestTags => ({ slow: true }),
  skipCi: (): TestTags => ({ skipCi: true }),
  skip: (reason: string = 'skipped'): TestTags => ({ skip: reason }),
};

export function isTaggableCategory(value: unknown): value is TaggableCategory {
  return typeof value === 'string' && TAGGABLE_CATEGORIES.some(category => category === value);
}

export function isCategoryFilter(value: unknown): value is CategoryFilter {
  return typeof value === 'string' && CATEGORY_FILTERS.some(filter => filter === value);
}

/**
 * Merges tag sets left to right; later sets win. Scope only survives on an
 * integration unit and phase only on a development unit.
 */
export function mergeTags(...sets: TestTags[]): TestTags {
  const merged: TestTags = {};
  for (const set of sets) {
    if (set.category !== undefined) {
      if (merged.category !== set.category) {
        delete merged.scope;
        delete merged.phase;
      }
      merged.category = set.category;
    }
    if (set.scope !== undefined) merged.scope = set.scope;
    if (set.phase !== undefined) merged.phase = set.phase;
    if (set.slow !== undefined) merged.slow = set.slow;
    if (set.skipCi !== undefined) merged.skipCi = set.skipCi;
    if (set.skip !== undefined) merged.skip = set.skip;
  }
  if (merged.category !== 'integration') delete merged.scope;
  if (merged.category !== 'development') delete merged.phase;
  return merged;
}

/**
 * Checks a tag object handed over by a test file. Test files may be plain
 * JavaScript, so nothing about the shape can be assumed.
 *
 * @returns the list of problems, empty when the value is a valid TestTags
 */
export function validateTags(value: unknown): string[] {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return ['tags must be an object'];
  }

  const problems: string[] = [];
  const record = new Map<string, unknown>(Object.entries(value));
  const known = new Set(['category', 'scope', 'phase', 'slow', 'skipCi', 'skip']);

  for (const key of record.keys()) {
    if (!known.has(key)) {
      problems.push(`unknown tag "${key}"`);
    }
  }
  const category = record.get('category');
  if (category !== undefined && !isTaggableCategory(category)) {
    problems.push(`unknown category "${String(category)}"`);
  }
  for (const key of ['scope', 'phase', 'skip']) {
    if (record.get(key) !== undefined && typeof record.get(key) !== 'string') {
      problems.push(`${key} must be a string`);
    }
  }
  for (const key of ['slow', 'skipCi']) {
    if (record.get(key) !== undefined && typeof record.get(key) !== 'boolean') {
      problems.push(`${key} must be a boolean`);
    }
  }
  return problems;
}

/**
 * Human readable labels, e.g. `["integration(scope=service)", "slow"]`.
 */
export function describeTags(category: TestCategory, tagSet: TestTags): string[] {
  const labels: string[] = [];
  if (category === 'integration' && tagSet.scope) {
    labels.push(`integration(scope=${tagSet.scope})`);
  } else if (category === 'development' && tagSet.phase) {
    labels.push(`development(phase=${tagSet.phase})`);
  } else {
    labels.push(category);
  }
  if (tagSet.slow) labels.push('slow');
  if (tagSet.skipCi) labels.push('skip-ci');
  return labels;
}
