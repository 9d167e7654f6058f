import type { TaggableCategory, TestCategory, TestTags } from '../test_tags';

/**
 * Category implied by the directories between a test root and a source.
 *
 * The nearest directory wins. A directory counts when its name contains
 * "regression", "integration" or "development", or has "dev" as one of
 * its "-", "_" or "." separated tokens.
 *
 * @param relativeDir - directory of the source relative to its test root, "/" separated
 */
export function directoryCategory(relativeDir: string): TaggableCategory | undefined {
  const segments = relativeDir.split('/').filter(segment => segment !== '' && segment !== '.');

  for (const segment of segments.reverse()) {
    const name = segment.toLowerCase();
    if (name.includes('regression')) return 'regression';
    if (name.includes('integration')) return 'integration';
    if (name.includes('development') || name.split(/[-_.]/).includes('dev')) return 'development';
  }
  return undefined;
}

/**
 * Explicit category tag first, then directory convention, then uncategorized.
 */
export function resolveCategory(tagSet: TestTags, dirCategory: TaggableCategory | undefined): TestCategory {
  return tagSet.category ?? dirCategory ?? 'uncategorized';
}
