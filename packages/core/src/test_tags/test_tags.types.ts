/**
 * Coarse classification of a test unit's purpose.
 */
export type TestCategory = 'regression' | 'integration' | 'development' | 'uncategorized';

/**
 * Categories a test author can tag explicitly. `uncategorized` is only
 * ever the absence of a tag and a category directory.
 */
export type TaggableCategory = Exclude<TestCategory, 'uncategorized'>;

/**
 * Values accepted by the category filter. `all` selects every category,
 * uncategorized units included.
 */
export type CategoryFilter = TaggableCategory | 'all';

export const TEST_CATEGORIES: readonly TestCategory[] = ['regression', 'integration', 'development', 'uncategorized'];
export const TAGGABLE_CATEGORIES: readonly TaggableCategory[] = ['regression', 'integration', 'development'];
export const CATEGORY_FILTERS: readonly CategoryFilter[] = ['regression', 'integration', 'development', 'all'];

/**
 * Labels attached to a test unit (or a whole suite) by its author.
 */
export type TestTags = {
  category?: TaggableCategory;
  /** Integration scope, e.g. "service" or "database" */
  scope?: string;
  /** Development phase, e.g. "experimental" */
  phase?: string;
  slow?: boolean;
  skipCi?: boolean;
  /** Declared skip with its reason */
  skip?: string;
};
