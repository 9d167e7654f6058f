export {
  tags,
  mergeTags,
  validateTags,
  describeTags,
  isTaggableCategory,
  isCategoryFilter,
} from './test_tags';
export { MetadataRegistry } from './metadata_registry';
export {
  TEST_CATEGORIES,
  TAGGABLE_CATEGORIES,
  CATEGORY_FILTERS,
} from './test_tags.types';
export type {
  TestCategory,
  TaggableCategory,
  CategoryFilter,
  TestTags,
} from './test_tags.types';
