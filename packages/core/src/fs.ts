/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access.
 * Use @sieve/core/memory for in-memory alternatives.
 */

// ConfigStore + ConfigManager Factory
export {
  FsConfigStore,
  CONFIG_FILE_NAMES,
  // Factory with explicit projectRoot (for DI containers)
  createConfigManager,
} from './config_store/fs/fs_config_store';

// FileLister
export { FsFileLister } from './file_lister/fs/fs_file_lister';

// TestFramework (fast-glob + CommonJS require)
export { FsTestFramework, requireFresh, DEFAULT_IGNORE } from './test_framework/fs/fs_test_framework';
export type { FsTestFrameworkOptions, ModuleLoader } from './test_framework/fs/fs_test_framework';

// Project Discovery (filesystem-based repository root detection)
export {
  detectRepositoryRoot,
  resetDiscoveryCache,
  REPOSITORY_INDICATORS,
} from './utils/project_discovery';
export { resolveRootPath } from './config_manager';
