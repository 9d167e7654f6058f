/**
 * In-memory implementations (no filesystem required)
 *
 * This module exports all implementations that work without filesystem access.
 * Suitable for testing and embedding.
 */

// ConfigStore
export { MemoryConfigStore } from './config_store/memory/memory_config_store';

// FileLister
export { MemoryFileLister } from './file_lister/memory/memory_file_lister';

// TestFramework
export { MemoryTestFramework } from './test_framework/memory/memory_test_framework';
export type { MemoryTestFrameworkOptions } from './test_framework/memory/memory_test_framework';
