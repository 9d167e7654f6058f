/**
 * ConfigStore - Configuration lookup abstraction
 *
 * IMPORTANT: This module only exports the interface.
 * For implementations, use:
 * - @sieve/core/fs for FsConfigStore and createConfigManager
 * - @sieve/core/memory for MemoryConfigStore
 */

// Interface only - NO implementation re-exports
export type { ConfigStore, ProjectConfigSource } from './config_store';
