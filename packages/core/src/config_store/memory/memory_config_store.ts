/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * Used by tests to feed ConfigManager a project document without touching
 * the filesystem.
 */

import type { ConfigStore, ProjectConfigSource } from '../config_store';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ pattern: '*.spec.js', excludeSlow: true });
 *
 * const manager = new ConfigManager({ configStore, rootPath: '/repo' });
 * const config = await manager.resolve({}, {});
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private source: ProjectConfigSource | null = null;

  async loadConfig(): Promise<ProjectConfigSource | null> {
    return this.source;
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set the document returned by loadConfig; null removes it
   */
  setConfig(data: unknown, label: string = 'memory://sieve.config'): void {
    this.source = data === null ? null : { path: label, data };
  }

  getConfig(): ProjectConfigSource | null {
    return this.source;
  }

  clear(): void {
    this.source = null;
  }
}
