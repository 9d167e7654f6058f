/**
 * ConfigStore Interface
 *
 * Abstraction over where a project's sieve configuration lives
 * (a file beside the code, memory for tests). Stores only read and parse;
 * validation and merging belong to ConfigManager.
 */

/**
 * A parsed configuration document and where it came from.
 */
export type ProjectConfigSource = {
  /** File path or other label used in error messages */
  path: string;
  /** Parsed but unvalidated content */
  data: unknown;
};

/**
 * Interface for project configuration lookup.
 *
 * Implementations:
 * - FsConfigStore: sieve.config.yml / .yaml / .json in the project root
 * - MemoryConfigStore: In-memory for tests
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/project');
 * const source = await store.loadConfig();
 * ```
 */
export interface ConfigStore {
  /**
   * Load the project configuration document
   *
   * @returns The parsed document, or null when the project has none
   */
  loadConfig(): Promise<ProjectConfigSource | null>;
}
