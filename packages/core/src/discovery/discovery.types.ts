import type { FileLister } from '../file_lister';
import type { Logger } from '../logger';
import type { CategoryFilter, MetadataRegistry } from '../test_tags';
import type { ITestFramework } from '../test_framework';
import type { TestRegistry } from '../test_registry';
import type { DiscoveryLoadError } from './errors';

/**
 * Dependencies required by DiscoveryEngine
 */
export type DiscoveryEngineDependencies = {
  /** Absolute path of the repository (or directory) to search */
  rootPath: string;
  /** Framework that loads test sources */
  framework: ITestFramework;
  /** Directory probing rooted at rootPath */
  fileLister: FileLister;
  logger?: Logger;
};

export type DiscoveryOptions = {
  /** File name pattern, e.g. "*.test.js" */
  pattern: string;
};

export type FilterCriteria = {
  /** Requested categories; "all" selects everything */
  categories: CategoryFilter[];
  excludeSlow: boolean;
  excludeCi: boolean;
};

/**
 * Which organisational styles the discovered tree uses.
 */
export type DiscoveryStructure = {
  /** At least one unit sits under a category directory */
  hierarchical: boolean;
  /** At least one unit carries an explicit category tag */
  tagged: boolean;
};

export type DiscoveryResult = {
  /** Every discovered unit, in discovery order */
  registry: TestRegistry;
  /** Declared tags keyed by unit id */
  metadata: MetadataRegistry;
  /** Absolute test roots that were searched */
  testRoots: string[];
  loadErrors: DiscoveryLoadError[];
  structure: DiscoveryStructure;
};
