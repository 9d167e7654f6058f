import type { TestTags } from '../test_tags';
import type { TestBody, TestUnit } from '../test_registry';

/**
 * A test as declared inside a source, before discovery resolves its category.
 */
export type DeclaredTest = {
  name: string;
  suitePath: string[];
  /** Suite tags merged with the test's own tags */
  tags: TestTags;
  line?: number;
  body: TestBody;
};

/**
 * Result of loading one test source.
 */
export type LoadedSource =
  | {
    status: 'loaded';
    /** Absolute path of the source */
    filePath: string;
    tests: DeclaredTest[];
  }
  | {
    status: 'failed';
    filePath: string;
    error: Error;
  };

/**
 * Framework-native outcome of running one unit.
 */
export type NativeOutcome =
  | { kind: 'pass' }
  | { kind: 'fail'; error: Error }
  | { kind: 'error'; error: Error }
  | { kind: 'skip'; reason: string };

/**
 * Contract of the sequential test-execution framework sieve drives.
 *
 * Implementations:
 * - FsTestFramework: loads CommonJS test files from disk
 * - MemoryTestFramework: in-process sources for tests
 */
export interface ITestFramework {
  /**
   * Finds and loads every source under `root` whose file name matches `pattern`.
   * A source that cannot be loaded is returned with status "failed"; it never
   * aborts the rest of the walk.
   */
  discover(root: string, pattern: string): Promise<LoadedSource[]>;

  /**
   * Runs one unit to completion and reports its native outcome.
   */
  run(unit: TestUnit): Promise<NativeOutcome>;
}
