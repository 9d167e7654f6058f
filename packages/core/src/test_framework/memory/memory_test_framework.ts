/**
 * MemoryTestFramework - in-process ITestFramework for tests
 *
 * Sources are definition functions keyed by an absolute-looking path. They
 * call `test()` and `suite()` exactly like a file on disk would.
 *
 * @module test_framework/memory
 */

import * as path from 'path';
import picomatch from 'picomatch';
import { toError } from '../../errors';
import { MemoryFileLister } from '../../file_lister';
import type { TestUnit } from '../../test_registry';
import { collectTests } from '../collector';
import { invokeBody } from '../outcome';
import type { ITestFramework, LoadedSource, NativeOutcome } from '../test_framework.types';

export type MemoryTestFrameworkOptions = {
  /** Map of absolute path -> definition function */
  sources: Record<string, () => void>;
};

/**
 * @example
 * ```typescript
 * const framework = new MemoryTestFramework({
 *   sources: {
 *     '/repo/tests/regression/test_math.js': () => {
 *       test('adds', () => assert.equal(1 + 1, 2));
 *     },
 *   },
 * });
 * ```
 */
export class MemoryTestFramework implements ITestFramework {
  private readonly sources: Map<string, () => void>;
  /** Ids of units run, in order */
  readonly executed: string[] = [];

  constructor(options: MemoryTestFrameworkOptions) {
    this.sources = new Map(Object.entries(options.sources));
  }

  async discover(root: string, pattern: string): Promise<LoadedSource[]> {
    const isMatch = picomatch(pattern);
    const prefix = root.endsWith('/') ? root : `${root}/`;
    const results: LoadedSource[] = [];

    for (const [filePath, define] of this.sources) {
      if (!filePath.startsWith(prefix) || !isMatch(path.posix.basename(filePath))) {
        continue;
      }
      try {
        results.push({ status: 'loaded', filePath, tests: collectTests(filePath, define) });
      } catch (thrown) {
        results.push({ status: 'failed', filePath, error: toError(thrown) });
      }
    }
    return results;
  }

  async run(unit: TestUnit): Promise<NativeOutcome> {
    this.executed.push(unit.id);
    return invokeBody(unit.run);
  }

  /**
   * A MemoryFileLister over the same sources, rooted at `root`.
   */
  fileListerFor(root: string): MemoryFileLister {
    const prefix = root.endsWith('/') ? root : `${root}/`;
    const files = [...this.sources.keys()]
      .filter(filePath => filePath.startsWith(prefix))
      .map(filePath => filePath.slice(prefix.length));
    return new MemoryFileLister({ cwd: root, files });
  }
}
