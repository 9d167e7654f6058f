/**
 * FsTestFramework - loads test sources from disk
 *
 * Lists candidate files with FsFileLister, matches their base name against
 * the discovery pattern with picomatch, and loads each through CommonJS
 * `require`, with the module cache cleared first so repeated discovery sees
 * a fresh declaration list.
 *
 * @module test_framework/fs
 */

import * as path from 'path';
import picomatch from 'picomatch';
import { toError } from '../../errors';
import { FsFileLister } from '../../file_lister';
import type { TestUnit } from '../../test_registry';
import { collectTests } from '../collector';
import { invokeBody } from '../outcome';
import type { ITestFramework, LoadedSource, NativeOutcome } from '../test_framework.types';

/**
 * Loads one source by absolute path. Declarations happen as a side effect.
 */
export type ModuleLoader = (absolutePath: string) => void;

export type FsTestFrameworkOptions = {
  /** Overrides how a source is loaded (default: require with cache eviction) */
  loader?: ModuleLoader;
  /** Extra ignore globs, relative to the discovery root */
  ignore?: string[];
};

export const DEFAULT_IGNORE = ['**/node_modules/**', '**/dist/**', '**/__pycache__/**'];

export const requireFresh: ModuleLoader = (absolutePath) => {
  const resolved = require.resolve(absolutePath);
  delete require.cache[resolved];
  require(resolved);
};

export class FsTestFramework implements ITestFramework {
  private readonly loader: ModuleLoader;
  private readonly ignore: string[];

  constructor(options: FsTestFrameworkOptions = {}) {
    this.loader = options.loader ?? requireFresh;
    this.ignore = [...DEFAULT_IGNORE, ...(options.ignore ?? [])];
  }

  async discover(root: string, pattern: string): Promise<LoadedSource[]> {
    const lister = new FsFileLister({ cwd: root });
    const isMatch = picomatch(pattern);
    const candidates = await lister.list(['**/*'], { ignore: this.ignore, absolute: true });
    const results: LoadedSource[] = [];

    for (const filePath of candidates) {
      if (!isMatch(path.basename(filePath))) {
        continue;
      }
      try {
        const tests = collectTests(filePath, () => this.loader(filePath));
        results.push({ status: 'loaded', filePath, tests });
      } catch (thrown) {
        results.push({ status: 'failed', filePath, error: toError(thrown) });
      }
    }
    return results;
  }

  async run(unit: TestUnit): Promise<NativeOutcome> {
    return invokeBody(unit.run);
  }
}
