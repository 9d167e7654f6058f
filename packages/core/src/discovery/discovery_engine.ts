/**
 * DiscoveryEngine - finds, categorizes and filters test units
 *
 * Supports both hierarchical trees (tests/regression/, tests/integration/)
 * and flat trees where categories come from tags, merged into one mapping.
 *
 * @module discovery
 */

import * as path from 'path';
import type { FileLister } from '../file_lister';
import type { Logger } from '../logger';
import type { ITestFramework, LoadedSource } from '../test_framework';
import type { TaggableCategory, TestCategory, TestTags } from '../test_tags';
import { MetadataRegistry } from '../test_tags';
import type { TestUnit } from '../test_registry';
import { TestRegistry, emptyCategoryMap } from '../test_registry';
import { directoryCategory, resolveCategory } from './category_resolver';
import { DiscoveryLoadError } from './errors';
import type {
  DiscoveryEngineDependencies,
  DiscoveryOptions,
  DiscoveryResult,
  FilterCriteria,
} from './discovery.types';

/**
 * Directory names probed directly under the root, in order.
 */
export const TEST_DIRECTORY_NAMES = ['tests', 'test', 'Tests', 'Test'];

export const LOAD_ERROR_UNIT_NAME = '<load error>';

function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}

/**
 * Orders by code unit, independent of locale.
 */
function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * @example
 * ```typescript
 * const engine = new DiscoveryEngine({
 *   rootPath: '/repo',
 *   framework: new FsTestFramework(),
 *   fileLister: new FsFileLister({ cwd: '/repo' }),
 * });
 * const { registry } = await engine.discover({ pattern: '*.test.js' });
 * const selected = engine.filter(registry.units, {
 *   categories: ['regression'], excludeSlow: true, excludeCi: false,
 * });
 * ```
 */
export class DiscoveryEngine {
  private readonly rootPath: string;
  private readonly framework: ITestFramework;
  private readonly fileLister: FileLister;
  private readonly logger: Logger | undefined;

  constructor(dependencies: DiscoveryEngineDependencies) {
    if (!dependencies.framework) {
      throw new Error("ITestFramework is required for DiscoveryEngine");
    }
    if (!dependencies.fileLister) {
      throw new Error("FileLister is required for DiscoveryEngine");
    }

    this.rootPath = dependencies.rootPath;
    this.framework = dependencies.framework;
    this.fileLister = dependencies.fileLister;
    this.logger = dependencies.logger;
  }

  /**
   * Test directories directly under the root, deduplicated by real path.
   * Falls back to the root itself when none exists.
   */
  async locateTestRoots(): Promise<string[]> {
    const roots: string[] = [];
    const seen = new Set<string>();

    for (const name of TEST_DIRECTORY_NAMES) {
      if (!(await this.fileLister.isDirectory(name))) {
        continue;
      }
      const realPath = await this.fileLister.realPath(name);
      if (seen.has(realPath)) {
        continue;
      }
      seen.add(realPath);
      roots.push(path.join(this.rootPath, name));
    }

    return roots.length > 0 ? roots : [this.rootPath];
  }

  /**
   * Discovers every unit under the test roots.
   *
   * Order: sources by relative path, then declaration order within a source.
   */
  async discover(options: DiscoveryOptions): Promise<DiscoveryResult> {
    const testRoots = await this.locateTestRoots();
    const sources = new Map<string, { source: LoadedSource; testRoot: string }>();

    for (const testRoot of testRoots) {
      this.logger?.debug(`Discovering ${options.pattern} in ${testRoot}`);
      for (const source of await this.framework.discover(testRoot, options.pattern)) {
        if (!sources.has(source.filePath)) {
          sources.set(source.filePath, { source, testRoot });
        }
      }
    }

    const ordered = [...sources.values()]
      .map(entry => ({ ...entry, relativePath: toPosix(path.relative(this.rootPath, entry.source.filePath)) }))
      .sort((a, b) => compareCodeUnits(a.relativePath, b.relativePath));

    const units: TestUnit[] = [];
    const metadata = new MetadataRegistry();
    const loadErrors: DiscoveryLoadError[] = [];
    let hierarchical = false;

    for (const { source, testRoot, relativePath } of ordered) {
      const relativeDir = toPosix(path.relative(testRoot, path.dirname(source.filePath)));
      const dirCategory = directoryCategory(relativeDir);
      if (dirCategory !== undefined) {
        hierarchical = true;
      }

      if (source.status === 'failed') {
        const loadError = new DiscoveryLoadError(relativePath, source.error);
        this.logger?.warn(`Import/loading error detected: ${loadError.message}`);
        loadErrors.push(loadError);
        const unit = this.createLoadErrorUnit(source.filePath, relativePath, dirCategory ?? 'uncategorized', loadError);
        metadata.register(unit.id, {});
        units.push(unit);
        continue;
      }

      const seenNames = new Map<string, number>();
      for (const declared of source.tests) {
        const baseName = [...declared.suitePath, declared.name].join('.');
        const occurrence = (seenNames.get(baseName) ?? 0) + 1;
        seenNames.set(baseName, occurrence);
        const qualifiedName = occurrence === 1 ? baseName : `${baseName}#${occurrence}`;
        if (occurrence > 1) {
          this.logger?.warn(`Duplicate test name "${baseName}" in ${relativePath}; registered as "${qualifiedName}"`);
        }

        const id = `${relativePath}::${qualifiedName}`;
        const category = resolveCategory(declared.tags, dirCategory);
        metadata.register(id, declared.tags);
        units.push(this.createUnit(id, qualifiedName, source.filePath, relativePath, category, declared.tags, {
          name: declared.name,
          suitePath: declared.suitePath,
          ...(declared.line !== undefined && { line: declared.line }),
          run: declared.body,
        }));
      }
    }

    metadata.seal();
    return {
      registry: new TestRegistry(units),
      metadata,
      testRoots,
      loadErrors,
      structure: { hierarchical, tagged: metadata.hasCategoryTags() },
    };
  }

  /**
   * Applies the category, slow and CI filters. Load-error units always pass:
   * their tags are unknown and the failure must stay visible.
   */
  filter(units: readonly TestUnit[], criteria: FilterCriteria): TestUnit[] {
    const allCategories = criteria.categories.length === 0 || criteria.categories.includes('all');
    const requested = new Set<TestCategory>(
      criteria.categories.filter((category): category is TaggableCategory => category !== 'all')
    );

    return units.filter(unit => {
      if (unit.synthetic) return true;
      if (!allCategories && !requested.has(unit.category)) return false;
      if (criteria.excludeSlow && unit.slow) return false;
      if (criteria.excludeCi && unit.skipCi) return false;
      return true;
    });
  }

  /**
   * Groups units by category, keeping their relative order.
   */
  categorize(units: readonly TestUnit[]): Record<TestCategory, TestUnit[]> {
    const grouped = emptyCategoryMap<TestUnit[]>(() => []);
    for (const unit of units) {
      grouped[unit.category].push(unit);
    }
    return grouped;
  }

  countByCategory(units: readonly TestUnit[]): Record<TestCategory, number> {
    const counts = emptyCategoryMap(() => 0);
    for (const unit of units) {
      counts[unit.category] += 1;
    }
    return counts;
  }

  private createUnit(
    id: string,
    qualifiedName: string,
    filePath: string,
    relativePath: string,
    category: TestCategory,
    tagSet: TestTags,
    rest: Pick<TestUnit, 'name' | 'suitePath' | 'line' | 'run'>
  ): TestUnit {
    return {
      id,
      qualifiedName,
      filePath,
      relativePath,
      category,
      ...(category === 'integration' && tagSet.scope !== undefined && { scope: tagSet.scope }),
      ...(category === 'development' && tagSet.phase !== undefined && { phase: tagSet.phase }),
      slow: tagSet.slow ?? false,
      skipCi: tagSet.skipCi ?? false,
      ...(tagSet.skip !== undefined && { skipReason: tagSet.skip }),
      synthetic: false,
      ...rest,
    };
  }

  private createLoadErrorUnit(
    filePath: string,
    relativePath: string,
    category: TestCategory,
    loadError: DiscoveryLoadError
  ): TestUnit {
    return {
      id: `${relativePath}::${LOAD_ERROR_UNIT_NAME}`,
      name: LOAD_ERROR_UNIT_NAME,
      qualifiedName: LOAD_ERROR_UNIT_NAME,
      suitePath: [],
      filePath,
      relativePath,
      category,
      slow: false,
      skipCi: false,
      synthetic: true,
      run: () => {
        throw loadError;
      },
    };
  }
}
