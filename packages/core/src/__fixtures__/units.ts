import type { TestUnit, TestUnitDescriptor } from '../test_registry';
import { toDescriptor } from '../test_registry';
import type { RunSummary } from '../execution/execution.types';

/**
 * Builds a unit under tests/test_sample.test.js with the given overrides.
 */
export function createUnit(name: string, overrides: Partial<TestUnit> = {}): TestUnit {
  const relativePath = overrides.relativePath ?? 'tests/test_sample.test.js';
  return {
    id: `${relativePath}::${name}`,
    name,
    qualifiedName: name,
    suitePath: [],
    filePath: `/repo/${relativePath}`,
    relativePath,
    category: 'uncategorized',
    slow: false,
    skipCi: false,
    synthetic: false,
    run: () => undefined,
    ...overrides,
  };
}

export function createDescriptor(name: string, overrides: Partial<TestUnit> = {}): TestUnitDescriptor {
  return toDescriptor(createUnit(name, overrides));
}

export function createSummary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    testsRun: 0,
    passed: 0,
    failed: 0,
    errored: 0,
    skipped: 0,
    successRate: 100,
    totalTimeMs: 0,
    startedAt: '2024-03-01T10:00:00.000Z',
    finishedAt: '2024-03-01T10:00:01.000Z',
    interrupted: false,
    ...overrides,
  };
}
