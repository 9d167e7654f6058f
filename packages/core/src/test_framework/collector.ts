/**
 * Authoring API for test sources.
 *
 * Test files call `test()` and `suite()` at load time. The framework wraps the
 * load in `collectTests()`, which captures the declarations in order.
 *
 * @example
 * ```javascript
 * const { test, suite, tags } = require('@sieve/core');
 *
 * suite('Checkout', tags.integration('service'), () => {
 *   test('charges the card', tags.slow(), async () => { ... });
 * });
 * ```
 */

import type { TestTags } from '../test_tags';
import { mergeTags, validateTags } from '../test_tags';
import type { TestBody } from '../test_registry';
import type { DeclaredTest } from './test_framework.types';

export type TestCollection = {
  filePath: string;
  tests: DeclaredTest[];
  suites: Array<{ name: string; tags: TestTags }>;
};

// Kept on globalThis so test files resolving a second copy of the package
// still register into the collection that is currently open.
declare global {
  var __sieveActiveCollection: TestCollection | undefined;
}

function activeCollection(caller: string): TestCollection {
  const collection = globalThis.__sieveActiveCollection;
  if (!collection) {
    throw new Error(`${caller}() called outside of test discovery`);
  }
  return collection;
}

function splitTagsAndBody<F extends () => unknown>(
  caller: string,
  name: string,
  args: Array<TestTags | F>
): { tagSets: TestTags[]; body: F } {
  const body = args[args.length - 1];
  if (typeof body !== 'function') {
    throw new TypeError(`${caller}("${name}") requires a function as its last argument`);
  }

  const tagSets: TestTags[] = [];
  for (const candidate of args.slice(0, -1)) {
    if (typeof candidate === 'function') {
      throw new TypeError(`${caller}("${name}") accepts a single function, as its last argument`);
    }
    const problems = validateTags(candidate);
    if (problems.length > 0) {
      throw new TypeError(`${caller}("${name}") has invalid tags: ${problems.join(', ')}`);
    }
    tagSets.push(candidate);
  }
  return { tagSets, body };
}

/**
 * Finds the line of the first stack frame inside the file being loaded.
 */
function callerLine(filePath: string): number | undefined {
  const stack = new Error().stack ?? '';
  for (const frame of stack.split('\n').slice(1)) {
    const index = frame.indexOf(filePath);
    if (index === -1) continue;
    const match = /:(\d+):\d+\)?\s*$/.exec(frame.slice(index + filePath.length));
    if (match?.[1]) {
      return Number(match[1]);
    }
  }
  return undefined;
}

export function test(name: string, body: TestBody): void;
export function test(name: string, ...tagsAndBody: [...TestTags[], TestBody]): void;
export function test(name: string, ...args: Array<TestTags | TestBody>): void {
  const collection = activeCollection('test');
  const { tagSets, body } = splitTagsAndBody<TestBody>('test', name, args);
  const suiteTags = collection.suites.map(frame => frame.tags);
  const line = callerLine(collection.filePath);

  collection.tests.push({
    name,
    suitePath: collection.suites.map(frame => frame.name),
    tags: mergeTags(...suiteTags, ...tagSets),
    ...(line !== undefined && { line }),
    body,
  });
}

export function suite(name: string, define: () => void): void;
export function suite(name: string, ...tagsAndDefine: [...TestTags[], () => void]): void;
export function suite(name: string, ...args: Array<TestTags | (() => void)>): void {
  const collection = activeCollection('suite');
  const { tagSets, body } = splitTagsAndBody<() => void>('suite', name, args);

  collection.suites.push({ name, tags: mergeTags(...tagSets) });
  try {
    body();
  } finally {
    collection.suites.pop();
  }
}

/**
 * Thrown by `skip()` from inside a running test body.
 */
export class SkipSignal extends Error {
  constructor(public readonly reason: string) {
    super(`Skipped: ${reason}`);
    this.name = 'SkipSignal';
    Object.setPrototypeOf(this, SkipSignal.prototype);
  }
}

/**
 * Skips the running test at runtime.
 */
export function skip(reason: string = 'skipped'): never {
  throw new SkipSignal(reason);
}

/**
 * Opens a collection for `filePath`, runs `load`, and returns the tests it
 * declared in declaration order. Errors thrown by `load` propagate.
 */
export function collectTests(filePath: string, load: () => void): DeclaredTest[] {
  if (globalThis.__sieveActiveCollection) {
    throw new Error(`Nested test collection while loading ${filePath}`);
  }
  const collection: TestCollection = { filePath, tests: [], suites: [] };
  globalThis.__sieveActiveCollection = collection;
  try {
    load();
  } finally {
    globalThis.__sieveActiveCollection = undefined;
  }
  return collection.tests;
}
