import { toError } from '../errors';
import type { TestBody } from '../test_registry';
import { SkipSignal } from './collector';
import type { NativeOutcome } from './test_framework.types';

/**
 * True for assertion-style mismatches: node:assert, chai and expect-style
 * matchers all either name their error "AssertionError" or tag it.
 */
export function isAssertionError(error: Error): boolean {
  return error.name === 'AssertionError' ||
    error.name === 'JestAssertionError' ||
    ('code' in error && error.code === 'ERR_ASSERTION') ||
    ('matcherResult' in error && error.matcherResult !== undefined);
}

/**
 * Maps a value thrown by a test body onto a native outcome.
 */
export function classifyThrown(thrown: unknown): NativeOutcome {
  if (thrown instanceof SkipSignal) {
    return { kind: 'skip', reason: thrown.reason };
  }
  const error = toError(thrown);
  if (isAssertionError(error)) {
    return { kind: 'fail', error };
  }
  return { kind: 'error', error };
}

/**
 * Runs a test body, awaiting it when it returns a promise.
 */
export async function invokeBody(body: TestBody): Promise<NativeOutcome> {
  try {
    await body();
    return { kind: 'pass' };
  } catch (thrown) {
    return classifyThrown(thrown);
  }
}
