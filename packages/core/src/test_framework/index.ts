export { test, suite, skip, collectTests, SkipSignal } from './collector';
export type { TestCollection } from './collector';
export { classifyThrown, invokeBody, isAssertionError } from './outcome';
export { FsTestFramework, requireFresh, DEFAULT_IGNORE } from './fs/fs_test_framework';
export type { FsTestFrameworkOptions, ModuleLoader } from './fs/fs_test_framework';
export { MemoryTestFramework } from './memory/memory_test_framework';
export type { MemoryTestFrameworkOptions } from './memory/memory_test_framework';
export type {
  ITestFramework,
  DeclaredTest,
  LoadedSource,
  NativeOutcome,
} from './test_framework.types';
