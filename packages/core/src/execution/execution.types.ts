import type { Logger } from '../logger';
import type { EventHub } from '../event_bus';
import type { ITestFramework } from '../test_framework';
import type { TestUnitDescriptor } from '../test_registry';

/**
 * Four-way outcome of one unit. `failed` is an assertion mismatch,
 * `errored` an unexpected fault; the two are never merged.
 */
export type TestStatus = 'passed' | 'failed' | 'errored' | 'skipped';

/**
 * What the engine knows about one finished unit.
 */
export type TestResult = {
  unit: TestUnitDescriptor;
  status: TestStatus;
  durationMs: number;
  /** First line of the failure, for failed and errored units */
  message?: string;
  /** Full stack with its cause chain, for failed and errored units */
  trace?: string;
  /** Constructor name of the thrown value */
  errorType?: string;
  skipReason?: string;
};

/**
 * Counts and timings of one run. Computed once when the run finishes.
 */
export type RunSummary = {
  testsRun: number;
  passed: number;
  failed: number;
  errored: number;
  skipped: number;
  /** 0-100; 100 when no unit was executed */
  successRate: number;
  totalTimeMs: number;
  /** ISO-8601 */
  startedAt: string;
  finishedAt: string;
  interrupted: boolean;
};

export type PerformanceSummary = {
  totalMs: number;
  averageMs: number;
  fastest?: { id: string; durationMs: number };
  slowest?: { id: string; durationMs: number };
};

export type ExecutionEngineDependencies = {
  framework: ITestFramework;
  hub: EventHub;
  logger?: Logger;
  /** Monotonic clock in milliseconds; defaults to performance.now */
  now?: () => number;
  /** Wall clock; defaults to new Date() */
  clock?: () => Date;
  /** Longest wait on sink backpressure before a unit starts anyway */
  backpressureTimeoutMs?: number;
};

export type RunOptions = {
  /** Human readable description of what was requested, carried by run.started */
  command: string;
  /** Aborting stops new units from starting */
  signal?: AbortSignal;
};
