import type { PerformanceSummary, RunSummary, TestResult, TestStatus } from './execution.types';

/**
 * passed / (testsRun - skipped) as a percentage; 100 when nothing was executed.
 */
export function computeSuccessRate(passed: number, testsRun: number, skipped: number): number {
  const executed = testsRun - skipped;
  if (executed <= 0) {
    return 100;
  }
  return (100 * passed) / executed;
}

export function countStatuses(results: readonly TestResult[]): Record<TestStatus, number> {
  const counts: Record<TestStatus, number> = { passed: 0, failed: 0, errored: 0, skipped: 0 };
  for (const result of results) {
    counts[result.status] += 1;
  }
  return counts;
}

export function computeSummary(
  results: readonly TestResult[],
  timing: { totalTimeMs: number; startedAt: Date; finishedAt: Date; interrupted: boolean }
): RunSummary {
  const counts = countStatuses(results);
  return {
    testsRun: results.length,
    ...counts,
    successRate: computeSuccessRate(counts.passed, results.length, counts.skipped),
    totalTimeMs: timing.totalTimeMs,
    startedAt: timing.startedAt.toISOString(),
    finishedAt: timing.finishedAt.toISOString(),
    interrupted: timing.interrupted,
  };
}

/**
 * Total, average, fastest and slowest of the units that actually ran.
 */
export function performanceSummary(results: readonly TestResult[]): PerformanceSummary {
  const timed = results.filter(result => result.status !== 'skipped');
  if (timed.length === 0) {
    return { totalMs: 0, averageMs: 0 };
  }

  let fastest = timed[0];
  let slowest = timed[0];
  let totalMs = 0;
  for (const result of timed) {
    totalMs += result.durationMs;
    if (result.durationMs < fastest.durationMs) fastest = result;
    if (result.durationMs > slowest.durationMs) slowest = result;
  }

  return {
    totalMs,
    averageMs: totalMs / timed.length,
    fastest: { id: fastest.unit.id, durationMs: fastest.durationMs },
    slowest: { id: slowest.unit.id, durationMs: slowest.durationMs },
  };
}

/**
 * Process exit code for a finished run: 130 when interrupted, 1 when any
 * unit failed or errored, 0 otherwise.
 */
export function exitCodeFor(summary: RunSummary): number {
  if (summary.interrupted) {
    return 130;
  }
  return summary.failed + summary.errored > 0 ? 1 : 0;
}
