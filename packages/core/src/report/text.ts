import type { RunSummary, TestStatus } from '../execution/execution.types';
import type { TestCategory } from '../test_tags';

export const SEPARATOR = '-'.repeat(70);

const STATUS_LABELS: Record<TestStatus, string> = {
  passed: 'PASS',
  failed: 'FAIL',
  errored: 'ERROR',
  skipped: 'SKIP',
};

const CATEGORY_LABELS: Record<TestCategory, string> = {
  regression: 'Regression',
  integration: 'Integration',
  development: 'Development',
  uncategorized: 'Uncategorized',
};

export function statusLabel(status: TestStatus): string {
  return STATUS_LABELS[status];
}

export function categoryLabel(category: TestCategory): string {
  return CATEGORY_LABELS[category];
}

/**
 * Milliseconds as seconds with three decimals, e.g. "0.012s".
 */
export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(3)}s`;
}

export function formatRate(rate: number): string {
  return `${rate.toFixed(1)}%`;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * The trailing block shared by the console and text file outputs.
 */
export function summaryLines(summary: RunSummary): string[] {
  const lines = [
    SEPARATOR,
    `Ran ${plural(summary.testsRun, 'test')} in ${formatDuration(summary.totalTimeMs)}`,
    `Passed: ${summary.passed}  Failed: ${summary.failed}  Errors: ${summary.errored}  Skipped: ${summary.skipped}`,
    `Success rate: ${formatRate(summary.successRate)}`,
  ];
  if (summary.interrupted) {
    lines.push('Run interrupted before all tests completed');
  }
  return lines;
}
