import type { TestCategory } from '../test_tags';
import type { TestStatus } from '../execution/execution.types';

/**
 * Detail level of a rendered report: 1 counts only, 2 adds per-unit
 * metadata and timing, 3 adds full error text and file locations.
 */
export type ReportVerbosity = 1 | 2 | 3;

export const REPORT_VERBOSITIES: readonly ReportVerbosity[] = [1, 2, 3];

export type RunReportResult = {
  id: string;
  name: string;
  category: TestCategory;
  status: TestStatus;
  /** Seconds */
  duration: number;
  scope?: string;
  phase?: string;
  slow: boolean;
  skip_ci: boolean;
  message?: string;
  skip_reason?: string;
  trace?: string;
  file?: string;
  line?: number;
};

/**
 * Structured document of one run, written once when the run finishes.
 */
export type RunReportDocument = {
  run_info: {
    run_id: string;
    command: string;
    started_at: string;
    finished_at: string;
  };
  /** ISO-8601 time the document was produced */
  timestamp: string;
  tests_run: number;
  passed: number;
  failures: number;
  errors: number;
  skipped: number;
  /** Percentage, two decimals */
  success_rate: number;
  /** Seconds, three decimals */
  total_time: number;
  interrupted: boolean;
  results?: RunReportResult[];
};

export type DiscoveryReportDocument = {
  discovery_summary: {
    timestamp: string;
    total_tests: number;
    categories: Record<TestCategory, number>;
    load_errors: number;
    uncategorized_tests?: string[];
    tests_by_category?: Record<TestCategory, string[]>;
  };
};
