export { ExecutionEngine, EVENT_SOURCE } from './execution_engine';
export {
  computeSuccessRate,
  computeSummary,
  countStatuses,
  exitCodeFor,
  performanceSummary,
} from './run_summary';
export { AssertionMismatch, ExecutionFault } from './errors';
export type {
  ExecutionEngineDependencies,
  PerformanceSummary,
  RunOptions,
  RunSummary,
  TestResult,
  TestStatus,
} from './execution.types';
