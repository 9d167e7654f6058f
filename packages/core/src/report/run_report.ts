/**
 * Structured run report, built incrementally from the event stream.
 *
 * Shared by the console JSON strategy and the JSON file formatter so both
 * emit the same document.
 */

import type { ExecutionEvent, RunFinishedEvent, TestFinishedEvent } from '../event_bus';
import type { ReportVerbosity, RunReportDocument, RunReportResult } from './report.types';

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function toResult(payload: TestFinishedEvent['payload'], verbosity: ReportVerbosity): RunReportResult {
  const { unit } = payload;
  const result: RunReportResult = {
    id: unit.id,
    name: unit.qualifiedName,
    category: unit.category,
    status: payload.status,
    duration: round(payload.durationMs / 1000, 3),
    ...(unit.scope !== undefined && { scope: unit.scope }),
    ...(unit.phase !== undefined && { phase: unit.phase }),
    slow: unit.slow,
    skip_ci: unit.skipCi,
    ...(payload.message !== undefined && { message: payload.message }),
    ...(payload.skipReason !== undefined && { skip_reason: payload.skipReason }),
  };

  if (verbosity >= 3) {
    return {
      ...result,
      ...(payload.trace !== undefined && { trace: payload.trace }),
      file: unit.relativePath,
      ...(unit.line !== undefined && { line: unit.line }),
    };
  }
  return result;
}

export class RunReportCollector {
  private runId = '';
  private command = '';
  private readonly finished: TestFinishedEvent['payload'][] = [];
  private final: RunFinishedEvent['payload'] | undefined;

  add(event: ExecutionEvent): void {
    switch (event.type) {
      case 'run.started':
        this.runId = event.metadata.runId;
        this.command = event.payload.command;
        break;
      case 'test.finished':
        this.finished.push(event.payload);
        break;
      case 'run.finished':
        this.final = event.payload;
        break;
      case 'test.started':
        break;
    }
  }

  get complete(): boolean {
    return this.final !== undefined;
  }

  /**
   * @throws Error before run.finished was added
   */
  toDocument(verbosity: ReportVerbosity, now: Date = new Date()): RunReportDocument {
    if (!this.final) {
      throw new Error('Run report requested before run.finished');
    }
    const { summary } = this.final;

    const document: RunReportDocument = {
      run_info: {
        run_id: this.runId,
        command: this.command,
        started_at: summary.startedAt,
        finished_at: summary.finishedAt,
      },
      timestamp: now.toISOString(),
      tests_run: summary.testsRun,
      passed: summary.passed,
      failures: summary.failed,
      errors: summary.errored,
      skipped: summary.skipped,
      success_rate: round(summary.successRate, 2),
      total_time: round(summary.totalTimeMs / 1000, 3),
      interrupted: summary.interrupted,
    };

    if (verbosity >= 2) {
      document.results = this.finished.map(payload => toResult(payload, verbosity));
    }
    return document;
  }
}
