import type { TestFinishedEvent } from '../../event_bus';
import type { RunSummary, TestResult } from '../../execution/execution.types';
import { performanceSummary } from '../../execution/run_summary';
import { formatDuration, SEPARATOR, statusLabel } from '../../report';
import { describeTags } from '../../test_tags';
import { StandardStrategy } from './standard_strategy';

/**
 * Standard output plus a start line per unit, unit metadata, full error
 * text and a performance summary.
 */
export class VerboseStrategy extends StandardStrategy {
  private readonly results: TestResult[] = [];

  protected started(unitId: string): string {
    return `${this.context.palette.cyan('▶')} ${unitId}\n`;
  }

  protected finished(event: TestFinishedEvent): string {
    this.results.push(event.payload);
    const { unit } = event.payload;
    const labels = describeTags(unit.category, {
      ...(unit.scope !== undefined && { scope: unit.scope }),
      ...(unit.phase !== undefined && { phase: unit.phase }),
      slow: unit.slow,
      skipCi: unit.skipCi,
    });
    const location = unit.line !== undefined ? `${unit.relativePath}:${unit.line}` : unit.relativePath;
    const meta = this.context.palette.dim(`    [${labels.join(', ')}] ${location}`);
    return `${super.finished(event)}${meta}\n`;
  }

  protected problemBlock(problem: TestResult): string {
    const { red, bold } = this.context.palette;
    const title = `${statusLabel(problem.status)}: ${problem.unit.id}`;
    const errorType = problem.errorType !== undefined ? `${problem.errorType}: ` : '';
    const lines = [SEPARATOR, bold(red(title)), `${errorType}${problem.message ?? ''}`];
    if (problem.trace !== undefined) {
      lines.push('', problem.trace);
    }
    return `${lines.join('\n')}\n`;
  }

  protected summaryBlock(summary: RunSummary): string {
    const perf = performanceSummary(this.results);
    const lines = ['Performance:', `  Total: ${formatDuration(perf.totalMs)}  Average: ${formatDuration(perf.averageMs)}`];
    if (perf.fastest && perf.slowest) {
      lines.push(`  Fastest: ${perf.fastest.id} (${formatDuration(perf.fastest.durationMs)})`);
      lines.push(`  Slowest: ${perf.slowest.id} (${formatDuration(perf.slowest.durationMs)})`);
    }
    return `${super.summaryBlock(summary)}\n${lines.join('\n')}\n`;
  }
}
