import type { ExecutionEvent, RunStartedEvent, TestFinishedEvent } from '../../event_bus';
import type { RunSummary, TestResult } from '../../execution/execution.types';
import { formatDuration, SEPARATOR, statusLabel, summaryLines } from '../../report';
import type { ConsoleStrategy, RenderContext } from '../console_sink.types';

/**
 * Run header, one coloured line per finished unit, failure blocks after
 * the run, then the summary.
 */
export class StandardStrategy implements ConsoleStrategy {
  protected readonly problems: TestResult[] = [];

  constructor(protected readonly context: RenderContext) { }

  render(event: ExecutionEvent): string {
    switch (event.type) {
      case 'run.started':
        return this.context.quiet ? '' : this.header(event);
      case 'test.started':
        return this.context.quiet ? '' : this.started(event.payload.unit.id);
      case 'test.finished':
        if (event.payload.status === 'failed' || event.payload.status === 'errored') {
          this.problems.push(event.payload);
        }
        return this.context.quiet ? '' : this.finished(event);
      case 'run.finished':
        return this.footer(event.payload.summary);
    }
  }

  protected header(event: RunStartedEvent): string {
    const { bold } = this.context.palette;
    return `${bold(`Running ${event.payload.testCount} test(s)`)}: ${event.payload.command}\n\n`;
  }

  protected started(_unitId: string): string {
    return '';
  }

  protected finished(event: TestFinishedEvent): string {
    const { payload } = event;
    const label = this.colorStatus(payload.status, statusLabel(payload.status).padEnd(5));
    const duration = this.context.palette.dim(`(${formatDuration(payload.durationMs)})`);
    const reason = payload.skipReason !== undefined ? ` ${this.context.palette.yellow(payload.skipReason)}` : '';
    return `${label} ${payload.unit.id} ${duration}${reason}\n`;
  }

  protected footer(summary: RunSummary): string {
    const blocks: string[] = [];
    for (const problem of this.problems) {
      blocks.push(this.problemBlock(problem));
    }
    blocks.push(this.summaryBlock(summary));
    return `\n${blocks.join('\n')}`;
  }

  protected problemBlock(problem: TestResult): string {
    const { red, bold } = this.context.palette;
    const title = `${statusLabel(problem.status)}: ${problem.unit.id}`;
    const detail = problem.trace ?? problem.message ?? '';
    return `${SEPARATOR}\n${bold(red(title))}\n${detail}\n`;
  }

  protected summaryBlock(summary: RunSummary): string {
    const lines = summaryLines(summary);
    const { green, red, yellow } = this.context.palette;
    const ok = summary.failed + summary.errored === 0;
    const verdict = summary.interrupted ? yellow('INTERRUPTED') : ok ? green('OK') : red('FAILED');
    return `${lines.join('\n')}\n${verdict}\n`;
  }

  protected colorStatus(status: TestResult['status'], text: string): string {
    const { green, red, yellow } = this.context.palette;
    switch (status) {
      case 'passed':
        return green(text);
      case 'failed':
      case 'errored':
        return red(text);
      case 'skipped':
        return yellow(text);
    }
  }
}
