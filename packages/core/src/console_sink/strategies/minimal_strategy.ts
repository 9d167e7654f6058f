import type { ExecutionEvent } from '../../event_bus';
import { formatDuration, formatRate } from '../../report';
import type { ConsoleStrategy, RenderContext } from '../console_sink.types';

const MARKS = {
  passed: '.',
  failed: 'F',
  errored: 'E',
  skipped: 's',
} as const;

/**
 * One character per finished unit, then a single summary line.
 */
export class MinimalStrategy implements ConsoleStrategy {
  constructor(private readonly context: RenderContext) { }

  render(event: ExecutionEvent): string {
    switch (event.type) {
      case 'run.started':
      case 'test.started':
        return '';
      case 'test.finished':
        return this.context.quiet ? '' : MARKS[event.payload.status];
      case 'run.finished': {
        const { summary } = event.payload;
        const line = `${summary.testsRun} tests, ${summary.failed} failures, ${summary.errored} errors, ` +
          `${summary.skipped} skipped (${formatRate(summary.successRate)}) in ${formatDuration(summary.totalTimeMs)}`;
        const prefix = this.context.quiet ? '' : '\n';
        return `${prefix}${summary.interrupted ? `${line} [interrupted]` : line}\n`;
      }
    }
  }
}
