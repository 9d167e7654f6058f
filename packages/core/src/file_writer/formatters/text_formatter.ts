import type { ExecutionEvent, TestFinishedEvent } from '../../event_bus';
import { formatDuration, statusLabel, summaryLines } from '../../report';
import type { ReportVerbosity } from '../../report';
import { describeTags } from '../../test_tags';
import type { FileFormatter } from './file_formatter';

/**
 * One line per event, each prefixed with its timestamp, and the summary
 * block after run.finished.
 *
 * Verbosity 1 lists status lines, 2 adds metadata and timings, 3 adds the
 * full error text and file locations on indented lines.
 */
export class TextFileFormatter implements FileFormatter {
  readonly format = 'txt';

  constructor(readonly verbosity: ReportVerbosity) { }

  write(event: ExecutionEvent): string {
    const stamp = `[${new Date(event.timestamp).toISOString()}]`;
    switch (event.type) {
      case 'run.started':
        return `${stamp} === Run ${event.metadata.runId} started: ${event.payload.command} (${event.payload.testCount} tests) ===\n`;
      case 'test.started':
        return `${stamp} START ${event.payload.unit.id}\n`;
      case 'test.finished':
        return `${stamp} ${this.finishedLine(event)}\n${this.details(event)}`;
      case 'run.finished':
        return `${stamp} === Run ${event.metadata.runId} finished ===\n${summaryLines(event.payload.summary).join('\n')}\n`;
    }
  }

  private finishedLine(event: TestFinishedEvent): string {
    const { unit, status, durationMs, skipReason } = event.payload;
    const parts = [statusLabel(status), unit.id];
    if (this.verbosity >= 2) {
      const labels = describeTags(unit.category, {
        ...(unit.scope !== undefined && { scope: unit.scope }),
        ...(unit.phase !== undefined && { phase: unit.phase }),
        slow: unit.slow,
        skipCi: unit.skipCi,
      });
      parts.push(`[${labels.join(', ')}]`, `(${formatDuration(durationMs)})`);
    }
    if (skipReason !== undefined) {
      parts.push(`- ${skipReason}`);
    } else if (event.payload.message !== undefined) {
      parts.push(`- ${event.payload.message}`);
    }
    return parts.join(' ');
  }

  private details(event: TestFinishedEvent): string {
    if (this.verbosity < 3) {
      return '';
    }
    const { unit, trace } = event.payload;
    const location = unit.line !== undefined ? `${unit.filePath}:${unit.line}` : unit.filePath;
    const lines = [`    at ${location}`];
    if (trace !== undefined) {
      lines.push(...trace.split('\n').map(line => `    | ${line}`));
    }
    return `${lines.join('\n')}\n`;
  }
}
