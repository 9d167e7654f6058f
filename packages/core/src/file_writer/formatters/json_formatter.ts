import type { ExecutionEvent } from '../../event_bus';
import { RunReportCollector } from '../../report';
import type { ReportVerbosity } from '../../report';
import type { FileFormatter } from './file_formatter';

/**
 * Writes one run report document per run.finished. A stream that ends
 * without run.finished writes nothing.
 */
export class JsonFileFormatter implements FileFormatter {
  readonly format = 'json';
  private collector = new RunReportCollector();

  constructor(readonly verbosity: ReportVerbosity, private readonly now: () => Date = () => new Date()) { }

  write(event: ExecutionEvent): string {
    this.collector.add(event);
    if (event.type !== 'run.finished') {
      return '';
    }
    const document = this.collector.toDocument(this.verbosity, this.now());
    this.collector = new RunReportCollector();
    return `${JSON.stringify(document, null, 2)}\n`;
  }
}
