import type { ExecutionEvent } from '../../event_bus';
import { RunReportCollector } from '../../report';
import type { ConsoleStrategy, RenderContext } from '../console_sink.types';

/**
 * Buffers the whole run and writes one document at run.finished.
 */
export class JsonStrategy implements ConsoleStrategy {
  private readonly collector = new RunReportCollector();

  constructor(private readonly context: RenderContext) { }

  render(event: ExecutionEvent): string {
    this.collector.add(event);
    if (event.type !== 'run.finished') {
      return '';
    }
    return `${JSON.stringify(this.collector.toDocument(this.context.verbosity), null, 2)}\n`;
  }
}
