import type { ExecutionEvent, Sink, SinkShutdownReport } from '../event_bus';
import { BackgroundFileWriter } from './background_file_writer';
import type { BackgroundFileWriterOptions } from './background_file_writer';

/**
 * Adapts a BackgroundFileWriter to the sink interface. Each file sink owns
 * its own writer, queue and worker.
 */
export class FileSink implements Sink {
  readonly name: string;
  readonly writer: BackgroundFileWriter;

  constructor(options: BackgroundFileWriterOptions) {
    this.name = `file:${options.filePath}`;
    this.writer = new BackgroundFileWriter(options);
  }

  handle(event: ExecutionEvent): void {
    this.writer.enqueue(event);
  }

  whenWritable(): Promise<void> {
    return this.writer.whenWritable();
  }

  async close(timeoutMs: number): Promise<SinkShutdownReport> {
    const report = await this.writer.close(timeoutMs);
    return { sink: this.name, ...report };
  }
}
