/**
 * BackgroundFileWriter - persists the event stream without making the
 * execution flow wait on the file system
 *
 * One producer (the hub, through FileSink) enqueues; one worker task
 * dequeues in FIFO order and writes through an fs/promises file handle,
 * whose I/O runs on the libuv threadpool. The handle belongs to the worker:
 * nothing else opens, writes or closes it.
 *
 * @module file_writer
 */

import { open } from 'fs/promises';
import { toError } from '../errors';
import type { ExecutionEvent } from '../event_bus';
import { logger as defaultLogger } from '../logger';
import type { Logger } from '../logger';
import { AsyncQueue } from './async_queue';
import { WriterIOFault } from './errors';
import type { FileFormatter } from './formatters';

export type WriterMode = 'append' | 'overwrite';

/**
 * The part of a FileHandle the worker uses.
 */
export type WritableHandle = {
  /** Writes all of `data`, looping over short writes */
  appendFile(data: string): Promise<void>;
  sync(): Promise<void>;
  close(): Promise<void>;
};

export type OpenFile = (filePath: string, flags: 'a' | 'w') => Promise<WritableHandle>;

/**
 * One queued event. `record` is the writer's own copy; the producer keeps
 * no reference to it.
 */
export type WriteJob = {
  sequence: number;
  record: ExecutionEvent;
};

export type WriterShutdownReport = {
  /** True when the worker drained the queue and closed the file in time */
  completed: boolean;
  /** Jobs handed to the formatter and written */
  written: number;
  /**
   * Jobs dropped after an I/O fault, or not written when a shutdown timed
   * out (including the batch being written at that moment).
   * `written + abandoned` always equals the number of jobs enqueued.
   */
  abandoned: number;
};

export type BackgroundFileWriterOptions = {
  filePath: string;
  mode: WriterMode;
  formatter: FileFormatter;
  /** Queue depth above which whenWritable() waits; default 1024 */
  highWaterMark?: number;
  logger?: Logger;
  /** Defaults to fs/promises open */
  openFile?: OpenFile;
};

// Jobs joined into one write
const MAX_BATCH = 256;

const defaultOpenFile: OpenFile = (filePath, flags) => open(filePath, flags);

export class BackgroundFileWriter {
  readonly filePath: string;
  readonly mode: WriterMode;
  private readonly formatter: FileFormatter;
  private readonly logger: Logger;
  private readonly openFile: OpenFile;
  private readonly queue: AsyncQueue<WriteJob>;
  private readonly worker: Promise<void>;
  private sequence = 0;
  private written = 0;
  private abandoned = 0;
  // Size of the batch currently inside writeBatch
  private inFlight = 0;
  private timedOut = false;
  private ioFault: WriterIOFault | undefined;
  private shutdown: Promise<WriterShutdownReport> | undefined;

  constructor(options: BackgroundFileWriterOptions) {
    this.filePath = options.filePath;
    this.mode = options.mode;
    this.formatter = options.formatter;
    this.logger = options.logger ?? defaultLogger;
    this.openFile = options.openFile ?? defaultOpenFile;
    this.queue = new AsyncQueue(options.highWaterMark);
    this.worker = this.work();
  }

  /**
   * Queues an event and returns at once. Never blocks, never drops.
   *
   * @throws Error after close() was called
   */
  enqueue(event: ExecutionEvent): void {
    this.sequence += 1;
    this.queue.push({ sequence: this.sequence, record: structuredClone(event) });
  }

  /**
   * Resolves while the queue is below its high-water mark.
   */
  whenWritable(): Promise<void> {
    return this.queue.whenBelowHighWaterMark();
  }

  get pending(): number {
    return this.queue.size;
  }

  get fault(): WriterIOFault | undefined {
    return this.ioFault;
  }

  /**
   * Signals end-of-stream and waits up to `timeoutMs` for the worker to
   * drain, flush and close the file. On timeout whatever is still queued and
   * the batch being written are abandoned; the worker closes the file once
   * that write settles.
   */
  close(timeoutMs: number): Promise<WriterShutdownReport> {
    if (!this.shutdown) {
      this.queue.close();
      this.shutdown = this.awaitShutdown(timeoutMs);
    }
    return this.shutdown;
  }

  private async awaitShutdown(timeoutMs: number): Promise<WriterShutdownReport> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    const outcome = await Promise.race([this.worker.then(() => 'done' as const), timedOut]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      this.timedOut = true;
      const dropped = this.queue.drain().length + this.inFlight;
      this.abandoned += dropped;
      this.logger.warn(
        `Log file writer did not finish within ${timeoutMs}ms; abandoned ${dropped} pending entr${dropped === 1 ? 'y' : 'ies'} for ${this.filePath}`
      );
      return { completed: false, written: this.written, abandoned: this.abandoned };
    }
    return { completed: this.ioFault === undefined, written: this.written, abandoned: this.abandoned };
  }

  private async work(): Promise<void> {
    let handle: WritableHandle | undefined;
    try {
      handle = await this.openFile(this.filePath, this.mode === 'append' ? 'a' : 'w');
    } catch (thrown) {
      this.recordFault(thrown);
    }

    for (let job = await this.queue.take(); job !== undefined; job = await this.queue.take()) {
      const batch = [job];
      while (batch.length < MAX_BATCH) {
        const next = this.queue.poll();
        if (next === undefined) break;
        batch.push(next);
      }

      if (!handle || this.ioFault) {
        this.abandoned += batch.length;
        continue;
      }
      this.inFlight = batch.length;
      await this.writeBatch(handle, batch);
      this.inFlight = 0;
    }

    if (handle) {
      try {
        await handle.sync();
        await handle.close();
      } catch (thrown) {
        this.recordFault(thrown);
      }
    }
  }

  private async writeBatch(handle: WritableHandle, batch: WriteJob[]): Promise<void> {
    try {
      let text = '';
      for (const job of batch) {
        text += this.formatter.write(job.record);
      }
      if (text !== '') {
        await handle.appendFile(text);
      }
      // A batch that lands after a timed-out shutdown was already counted
      if (!this.timedOut) {
        this.written += batch.length;
      }
    } catch (thrown) {
      if (!this.timedOut) {
        this.abandoned += batch.length;
      }
      this.recordFault(thrown);
    }
  }

  private recordFault(thrown: unknown): void {
    if (this.ioFault) {
      return;
    }
    this.ioFault = new WriterIOFault(this.filePath, toError(thrown));
    this.logger.error(this.ioFault.message);
  }
}
