/**
 * Event types for the sieve execution event stream
 */

import type { RunSummary, TestStatus } from '../execution/execution.types';
import type { TestUnitDescriptor } from '../test_registry';

/**
 * Event metadata for ordering and debugging
 */
export type EventMetadata = {
  /** Unique event identifier, `<runId>:<sequenceNumber>` */
  eventId: string;
  /** Identifier shared by every event of one run */
  runId: string;
  /** Starts at 1 and increases by one per event of the run */
  sequenceNumber: number;
};

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Epoch milliseconds */
  timestamp: number;
  payload: unknown;
  /** Component that emitted the event */
  source: string;
  metadata: EventMetadata;
};

export type RunStartedEvent = BaseEvent & {
  type: 'run.started';
  payload: {
    command: string;
    testCount: number;
    /** ISO-8601 */
    startedAt: string;
  };
};

export type TestStartedEvent = BaseEvent & {
  type: 'test.started';
  payload: {
    unit: TestUnitDescriptor;
  };
};

export type TestFinishedEvent = BaseEvent & {
  type: 'test.finished';
  payload: {
    unit: TestUnitDescriptor;
    status: TestStatus;
    durationMs: number;
    message?: string;
    trace?: string;
    errorType?: string;
    skipReason?: string;
  };
};

export type RunFinishedEvent = BaseEvent & {
  type: 'run.finished';
  payload: {
    summary: RunSummary;
  };
};

/**
 * Union type of all execution events
 */
export type ExecutionEvent =
  | RunStartedEvent
  | TestStartedEvent
  | TestFinishedEvent
  | RunFinishedEvent;

export type ExecutionEventType = ExecutionEvent['type'];

/**
 * Outcome of closing one sink.
 */
export type SinkShutdownReport = {
  sink: string;
  /** False when the sink gave up before writing everything it had accepted */
  completed: boolean;
  written: number;
  abandoned: number;
};

/**
 * A destination for the execution event stream.
 *
 * `handle` is called synchronously, once per event, in publication order.
 * It must not mutate the event.
 */
export interface Sink {
  readonly name: string;
  handle(event: ExecutionEvent): void;
  /**
   * Resolves once the sink can take more events without growing past its
   * high-water mark. Sinks without a buffer omit it.
   */
  whenWritable?(): Promise<void>;
  /**
   * Releases the sink's resources, waiting at most `timeoutMs`.
   */
  close?(timeoutMs: number): Promise<SinkShutdownReport>;
}
