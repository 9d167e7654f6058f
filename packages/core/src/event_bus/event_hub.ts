import { EventEmitter } from 'events';
import { toError } from '../errors';
import type { Logger } from '../logger';
import { SinkDeliveryFault } from './errors';
import type { ExecutionEvent, Sink, SinkShutdownReport } from './types';

const EVENT_CHANNEL = 'event';

type Registration = {
  sink: Sink;
  listener: (event: ExecutionEvent) => void;
  faulted: boolean;
};

/**
 * Event Hub contract - fans the execution event stream out to sinks
 */
export interface IEventHub {
  register(sink: Sink): void;
  getSinks(): Sink[];
  publish(event: ExecutionEvent): void;
  whenWritable(): Promise<void>;
  close(timeoutMs: number): Promise<SinkShutdownReport[]>;
}

/**
 * EventHub - synchronous, ordered, isolated fan-out using Node.js EventEmitter
 *
 * Design Principles:
 * - Ordered: every sink receives each event in registration order before publish() returns
 * - Isolated: a throwing sink is logged once and never stops delivery to the others
 * - Immutable: events are frozen before any sink sees them
 * - No I/O: buffering and writing are the sinks' business
 */
export class EventHub implements IEventHub {
  private emitter: EventEmitter;
  private registrations: Map<string, Registration>;
  private logger: Logger | undefined;

  constructor(options: { logger?: Logger } = {}) {
    this.emitter = new EventEmitter();
    this.registrations = new Map();
    this.logger = options.logger;

    // One listener per sink; no practical limit
    this.emitter.setMaxListeners(0);
  }

  /**
   * Adds a sink after the ones already registered.
   *
   * @throws Error when a sink with the same name is registered
   */
  register(sink: Sink): void {
    if (this.registrations.has(sink.name)) {
      throw new Error(`Sink "${sink.name}" is already registered`);
    }

    const registration: Registration = {
      sink,
      faulted: false,
      listener: (event: ExecutionEvent) => {
        try {
          sink.handle(event);
        } catch (thrown) {
          const fault = new SinkDeliveryFault(sink.name, event.type, toError(thrown));
          if (!registration.faulted) {
            registration.faulted = true;
            this.logger?.error(fault.message);
          } else {
            this.logger?.debug(fault.message);
          }
        }
      },
    };

    this.emitter.on(EVENT_CHANNEL, registration.listener);
    this.registrations.set(sink.name, registration);
  }

  getSinks(): Sink[] {
    return Array.from(this.registrations.values(), registration => registration.sink);
  }

  /**
   * Delivers the event to every sink, in registration order, before returning.
   */
  publish(event: ExecutionEvent): void {
    if (!Object.isFrozen(event)) {
      Object.freeze(event);
    }
    this.emitter.emit(EVENT_CHANNEL, event);
  }

  /**
   * Resolves when every sink exposing backpressure is below its high-water mark.
   */
  async whenWritable(): Promise<void> {
    for (const sink of this.getSinks()) {
      if (sink.whenWritable) {
        await sink.whenWritable();
      }
    }
  }

  /**
   * Closes every sink in registration order and collects their reports.
   * A sink that fails to close is reported as incomplete.
   */
  async close(timeoutMs: number): Promise<SinkShutdownReport[]> {
    const reports: SinkShutdownReport[] = [];
    for (const sink of this.getSinks()) {
      if (!sink.close) {
        continue;
      }
      try {
        reports.push(await sink.close(timeoutMs));
      } catch (thrown) {
        this.logger?.error(`Sink "${sink.name}" failed to close: ${toError(thrown).message}`);
        reports.push({ sink: sink.name, completed: false, written: 0, abandoned: 0 });
      }
    }
    return reports;
  }
}
