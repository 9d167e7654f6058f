import type { RunSummary } from '../execution/execution.types';
import type { TestUnitDescriptor } from '../test_registry';
import type {
  EventMetadata,
  RunFinishedEvent,
  RunStartedEvent,
  TestFinishedEvent,
  TestStartedEvent,
} from './types';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

// Generate unique run IDs
export function generateRunId(now: number = Date.now()): string {
  return `run:${now}-${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Builds the frozen, sequence-numbered events of one run.
 */
export class EventFactory {
  private sequence = 0;

  constructor(
    private readonly source: string,
    public readonly runId: string = generateRunId(),
    private readonly clock: () => number = Date.now
  ) { }

  runStarted(payload: RunStartedEvent['payload']): RunStartedEvent {
    const event: RunStartedEvent = { type: 'run.started', payload, ...this.envelope() };
    return deepFreeze(event);
  }

  testStarted(unit: TestUnitDescriptor): TestStartedEvent {
    const event: TestStartedEvent = { type: 'test.started', payload: { unit }, ...this.envelope() };
    return deepFreeze(event);
  }

  testFinished(payload: TestFinishedEvent['payload']): TestFinishedEvent {
    const event: TestFinishedEvent = { type: 'test.finished', payload, ...this.envelope() };
    return deepFreeze(event);
  }

  runFinished(summary: RunSummary): RunFinishedEvent {
    const event: RunFinishedEvent = { type: 'run.finished', payload: { summary }, ...this.envelope() };
    return deepFreeze(event);
  }

  /**
   * Number of events created so far.
   */
  get count(): number {
    return this.sequence;
  }

  private envelope(): { timestamp: number; source: string; metadata: EventMetadata } {
    this.sequence += 1;
    return {
      timestamp: this.clock(),
      source: this.source,
      metadata: {
        eventId: `${this.runId}:${this.sequence}`,
        runId: this.runId,
        sequenceNumber: this.sequence,
      },
    };
  }
}
