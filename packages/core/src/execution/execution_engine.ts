/**
 * ExecutionEngine - runs test units one at a time and reports each step
 *
 * Every unit's fault is turned into event data; nothing a test does escapes
 * the loop. Events are published on the hub from the same flow that runs
 * the units, in the order things happen.
 *
 * @module execution
 */

import { performance } from 'perf_hooks';
import { formatTrace, toError } from '../errors';
import { EventFactory } from '../event_bus';
import type { EventHub } from '../event_bus';
import type { Logger } from '../logger';
import type { ITestFramework, NativeOutcome } from '../test_framework';
import type { TestUnit, TestUnitDescriptor } from '../test_registry';
import { toDescriptor } from '../test_registry';
import { AssertionMismatch, ExecutionFault } from './errors';
import type {
  ExecutionEngineDependencies,
  RunOptions,
  RunSummary,
  TestResult,
} from './execution.types';
import { computeSummary } from './run_summary';

export const EVENT_SOURCE = 'execution_engine';
const DEFAULT_BACKPRESSURE_TIMEOUT_MS = 10_000;

type GateOutcome = 'writable' | 'aborted' | 'timeout';

function firstLine(message: string): string {
  const newline = message.indexOf('\n');
  return newline === -1 ? message : message.slice(0, newline);
}

export class ExecutionEngine {
  private readonly framework: ITestFramework;
  private readonly hub: EventHub;
  private readonly logger: Logger | undefined;
  private readonly now: () => number;
  private readonly clock: () => Date;
  private readonly backpressureTimeoutMs: number;
  private lastResults: TestResult[] = [];

  constructor(dependencies: ExecutionEngineDependencies) {
    if (!dependencies.framework) {
      throw new Error("ITestFramework is required for ExecutionEngine");
    }
    if (!dependencies.hub) {
      throw new Error("EventHub is required for ExecutionEngine");
    }

    this.framework = dependencies.framework;
    this.hub = dependencies.hub;
    this.logger = dependencies.logger;
    this.now = dependencies.now ?? (() => performance.now());
    this.clock = dependencies.clock ?? (() => new Date());
    this.backpressureTimeoutMs = dependencies.backpressureTimeoutMs ?? DEFAULT_BACKPRESSURE_TIMEOUT_MS;
  }

  /**
   * Runs the units in order and returns the summary carried by run.finished.
   *
   * When `signal` aborts, the unit in flight finishes, no other unit starts,
   * and the summary counts only what completed.
   */
  async run(units: readonly TestUnit[], options: RunOptions): Promise<RunSummary> {
    const events = new EventFactory(EVENT_SOURCE);
    const startedAt = this.clock();
    const runStart = this.now();
    const results: TestResult[] = [];
    let interrupted = false;
    let warnedSlowSinks = false;

    this.hub.publish(events.runStarted({
      command: options.command,
      testCount: units.length,
      startedAt: startedAt.toISOString(),
    }));

    for (const unit of units) {
      const gate = await this.awaitBackpressure(options.signal);
      if (gate === 'timeout') {
        const message = `Log sinks are falling behind; starting next unit after waiting ${this.backpressureTimeoutMs}ms`;
        if (warnedSlowSinks) {
          this.logger?.debug(message);
        } else {
          this.logger?.warn(message);
          warnedSlowSinks = true;
        }
      }
      if (options.signal?.aborted) {
        interrupted = true;
        this.logger?.warn(`Run interrupted; ${units.length - results.length} unit(s) not started`);
        break;
      }

      const descriptor = toDescriptor(unit);
      this.hub.publish(events.testStarted(descriptor));

      const result = await this.runUnit(unit, descriptor);
      results.push(result);
      this.hub.publish(events.testFinished(result));
    }

    const summary = computeSummary(results, {
      totalTimeMs: this.now() - runStart,
      startedAt,
      finishedAt: this.clock(),
      interrupted,
    });
    this.lastResults = results;
    this.hub.publish(events.runFinished(summary));
    return summary;
  }

  /**
   * Results of the most recent run, in completion order.
   */
  get results(): readonly TestResult[] {
    return this.lastResults;
  }

  /**
   * Waits for the hub to drop below its high-water marks, giving up when the
   * signal aborts or the time limit passes. Sink queues are unbounded, so
   * starting the next unit after a timeout loses nothing.
   */
  private async awaitBackpressure(signal: AbortSignal | undefined): Promise<GateOutcome> {
    if (signal?.aborted) {
      return 'aborted';
    }

    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;
    const contenders: Promise<GateOutcome>[] = [
      this.hub.whenWritable().then((): GateOutcome => 'writable'),
      new Promise<GateOutcome>(resolve => {
        timer = setTimeout(() => resolve('timeout'), this.backpressureTimeoutMs);
      }),
    ];
    if (signal) {
      contenders.push(new Promise<GateOutcome>(resolve => {
        onAbort = () => resolve('aborted');
        signal.addEventListener('abort', onAbort, { once: true });
      }));
    }

    try {
      return await Promise.race(contenders);
    } finally {
      clearTimeout(timer);
      if (signal && onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }

  private async runUnit(unit: TestUnit, descriptor: TestUnitDescriptor): Promise<TestResult> {
    if (unit.skipReason !== undefined) {
      return { unit: descriptor, status: 'skipped', durationMs: 0, skipReason: unit.skipReason };
    }

    const start = this.now();
    let outcome: NativeOutcome;
    try {
      outcome = await this.framework.run(unit);
    } catch (thrown) {
      outcome = { kind: 'error', error: new ExecutionFault(unit.id, toError(thrown)) };
    }
    const durationMs = this.now() - start;

    switch (outcome.kind) {
      case 'pass':
        return { unit: descriptor, status: 'passed', durationMs };
      case 'skip':
        return { unit: descriptor, status: 'skipped', durationMs, skipReason: outcome.reason };
      case 'fail': {
        const fault = new AssertionMismatch(unit.id, outcome.error);
        this.logger?.debug(fault.message);
        return {
          unit: descriptor,
          status: 'failed',
          durationMs,
          message: firstLine(outcome.error.message),
          trace: formatTrace(outcome.error),
          errorType: outcome.error.name,
        };
      }
      case 'error': {
        const fault = outcome.error instanceof ExecutionFault ? outcome.error : new ExecutionFault(unit.id, outcome.error);
        this.logger?.debug(fault.message);
        return {
          unit: descriptor,
          status: 'errored',
          durationMs,
          message: firstLine(outcome.error.message) || outcome.error.name,
          trace: formatTrace(outcome.error),
          errorType: outcome.error.name,
        };
      }
    }
  }
}
