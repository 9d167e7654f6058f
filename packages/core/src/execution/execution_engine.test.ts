import * as assert from 'assert';
import { ExecutionEngine } from './execution_engine';
import { ExecutionFault } from './errors';
import { EventHub } from '../event_bus';
import type { ExecutionEvent, Sink } from '../event_bus';
import { MemoryTestFramework, skip } from '../test_framework';
import type { ITestFramework } from '../test_framework';
import type { TestUnit } from '../test_registry';
import { createUnit } from '../__fixtures__/units';

class RecordingSink implements Sink {
  readonly events: ExecutionEvent[] = [];

  constructor(readonly name: string) { }

  handle(event: ExecutionEvent): void {
    this.events.push(event);
  }
}

class ThrowingSink implements Sink {
  readonly name = 'throwing';

  handle(): void {
    throw new Error('sink exploded');
  }
}

/** Reports backpressure that never clears */
class StalledSink implements Sink {
  readonly name = 'stalled';

  handle(): void { }

  whenWritable(): Promise<void> {
    return new Promise<void>(() => undefined);
  }
}

function silentLogger() {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function tickingClock(step = 5): () => number {
  let current = 0;
  return () => {
    current += step;
    return current;
  };
}

function finishedEvents(events: ExecutionEvent[]) {
  return events.flatMap(event => (event.type === 'test.finished' ? [event] : []));
}

describe('ExecutionEngine', () => {
  let hub: EventHub;
  let sink: RecordingSink;
  let framework: MemoryTestFramework;
  let engine: ExecutionEngine;

  beforeEach(() => {
    hub = new EventHub();
    sink = new RecordingSink('recording');
    hub.register(sink);
    framework = new MemoryTestFramework({ sources: {} });
    engine = new ExecutionEngine({
      framework,
      hub,
      now: tickingClock(),
      clock: () => new Date('2024-03-01T10:00:00.000Z'),
    });
  });

  it('should emit run.started, a started/finished pair per unit, then run.finished', async () => {
    const units = [createUnit('one'), createUnit('two')];

    await engine.run(units, { command: 'sieve tests' });

    expect(sink.events.map(event => event.type)).toEqual([
      'run.started',
      'test.started',
      'test.finished',
      'test.started',
      'test.finished',
      'run.finished',
    ]);
    expect(sink.events.map(event => event.metadata.sequenceNumber)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(sink.events[0]?.payload).toEqual({
      command: 'sieve tests',
      testCount: 2,
      startedAt: '2024-03-01T10:00:00.000Z',
    });
  });

  it('should run units one at a time in the given order', async () => {
    const trace: string[] = [];
    const slowUnit = createUnit('slow', {
      run: async () => {
        trace.push('slow:start');
        await new Promise(resolve => setTimeout(resolve, 5));
        trace.push('slow:end');
      },
    });
    const fastUnit = createUnit('fast', { run: () => { trace.push('fast'); } });

    await engine.run([slowUnit, fastUnit], { command: 'sieve' });

    expect(trace).toEqual(['slow:start', 'slow:end', 'fast']);
    expect(framework.executed).toEqual([slowUnit.id, fastUnit.id]);
  });

  it('should tell failures apart from errors and keep going', async () => {
    const units = [
      createUnit('asserts', { run: () => assert.strictEqual(1 + 1, 3) }),
      createUnit('crashes', {
        run: () => {
          throw new TypeError("Cannot read properties of undefined (reading 'id')");
        },
      }),
      createUnit('passes'),
    ];

    const summary = await engine.run(units, { command: 'sieve' });
    const [failed, errored, passed] = finishedEvents(sink.events).map(event => event.payload);

    assert.ok(failed && errored && passed);
    expect(failed.status).toBe('failed');
    expect(failed.message).toContain('Expected values to be strictly equal');
    expect(failed.errorType).toBe('AssertionError');
    expect(errored.status).toBe('errored');
    expect(errored.message).toBe("Cannot read properties of undefined (reading 'id')");
    expect(errored.errorType).toBe('TypeError');
    expect(errored.trace).toContain('TypeError: Cannot read properties of undefined');
    expect(passed.status).toBe('passed');
    expect(summary).toMatchObject({ testsRun: 3, passed: 1, failed: 1, errored: 1, skipped: 0 });
  });

  it('should report declared skips without running them', async () => {
    const run = jest.fn();
    const units = [createUnit('later', { skipReason: 'waiting on fixtures', run })];

    const summary = await engine.run(units, { command: 'sieve' });

    expect(run).not.toHaveBeenCalled();
    expect(framework.executed).toEqual([]);
    expect(finishedEvents(sink.events)[0]?.payload).toMatchObject({
      status: 'skipped',
      skipReason: 'waiting on fixtures',
      durationMs: 0,
    });
    expect(summary.successRate).toBe(100);
  });

  it('should report runtime skips', async () => {
    const units = [createUnit('needs network', { run: () => skip('offline') })];

    const summary = await engine.run(units, { command: 'sieve' });

    expect(finishedEvents(sink.events)[0]?.payload).toMatchObject({ status: 'skipped', skipReason: 'offline' });
    expect(summary.skipped).toBe(1);
  });

  it('should mark a unit errored when the framework itself throws', async () => {
    const broken: ITestFramework = {
      discover: async () => [],
      run: async () => {
        throw new Error('runner crashed');
      },
    };
    const brokenEngine = new ExecutionEngine({ framework: broken, hub, now: tickingClock() });

    const summary = await brokenEngine.run([createUnit('victim'), createUnit('next')], { command: 'sieve' });
    const finished = finishedEvents(sink.events);

    expect(finished.map(event => event.payload.status)).toEqual(['errored', 'errored']);
    expect(finished[0]?.payload.errorType).toBe(new ExecutionFault('x', new Error('y')).name);
    expect(finished[0]?.payload.message).toBe('Unexpected fault in tests/test_sample.test.js::victim: runner crashed');
    expect(summary.errored).toBe(2);
  });

  it('should measure each unit with the monotonic clock', async () => {
    await engine.run([createUnit('one')], { command: 'sieve' });

    // runStart=5, unit start=10, unit end=15, run end=20
    expect(finishedEvents(sink.events)[0]?.payload.durationMs).toBe(5);
    const last = sink.events[sink.events.length - 1];
    assert.ok(last?.type === 'run.finished');
    expect(last.payload.summary.totalTimeMs).toBe(15);
  });

  it('should stop starting units once aborted and report a partial summary', async () => {
    const controller = new AbortController();
    const units: TestUnit[] = [
      createUnit('first'),
      createUnit('second', { run: () => controller.abort() }),
      createUnit('third'),
      createUnit('fourth'),
    ];

    const summary = await engine.run(units, { command: 'sieve', signal: controller.signal });

    expect(framework.executed).toEqual([units[0]?.id, units[1]?.id]);
    expect(summary).toMatchObject({ testsRun: 2, passed: 2, interrupted: true });
    expect(sink.events[sink.events.length - 1]?.type).toBe('run.finished');
  });

  it('should wait on the hub before starting each unit', async () => {
    const order: string[] = [];
    hub.register({
      name: 'gated',
      handle: () => undefined,
      whenWritable: async () => {
        order.push('gate');
      },
    });
    const units = [
      createUnit('a', { run: () => { order.push('a'); } }),
      createUnit('b', { run: () => { order.push('b'); } }),
    ];

    await engine.run(units, { command: 'sieve' });

    expect(order).toEqual(['gate', 'a', 'gate', 'b']);
  });

  it('should keep the counts consistent', async () => {
    const units = [
      createUnit('p1'),
      createUnit('p2'),
      createUnit('f', { run: () => assert.fail('nope') }),
      createUnit('e', { run: () => Promise.reject(new RangeError('bad index')) }),
      createUnit('s', { skipReason: 'later' }),
    ];

    const summary = await engine.run(units, { command: 'sieve' });

    expect(summary.passed + summary.failed + summary.errored + summary.skipped).toBe(summary.testsRun);
    expect(summary.successRate).toBe(50);
    expect(engine.results.map(result => result.status)).toEqual(['passed', 'passed', 'failed', 'errored', 'skipped']);
  });

  it('should emit a summary for an empty run', async () => {
    const summary = await engine.run([], { command: 'sieve' });

    expect(sink.events.map(event => event.type)).toEqual(['run.started', 'run.finished']);
    expect(summary).toMatchObject({ testsRun: 0, successRate: 100, interrupted: false });
  });

  it('should stop waiting on a stalled sink when the run is aborted', async () => {
    const logger = silentLogger();
    hub.register(new StalledSink());
    const stalledEngine = new ExecutionEngine({
      framework,
      hub,
      logger,
      now: tickingClock(),
      backpressureTimeoutMs: 60_000,
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const summary = await stalledEngine.run(
      [createUnit('a'), createUnit('b'), createUnit('c')],
      { command: 'sieve', signal: controller.signal },
    );

    expect(framework.executed).toEqual([]);
    expect(summary).toMatchObject({ testsRun: 0, interrupted: true });
    expect(logger.warn).toHaveBeenCalledWith('Run interrupted; 3 unit(s) not started');
    expect(sink.events[sink.events.length - 1]?.type).toBe('run.finished');
  });

  it('should start the next unit once the backpressure wait times out', async () => {
    const logger = silentLogger();
    hub.register(new StalledSink());
    const stalledEngine = new ExecutionEngine({
      framework,
      hub,
      logger,
      now: tickingClock(),
      backpressureTimeoutMs: 10,
    });
    const units = [createUnit('a'), createUnit('b'), createUnit('c')];
    const message = 'Log sinks are falling behind; starting next unit after waiting 10ms';

    const summary = await stalledEngine.run(units, { command: 'sieve' });

    expect(framework.executed).toEqual(units.map(unit => unit.id));
    expect(summary).toMatchObject({ testsRun: 3, passed: 3, interrupted: false });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(message);
    expect(logger.debug.mock.calls.filter(call => call[0] === message)).toHaveLength(2);
  });

  it('should produce the same run whether or not an earlier sink throws', async () => {
    const units = () => [
      createUnit('passes'),
      createUnit('fails', { run: () => assert.fail('nope') }),
      createUnit('later', { skipReason: 'not yet' }),
    ];
    const runWith = async (sinks: Sink[]) => {
      const isolatedHub = new EventHub({ logger: silentLogger() });
      for (const each of sinks) {
        isolatedHub.register(each);
      }
      const isolatedEngine = new ExecutionEngine({
        framework: new MemoryTestFramework({ sources: {} }),
        hub: isolatedHub,
        now: tickingClock(),
        clock: () => new Date('2024-03-01T10:00:00.000Z'),
      });
      return isolatedEngine.run(units(), { command: 'sieve' });
    };

    const baseline = new RecordingSink('baseline');
    const behindThrower = new RecordingSink('behind-thrower');
    const expected = await runWith([baseline]);
    const actual = await runWith([new ThrowingSink(), behindThrower]);

    expect(actual).toEqual(expected);
    expect(behindThrower.events).toHaveLength(8);
    expect(behindThrower.events.map(event => event.type)).toEqual(baseline.events.map(event => event.type));
  });
});
