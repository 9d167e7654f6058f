import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BackgroundFileWriter } from './background_file_writer';
import type { OpenFile, WritableHandle } from './background_file_writer';
import { TextFileFormatter } from './formatters';
import { EventFactory } from '../event_bus';
import type { ExecutionEvent } from '../event_bus';
import type { Logger } from '../logger';
import { createDescriptor, createSummary } from '../__fixtures__/units';

const T0 = Date.UTC(2024, 2, 1, 10, 0, 0);

function runEvents(runId: string, names: string[]): ExecutionEvent[] {
  const factory = new EventFactory('test', runId, () => T0);
  const events: ExecutionEvent[] = [
    factory.runStarted({ command: 'sieve', testCount: names.length, startedAt: '2024-03-01T10:00:00.000Z' }),
  ];
  for (const name of names) {
    const unit = createDescriptor(name);
    events.push(factory.testStarted(unit));
    events.push(factory.testFinished({ unit, status: 'passed', durationMs: 12 }));
  }
  events.push(factory.runFinished(createSummary({ testsRun: names.length, passed: names.length, totalTimeMs: 12 })));
  return events;
}

function createMockLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

/**
 * Handle whose writes wait until released.
 */
function gatedHandle() {
  const writes: string[] = [];
  let release: () => void = () => undefined;
  const gate = new Promise<void>(resolve => {
    release = resolve;
  });
  const handle: WritableHandle & { closed: boolean } = {
    closed: false,
    appendFile: async (data: string) => {
      await gate;
      writes.push(data);
    },
    sync: async () => undefined,
    close: async () => {
      handle.closed = true;
    },
  };
  return { handle, writes, release: () => release() };
}

describe('BackgroundFileWriter', () => {
  let tempDir: string;
  let logger: jest.Mocked<Logger>;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sieve-writer-'));
    logger = createMockLogger();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function createWriter(filePath: string, mode: 'append' | 'overwrite' = 'overwrite', openFile?: OpenFile) {
    return new BackgroundFileWriter({
      filePath,
      mode,
      formatter: new TextFileFormatter(1),
      logger,
      ...(openFile && { openFile }),
    });
  }

  it('should write every event in order and close the file', async () => {
    const filePath = path.join(tempDir, 'run.txt');
    const writer = createWriter(filePath);

    runEvents('run:one', ['adds']).forEach(event => writer.enqueue(event));
    const report = await writer.close(5000);

    expect(report).toEqual({ completed: true, written: 4, abandoned: 0 });
    expect(fs.readFileSync(filePath, 'utf8')).toBe([
      '[2024-03-01T10:00:00.000Z] === Run run:one started: sieve (1 tests) ===',
      '[2024-03-01T10:00:00.000Z] START tests/test_sample.test.js::adds',
      '[2024-03-01T10:00:00.000Z] PASS tests/test_sample.test.js::adds',
      '[2024-03-01T10:00:00.000Z] === Run run:one finished ===',
      '-'.repeat(70),
      'Ran 1 test in 0.012s',
      'Passed: 1  Failed: 0  Errors: 0  Skipped: 0',
      'Success rate: 100.0%',
      '',
    ].join('\n'));
  });

  it('should keep only the second run in overwrite mode', async () => {
    const filePath = path.join(tempDir, 'run.txt');

    for (const runId of ['run:first', 'run:second']) {
      const writer = createWriter(filePath, 'overwrite');
      runEvents(runId, ['adds']).forEach(event => writer.enqueue(event));
      await writer.close(5000);
    }

    const content = fs.readFileSync(filePath, 'utf8');
    expect(content).not.toContain('run:first');
    expect(content.match(/=== Run run:second started/g)).toHaveLength(1);
  });

  it('should concatenate runs in append mode', async () => {
    const filePath = path.join(tempDir, 'run.txt');

    for (const runId of ['run:first', 'run:second']) {
      const writer = createWriter(filePath, 'append');
      runEvents(runId, ['adds']).forEach(event => writer.enqueue(event));
      await writer.close(5000);
    }

    const content = fs.readFileSync(filePath, 'utf8');
    const first = content.indexOf('=== Run run:first started');
    const second = content.indexOf('=== Run run:second started');
    expect(first).toBe(27);
    expect(second).toBeGreaterThan(content.indexOf('=== Run run:first finished'));
  });

  it('should create an empty file when nothing was queued', async () => {
    const filePath = path.join(tempDir, 'empty.txt');
    const writer = createWriter(filePath);

    const report = await writer.close(5000);

    expect(report).toEqual({ completed: true, written: 0, abandoned: 0 });
    expect(fs.readFileSync(filePath, 'utf8')).toBe('');
  });

  it('should persist exactly one entry per event for 10,000 queued jobs', async () => {
    const filePath = path.join(tempDir, 'many.txt');
    const writer = createWriter(filePath);
    const factory = new EventFactory('test', 'run:many', () => T0);
    const unit = createDescriptor('adds');

    for (let i = 0; i < 10_000; i++) {
      writer.enqueue(factory.testStarted(unit));
    }
    expect(writer.pending).toBe(10_000);
    const report = await writer.close(30_000);

    const lines = fs.readFileSync(filePath, 'utf8').split('\n').filter(line => line !== '');
    expect(report).toEqual({ completed: true, written: 10_000, abandoned: 0 });
    expect(lines).toHaveLength(10_000);
    expect(new Set(lines).size).toBe(1);
  }, 30_000);

  it('should report an open failure once and discard later jobs', async () => {
    const filePath = path.join(tempDir, 'missing', 'run.txt');
    const writer = createWriter(filePath);

    runEvents('run:x', ['a', 'b']).forEach(event => writer.enqueue(event));
    const report = await writer.close(5000);

    expect(report).toEqual({ completed: false, written: 0, abandoned: 6 });
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0]?.[0]).toMatch(/^Could not write .*run\.txt: ENOENT/);
    expect(writer.fault?.code).toBe('WRITER_IO_FAULT');
  });

  it('should stop after the first failed write and still close the handle', async () => {
    let closed = false;
    const appendFile = jest.fn().mockRejectedValue(new Error('ENOSPC: no space left on device'));
    const writer = createWriter('/virtual/run.txt', 'overwrite', async () => ({
      appendFile,
      sync: async () => undefined,
      close: async () => {
        closed = true;
      },
    }));

    const events = runEvents('run:x', ['a']);
    writer.enqueue(events[0]);
    await new Promise(resolve => setImmediate(resolve));
    events.slice(1).forEach(event => writer.enqueue(event));
    const report = await writer.close(5000);

    expect(appendFile).toHaveBeenCalledTimes(1);
    expect(report).toEqual({ completed: false, written: 0, abandoned: 4 });
    expect(logger.error).toHaveBeenCalledWith('Could not write /virtual/run.txt: ENOSPC: no space left on device');
    expect(closed).toBe(true);
  });

  it('should abandon the queued jobs and the batch in flight when shutdown times out', async () => {
    const handle = gatedHandle();
    const writer = createWriter('/virtual/run.txt', 'overwrite', async () => handle.handle);
    const events = runEvents('run:slow', ['a']);

    writer.enqueue(events[0]);
    await new Promise(resolve => setImmediate(resolve));
    events.slice(1).forEach(event => writer.enqueue(event));

    const report = await writer.close(20);

    expect(report).toEqual({ completed: false, written: 0, abandoned: 4 });
    expect(logger.warn).toHaveBeenCalledWith(
      'Log file writer did not finish within 20ms; abandoned 4 pending entries for /virtual/run.txt'
    );

    handle.release();
    await new Promise(resolve => setTimeout(resolve, 10));
    expect(handle.handle.closed).toBe(true);
    expect(handle.writes).toHaveLength(1);
  });

  it('should account for every enqueued job when a write never settles', async () => {
    const appendFile = jest.fn(() => new Promise<void>(() => undefined));
    const writer = createWriter('/virtual/run.txt', 'overwrite', async () => ({
      appendFile,
      sync: async () => undefined,
      close: async () => undefined,
    }));
    const factory = new EventFactory('test', 'run:stuck', () => T0);
    const unit = createDescriptor('adds');

    writer.enqueue(factory.testStarted(unit));
    await new Promise(resolve => setImmediate(resolve));
    for (let i = 0; i < 19; i++) {
      writer.enqueue(factory.testStarted(unit));
    }

    const report = await writer.close(50);

    expect(appendFile).toHaveBeenCalledTimes(1);
    expect(report).toEqual({ completed: false, written: 0, abandoned: 20 });
    expect(report.written + report.abandoned).toBe(20);
    expect(writer.pending).toBe(0);
  });

  it('should signal backpressure above the high-water mark', async () => {
    const handle = gatedHandle();
    const writer = new BackgroundFileWriter({
      filePath: '/virtual/run.txt',
      mode: 'overwrite',
      formatter: new TextFileFormatter(1),
      highWaterMark: 2,
      logger,
      openFile: async () => handle.handle,
    });
    const events = runEvents('run:bp', ['a', 'b']);

    writer.enqueue(events[0]);
    await new Promise(resolve => setImmediate(resolve));
    events.slice(1, 4).forEach(event => writer.enqueue(event));

    let writable = false;
    const gate = writer.whenWritable().then(() => {
      writable = true;
    });
    await Promise.resolve();
    expect(writable).toBe(false);

    handle.release();
    await gate;
    expect(writable).toBe(true);
    await writer.close(5000);
  });

  it('should return the same report when closed twice', async () => {
    const writer = createWriter(path.join(tempDir, 'twice.txt'));

    const first = writer.close(5000);
    const second = writer.close(5000);

    expect(second).toBe(first);
    await first;
    expect(() => writer.enqueue(runEvents('run:late', [])[0])).toThrow('Cannot push to a closed queue');
  });
});
