import { describe, it, expect, afterEach, vi } from 'vitest';
import { TimeoutError } from '../../src/errors.js';
import { ClusterExtractor } from '../../src/clustering/extractor.js';
import type { ExtractOptions } from '../../src/clustering/extractor.js';
import { ClusteringScheduler } from '../../src/clustering/scheduler.js';
import type { ExtractionResults } from '../../src/clustering/scheduler.js';
import type { ClusterInfo } from '../../src/clustering/types.js';
import { InMemoryVectorStore } from '../../src/storage/memory.js';
import { InlineClusterRunner } from '../helpers/cluster-runner.js';
import { captureLogger, events } from '../helpers/logger.js';
import type { LogEntry } from '../helpers/logger.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

class StubExtractor extends ClusterExtractor {
  calls: string[] = [];
  active = 0;
  peak = 0;
  gate: Promise<void> = Promise.resolve();
  results: ExtractionResults = {};
  failure: Error | null = null;
  signals: Array<AbortSignal | undefined> = [];

  constructor() {
    super(new InMemoryVectorStore(), new InlineClusterRunner());
  }

  async extract(axis: string, options: ExtractOptions = {}): Promise<ClusterInfo[]> {
    this.calls.push(axis);
    this.signals.push(options.signal);
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      await this.gate;
      return [];
    } finally {
      this.active--;
    }
  }

  async extractAll(options: ExtractOptions = {}): Promise<ExtractionResults> {
    this.calls.push('all');
    this.signals.push(options.signal);
    await this.gate;
    if (this.failure) throw this.failure;
    return this.results;
  }
}

describe('ClusteringScheduler', () => {
  let entries: LogEntry[] = [];

  afterEach(() => {
    vi.useRealTimers();
    entries = [];
  });

  it('runs extractions one at a time by default', async () => {
    const stub = new StubExtractor();
    const gate = deferred();
    stub.gate = gate.promise;
    const scheduler = new ClusteringScheduler(stub);

    const first = scheduler.extract('full');
    const second = scheduler.extract('strategy');
    await Promise.resolve();
    expect(stub.calls).toEqual(['full']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(stub.calls).toEqual(['full', 'strategy']);
    expect(stub.peak).toBe(1);
  });

  it('allows more at once with a higher concurrency', async () => {
    const stub = new StubExtractor();
    const gate = deferred();
    stub.gate = gate.promise;
    const scheduler = new ClusteringScheduler(stub, { concurrency: 2 });

    const running = [scheduler.extract('full'), scheduler.extract('surprise')];
    await Promise.resolve();
    expect(stub.peak).toBe(2);

    gate.resolve();
    await Promise.all(running);
  });

  it('times out a slow extraction', async () => {
    const stub = new StubExtractor();
    stub.gate = new Promise<void>(() => {});
    const scheduler = new ClusteringScheduler(stub, { timeoutMs: 20 });

    await expect(scheduler.extract('full')).rejects.toThrow(
      new TimeoutError('clustering.extract(full)', 20)
    );
  });

  it('aborts the extraction it gave up on', async () => {
    const stub = new StubExtractor();
    stub.gate = new Promise<void>(() => {});
    const scheduler = new ClusteringScheduler(stub, { timeoutMs: 20 });

    const error = await scheduler.extract('full').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    const signal = stub.signals[0];
    expect(signal?.aborted).toBe(true);
    expect(signal?.reason).toBe(error);
  });

  it('frees the slot of a timed-out extraction for the next one', async () => {
    const stub = new StubExtractor();
    stub.gate = new Promise<void>(() => {});
    const scheduler = new ClusteringScheduler(stub, { timeoutMs: 20 });

    const first = scheduler.extract('full');
    const second = scheduler.extract('strategy');
    await expect(first).rejects.toBeInstanceOf(TimeoutError);
    await expect(second).rejects.toBeInstanceOf(TimeoutError);
    expect(stub.calls).toEqual(['full', 'strategy']);
  });

  it('runs extractAll on an interval and hands over the results', async () => {
    vi.useFakeTimers();
    const stub = new StubExtractor();
    stub.results = { full: [] };
    const handler = vi.fn();
    const scheduler = new ClusteringScheduler(stub, { logger: captureLogger(entries) });

    scheduler.start(1000, handler);
    expect(scheduler.running).toBe(true);
    await vi.advanceTimersByTimeAsync(1000);
    await scheduler.stop();

    expect(scheduler.running).toBe(false);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ full: [] });
    expect(events(entries, 'info')).toEqual(expect.arrayContaining([
      'scheduler.started',
      'scheduler.run_complete',
      'scheduler.stopped',
    ]));
  });

  it('logs a failed run instead of rejecting', async () => {
    vi.useFakeTimers();
    const stub = new StubExtractor();
    stub.failure = new Error('store offline');
    const handler = vi.fn();
    const scheduler = new ClusteringScheduler(stub, { logger: captureLogger(entries) });

    scheduler.start(1000, handler);
    await vi.advanceTimersByTimeAsync(1000);
    await expect(scheduler.stop()).resolves.toBeUndefined();

    expect(handler).not.toHaveBeenCalled();
    const failure = entries.find((e) => e.event === 'scheduler.run_failed');
    expect(failure?.level).toBe('error');
    expect(failure?.context.error).toBe('store offline');
  });

  it('skips a tick while the previous run is still going', async () => {
    vi.useFakeTimers();
    const stub = new StubExtractor();
    const gate = deferred();
    stub.gate = gate.promise;
    const handler = vi.fn();
    const scheduler = new ClusteringScheduler(stub, { logger: captureLogger(entries) });

    scheduler.start(1000, handler);
    await vi.advanceTimersByTimeAsync(2000);
    expect(stub.calls).toEqual(['all']);
    expect(events(entries, 'debug')).toEqual(['scheduler.tick_skipped']);

    const stopped = scheduler.stop();
    gate.resolve();
    await stopped;
    expect(handler).toHaveBeenCalledTimes(1);
  });
});
