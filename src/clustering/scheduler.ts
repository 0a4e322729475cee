import type { Axis } from '../search/collections.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';
import { AsyncSemaphore, withTimeout } from '../utils/async.js';
import { errorMessage } from '../errors.js';
import type { ClusterExtractor } from './extractor.js';
import type { ClusterInfo } from './types.js';

export type ExtractionResults = Partial<Record<Axis, ClusterInfo[]>>;

export type ExtractionHandler = (results: ExtractionResults) => void | Promise<void>;

export interface SchedulerOptions {
  // Extractions allowed at once
  concurrency?: number;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * The only way clustering should run. Extractions are bounded in number and
 * each one is raced against a timeout covering the whole run, reads
 * included. The HDBSCAN step itself runs on the extractor's worker pool, so
 * the timer fires on schedule; a run that overruns is abandoned and its
 * worker terminated.
 */
export class ClusteringScheduler {
  private semaphore: AsyncSemaphore;
  private timeoutMs: number;
  private logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private extractor: ClusterExtractor,
    options: SchedulerOptions = {}
  ) {
    this.semaphore = new AsyncSemaphore(options.concurrency ?? 1);
    this.timeoutMs = options.timeoutMs ?? 120000;
    this.logger = (options.logger ?? silentLogger).child({ component: 'scheduler' });
  }

  get running(): boolean {
    return this.timer !== null;
  }

  extract(axis: string): Promise<ClusterInfo[]> {
    return this.submit(`clustering.extract(${axis})`, (signal) => this.extractor.extract(axis, { signal }));
  }

  extractAll(): Promise<ExtractionResults> {
    return this.submit('clustering.extractAll', (signal) => this.extractor.extractAll({ signal }));
  }

  // A plain count; no clustering involved
  countExperiences(axis: string): Promise<number> {
    return this.extractor.countExperiences(axis);
  }

  /** Run `extractAll` every `intervalMs`. A tick still in progress makes the next one skip. */
  start(intervalMs: number, handler: ExtractionHandler): void {
    if (this.timer !== null) {
      this.stopTimer();
    }
    this.timer = setInterval(() => {
      if (this.inFlight !== null) {
        this.logger.debug('scheduler.tick_skipped');
        return;
      }
      this.inFlight = this.tick(handler).finally(() => {
        this.inFlight = null;
      });
    }, intervalMs);
    this.timer.unref();
    this.logger.info('scheduler.started', { intervalMs });
  }

  /** Stop ticking and wait for a tick already in progress. */
  async stop(): Promise<void> {
    this.stopTimer();
    if (this.inFlight !== null) {
      await this.inFlight;
    }
  }

  private stopTimer(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('scheduler.stopped');
    }
  }

  private submit<T>(label: string, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return this.semaphore.run(() => withTimeout({ timeoutMs: this.timeoutMs, label, run: task }));
  }

  // Never rejects: a failed run is logged and the next tick tries again
  private async tick(handler: ExtractionHandler): Promise<void> {
    const startedAt = Date.now();
    try {
      const results = await this.extractAll();
      await handler(results);
      this.logger.info('scheduler.run_complete', {
        axes: Object.keys(results).length,
        durationMs: Date.now() - startedAt,
      });
    } catch (error) {
      this.logger.error('scheduler.run_failed', { error: errorMessage(error), durationMs: Date.now() - startedAt });
    }
  }
}
