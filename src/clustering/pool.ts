import { Worker } from 'worker_threads';
import type { ClusteringConfig } from '../config/index.js';
import { ComputationError, errorMessage } from '../errors.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';
import { AsyncSemaphore } from '../utils/async.js';
import type { ClustererOptions } from './clusterer.js';
import type { ClusterMetric, ClusterResult, HdbscanOptions } from './types.js';
import { parseClusterReply, replyError } from './worker-protocol.js';
import type { ClusterJob, ClusterReply } from './worker-protocol.js';

export interface RunOptions {
  // Aborting terminates the worker running the job
  signal?: AbortSignal;
}

/** Somewhere to run HDBSCAN that is not the caller's event loop. */
export interface ClusterRunner {
  cluster(vectors: Float32Array[], metric: ClusterMetric, options?: RunOptions): Promise<ClusterResult>;
  close(): Promise<void>;
}

export type WorkerFactory = () => Worker;

// Resolves next to the compiled pool module
export const defaultWorkerFactory: WorkerFactory = () =>
  new Worker(new URL('./cluster-worker.js', import.meta.url));

export interface ClusterPoolOptions extends ClustererOptions {
  // Workers alive at once
  size?: number;
  spawn?: WorkerFactory;
  logger?: Logger;
}

export function clusterPoolOptions(config: ClusteringConfig): ClusterPoolOptions {
  return {
    minClusterSize: config.minClusterSize,
    minSamples: config.minSamples,
    selectionMethod: config.selectionMethod,
    size: config.concurrency,
  };
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new ComputationError('Clustering was aborted');
}

/**
 * A bounded set of worker threads that run HDBSCAN. Workers are spawned on
 * demand, reused while healthy, and terminated when a job is aborted or the
 * worker misbehaves. Idle workers do not keep the process alive.
 */
export class ClusterWorkerPool implements ClusterRunner {
  private semaphore: AsyncSemaphore;
  private hdbscan: HdbscanOptions;
  private spawnWorker: WorkerFactory;
  private logger: Logger;
  private workers = new Set<Worker>();
  private idle: Worker[] = [];
  private terminating: Promise<void>[] = [];
  private nextJobId = 1;
  private closed = false;

  constructor(options: ClusterPoolOptions = {}) {
    this.semaphore = new AsyncSemaphore(options.size ?? 1);
    this.hdbscan = {
      minClusterSize: options.minClusterSize ?? 5,
      minSamples: options.minSamples ?? 3,
      selectionMethod: options.selectionMethod ?? 'eom',
    };
    this.spawnWorker = options.spawn ?? defaultWorkerFactory;
    this.logger = (options.logger ?? silentLogger).child({ component: 'cluster_pool' });
  }

  get workerCount(): number {
    return this.workers.size;
  }

  get busy(): number {
    return this.semaphore.running;
  }

  cluster(vectors: Float32Array[], metric: ClusterMetric, options: RunOptions = {}): Promise<ClusterResult> {
    if (this.closed) {
      return Promise.reject(new ComputationError('Clustering pool is closed'));
    }
    const job: ClusterJob = { id: this.nextJobId++, vectors, metric, options: this.hdbscan };
    return this.semaphore.run(() => this.dispatch(job, options.signal));
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const worker of Array.from(this.workers)) {
      this.discard(worker);
    }
    await Promise.all(this.terminating);
    this.terminating = [];
  }

  private dispatch(job: ClusterJob, signal: AbortSignal | undefined): Promise<ClusterResult> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    const worker = this.idle.pop() ?? this.spawn();
    worker.ref();

    return new Promise<ClusterResult>((resolve, reject) => {
      const settle = (healthy: boolean, outcome: () => void): void => {
        worker.off('message', onMessage);
        worker.off('error', onError);
        worker.off('exit', onExit);
        signal?.removeEventListener('abort', onAbort);
        if (healthy && !this.closed) {
          worker.unref();
          this.idle.push(worker);
        } else {
          this.discard(worker);
        }
        outcome();
      };

      const onMessage = (message: unknown): void => {
        let reply: ClusterReply;
        try {
          reply = parseClusterReply(message);
        } catch (error) {
          settle(false, () => reject(error));
          return;
        }
        if (reply.id !== job.id) {
          const answered = reply.id;
          settle(false, () => reject(new ComputationError(`Clustering worker answered job ${answered}, expected ${job.id}`)));
          return;
        }
        if (reply.type === 'result') {
          const { result } = reply;
          settle(true, () => resolve(result));
        } else {
          const error = replyError(reply);
          settle(true, () => reject(error));
        }
      };
      const onError = (error: Error): void => {
        settle(false, () => reject(new ComputationError(`Clustering worker failed: ${error.message}`, { cause: error })));
      };
      const onExit = (code: number): void => {
        settle(false, () => reject(new ComputationError(`Clustering worker exited with code ${code}`)));
      };
      const onAbort = (): void => {
        this.logger.warn('clustering.job_abandoned', { jobId: job.id, points: job.vectors.length });
        settle(false, () => reject(abortReason(signal)));
      };

      worker.on('message', onMessage);
      worker.on('error', onError);
      worker.on('exit', onExit);
      signal?.addEventListener('abort', onAbort, { once: true });
      worker.postMessage(job);
    });
  }

  private spawn(): Worker {
    const worker = this.spawnWorker();
    this.workers.add(worker);
    // Keeps an idle worker's crash from surfacing as an unhandled 'error'
    worker.on('error', (error: Error) => {
      this.logger.warn('clustering.worker_error', { error: error.message });
    });
    worker.on('exit', () => {
      this.forget(worker);
    });
    this.logger.debug('clustering.worker_spawned', { workers: this.workers.size });
    return worker;
  }

  private forget(worker: Worker): void {
    this.workers.delete(worker);
    this.idle = this.idle.filter((w) => w !== worker);
  }

  private discard(worker: Worker): void {
    this.forget(worker);
    this.terminating.push(
      worker.terminate().then(
        () => undefined,
        (error: unknown) => {
          this.logger.warn('clustering.terminate_failed', { error: errorMessage(error) });
        }
      )
    );
  }
}
