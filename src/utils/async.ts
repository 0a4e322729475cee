import { TimeoutError } from '../errors.js';

/**
 * Bounded concurrency for async tasks. A finishing task hands its slot
 * straight to the next waiter, so the limit holds even under bursts.
 */
export class AsyncSemaphore {
  private active = 0;
  private queue: Array<() => void> = [];

  constructor(private max: number) {
    if (!Number.isInteger(this.max) || this.max <= 0) {
      this.max = 1;
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active >= this.max) {
      await new Promise<void>((resolve) => this.queue.push(resolve));
    } else {
      this.active += 1;
    }
    try {
      return await task();
    } finally {
      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.active -= 1;
      }
    }
  }

  get running(): number {
    return this.active;
  }

  get waiting(): number {
    return this.queue.length;
  }
}

interface WithTimeoutInput<T> {
  timeoutMs: number;
  label: string;
  // The signal aborts, with the TimeoutError as its reason, once time is up
  run: (signal: AbortSignal) => Promise<T>;
}

/**
 * Race `run` against a timer. On timeout the signal handed to `run` is
 * aborted so the task can drop whatever it holds; its eventual result is
 * ignored.
 */
export async function withTimeout<T>(input: WithTimeoutInput<T>): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    return await Promise.race([
      input.run(controller.signal),
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          const error = new TimeoutError(input.label, input.timeoutMs);
          controller.abort(error);
          reject(error);
        }, input.timeoutMs);
      }),
    ]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
