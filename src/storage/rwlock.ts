export type Release = () => void;

/**
 * Async readers-writer lock.
 *
 * Readers share the lock; a writer waits for active readers to drain and then
 * runs alone. Queued writers block new readers so a steady stream of searches
 * cannot starve an upsert.
 */
export class RWLock {
  private readers = 0;
  private writer = false;
  private readQueue: Array<() => void> = [];
  private writeQueue: Array<() => void> = [];

  async readLock(): Promise<Release> {
    await new Promise<void>((resolve) => {
      const attempt = () => {
        if (!this.writer && this.writeQueue.length === 0) {
          this.readers++;
          resolve();
        } else {
          this.readQueue.push(attempt);
        }
      };
      attempt();
    });

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.readers--;
      if (this.readers === 0) {
        this.writeQueue.shift()?.();
      }
    };
  }

  async writeLock(): Promise<Release> {
    await new Promise<void>((resolve) => {
      const attempt = () => {
        if (!this.writer && this.readers === 0) {
          this.writer = true;
          resolve();
        } else {
          this.writeQueue.push(attempt);
        }
      };
      // Join the queue first so readers arriving later wait behind us
      if (this.writer || this.readers > 0) {
        this.writeQueue.push(attempt);
      } else {
        attempt();
      }
    });

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.writer = false;
      const nextWriter = this.writeQueue.shift();
      if (nextWriter) {
        nextWriter();
        return;
      }
      const waitingReaders = this.readQueue.splice(0);
      for (const next of waitingReaders) next();
    };
  }

  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.readLock();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.writeLock();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get writing(): boolean {
    return this.writer;
  }
}
