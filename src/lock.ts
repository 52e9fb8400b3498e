type Waiter = { exclusive: boolean; grant: () => void };

/**
 * Async readers-writer lock. Readers share the lock while no writer holds it;
 * a queued writer blocks readers that arrive after it, so ingestion is not
 * starved by a steady stream of queries.
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private queue: Waiter[] = [];

  get activeReaders(): number {
    return this.readers;
  }

  get writeLocked(): boolean {
    return this.writer;
  }

  private acquire(exclusive: boolean): Promise<() => void> {
    return new Promise((resolve) => {
      this.queue.push({
        exclusive,
        grant: () => resolve(this.releaser(exclusive))
      });
      this.drain();
    });
  }

  private releaser(exclusive: boolean): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      if (exclusive) {
        this.writer = false;
      } else {
        this.readers -= 1;
      }
      this.drain();
    };
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!next) {
        return;
      }
      if (next.exclusive) {
        if (this.writer || this.readers > 0) {
          return;
        }
        this.queue.shift();
        this.writer = true;
        next.grant();
        return;
      }
      if (this.writer) {
        return;
      }
      this.queue.shift();
      this.readers += 1;
      next.grant();
    }
  }

  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(false);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(true);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
