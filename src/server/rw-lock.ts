type Mode = 'read' | 'write';

interface Waiter {
  readonly mode: Mode;
  readonly grant: () => void;
}

/**
 * Async reader/writer lock with FIFO fairness: any number of readers run
 * together, a writer runs alone, and a reader queued behind a writer waits
 * for it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  async read<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await operation();
    } finally {
      this.readers -= 1;
      this.drain();
    }
  }

  async write<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await operation();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  /** Number of operations waiting for the lock. */
  get pending(): number {
    return this.queue.length;
  }

  private acquire(mode: Mode): Promise<void> {
    return new Promise(resolve => {
      this.queue.push({ mode, grant: resolve });
      this.drain();
    });
  }

  private drain(): void {
    for (let next = this.queue[0]; next !== undefined; next = this.queue[0]) {
      if (next.mode === 'write') {
        if (this.writing || this.readers > 0) return;
        this.queue.shift();
        this.writing = true;
        next.grant();
        return;
      }
      if (this.writing) return;
      this.queue.shift();
      this.readers += 1;
      next.grant();
    }
  }
}
