/**
 * Read/Write Lock
 * Shared readers, exclusive writer, granted in arrival order
 */

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  /**
   * Resolves once a read lock is held. A reader that arrives while a
   * writer is waiting queues behind that writer.
   */
  acquireRead(): Promise<void> {
    if (!this.writing && this.queue.length === 0) {
      this.readers++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ mode: 'read', grant: resolve });
    });
  }

  releaseRead(): void {
    if (this.readers === 0) {
      throw new Error('releaseRead called without a held read lock');
    }
    this.readers--;
    this.drain();
  }

  acquireWrite(): Promise<void> {
    if (!this.writing && this.readers === 0 && this.queue.length === 0) {
      this.writing = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ mode: 'write', grant: resolve });
    });
  }

  releaseWrite(): void {
    if (!this.writing) {
      throw new Error('releaseWrite called without a held write lock');
    }
    this.writing = false;
    this.drain();
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  get pending(): number {
    return this.queue.length;
  }

  // Grants the head of the queue, and every consecutive reader after it
  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];

      if (next.mode === 'write') {
        if (this.writing || this.readers > 0) {
          return;
        }
        this.queue.shift();
        this.writing = true;
        next.grant();
        return;
      }

      if (this.writing) {
        return;
      }
      this.queue.shift();
      this.readers++;
      next.grant();
    }
  }
}
