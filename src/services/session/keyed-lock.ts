/**
 * FIFO async mutex, plus a keyed variant that holds one mutex per key
 * only while someone is waiting on or holding it.
 */

export class AsyncLock {
  private queue: Array<() => void> = [];
  private locked = false;

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

interface LockEntry {
  lock: AsyncLock;
  users: number;
}

export class KeyedLock {
  private readonly entries = new Map<string, LockEntry>();

  async run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { lock: new AsyncLock(), users: 0 };
      this.entries.set(key, entry);
    }
    entry.users++;

    try {
      return await entry.lock.run(fn);
    } finally {
      entry.users--;
      if (entry.users === 0) {
        this.entries.delete(key);
      }
    }
  }

  /** Keys currently held or awaited */
  activeKeys(): number {
    return this.entries.size;
  }
}
