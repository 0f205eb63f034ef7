/**
 * Promise-chained mutual exclusion. Callers queue in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.pending++;
    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  get isLocked(): boolean {
    return this.pending > 0;
  }
}

/** One Mutex per key (symbol, position id). */
export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }
    return lock.runExclusive(fn);
  }
}
