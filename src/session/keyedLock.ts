// KeyedLock: one holder per key, waiters queue behind it

export class KeyedLock {
  private locks = new Map<string, Promise<void>>();

  /**
   * Acquire the lock for a key. Returns a release function.
   * If the lock is already held, waits for it to release first.
   */
  async acquire(key: string): Promise<() => void> {
    let held = this.locks.get(key);
    while (held) {
      await held;
      held = this.locks.get(key);
    }

    let release: () => void = () => {};
    const promise = new Promise<void>((resolve) => {
      release = () => {
        if (this.locks.get(key) === promise) this.locks.delete(key);
        resolve();
      };
    });

    this.locks.set(key, promise);
    return release;
  }

  /** Run `fn` while holding the key; the lock is released even if it throws. */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}
