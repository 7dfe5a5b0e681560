// ── Keyed Lock ───────────────────────────────────────────────────────────────

export interface KeyedLock {
  release(): void;
}

/**
 * Per-key async mutex. Holders of the same key run one after another in
 * acquisition order; different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<KeyedLock> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseNext: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      releaseNext = resolve;
    });
    const tail = previous.then(() => next);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        releaseNext();
        // Drop the entry once nobody is queued behind us
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      },
    };
  }

  /**
   * Run `fn` while holding the lock for `key`.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const lock = await this.acquire(key);
    try {
      return await fn();
    } finally {
      lock.release();
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
