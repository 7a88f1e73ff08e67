/**
 * Releases a held {@link Mutex}. Calling it more than once has no effect.
 */
export type MutexRelease = () => void;

/**
 * FIFO async mutual exclusion lock.
 *
 * Waiters are resumed in the order they called {@link acquire}; ownership is
 * handed straight to the next waiter on release.
 */
export class Mutex {
  private locked = false;
  private readonly waiting: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  get pending(): number {
    return this.waiting.length;
  }

  async acquire(): Promise<MutexRelease> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise<MutexRelease>((resolve) => {
      this.waiting.push(() => resolve(this.createRelease()));
    });
  }

  /**
   * Run `fn` while holding the lock, releasing it however `fn` settles.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): MutexRelease {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }
}
