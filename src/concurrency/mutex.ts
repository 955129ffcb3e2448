/**
 * FIFO async mutex.
 *
 * Waiters are served in the order they called acquire(). Releasing hands
 * the lock directly to the next waiter, so no third party can barge in
 * between.
 */

export type Release = () => void;

export class Mutex {
  private locked = false;
  private readonly waiters: Array<(release: Release) => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock */
  get pending(): number {
    return this.waiters.length;
  }

  acquire(): Promise<Release> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.makeRelease());
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Run `fn` while holding the lock; the lock is released however `fn` exits.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private makeRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next(this.makeRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
