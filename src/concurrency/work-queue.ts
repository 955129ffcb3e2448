/**
 * Unbounded FIFO queue with async consumers.
 *
 * pop() resolves as soon as an item is available. An item pushed while
 * consumers are waiting goes straight to the longest-waiting consumer.
 */

export class WorkQueue<T> {
  private readonly items: T[] = [];
  private readonly consumers: Array<(item: T) => void> = [];

  /** Items queued and not yet taken */
  get size(): number {
    return this.items.length;
  }

  /** Consumers blocked in pop() */
  get waiting(): number {
    return this.consumers.length;
  }

  push(item: T): void {
    const consumer = this.consumers.shift();
    if (consumer) {
      consumer(item);
    } else {
      this.items.push(item);
    }
  }

  pop(): Promise<T> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    return new Promise((resolve) => {
      this.consumers.push(resolve);
    });
  }
}

/**
 * One-shot wake-up signal, re-armed after every notify().
 * Used to wait for "something changed" without polling.
 */
export class Signal {
  private waiters: Array<() => void> = [];

  wait(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }
}
