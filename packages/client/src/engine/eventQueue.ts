/**
 * Bounded FIFO with a wake signal. Consumers check for items and call
 * `wait()` in the same tick, so a push between the check and the wait cannot
 * be missed.
 */
export class EventQueue<T> {
  private items: T[] = [];
  private waiters: Array<() => void> = [];

  constructor(
    private readonly capacity: number,
    private readonly onOverflow?: (dropped: T) => void,
  ) {}

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    if (this.items.length >= this.capacity) {
      const dropped = this.items.shift();
      if (dropped !== undefined) {
        this.onOverflow?.(dropped);
      }
    }
    this.items.push(item);
    this.wake();
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  drain(): T[] {
    const items = this.items;
    this.items = [];
    return items;
  }

  wait(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Resolve every pending `wait()`. */
  wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
