interface TimerEntry {
  generation: number;
  handle: NodeJS.Timeout | null;
  /** Time left when last (re)scheduled. */
  remainingMs: number;
  scheduledAt: number;
  callback: () => void;
}

/**
 * Cancelable per-key timers. Arming a key clears its previous handle and bumps
 * its generation in one synchronous step, so a key never has two live timers
 * and a late callback from an older generation is ignored.
 */
export class KeyedDebouncer {
  private readonly entries = new Map<string, TimerEntry>();
  private generation = 0;
  private suspended = false;

  constructor(private readonly now: () => number = () => Date.now()) {}

  arm(key: string, delayMs: number, callback: () => void): number {
    const existing = this.entries.get(key);
    if (existing?.handle) {
      clearTimeout(existing.handle);
    }
    this.generation += 1;
    const entry: TimerEntry = {
      generation: this.generation,
      handle: null,
      remainingMs: delayMs,
      scheduledAt: this.now(),
      callback,
    };
    this.entries.set(key, entry);
    if (!this.suspended) {
      this.schedule(key, entry, delayMs);
    }
    return entry.generation;
  }

  cancel(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    if (entry.handle) {
      clearTimeout(entry.handle);
    }
    this.entries.delete(key);
    return true;
  }

  cancelAll(): void {
    for (const key of [...this.entries.keys()]) {
      this.cancel(key);
    }
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  generationOf(key: string): number | undefined {
    return this.entries.get(key)?.generation;
  }

  get size(): number {
    return this.entries.size;
  }

  get isSuspended(): boolean {
    return this.suspended;
  }

  /** Stop every armed timer, keeping what was left of its delay. */
  suspend(): void {
    if (this.suspended) {
      return;
    }
    this.suspended = true;
    const now = this.now();
    for (const entry of this.entries.values()) {
      if (entry.handle) {
        clearTimeout(entry.handle);
        entry.handle = null;
        entry.remainingMs = Math.max(0, entry.remainingMs - (now - entry.scheduledAt));
      }
    }
  }

  resume(): void {
    if (!this.suspended) {
      return;
    }
    this.suspended = false;
    for (const [key, entry] of this.entries) {
      this.schedule(key, entry, entry.remainingMs);
    }
  }

  private schedule(key: string, entry: TimerEntry, delayMs: number): void {
    const { generation } = entry;
    entry.remainingMs = delayMs;
    entry.scheduledAt = this.now();
    entry.handle = setTimeout(() => this.fire(key, generation), delayMs);
  }

  private fire(key: string, generation: number): void {
    const entry = this.entries.get(key);
    if (!entry || entry.generation !== generation) {
      return;
    }
    this.entries.delete(key);
    entry.callback();
  }
}
