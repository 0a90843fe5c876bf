import type { CounterStore, StoreOperation } from "./store.js";
import { StoreUnavailableError } from "../errors.js";

interface CounterRecord {
  count: number;
  windowExpiry: number;
}

export interface InMemoryCounterStoreOptions {
  /** Clock in epoch milliseconds. Default: Date.now */
  now?: () => number;
  /** When set, expired records are swept on this interval. */
  sweepIntervalMs?: number;
}

export class InMemoryCounterStore implements CounterStore {
  private counters = new Map<string, CounterRecord>();
  private blocks = new Map<string, number>();
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private closed = false;

  constructor(options: InMemoryCounterStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    if (options.sweepIntervalMs !== undefined && options.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), options.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  // No await between the read and the write below: the whole update runs
  // before any other caller gets the event loop.
  async increment(key: string, windowMs: number): Promise<number> {
    this.assertOpen("increment");
    const now = this.now();
    const record = this.counters.get(key);
    if (!record || record.windowExpiry <= now) {
      this.counters.set(key, { count: 1, windowExpiry: now + windowMs });
      return 1;
    }
    record.count += 1;
    return record.count;
  }

  async isBlocked(key: string): Promise<boolean> {
    this.assertOpen("isBlocked");
    const blockedUntil = this.blocks.get(key);
    if (blockedUntil === undefined) return false;
    if (blockedUntil <= this.now()) {
      this.blocks.delete(key);
      return false;
    }
    return true;
  }

  async block(key: string, blockMs: number): Promise<void> {
    this.assertOpen("block");
    if (blockMs <= 0) {
      this.blocks.delete(key);
      return;
    }
    this.blocks.set(key, this.now() + blockMs);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.counters.clear();
    this.blocks.clear();
  }

  /** Current count for `key`, or 0 when no live window exists. */
  peekCount(key: string): number {
    const record = this.counters.get(key);
    if (!record || record.windowExpiry <= this.now()) return 0;
    return record.count;
  }

  /** Removes expired counters and blocks; returns how many were dropped. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, record] of this.counters) {
      if (record.windowExpiry <= now) {
        this.counters.delete(key);
        removed++;
      }
    }
    for (const [key, blockedUntil] of this.blocks) {
      if (blockedUntil <= now) {
        this.blocks.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.counters.size + this.blocks.size;
  }

  private assertOpen(operation: StoreOperation): void {
    if (this.closed) {
      throw new StoreUnavailableError(operation, new Error("Counter store is closed"));
    }
  }
}
