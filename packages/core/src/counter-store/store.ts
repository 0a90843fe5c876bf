/**
 * Per-subject counter and block state. Implementations own expiry: the
 * limiter never reads timestamps back, it only asks questions.
 *
 * `increment` must be atomic per key, and the expiry of a fresh window must
 * be set in the same step as its first increment.
 */
export interface CounterStore {
  /** Increments the counter for `key` and returns the post-increment count. */
  increment(key: string, windowMs: number): Promise<number>;
  isBlocked(key: string): Promise<boolean>;
  /** Creates or overwrites a block that expires after `blockMs`. */
  block(key: string, blockMs: number): Promise<void>;
  /** Idempotent. */
  close(): Promise<void>;
}

export type StoreOperation = "isBlocked" | "increment" | "block";
