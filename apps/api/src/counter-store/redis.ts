import type { CounterStore, StoreOperation } from "@ratewarden/core";
import { StoreUnavailableError } from "@ratewarden/core";

/**
 * INCR and the first-write PEXPIRE run as one script, so no caller can see
 * a counter without an expiry. A counter found without a TTL (PTTL -1) gets
 * one as well.
 */
const INCREMENT_SCRIPT = `
local count = redis.call("INCR", KEYS[1])
if count == 1 or redis.call("PTTL", KEYS[1]) == -1 then
  redis.call("PEXPIRE", KEYS[1], tonumber(ARGV[1]))
end
return count
`;

/** The ioredis commands this store uses. A `Redis` instance satisfies it. */
export interface RedisCounterClient {
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  exists(...keys: string[]): Promise<number>;
  set(key: string, value: string, mode: "PX", ttlMs: number): Promise<unknown>;
  quit(): Promise<unknown>;
}

export class RedisCounterStore implements CounterStore {
  private closed = false;

  constructor(
    private redis: RedisCounterClient,
    private keyPrefix = "ratelimit",
  ) {}

  async increment(key: string, windowMs: number): Promise<number> {
    const result = await this.run("increment", () =>
      this.redis.eval(INCREMENT_SCRIPT, 1, this.counterKey(key), windowMs),
    );
    if (typeof result !== "number") {
      throw new StoreUnavailableError("increment", new Error(`Unexpected INCR reply: ${String(result)}`));
    }
    return result;
  }

  async isBlocked(key: string): Promise<boolean> {
    const exists = await this.run("isBlocked", () => this.redis.exists(this.blockKey(key)));
    return exists > 0;
  }

  async block(key: string, blockMs: number): Promise<void> {
    // PX 0 is rejected by Redis; a zero-length block is already over
    if (blockMs <= 0) return;
    await this.run("block", () => this.redis.set(this.blockKey(key), "1", "PX", blockMs));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.redis.quit();
  }

  private counterKey(key: string): string {
    return `${this.keyPrefix}:count:${key}`;
  }

  private blockKey(key: string): string {
    return `${this.keyPrefix}:block:${key}`;
  }

  private async run<T>(operation: StoreOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreUnavailableError(operation, err);
    }
  }
}
