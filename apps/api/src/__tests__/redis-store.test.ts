import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import RedisMock from "ioredis-mock";
import { InMemoryCounterStore, StoreUnavailableError } from "@ratewarden/core";
import { createCounterStore } from "../counter-store/index.js";
import { RedisCounterStore } from "../counter-store/redis.js";

const KEY = "ip:203.0.113.7";
const COUNTER = `rl:count:${KEY}`;
const BLOCK = `rl:block:${KEY}`;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("RedisCounterStore", () => {
  let redis: InstanceType<typeof RedisMock>;
  let store: RedisCounterStore;

  beforeEach(async () => {
    redis = new RedisMock();
    await redis.flushall();
    store = new RedisCounterStore(redis, "rl");
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("increment", () => {
    it("sets the window expiry on the first write", async () => {
      expect(await store.increment(KEY, 1000)).toBe(1);

      const ttl = await redis.pttl(COUNTER);
      expect(ttl).toBeGreaterThan(0);
      expect(ttl).toBeLessThanOrEqual(1000);
    });

    it("leaves the expiry alone on later writes", async () => {
      await store.increment(KEY, 1000);
      expect(await store.increment(KEY, 60_000)).toBe(2);

      expect(await redis.pttl(COUNTER)).toBeLessThanOrEqual(1000);
    });

    it("gives a counter without an expiry one", async () => {
      await redis.set(COUNTER, "5");

      expect(await store.increment(KEY, 1000)).toBe(6);
      expect(await redis.pttl(COUNTER)).toBeGreaterThan(0);
    });

    it("starts over once the window has passed", async () => {
      await store.increment(KEY, 20);
      await store.increment(KEY, 20);
      await sleep(50);

      expect(await store.increment(KEY, 20)).toBe(1);
    });

    it("hands out 1..N to concurrent increments", async () => {
      const counts = await Promise.all(Array.from({ length: 50 }, () => store.increment(KEY, 1000)));

      expect([...counts].sort((a, b) => a - b)).toEqual(Array.from({ length: 50 }, (_, i) => i + 1));
    });

    it("rejects a non-numeric script reply", async () => {
      vi.spyOn(redis, "eval").mockResolvedValueOnce("OK");

      await expect(store.increment(KEY, 1000)).rejects.toThrow(
        "Counter store increment failed: Unexpected INCR reply: OK",
      );
    });
  });

  describe("block", () => {
    it("blocks for the given duration", async () => {
      expect(await store.isBlocked(KEY)).toBe(false);

      await store.block(KEY, 5000);

      expect(await store.isBlocked(KEY)).toBe(true);
      const ttl = await redis.pttl(BLOCK);
      expect(ttl).toBeGreaterThan(0);
      expect(ttl).toBeLessThanOrEqual(5000);
    });

    it("lets the block lapse", async () => {
      await store.block(KEY, 20);
      await sleep(50);

      expect(await store.isBlocked(KEY)).toBe(false);
    });

    it("skips zero-length blocks", async () => {
      const setSpy = vi.spyOn(redis, "set");

      await store.block(KEY, 0);

      expect(setSpy).not.toHaveBeenCalled();
      expect(await store.isBlocked(KEY)).toBe(false);
    });
  });

  it("keeps counter and block keys under the prefix", async () => {
    await store.increment("token:abc123", 1000);
    await store.block("token:abc123", 5000);

    expect((await redis.keys("*")).sort()).toEqual(["rl:block:token:abc123", "rl:count:token:abc123"]);
  });

  it("uses the default prefix", async () => {
    const plain = new RedisCounterStore(redis);
    await plain.increment(KEY, 1000);

    expect(await redis.exists(`ratelimit:count:${KEY}`)).toBe(1);
  });

  it("wraps command failures with the failing operation", async () => {
    vi.spyOn(redis, "exists").mockRejectedValueOnce(new Error("Command timed out"));
    vi.spyOn(redis, "eval").mockRejectedValueOnce(new Error("Command timed out"));
    vi.spyOn(redis, "set").mockRejectedValueOnce(new Error("Command timed out"));

    await expect(store.isBlocked(KEY)).rejects.toThrow("Counter store isBlocked failed: Command timed out");
    await expect(store.increment(KEY, 1000)).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(store.block(KEY, 1000)).rejects.toMatchObject({ operation: "block" });
  });

  it("quits the client once", async () => {
    const quitSpy = vi.spyOn(redis, "quit");

    await store.close();
    await store.close();

    expect(quitSpy).toHaveBeenCalledTimes(1);
  });
});

describe("createCounterStore", () => {
  it("keeps counters in memory without a Redis URL", async () => {
    const store = createCounterStore({ keyPrefix: "ratelimit", commandTimeoutMs: 1000 });

    expect(store).toBeInstanceOf(InMemoryCounterStore);
    await store.close();
  });
});
