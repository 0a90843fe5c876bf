import { Redis } from "ioredis";
import type { CounterStore } from "@ratewarden/core";
import { InMemoryCounterStore } from "@ratewarden/core";
import type { ApiConfig } from "../config.js";
import { RedisCounterStore } from "./redis.js";

const MEMORY_SWEEP_INTERVAL_MS = 60_000;

/** Redis when a URL is configured, process memory otherwise. The store owns the client it creates. */
export function createCounterStore(config: ApiConfig["redis"]): CounterStore {
  if (config.url) {
    const redis = new Redis(config.url, {
      commandTimeout: config.commandTimeoutMs,
      maxRetriesPerRequest: 1,
    });
    return new RedisCounterStore(redis, config.keyPrefix);
  }
  return new InMemoryCounterStore({ sweepIntervalMs: MEMORY_SWEEP_INTERVAL_MS });
}

export { RedisCounterStore } from "./redis.js";
export type { RedisCounterClient } from "./redis.js";
