// Limiter
export { RateLimiter, ScopeRegistry, addressKey, tokenKey, scopeOfKey } from "./limiter/index.js";
export type { RateLimiterConfig, ClientIdentity, ResolvedScope } from "./limiter/index.js";

// Counter store
export { InMemoryCounterStore } from "./counter-store/index.js";
export type { CounterStore, StoreOperation, InMemoryCounterStoreOptions } from "./counter-store/index.js";

// Errors
export { StoreUnavailableError, InvalidConfigurationError, RegistryFrozenError } from "./errors.js";

// Logging
export type { Logger } from "./logger.js";

// Telemetry
export {
  getMetrics,
  setMetrics,
  createInMemoryMetrics,
  InMemoryCounter,
  InMemoryHistogram,
} from "./telemetry/index.js";
export type { RateLimiterMetrics, InMemoryRateLimiterMetrics, Counter, Histogram } from "./telemetry/index.js";
