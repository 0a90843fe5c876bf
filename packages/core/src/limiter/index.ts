export { RateLimiter } from "./rate-limiter.js";
export type { RateLimiterConfig, ClientIdentity } from "./rate-limiter.js";
export { ScopeRegistry } from "./scope-registry.js";
export type { ResolvedScope } from "./scope-registry.js";
export { addressKey, tokenKey, scopeOfKey } from "./rate-key.js";
