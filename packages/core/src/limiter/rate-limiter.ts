import type { DecisionOutcome, RateDecision, RateScopeKind, ScopeConfig } from "@ratewarden/schemas";
import type { CounterStore, StoreOperation } from "../counter-store/store.js";
import type { Logger } from "../logger.js";
import type { RateLimiterMetrics } from "../telemetry/metrics.js";
import { getMetrics } from "../telemetry/metrics.js";
import { StoreUnavailableError } from "../errors.js";
import { addressKey, scopeOfKey, tokenKey } from "./rate-key.js";
import type { ScopeRegistry } from "./scope-registry.js";

export interface RateLimiterConfig {
  store: CounterStore;
  registry: ScopeRegistry;
  metrics?: RateLimiterMetrics;
  logger?: Logger;
}

export interface ClientIdentity {
  address: string;
  token?: string;
}

/**
 * Fixed-window limiter with a penalty block.
 *
 * Every decision re-reads store state; nothing is cached here, so one
 * instance can be shared by all in-flight requests. Store failures reject
 * with StoreUnavailableError and are never retried.
 */
export class RateLimiter {
  private readonly store: CounterStore;
  private readonly registry: ScopeRegistry;
  private readonly metrics: RateLimiterMetrics;
  private readonly logger: Logger | undefined;

  constructor(config: RateLimiterConfig) {
    this.store = config.store;
    this.registry = config.registry;
    this.metrics = config.metrics ?? getMetrics();
    this.logger = config.logger;
  }

  registerScope(token: string, config: ScopeConfig): void {
    this.registry.register(token, config);
  }

  async checkByAddress(address: string): Promise<boolean> {
    return this.consume(addressKey(address), "address", this.registry.getDefault());
  }

  /**
   * Resolves true without touching the store when `token` has no registered
   * scope. The caller is expected to follow up with checkByAddress in that
   * case; use check() to get both steps in one call.
   */
  async checkByToken(token: string): Promise<boolean> {
    const config = this.registry.getTokenScope(token);
    if (!config) return true;
    return this.consume(tokenKey(token), "token", config);
  }

  /** Resolves the scope for `identity` and applies it in one decision. */
  async check(identity: ClientIdentity): Promise<RateDecision> {
    const resolved = this.registry.resolve(identity.token, identity.address);
    const allowed = await this.consume(resolved.key, resolved.scope, resolved.config);
    return { allowed, key: resolved.key, scope: resolved.scope, config: resolved.config };
  }

  /**
   * 1. blocked → deny without touching the counter
   * 2. increment (the store sets the window expiry on the first hit)
   * 3. count > requestLimit → block for blockMs and deny
   */
  async checkAndConsume(key: string, config: ScopeConfig): Promise<boolean> {
    if (await this.call("isBlocked", () => this.store.isBlocked(key))) {
      return false;
    }

    const count = await this.call("increment", () => this.store.increment(key, config.windowMs));
    if (count > config.requestLimit) {
      await this.call("block", () => this.store.block(key, config.blockMs));
      this.metrics.blocksIssued.inc({ scope: scopeOfKey(key) });
      this.logger?.warn(
        { key, count, requestLimit: config.requestLimit, blockMs: config.blockMs },
        "Rate limit exceeded, key blocked",
      );
      return false;
    }

    return true;
  }

  private async consume(key: string, scope: RateScopeKind, config: ScopeConfig): Promise<boolean> {
    const start = Date.now();
    let allowed: boolean;
    try {
      allowed = await this.checkAndConsume(key, config);
    } catch (err) {
      this.recordDecision(scope, "error");
      throw err;
    } finally {
      this.metrics.decisionLatencyMs.observe({ scope }, Date.now() - start);
    }

    this.recordDecision(scope, allowed ? "allowed" : "denied");
    return allowed;
  }

  private recordDecision(scope: RateScopeKind, outcome: DecisionOutcome): void {
    this.metrics.decisionsTotal.inc({ scope, outcome });
  }

  private async call<T>(operation: StoreOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      this.metrics.storeErrors.inc({ operation });
      this.logger?.error({ err, operation }, "Counter store operation failed");
      throw err instanceof StoreUnavailableError ? err : new StoreUnavailableError(operation, err);
    }
  }
}
