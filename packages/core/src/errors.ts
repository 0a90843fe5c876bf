import type { StoreOperation } from "./counter-store/store.js";

/**
 * A counter store call failed (connectivity, timeout, backend error).
 * Distinct from a denied decision: callers choose whether to fail open or closed.
 */
export class StoreUnavailableError extends Error {
  public override readonly cause: unknown;

  constructor(
    public readonly operation: StoreOperation,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Counter store ${operation} failed: ${detail}`);
    this.name = "StoreUnavailableError";
    this.cause = cause;
  }
}

/** Thrown when a scope configuration is rejected at registration. */
export class InvalidConfigurationError extends Error {
  constructor(
    public readonly scope: string,
    public readonly issues: string[],
  ) {
    super(`Invalid configuration for ${scope}: ${issues.join("; ")}`);
    this.name = "InvalidConfigurationError";
  }
}

/** Thrown when a scope is registered after the registry was frozen. */
export class RegistryFrozenError extends Error {
  constructor(token: string) {
    super(`Scope registry is frozen; cannot register token scope "${token}"`);
    this.name = "RegistryFrozenError";
  }
}
