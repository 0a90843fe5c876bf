import { ScopeConfigSchema, ScopeTokenSchema } from "@ratewarden/schemas";
import type { RateScopeKind, ScopeConfig } from "@ratewarden/schemas";
import type { ZodError } from "zod";
import { InvalidConfigurationError, RegistryFrozenError } from "../errors.js";
import { addressKey, tokenKey } from "./rate-key.js";

export interface ResolvedScope {
  key: string;
  scope: RateScopeKind;
  config: ScopeConfig;
}

/**
 * Default (address) scope plus named token scopes.
 *
 * Populate during startup, then call freeze() before serving traffic. Stored
 * configs are frozen copies, so a caller mutating its own object afterwards
 * has no effect.
 */
export class ScopeRegistry {
  private readonly defaultConfig: Readonly<ScopeConfig>;
  private readonly tokens = new Map<string, Readonly<ScopeConfig>>();
  private frozen = false;

  constructor(defaultConfig: ScopeConfig) {
    this.defaultConfig = validateConfig("default scope", defaultConfig);
  }

  /** Adds or replaces the scope for `token`. Last registration wins. */
  register(token: string, config: ScopeConfig): void {
    if (this.frozen) {
      throw new RegistryFrozenError(token);
    }
    const tokenResult = ScopeTokenSchema.safeParse(token);
    if (!tokenResult.success) {
      throw new InvalidConfigurationError("token scope", ["token must be a non-empty string"]);
    }
    this.tokens.set(token, validateConfig(`token scope "${token}"`, config));
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  getDefault(): Readonly<ScopeConfig> {
    return this.defaultConfig;
  }

  /** Exact, case-sensitive lookup. */
  getTokenScope(token: string): Readonly<ScopeConfig> | undefined {
    return this.tokens.get(token);
  }

  listTokens(): string[] {
    return [...this.tokens.keys()];
  }

  /**
   * Picks the token scope when `token` is non-empty and registered, and the
   * address scope otherwise. An unknown token is treated as no token.
   */
  resolve(token: string | undefined, address: string): ResolvedScope {
    if (token) {
      const config = this.tokens.get(token);
      if (config) {
        return { key: tokenKey(token), scope: "token", config };
      }
    }
    return { key: addressKey(address), scope: "address", config: this.defaultConfig };
  }
}

function validateConfig(scope: string, config: ScopeConfig): Readonly<ScopeConfig> {
  const result = ScopeConfigSchema.safeParse(config);
  if (!result.success) {
    throw new InvalidConfigurationError(scope, formatIssues(result.error));
  }
  return Object.freeze({ ...result.data });
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
}
