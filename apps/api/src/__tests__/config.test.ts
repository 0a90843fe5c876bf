import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "../config.js";

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected loadConfig to fail");
}

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 8080,
      host: "0.0.0.0",
      logLevel: "info",
      redis: { url: undefined, keyPrefix: "ratelimit", commandTimeoutMs: 1000 },
      defaultScope: { requestLimit: 10, windowMs: 1000, blockMs: 300_000 },
      tokenScopes: [],
      gate: { tokenHeader: "API_KEY", trustProxyHeaders: true, failMode: "closed" },
    });
  });

  it("reads the address scope and service settings", () => {
    const config = loadConfig({
      PORT: "9000",
      LOG_LEVEL: "debug",
      REDIS_URL: "redis://localhost:6379",
      RATE_LIMIT_IP_REQUESTS: "3",
      RATE_LIMIT_IP_WINDOW: "2s",
      RATE_LIMIT_IP_BLOCK_TIME: "1m30s",
      RATE_LIMIT_TRUST_PROXY_HEADERS: "false",
      RATE_LIMIT_FAIL_MODE: "open",
    });

    expect(config.port).toBe(9000);
    expect(config.logLevel).toBe("debug");
    expect(config.redis.url).toBe("redis://localhost:6379");
    expect(config.defaultScope).toEqual({ requestLimit: 3, windowMs: 2000, blockMs: 90_000 });
    expect(config.gate.trustProxyHeaders).toBe(false);
    expect(config.gate.failMode).toBe("open");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ RATE_LIMIT_IP_REQUESTS: "", REDIS_URL: "  " });

    expect(config.defaultScope.requestLimit).toBe(10);
    expect(config.redis.url).toBeUndefined();
  });

  it("collects token scopes in name order", () => {
    const config = loadConfig({
      RATE_LIMIT_TOKEN_zeta_REQUESTS: "50",
      RATE_LIMIT_TOKEN_abc123_REQUESTS: "100",
      RATE_LIMIT_TOKEN_abc123_WINDOW: "10s",
      RATE_LIMIT_TOKEN_abc123_BLOCK_TIME: "0",
    });

    expect(config.tokenScopes).toEqual([
      { token: "abc123", config: { requestLimit: 100, windowMs: 10_000, blockMs: 0 } },
      { token: "zeta", config: { requestLimit: 50, windowMs: 1000, blockMs: 300_000 } },
    ]);
  });

  it("ignores window settings for a token without a request count", () => {
    const config = loadConfig({ RATE_LIMIT_TOKEN_orphan_WINDOW: "5s" });

    expect(config.tokenScopes).toEqual([]);
  });

  it("rejects a zero request count", () => {
    const err = configError({ RATE_LIMIT_IP_REQUESTS: "0" });

    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatch(/^RATE_LIMIT_IP_REQUESTS: /);
  });

  it("reports every invalid value at once", () => {
    const err = configError({
      RATE_LIMIT_IP_WINDOW: "soon",
      RATE_LIMIT_TOKEN_abc123_REQUESTS: "many",
      RATE_LIMIT_TOKEN_abc123_BLOCK_TIME: "5x",
    });

    expect(err.issues).toHaveLength(3);
    expect(err.issues[0]).toBe('RATE_LIMIT_IP_WINDOW: invalid duration "soon"');
    expect(err.issues[1]).toMatch(/^RATE_LIMIT_TOKEN_abc123_REQUESTS: /);
    expect(err.issues[2]).toBe('RATE_LIMIT_TOKEN_abc123_BLOCK_TIME: invalid duration "5x"');
    expect(err.message).toMatch(/^Invalid configuration: RATE_LIMIT_IP_WINDOW/);
  });

  it("rejects a zero-length window", () => {
    const err = configError({ RATE_LIMIT_IP_WINDOW: "0" });

    expect(err.issues).toEqual(["RATE_LIMIT_IP_WINDOW: Number must be greater than 0"]);
  });

  it("rejects a token window that rounds down to zero", () => {
    const err = configError({
      RATE_LIMIT_TOKEN_abc_REQUESTS: "5",
      RATE_LIMIT_TOKEN_abc_WINDOW: "0.4ms",
    });

    expect(err.issues).toEqual(["RATE_LIMIT_TOKEN_abc_WINDOW: Number must be greater than 0"]);
  });

  it("accepts a zero block time", () => {
    const config = loadConfig({ RATE_LIMIT_IP_BLOCK_TIME: "0" });

    expect(config.defaultScope.blockMs).toBe(0);
  });

  it("rejects an unknown fail mode", () => {
    const err = configError({ RATE_LIMIT_FAIL_MODE: "maybe" });

    expect(err.issues[0]).toMatch(/^RATE_LIMIT_FAIL_MODE: /);
  });
});
