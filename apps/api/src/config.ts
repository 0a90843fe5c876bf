import { z } from "zod";
import type { ScopeConfig } from "@ratewarden/schemas";
import { parseDuration } from "./utils/duration.js";

// ── Env value parsers ────────────────────────────────────────────────

const durationMs = z.string().transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : String(err),
    });
    return z.NEVER;
  }
});

// A window must last at least one whole millisecond
const windowMs = durationMs.pipe(z.number().int().positive());

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const requestCount = z.coerce.number().int().positive();

// ── Schemas ──────────────────────────────────────────────────────────

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  REDIS_URL: z.string().url().optional(),
  REDIS_KEY_PREFIX: z.string().min(1).default("ratelimit"),
  REDIS_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),

  RATE_LIMIT_IP_REQUESTS: requestCount.default(10),
  RATE_LIMIT_IP_WINDOW: windowMs.default("1s"),
  RATE_LIMIT_IP_BLOCK_TIME: durationMs.default("5m"),

  RATE_LIMIT_TOKEN_HEADER: z.string().min(1).default("API_KEY"),
  RATE_LIMIT_TRUST_PROXY_HEADERS: booleanFlag.default("true"),
  RATE_LIMIT_FAIL_MODE: z.enum(["closed", "open"]).default("closed"),
});

const TokenScopeEnvSchema = z.object({
  REQUESTS: requestCount,
  WINDOW: windowMs.default("1s"),
  BLOCK_TIME: durationMs.default("5m"),
});

const TOKEN_REQUESTS_VAR = /^RATE_LIMIT_TOKEN_(.+)_REQUESTS$/;

// ── Types ────────────────────────────────────────────────────────────

export type FailMode = "closed" | "open";

export interface TokenScopeEntry {
  token: string;
  config: ScopeConfig;
}

export interface ApiConfig {
  port: number;
  host: string;
  logLevel: string;
  redis: {
    url?: string;
    keyPrefix: string;
    commandTimeoutMs: number;
  };
  defaultScope: ScopeConfig;
  tokenScopes: TokenScopeEntry[];
  gate: {
    tokenHeader: string;
    trustProxyHeaders: boolean;
    failMode: FailMode;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

// ── Loader ───────────────────────────────────────────────────────────

/**
 * Reads the service configuration from environment variables.
 *
 * Token scopes are declared by `RATE_LIMIT_TOKEN_<TOKEN>_REQUESTS`, with
 * optional `_WINDOW` and `_BLOCK_TIME` siblings. Empty variables count as
 * unset. All problems are collected into one ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const vars = withoutEmpty(env);
  const issues: string[] = [];

  const base = EnvSchema.safeParse(vars);
  if (!base.success) {
    issues.push(...base.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const tokenScopes: TokenScopeEntry[] = [];
  for (const name of Object.keys(vars).sort()) {
    const match = TOKEN_REQUESTS_VAR.exec(name);
    const token = match?.[1];
    if (!token) continue;

    const prefix = `RATE_LIMIT_TOKEN_${token}_`;
    const parsed = TokenScopeEnvSchema.safeParse({
      REQUESTS: vars[`${prefix}REQUESTS`],
      WINDOW: vars[`${prefix}WINDOW`],
      BLOCK_TIME: vars[`${prefix}BLOCK_TIME`],
    });
    if (!parsed.success) {
      issues.push(...parsed.error.issues.map((i) => `${prefix}${i.path.join(".")}: ${i.message}`));
      continue;
    }
    tokenScopes.push({
      token,
      config: {
        requestLimit: parsed.data.REQUESTS,
        windowMs: parsed.data.WINDOW,
        blockMs: parsed.data.BLOCK_TIME,
      },
    });
  }

  if (!base.success || issues.length > 0) {
    throw new ConfigError(issues);
  }

  const data = base.data;
  return {
    port: data.PORT,
    host: data.HOST,
    logLevel: data.LOG_LEVEL,
    redis: {
      url: data.REDIS_URL,
      keyPrefix: data.REDIS_KEY_PREFIX,
      commandTimeoutMs: data.REDIS_COMMAND_TIMEOUT_MS,
    },
    defaultScope: {
      requestLimit: data.RATE_LIMIT_IP_REQUESTS,
      windowMs: data.RATE_LIMIT_IP_WINDOW,
      blockMs: data.RATE_LIMIT_IP_BLOCK_TIME,
    },
    tokenScopes,
    gate: {
      tokenHeader: data.RATE_LIMIT_TOKEN_HEADER,
      trustProxyHeaders: data.RATE_LIMIT_TRUST_PROXY_HEADERS,
      failMode: data.RATE_LIMIT_FAIL_MODE,
    },
  };
}

function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      out[name] = value;
    }
  }
  return out;
}
