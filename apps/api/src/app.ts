import Fastify from "fastify";
import type { FastifyError } from "fastify";
import { RateLimiter, ScopeRegistry } from "@ratewarden/core";
import type { CounterStore, RateLimiterMetrics } from "@ratewarden/core";
import type { ApiConfig } from "./config.js";
import { createCounterStore } from "./counter-store/index.js";
import { rateLimitGate } from "./middleware/rate-limit-gate.js";
import { createPromMetrics, metricsRoute } from "./metrics.js";
import { sanitizeErrorMessage } from "./utils/error-sanitizer.js";
import { formatDuration } from "./utils/duration.js";

declare module "fastify" {
  interface FastifyInstance {
    limiter: RateLimiter;
    counterStore: CounterStore;
  }
}

export interface BuildServerOptions {
  config: ApiConfig;
  /** Defaults to the store selected by config.redis. Closed with the server. */
  store?: CounterStore;
  /** Defaults to prom-client collectors served at /metrics. */
  metrics?: RateLimiterMetrics;
  /** `false` silences request logging (tests). */
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions) {
  const { config } = options;
  const app = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  });

  // Uniform error body; backend details never reach the client
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    }

    return reply.code(statusCode).send({
      error: sanitizeErrorMessage(error, statusCode),
      statusCode,
    });
  });

  // Scopes are fixed before the first request is served
  const registry = new ScopeRegistry(config.defaultScope);
  for (const { token, config: scope } of config.tokenScopes) {
    registry.register(token, scope);
    app.log.info(
      {
        requestLimit: scope.requestLimit,
        window: formatDuration(scope.windowMs),
        blockTime: formatDuration(scope.blockMs),
      },
      "Token scope registered",
    );
  }
  registry.freeze();

  const prom = options.metrics ? null : createPromMetrics();
  const store = options.store ?? createCounterStore(config.redis);
  const limiter = new RateLimiter({
    store,
    registry,
    metrics: options.metrics ?? prom?.metrics,
    logger: app.log,
  });

  app.decorate("limiter", limiter);
  app.decorate("counterStore", store);
  app.addHook("onClose", async () => {
    await store.close();
  });

  await app.register(rateLimitGate, {
    limiter,
    tokenHeader: config.gate.tokenHeader,
    trustProxyHeaders: config.gate.trustProxyHeaders,
    failMode: config.gate.failMode,
  });

  app.get("/health", async () => ({ status: "ok" }));

  if (prom) {
    app.get("/metrics", metricsRoute(prom.registry));
  }

  app.get("/", async () => ({
    message: "Request successful!",
    timestamp: new Date().toISOString(),
  }));

  return app;
}
