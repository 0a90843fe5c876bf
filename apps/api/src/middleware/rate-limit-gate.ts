import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import type { RateDecision } from "@ratewarden/schemas";
import type { RateLimiter } from "@ratewarden/core";
import { StoreUnavailableError } from "@ratewarden/core";
import type { FailMode } from "../config.js";
import { resolveClientIdentity } from "./client-identity.js";

export const RATE_LIMITED_MESSAGE =
  "you have reached the maximum number of requests or actions allowed within a certain time frame";

export interface RateLimitGateOptions {
  limiter: RateLimiter;
  tokenHeader: string;
  trustProxyHeaders: boolean;
  failMode: FailMode;
  /** Paths that bypass the limiter. Default: /health, /metrics */
  exemptPaths?: string[];
}

/**
 * Request gate: resolves the caller's address and token, asks the limiter
 * for a decision and answers 429 when it is denied.
 *
 * A store failure is rethrown to the global error handler (500) in
 * "closed" mode; in "open" mode the request is let through and logged.
 */
const rateLimitGatePlugin: FastifyPluginAsync<RateLimitGateOptions> = async (app, opts) => {
  const exemptPaths = new Set(opts.exemptPaths ?? ["/health", "/metrics"]);

  app.addHook("onRequest", async (request, reply) => {
    const path = request.url.split("?", 1)[0] ?? request.url;
    if (exemptPaths.has(path)) return;

    const identity = resolveClientIdentity(request, opts);

    let decision: RateDecision;
    try {
      decision = await opts.limiter.check(identity);
    } catch (err) {
      if (opts.failMode === "open" && err instanceof StoreUnavailableError) {
        request.log.warn(
          { err, operation: err.operation, address: identity.address },
          "Rate limiter unavailable, allowing request",
        );
        return;
      }
      throw err;
    }

    if (!decision.allowed) {
      request.log.info({ scope: decision.scope, address: identity.address }, "Request rate limited");
      return reply.code(429).send({ error: RATE_LIMITED_MESSAGE });
    }
  });
};

export const rateLimitGate = fp(rateLimitGatePlugin, { name: "rate-limit-gate" });
