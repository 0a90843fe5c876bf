import { Registry, Counter as PromClientCounter, Histogram as PromClientHistogram, collectDefaultMetrics } from "prom-client";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { RateLimiterMetrics, Counter, Histogram } from "@ratewarden/core";

class PromCounter implements Counter {
  private counter: PromClientCounter;
  constructor(registry: Registry, name: string, help: string, labelNames: string[]) {
    this.counter = new PromClientCounter({ name, help, labelNames, registers: [registry] });
  }
  inc(labels?: Record<string, string>, value?: number): void {
    if (labels) {
      this.counter.inc(labels, value ?? 1);
    } else {
      this.counter.inc(value ?? 1);
    }
  }
}

class PromHistogram implements Histogram {
  private histogram: PromClientHistogram;
  constructor(registry: Registry, name: string, help: string, labelNames: string[], buckets?: number[]) {
    this.histogram = new PromClientHistogram({ name, help, labelNames, buckets, registers: [registry] });
  }
  observe(labels: Record<string, string>, value: number): void {
    this.histogram.observe(labels, value);
  }
}

const LATENCY_BUCKETS = [1, 2, 5, 10, 25, 50, 100, 250, 500, 1000];

export interface PromMetrics {
  metrics: RateLimiterMetrics;
  registry: Registry;
}

/** One registry per server, so several servers in one process don't collide. */
export function createPromMetrics(): PromMetrics {
  const registry = new Registry();
  collectDefaultMetrics({ register: registry });

  return {
    registry,
    metrics: {
      decisionsTotal: new PromCounter(registry, "ratewarden_decisions_total", "Rate limit decisions", ["scope", "outcome"]),
      blocksIssued: new PromCounter(registry, "ratewarden_blocks_total", "Blocks issued after a limit was exceeded", ["scope"]),
      storeErrors: new PromCounter(registry, "ratewarden_store_errors_total", "Failed counter store operations", ["operation"]),
      decisionLatencyMs: new PromHistogram(registry, "ratewarden_decision_latency_ms", "Decision latency in ms", ["scope"], LATENCY_BUCKETS),
    },
  };
}

export function metricsRoute(registry: Registry) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    const body = await registry.metrics();
    return reply.type(registry.contentType).send(body);
  };
}
