/**
 * Lightweight metrics abstraction compatible with Prometheus/prom-client.
 * The API server wires real prom-client collectors through setMetrics();
 * otherwise in-memory counters are used for testing/inspection.
 */

export interface RateLimiterMetrics {
  /** Labels: scope, outcome */
  decisionsTotal: Counter;
  /** Labels: scope */
  blocksIssued: Counter;
  /** Labels: operation */
  storeErrors: Counter;
  /** Labels: scope */
  decisionLatencyMs: Histogram;
}

export interface Counter {
  inc(labels?: Record<string, string>, value?: number): void;
}

export interface Histogram {
  observe(labels: Record<string, string>, value: number): void;
}

export class InMemoryCounter implements Counter {
  private values = new Map<string, number>();

  inc(labels?: Record<string, string>, amount = 1): void {
    const key = labelKey(labels);
    this.values.set(key, (this.values.get(key) ?? 0) + amount);
  }

  /** Total across all label sets, or the value for one exact label set. */
  get(labels?: Record<string, string>): number {
    if (labels) return this.values.get(labelKey(labels)) ?? 0;
    let total = 0;
    for (const value of this.values.values()) total += value;
    return total;
  }
}

/** Keeps only a count and a sum per label set, so memory stays flat however long it runs. */
export class InMemoryHistogram implements Histogram {
  private series = new Map<string, { count: number; sum: number }>();

  observe(labels: Record<string, string>, value: number): void {
    const key = labelKey(labels);
    const entry = this.series.get(key) ?? { count: 0, sum: 0 };
    entry.count += 1;
    entry.sum += value;
    this.series.set(key, entry);
  }

  /** Observations for one exact label set, or across all of them. */
  count(labels?: Record<string, string>): number {
    return this.total(labels, "count");
  }

  sum(labels?: Record<string, string>): number {
    return this.total(labels, "sum");
  }

  get seriesCount(): number {
    return this.series.size;
  }

  private total(labels: Record<string, string> | undefined, field: "count" | "sum"): number {
    if (labels) return this.series.get(labelKey(labels))?.[field] ?? 0;
    let total = 0;
    for (const entry of this.series.values()) total += entry[field];
    return total;
  }
}

function labelKey(labels?: Record<string, string>): string {
  if (!labels) return "";
  return Object.keys(labels)
    .sort()
    .map((name) => `${name}=${labels[name]}`)
    .join(",");
}

export interface InMemoryRateLimiterMetrics extends RateLimiterMetrics {
  decisionsTotal: InMemoryCounter;
  blocksIssued: InMemoryCounter;
  storeErrors: InMemoryCounter;
  decisionLatencyMs: InMemoryHistogram;
}

let activeMetrics: RateLimiterMetrics | null = null;

export function setMetrics(metrics: RateLimiterMetrics): void {
  activeMetrics = metrics;
}

export function getMetrics(): RateLimiterMetrics {
  if (!activeMetrics) {
    activeMetrics = createInMemoryMetrics();
  }
  return activeMetrics;
}

export function createInMemoryMetrics(): InMemoryRateLimiterMetrics {
  return {
    decisionsTotal: new InMemoryCounter(),
    blocksIssued: new InMemoryCounter(),
    storeErrors: new InMemoryCounter(),
    decisionLatencyMs: new InMemoryHistogram(),
  };
}
