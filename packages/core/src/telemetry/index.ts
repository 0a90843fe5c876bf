export {
  getMetrics,
  setMetrics,
  createInMemoryMetrics,
  InMemoryCounter,
  InMemoryHistogram,
} from "./metrics.js";
export type { RateLimiterMetrics, InMemoryRateLimiterMetrics, Counter, Histogram } from "./metrics.js";
