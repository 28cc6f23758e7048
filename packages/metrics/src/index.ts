export { MetricsCollector } from "./metrics-collector.js";
export type { MetricsCollectorConfig } from "./metrics-collector.js";
export { createMetricsRouter } from "./metrics-server.js";
export type { MetricsRouter } from "./metrics-server.js";
