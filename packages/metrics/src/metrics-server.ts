import type { Logger, Route } from "@wardline/schemas";
import { errorMessage } from "@wardline/schemas";
import type { MetricsCollector } from "./metrics-collector.js";

export type MetricsRouter = Route;

export function createMetricsRouter(collector: MetricsCollector, logger?: Logger): MetricsRouter {
  return {
    method: "GET",
    path: "/metrics",
    handler: async (_req, res) => {
      try {
        const body = await collector.getMetrics();
        res.text(body, collector.getContentType());
      } catch (err) {
        logger?.error("metrics collection failed", { error: errorMessage(err) });
        res.status(500).text("Error collecting metrics", "text/plain; charset=utf-8");
      }
    },
  };
}
