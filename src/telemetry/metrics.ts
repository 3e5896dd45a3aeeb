// Custom Metrics Service
// src/telemetry/metrics.ts

import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

// Create a custom registry
export const metricsRegistry = new Registry();

// Collect default Node.js metrics
collectDefaultMetrics({ register: metricsRegistry });

// Circulation Metrics

export const stockOperationsTotal = new Counter({
  name: "shelfstock_stock_operations_total",
  help: "Catalog stock operations by kind and outcome",
  labelNames: ["operation", "outcome"],
  registers: [metricsRegistry],
});

export const copiesMovedTotal = new Counter({
  name: "shelfstock_copies_moved_total",
  help: "Copies added, borrowed or returned",
  labelNames: ["operation"],
  registers: [metricsRegistry],
});

// API Metrics
export const httpRequestDuration = new Histogram({
  name: "shelfstock_http_request_duration_seconds",
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route", "status_code"],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [metricsRegistry],
});

export const httpRequestsTotal = new Counter({
  name: "shelfstock_http_requests_total",
  help: "Total HTTP requests",
  labelNames: ["method", "route", "status_code"],
  registers: [metricsRegistry],
});

// Helper function to get all metrics
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}
