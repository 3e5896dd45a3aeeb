// Telemetry Module Index
// src/telemetry/index.ts

export { initTracing, shutdownTracing } from "./tracing.js";

export {
  metricsRegistry,
  getMetrics,
  // Circulation metrics
  stockOperationsTotal,
  copiesMovedTotal,
  // API metrics
  httpRequestDuration,
  httpRequestsTotal,
} from "./metrics.js";
