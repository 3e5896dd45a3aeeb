// OpenTelemetry Tracing Setup
// src/telemetry/tracing.ts

import { NodeSDK } from "@opentelemetry/sdk-node";
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import { env, logger } from "@/config";

const SERVICE_VERSION = process.env.npm_package_version || "0.1.0";

let sdk: NodeSDK | null = null;

export function initTracing(): void {
  // Skip in test environment and for the interactive shell
  if (env.NODE_ENV === "test" || env.APP_MODE === "console") {
    return;
  }

  if (env.OTEL_DISABLED) {
    logger.info("OpenTelemetry disabled");
    return;
  }

  const resource = resourceFromAttributes({
    [ATTR_SERVICE_NAME]: env.OTEL_SERVICE_NAME,
    [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
    "deployment.environment": env.NODE_ENV,
  });

  const traceExporter = new OTLPTraceExporter({
    url: env.OTEL_EXPORTER_OTLP_ENDPOINT + "/v1/traces",
  });

  sdk = new NodeSDK({
    resource,
    traceExporter,
    instrumentations: [
      new HttpInstrumentation({
        ignoreIncomingRequestHook: (req) => {
          const url = req.url || "";
          return url.includes("/health") || url.includes("/metrics");
        },
      }),
    ],
  });

  sdk.start();
  logger.info({ endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT }, "OpenTelemetry initialized");
}

export async function shutdownTracing(): Promise<void> {
  if (!sdk) return;
  await sdk.shutdown();
  sdk = null;
}
