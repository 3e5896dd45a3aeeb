import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

export const env = createEnv({
  server: {
    // Mode
    APP_MODE: z.enum(["api", "console"]).default("api"),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PORT: z.coerce.number().default(3000),

    // Storage
    STORE: z.enum(["memory", "postgres"]).default("memory"),
    DATABASE_URL: z.string().url().optional(),

    // Auth (HTTP Basic, single librarian account)
    AUTH_USERNAME: z.string().min(1).default("librarian"),
    AUTH_PASSWORD: z.string().min(8).optional(),

    // CORS
    CORS_ORIGINS: z.string().optional(),

    // Telemetry
    OTEL_DISABLED: z.enum(["true", "false"]).default("false").transform((v) => v === "true"),
    OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().default("http://localhost:4318"),
    OTEL_SERVICE_NAME: z.string().default("shelfstock"),

    // Logging
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export type Env = typeof env;
