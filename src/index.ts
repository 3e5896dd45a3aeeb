import { initTracing, shutdownTracing } from "@/telemetry";
import { env, logger } from "@/config";
import { createApp } from "@/api/app";
import { InMemoryUserStore } from "@/auth";
import { MemoryBookStore, PostgresBookStore, type BookStore } from "@/books";
import { createDatabase, type DatabaseHandle } from "@/db";
import { ensureSchema } from "@/db/migrate";
import { LibraryShell, createTerminalIO } from "@/console";

let isShuttingDown = false;
let database: DatabaseHandle | null = null;

async function main() {
  initTracing();

  const mode = env.APP_MODE;

  logger.info({ mode, store: env.STORE, nodeEnv: env.NODE_ENV }, "Starting shelfstock");

  const store = await createStore();

  switch (mode) {
    case "api":
      await startApiServer(store);
      break;
    case "console":
      await startConsole(store);
      break;
  }
}

async function createStore(): Promise<BookStore> {
  if (env.STORE === "memory") {
    return new MemoryBookStore();
  }

  if (!env.DATABASE_URL) {
    throw new Error("DATABASE_URL is required when STORE=postgres");
  }

  database = createDatabase(env.DATABASE_URL);
  await ensureSchema(database.db);
  return new PostgresBookStore(database.db, logger.child({ component: "postgres-store" }));
}

async function startApiServer(store: BookStore) {
  if (!env.AUTH_PASSWORD) {
    throw new Error("AUTH_PASSWORD is required in api mode");
  }

  // Loaded after initTracing() so the HTTP instrumentation sees node:http first
  const { serve } = await import("@hono/node-server");

  const users = await InMemoryUserStore.withUser(env.AUTH_USERNAME, env.AUTH_PASSWORD);
  const app = createApp({ store, users, logger });
  const port = env.PORT;

  serve({
    fetch: app.fetch,
    port,
  });

  logger.info({ port }, "API server listening");
}

async function startConsole(store: BookStore) {
  const io = createTerminalIO();
  const shell = new LibraryShell(store, io, logger);

  try {
    await shell.run();
  } finally {
    io.close();
  }

  await shutdown("console-exit");
}

// Graceful shutdown
async function shutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info({ signal }, "Shutting down gracefully");

  try {
    await shutdownTracing();
    await database?.close();

    logger.info("Shutdown complete");
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "Error during shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

main().catch((err) => {
  logger.fatal({ err }, "Failed to start");
  process.exit(1);
});
