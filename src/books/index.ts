// Books Module Index
// src/books/index.ts

export * from "./types.js";
export { MemoryBookStore } from "./memory-store.js";
export { PostgresBookStore } from "./postgres-store.js";
export { createBookRoutes } from "./routes.js";
