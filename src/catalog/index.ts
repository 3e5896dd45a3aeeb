// Catalog Module Index
// src/catalog/index.ts

export * from "./types.js";
export { Catalog, MAX_COPIES, canIncrease, checkBorrow, isValidQuantity, normalizeKey } from "./catalog.js";
