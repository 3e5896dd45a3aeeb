// Catalog Types
// src/catalog/types.ts

/**
 * A single title/author pair and its shelf stock. Records are owned by the
 * catalog that created them; only `copiesAvailable` ever changes.
 */
export interface BookRecord {
  readonly id: string;
  readonly title: string;
  readonly author: string;
  copiesAvailable: number;
}

export type StockErrorCode =
  | "INVALID_QUANTITY"    // not a positive integer, or the stock would pass MAX_COPIES
  | "INSUFFICIENT_STOCK"; // borrow exceeds copiesAvailable
