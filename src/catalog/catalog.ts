// Catalog
// src/catalog/catalog.ts

import type { BookRecord, StockErrorCode } from "./types.js";

export function normalizeKey(value: string): string {
  return value.toLowerCase();
}

// Largest stock a record can hold; matches the PostgreSQL integer column
export const MAX_COPIES = 2_147_483_647;

export function isValidQuantity(quantity: number): boolean {
  return Number.isSafeInteger(quantity) && quantity > 0 && quantity <= MAX_COPIES;
}

// Whether adding quantity keeps the record within MAX_COPIES
export function canIncrease(record: BookRecord, quantity: number): boolean {
  return isValidQuantity(quantity) && record.copiesAvailable <= MAX_COPIES - quantity;
}

// Reason a borrow would be refused, or null when it can go through
export function checkBorrow(record: BookRecord, quantity: number): StockErrorCode | null {
  if (!isValidQuantity(quantity)) return "INVALID_QUANTITY";
  if (record.copiesAvailable < quantity) return "INSUFFICIENT_STOCK";
  return null;
}

/**
 * Title-indexed, in-memory book inventory.
 *
 * Records are grouped in buckets keyed by the lower-cased title. A bucket
 * holds one record per author (compared case-insensitively) in the order
 * the authors were first added, and is never empty once created.
 */
export class Catalog {
  private readonly buckets = new Map<string, BookRecord[]>();
  private readonly byId = new Map<string, BookRecord>();

  constructor(private readonly generateId: () => string = () => crypto.randomUUID()) {}

  get size(): number {
    return this.byId.size;
  }

  addBook(title: string, author: string, quantity: number): boolean {
    if (!isValidQuantity(quantity)) return false;

    const key = normalizeKey(title);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = [];
      this.buckets.set(key, bucket);
    }

    const authorKey = normalizeKey(author);
    const existing = bucket.find((record) => normalizeKey(record.author) === authorKey);

    if (existing) {
      return this.increase(existing, quantity);
    }

    const record: BookRecord = {
      id: this.generateId(),
      title,
      author,
      copiesAvailable: quantity,
    };
    bucket.push(record);
    this.byId.set(record.id, record);
    return true;
  }

  findBook(title: string): readonly BookRecord[] {
    const bucket = this.buckets.get(normalizeKey(title));
    return bucket ? [...bucket] : [];
  }

  borrowBook(record: BookRecord, quantity: number): boolean {
    if (checkBorrow(record, quantity) !== null) return false;
    record.copiesAvailable -= quantity;
    return true;
  }

  returnBook(record: BookRecord, quantity: number): boolean {
    return this.increase(record, quantity);
  }

  // Stock correction (stocktake); zero is allowed here
  setCopies(record: BookRecord, copies: number): boolean {
    if (!Number.isSafeInteger(copies) || copies < 0 || copies > MAX_COPIES) return false;
    record.copiesAvailable = copies;
    return true;
  }

  getBook(id: string): BookRecord | undefined {
    return this.byId.get(id);
  }

  listBooks(): readonly BookRecord[] {
    return Array.from(this.buckets.values()).flat();
  }

  private increase(record: BookRecord, quantity: number): boolean {
    if (!canIncrease(record, quantity)) return false;
    record.copiesAvailable += quantity;
    return true;
  }
}
