// In-memory Book Store
// src/books/memory-store.ts

import { Catalog, checkBorrow, normalizeKey, type BookRecord } from "@/catalog";
import type { AddBookInput, Book, BookStore, StockOutcome } from "./types.js";

function toBook(record: BookRecord): Book {
  return {
    id: record.id,
    title: record.title,
    author: record.author,
    copiesAvailable: record.copiesAvailable,
  };
}

export class MemoryBookStore implements BookStore {
  constructor(private readonly catalog: Catalog = new Catalog()) {}

  async addBook(input: AddBookInput): Promise<StockOutcome> {
    if (!this.catalog.addBook(input.title, input.author, input.quantity)) {
      return { ok: false, error: "INVALID_QUANTITY" };
    }

    const authorKey = normalizeKey(input.author);
    const record = this.catalog
      .findBook(input.title)
      .find((r) => normalizeKey(r.author) === authorKey);

    if (!record) {
      throw new Error(`Catalog lost record for "${input.title}" by ${input.author}`);
    }
    return { ok: true, book: toBook(record) };
  }

  async findBook(title: string): Promise<Book[]> {
    return this.catalog.findBook(title).map(toBook);
  }

  async listBooks(): Promise<Book[]> {
    return this.catalog.listBooks().map(toBook);
  }

  async getBook(id: string): Promise<Book | null> {
    const record = this.catalog.getBook(id);
    return record ? toBook(record) : null;
  }

  async borrowBook(id: string, quantity: number): Promise<StockOutcome> {
    const record = this.catalog.getBook(id);
    if (!record) return { ok: false, error: "NOT_FOUND" };

    const refusal = checkBorrow(record, quantity);
    if (refusal || !this.catalog.borrowBook(record, quantity)) {
      return { ok: false, error: refusal ?? "INVALID_QUANTITY" };
    }
    return { ok: true, book: toBook(record) };
  }

  async returnBook(id: string, quantity: number): Promise<StockOutcome> {
    const record = this.catalog.getBook(id);
    if (!record) return { ok: false, error: "NOT_FOUND" };

    if (!this.catalog.returnBook(record, quantity)) {
      return { ok: false, error: "INVALID_QUANTITY" };
    }
    return { ok: true, book: toBook(record) };
  }

  async setCopies(id: string, copies: number): Promise<StockOutcome> {
    const record = this.catalog.getBook(id);
    if (!record) return { ok: false, error: "NOT_FOUND" };

    if (!this.catalog.setCopies(record, copies)) {
      return { ok: false, error: "INVALID_QUANTITY" };
    }
    return { ok: true, book: toBook(record) };
  }
}
