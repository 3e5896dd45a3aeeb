// Book Store Types
// src/books/types.ts

import type { StockErrorCode } from "@/catalog";

export interface Book {
  id: string;
  title: string;
  author: string;
  copiesAvailable: number;
}

export interface AddBookInput {
  title: string;
  author: string;
  quantity: number;
}

export type BookErrorCode = StockErrorCode | "NOT_FOUND";

export type StockOutcome =
  | { ok: true; book: Book }
  | { ok: false; error: BookErrorCode };

/**
 * Storage port used by the REST routes and the console shell.
 * Expected failures come back as `StockOutcome` values; only
 * infrastructure errors (lost connection etc.) reject.
 */
export interface BookStore {
  addBook(input: AddBookInput): Promise<StockOutcome>;
  findBook(title: string): Promise<Book[]>;
  listBooks(): Promise<Book[]>;
  getBook(id: string): Promise<Book | null>;
  borrowBook(id: string, quantity: number): Promise<StockOutcome>;
  returnBook(id: string, quantity: number): Promise<StockOutcome>;
  setCopies(id: string, copies: number): Promise<StockOutcome>;
}
