// PostgreSQL Book Store
// src/books/postgres-store.ts

import { and, asc, eq, gte, lte, sql } from "drizzle-orm";
import { z } from "zod";
import type { Database } from "@/db";
import { books, type BookRow } from "@/db/schema";
import { MAX_COPIES, isValidQuantity, normalizeKey } from "@/catalog";
import type { Logger } from "@/config";
import type { AddBookInput, Book, BookStore, StockOutcome } from "./types.js";

const idSchema = z.string().uuid();

function toBook(row: BookRow): Book {
  return {
    id: row.id,
    title: row.title,
    author: row.author,
    copiesAvailable: row.copiesAvailable,
  };
}

/**
 * Same rules as the in-memory catalog, enforced with single statements so
 * concurrent requests cannot overdraw a row.
 */
export class PostgresBookStore implements BookStore {
  constructor(
    private readonly db: Database,
    private readonly logger: Logger,
  ) {}

  async addBook(input: AddBookInput): Promise<StockOutcome> {
    if (!isValidQuantity(input.quantity)) {
      return { ok: false, error: "INVALID_QUANTITY" };
    }

    const [row] = await this.db
      .insert(books)
      .values({
        title: input.title,
        titleKey: normalizeKey(input.title),
        author: input.author,
        authorKey: normalizeKey(input.author),
        copiesAvailable: input.quantity,
      })
      .onConflictDoUpdate({
        target: [books.titleKey, books.authorKey],
        set: {
          copiesAvailable: sql`${books.copiesAvailable} + ${input.quantity}`,
          updatedAt: new Date(),
        },
        // An existing row with no room left is not updated and returns nothing
        setWhere: lte(books.copiesAvailable, MAX_COPIES - input.quantity),
      })
      .returning();

    if (!row) {
      this.logger.debug({ title: input.title, quantity: input.quantity }, "Restock refused at stock limit");
      return { ok: false, error: "INVALID_QUANTITY" };
    }

    this.logger.debug({ bookId: row.id, quantity: input.quantity }, "Stock added");
    return { ok: true, book: toBook(row) };
  }

  async findBook(title: string): Promise<Book[]> {
    const rows = await this.db
      .select()
      .from(books)
      .where(eq(books.titleKey, normalizeKey(title)))
      .orderBy(asc(books.position));

    return rows.map(toBook);
  }

  async listBooks(): Promise<Book[]> {
    // Titles in order of first appearance, authors in insertion order
    const rows = await this.db
      .select()
      .from(books)
      .orderBy(
        sql`min(${books.position}) over (partition by ${books.titleKey})`,
        asc(books.position),
      );

    return rows.map(toBook);
  }

  async getBook(id: string): Promise<Book | null> {
    if (!idSchema.safeParse(id).success) return null;

    const [row] = await this.db.select().from(books).where(eq(books.id, id)).limit(1);
    return row ? toBook(row) : null;
  }

  async borrowBook(id: string, quantity: number): Promise<StockOutcome> {
    if (!idSchema.safeParse(id).success) return { ok: false, error: "NOT_FOUND" };
    if (!isValidQuantity(quantity)) return { ok: false, error: "INVALID_QUANTITY" };

    const [row] = await this.db
      .update(books)
      .set({
        copiesAvailable: sql`${books.copiesAvailable} - ${quantity}`,
        updatedAt: new Date(),
      })
      .where(and(eq(books.id, id), gte(books.copiesAvailable, quantity)))
      .returning();

    if (row) return { ok: true, book: toBook(row) };

    const existing = await this.getBook(id);
    return { ok: false, error: existing ? "INSUFFICIENT_STOCK" : "NOT_FOUND" };
  }

  async returnBook(id: string, quantity: number): Promise<StockOutcome> {
    if (!idSchema.safeParse(id).success) return { ok: false, error: "NOT_FOUND" };
    if (!isValidQuantity(quantity)) return { ok: false, error: "INVALID_QUANTITY" };

    const [row] = await this.db
      .update(books)
      .set({
        copiesAvailable: sql`${books.copiesAvailable} + ${quantity}`,
        updatedAt: new Date(),
      })
      .where(and(eq(books.id, id), lte(books.copiesAvailable, MAX_COPIES - quantity)))
      .returning();

    if (row) return { ok: true, book: toBook(row) };

    const existing = await this.getBook(id);
    return { ok: false, error: existing ? "INVALID_QUANTITY" : "NOT_FOUND" };
  }

  async setCopies(id: string, copies: number): Promise<StockOutcome> {
    if (!idSchema.safeParse(id).success) return { ok: false, error: "NOT_FOUND" };
    if (!Number.isSafeInteger(copies) || copies < 0 || copies > MAX_COPIES) {
      return { ok: false, error: "INVALID_QUANTITY" };
    }

    const [row] = await this.db
      .update(books)
      .set({ copiesAvailable: copies, updatedAt: new Date() })
      .where(eq(books.id, id))
      .returning();

    if (row) {
      this.logger.info({ bookId: id, copies }, "Stock corrected");
    }
    return row ? { ok: true, book: toBook(row) } : { ok: false, error: "NOT_FOUND" };
  }
}
