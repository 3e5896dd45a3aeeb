// Book REST Routes
// src/books/routes.ts

import { Hono, type Context } from "hono";
import { z } from "zod";
import { MAX_COPIES } from "@/catalog";
import type { Logger } from "@/config";
import { copiesMovedTotal, stockOperationsTotal } from "@/telemetry";
import type { BookErrorCode, BookStore, StockOutcome } from "./types.js";

type StockOperation = "add" | "borrow" | "return";

// Input validation
const addBookSchema = z.object({
  title: z.string().trim().min(1).max(500),
  author: z.string().trim().min(1).max(255),
  quantity: z.number().int().max(MAX_COPIES),
});

const quantitySchema = z.object({
  quantity: z.number().int().max(MAX_COPIES),
});

const setCopiesSchema = z.object({
  copiesAvailable: z.number().int().nonnegative().max(MAX_COPIES),
});

const ERRORS: Record<BookErrorCode, { status: 400 | 404 | 409; message: string }> = {
  INVALID_QUANTITY: {
    status: 400,
    message: `Quantity must be a positive integer and keep the stock at or below ${MAX_COPIES} copies`,
  },
  INSUFFICIENT_STOCK: { status: 409, message: "Not enough copies available" },
  NOT_FOUND: { status: 404, message: "Book not found" },
};

function errorResponse(c: Context, code: BookErrorCode) {
  const { status, message } = ERRORS[code];
  return c.json({ error: { code, message } }, status);
}

function validationError(c: Context, error: z.ZodError) {
  return c.json({
    error: { code: "VALIDATION_ERROR", message: "Invalid input", details: error.flatten() },
  }, 400);
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return null; // rejected by the schema below
  }
}

function record(operation: StockOperation, outcome: StockOutcome, quantity: number): void {
  stockOperationsTotal.inc({ operation, outcome: outcome.ok ? "ok" : outcome.error });
  if (outcome.ok) {
    copiesMovedTotal.inc({ operation }, quantity);
  }
}

export function createBookRoutes(store: BookStore, logger: Logger) {
  const router = new Hono();
  const log = logger.child({ component: "books" });

  // List all books, or every edition of one title
  router.get("/", async (c) => {
    const title = c.req.query("title");
    const data = title !== undefined ? await store.findBook(title) : await store.listBooks();

    return c.json({ data, total: data.length });
  });

  router.get("/:id", async (c) => {
    const book = await store.getBook(c.req.param("id"));
    if (!book) {
      return errorResponse(c, "NOT_FOUND");
    }
    return c.json({ data: book });
  });

  // Add copies (creates the record on first add)
  router.post("/", async (c) => {
    const parsed = addBookSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }

    const outcome = await store.addBook(parsed.data);
    record("add", outcome, parsed.data.quantity);
    if (!outcome.ok) {
      return errorResponse(c, outcome.error);
    }

    log.info({ bookId: outcome.book.id, quantity: parsed.data.quantity }, "Book stock added");
    c.header("Location", `${c.req.path.replace(/\/$/, "")}/${outcome.book.id}`);
    return c.json({ data: outcome.book }, 201);
  });

  // Stock correction
  router.put("/:id", async (c) => {
    const id = c.req.param("id");
    const parsed = setCopiesSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }

    const outcome = await store.setCopies(id, parsed.data.copiesAvailable);
    if (!outcome.ok) {
      return errorResponse(c, outcome.error);
    }

    log.info({ bookId: id, copies: parsed.data.copiesAvailable, user: c.get("user")?.username }, "Book stock corrected");
    return c.body(null, 204);
  });

  router.post("/:id/borrow", async (c) => {
    const id = c.req.param("id");
    const parsed = quantitySchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }

    const outcome = await store.borrowBook(id, parsed.data.quantity);
    record("borrow", outcome, parsed.data.quantity);
    if (!outcome.ok) {
      log.debug({ bookId: id, quantity: parsed.data.quantity, reason: outcome.error }, "Borrow refused");
      return errorResponse(c, outcome.error);
    }

    log.info({ bookId: id, quantity: parsed.data.quantity }, "Books borrowed");
    return c.json({ data: outcome.book });
  });

  router.post("/:id/return", async (c) => {
    const id = c.req.param("id");
    const parsed = quantitySchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }

    const outcome = await store.returnBook(id, parsed.data.quantity);
    record("return", outcome, parsed.data.quantity);
    if (!outcome.ok) {
      return errorResponse(c, outcome.error);
    }

    log.info({ bookId: id, quantity: parsed.data.quantity }, "Books returned");
    return c.json({ data: outcome.book });
  });

  return router;
}
