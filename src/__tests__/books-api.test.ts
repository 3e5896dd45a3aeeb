// Books API Tests
import { describe, it, expect, beforeAll, beforeEach } from "vitest";
import { createApp } from "@/api/app";
import { MemoryBookStore } from "@/books";
import { MAX_COPIES } from "@/catalog";
import type { InMemoryUserStore } from "@/auth";
import { basicAuthHeader, createTestBook, createTestUsers, jsonRequest } from "../../tests/utils/helpers";

describe("Books API", () => {
  let users: InMemoryUserStore;
  let app: ReturnType<typeof createApp>;

  beforeAll(async () => {
    users = await createTestUsers();
  });

  beforeEach(() => {
    app = createApp({ store: new MemoryBookStore(), users });
  });

  async function addBook(book = createTestBook()) {
    const res = await app.request("/api/v1/books", jsonRequest("POST", book));
    const json = await res.json();
    return { res, book: json.data };
  }

  describe("authentication", () => {
    it("should reject requests without credentials", async () => {
      const res = await app.request("/api/v1/books");

      expect(res.status).toBe(401);
      expect(res.headers.get("WWW-Authenticate")).toBe('Basic realm="library"');
      const json = await res.json();
      expect(json.error.code).toBe("UNAUTHORIZED");
    });

    it("should reject a wrong password", async () => {
      const res = await app.request("/api/v1/books", {
        headers: { Authorization: basicAuthHeader("librarian", "wrong-password") },
      });

      expect(res.status).toBe(401);
    });
  });

  describe("POST /api/v1/books", () => {
    it("should create a book and point to it", async () => {
      const { res, book } = await addBook();

      expect(res.status).toBe(201);
      expect(res.headers.get("Location")).toBe(`/api/v1/books/${book.id}`);
      expect(book).toEqual({
        id: expect.any(String),
        title: "The Left Hand of Darkness",
        author: "Ursula K. Le Guin",
        copiesAvailable: 3,
      });
    });

    it("should restock an existing title and author", async () => {
      const first = await addBook();
      const second = await addBook(createTestBook({ title: "the left hand of darkness", quantity: 2 }));

      expect(second.res.status).toBe(201);
      expect(second.book.id).toBe(first.book.id);
      expect(second.book.copiesAvailable).toBe(5);
    });

    it("should reject a non-positive quantity", async () => {
      const res = await app.request("/api/v1/books", jsonRequest("POST", createTestBook({ quantity: 0 })));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: "INVALID_QUANTITY",
          message: "Quantity must be a positive integer and keep the stock at or below 2147483647 copies",
        },
      });
    });

    it("should refuse stock past the integer column limit", async () => {
      const tooLarge = await app.request("/api/v1/books", jsonRequest("POST", createTestBook({ quantity: MAX_COPIES + 1 })));
      expect(tooLarge.status).toBe(400);
      expect((await tooLarge.json()).error.code).toBe("VALIDATION_ERROR");

      const { book } = await addBook(createTestBook({ quantity: MAX_COPIES }));
      const overflow = await app.request("/api/v1/books", jsonRequest("POST", createTestBook({ quantity: 2 })));
      expect(overflow.status).toBe(400);
      expect((await overflow.json()).error.code).toBe("INVALID_QUANTITY");

      const returned = await app.request(`/api/v1/books/${book.id}/return`, jsonRequest("POST", { quantity: 1 }));
      expect(returned.status).toBe(400);
      expect((await returned.json()).error.code).toBe("INVALID_QUANTITY");

      const after = await app.request(`/api/v1/books/${book.id}`, jsonRequest("GET"));
      expect((await after.json()).data.copiesAvailable).toBe(MAX_COPIES);
    });

    it("should reject malformed bodies", async () => {
      const wrongType = await app.request("/api/v1/books", jsonRequest("POST", { title: "Dune", author: "Frank Herbert", quantity: "3" }));
      expect(wrongType.status).toBe(400);
      expect((await wrongType.json()).error.code).toBe("VALIDATION_ERROR");

      const notJson = await app.request("/api/v1/books", {
        method: "POST",
        headers: { Authorization: basicAuthHeader(), "Content-Type": "application/json" },
        body: "{not json",
      });
      expect(notJson.status).toBe(400);
      expect((await notJson.json()).error.code).toBe("VALIDATION_ERROR");
    });
  });

  describe("GET /api/v1/books", () => {
    it("should find every author of a title case-insensitively", async () => {
      await addBook(createTestBook({ title: "Collected Stories", author: "Grace Paley" }));
      await addBook(createTestBook({ title: "Collected Stories", author: "Lydia Davis" }));
      await addBook(createTestBook({ title: "Other Title", author: "Grace Paley" }));

      const res = await app.request("/api/v1/books?title=collected%20stories", jsonRequest("GET"));
      const json = await res.json();

      expect(res.status).toBe(200);
      expect(json.total).toBe(2);
      expect(json.data.map((b: { author: string }) => b.author)).toEqual(["Grace Paley", "Lydia Davis"]);
    });

    it("should return an empty list for an unknown title", async () => {
      const res = await app.request("/api/v1/books?title=nothing", jsonRequest("GET"));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ data: [], total: 0 });
    });

    it("should list all books without a title", async () => {
      await addBook(createTestBook({ title: "A" }));
      await addBook(createTestBook({ title: "B" }));

      const res = await app.request("/api/v1/books", jsonRequest("GET"));
      const json = await res.json();

      expect(json.total).toBe(2);
    });
  });

  describe("GET /api/v1/books/:id", () => {
    it("should return a book or 404", async () => {
      const { book } = await addBook();

      const found = await app.request(`/api/v1/books/${book.id}`, jsonRequest("GET"));
      expect(found.status).toBe(200);
      expect((await found.json()).data).toEqual(book);

      const missing = await app.request("/api/v1/books/missing", jsonRequest("GET"));
      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({ error: { code: "NOT_FOUND", message: "Book not found" } });
    });
  });

  describe("borrow and return", () => {
    it("should borrow while stock lasts and return without a cap", async () => {
      const { book } = await addBook(createTestBook({ quantity: 5 }));

      const borrowed = await app.request(`/api/v1/books/${book.id}/borrow`, jsonRequest("POST", { quantity: 3 }));
      expect(borrowed.status).toBe(200);
      expect((await borrowed.json()).data.copiesAvailable).toBe(2);

      const refused = await app.request(`/api/v1/books/${book.id}/borrow`, jsonRequest("POST", { quantity: 3 }));
      expect(refused.status).toBe(409);
      expect((await refused.json()).error.code).toBe("INSUFFICIENT_STOCK");

      const returned = await app.request(`/api/v1/books/${book.id}/return`, jsonRequest("POST", { quantity: 4 }));
      expect(returned.status).toBe(200);
      expect((await returned.json()).data.copiesAvailable).toBe(6);
    });

    it("should reject invalid quantities and unknown books", async () => {
      const { book } = await addBook();

      const zero = await app.request(`/api/v1/books/${book.id}/return`, jsonRequest("POST", { quantity: 0 }));
      expect(zero.status).toBe(400);
      expect((await zero.json()).error.code).toBe("INVALID_QUANTITY");

      const missing = await app.request("/api/v1/books/missing/borrow", jsonRequest("POST", { quantity: 1 }));
      expect(missing.status).toBe(404);
    });
  });

  describe("PUT /api/v1/books/:id", () => {
    it("should correct the stock", async () => {
      const { book } = await addBook();

      const res = await app.request(`/api/v1/books/${book.id}`, jsonRequest("PUT", { copiesAvailable: 10 }));
      expect(res.status).toBe(204);

      const after = await app.request(`/api/v1/books/${book.id}`, jsonRequest("GET"));
      expect((await after.json()).data.copiesAvailable).toBe(10);
    });

    it("should validate the body and the id", async () => {
      const { book } = await addBook();

      const negative = await app.request(`/api/v1/books/${book.id}`, jsonRequest("PUT", { copiesAvailable: -1 }));
      expect(negative.status).toBe(400);
      expect((await negative.json()).error.code).toBe("VALIDATION_ERROR");

      const missing = await app.request("/api/v1/books/missing", jsonRequest("PUT", { copiesAvailable: 1 }));
      expect(missing.status).toBe(404);
    });
  });

  describe("rate limiting", () => {
    it("should count requests per account and per app", async () => {
      const limited = createApp({ store: new MemoryBookStore(), users, rateLimit: { windowMs: 60_000, limit: 2 } });

      expect((await limited.request("/api/v1/books", jsonRequest("GET"))).status).toBe(200);
      expect((await limited.request("/api/v1/books", jsonRequest("GET"))).status).toBe(200);

      const blocked = await limited.request("/api/v1/books", jsonRequest("GET"));
      expect(blocked.status).toBe(429);

      // A forwarded address does not open a new bucket
      const spoofed = await limited.request("/api/v1/books", {
        headers: { Authorization: basicAuthHeader(), "X-Forwarded-For": "203.0.113.7" },
      });
      expect(spoofed.status).toBe(429);

      const fresh = createApp({ store: new MemoryBookStore(), users, rateLimit: { windowMs: 60_000, limit: 2 } });
      expect((await fresh.request("/api/v1/books", jsonRequest("GET"))).status).toBe(200);
    });
  });

  describe("public endpoints", () => {
    it("GET /health should return ok", async () => {
      const res = await app.request("/health");

      expect(res.status).toBe(200);
      expect((await res.json()).status).toBe("ok");
    });

    it("GET /metrics should expose Prometheus text", async () => {
      await app.request("/health");
      const res = await app.request("/metrics");

      expect(res.status).toBe(200);
      expect(await res.text()).toContain("shelfstock_http_requests_total");
    });

    it("GET /metrics should label requests with the route pattern", async () => {
      await app.request("/api/v1/books/123e4567-e89b-42d3-a456-426614174000", jsonRequest("GET"));
      const res = await app.request("/metrics");

      expect(await res.text()).toContain('route="/api/v1/books/:id"');
    });

    it("GET /api/docs/openapi.json should describe the books API", async () => {
      const res = await app.request("/api/docs/openapi.json");
      const json = await res.json();

      expect(json.info.title).toBe("Shelfstock API");
      expect(Object.keys(json.paths)).toContain("/api/v1/books/{id}/borrow");
    });

    it("should answer unknown routes with 404", async () => {
      const res = await app.request("/nope");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: { code: "NOT_FOUND", message: "Not found" } });
    });
  });
});
