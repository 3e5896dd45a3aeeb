// OpenAPI Documentation
// src/api/docs/openapi.ts

import { swaggerUI } from "@hono/swagger-ui";
import type { Hono } from "hono";
import { MAX_COPIES } from "@/catalog";

const bookIdParam = {
  name: "id",
  in: "path",
  required: true,
  schema: { type: "string" },
};

const errorResponse = (description: string) => ({
  description,
  content: {
    "application/json": {
      schema: { $ref: "#/components/schemas/Error" },
    },
  },
});

const bookResponse = (description: string) => ({
  description,
  content: {
    "application/json": {
      schema: {
        type: "object",
        properties: { data: { $ref: "#/components/schemas/Book" } },
      },
    },
  },
});

const quantityBody = {
  required: true,
  content: {
    "application/json": {
      schema: { $ref: "#/components/schemas/QuantityInput" },
    },
  },
};

export const openApiSpec = {
  openapi: "3.1.0",
  info: {
    title: "Shelfstock API",
    version: "0.1.0",
    description: "Book inventory: add stock, borrow and return copies",
  },
  servers: [
    {
      url: "http://localhost:3000",
      description: "Development server",
    },
  ],
  tags: [
    { name: "Books", description: "Catalog and circulation" },
  ],
  security: [{ basicAuth: [] }],
  paths: {
    "/api/v1/books": {
      get: {
        tags: ["Books"],
        summary: "List books, or find every edition of a title",
        parameters: [
          { name: "title", in: "query", schema: { type: "string" }, description: "Case-insensitive exact title" },
        ],
        responses: {
          "200": {
            description: "Books in catalog order",
            content: {
              "application/json": {
                schema: { $ref: "#/components/schemas/BookList" },
              },
            },
          },
          "401": errorResponse("Missing or invalid credentials"),
        },
      },
      post: {
        tags: ["Books"],
        summary: "Add copies of a title/author pair",
        description: "Creates the record on first add, otherwise increases its stock.",
        requestBody: {
          required: true,
          content: {
            "application/json": {
              schema: { $ref: "#/components/schemas/AddBookInput" },
            },
          },
        },
        responses: {
          "201": bookResponse("Book added or restocked"),
          "400": errorResponse("Invalid input or quantity"),
        },
      },
    },
    "/api/v1/books/{id}": {
      get: {
        tags: ["Books"],
        summary: "Get a book",
        parameters: [bookIdParam],
        responses: {
          "200": bookResponse("Book"),
          "404": errorResponse("Book not found"),
        },
      },
      put: {
        tags: ["Books"],
        summary: "Correct the available copies of a book",
        parameters: [bookIdParam],
        requestBody: {
          required: true,
          content: {
            "application/json": {
              schema: {
                type: "object",
                properties: { copiesAvailable: { type: "integer", minimum: 0, maximum: MAX_COPIES } },
                required: ["copiesAvailable"],
              },
            },
          },
        },
        responses: {
          "204": { description: "Updated" },
          "400": errorResponse("Invalid input"),
          "404": errorResponse("Book not found"),
        },
      },
    },
    "/api/v1/books/{id}/borrow": {
      post: {
        tags: ["Books"],
        summary: "Borrow copies",
        parameters: [bookIdParam],
        requestBody: quantityBody,
        responses: {
          "200": bookResponse("Copies borrowed"),
          "400": errorResponse("Invalid quantity"),
          "404": errorResponse("Book not found"),
          "409": errorResponse("Not enough copies available"),
        },
      },
    },
    "/api/v1/books/{id}/return": {
      post: {
        tags: ["Books"],
        summary: "Return copies",
        parameters: [bookIdParam],
        requestBody: quantityBody,
        responses: {
          "200": bookResponse("Copies returned"),
          "400": errorResponse("Invalid quantity"),
          "404": errorResponse("Book not found"),
        },
      },
    },
  },
  components: {
    schemas: {
      Book: {
        type: "object",
        properties: {
          id: { type: "string" },
          title: { type: "string" },
          author: { type: "string" },
          copiesAvailable: { type: "integer", minimum: 0, maximum: MAX_COPIES },
        },
      },
      BookList: {
        type: "object",
        properties: {
          data: { type: "array", items: { $ref: "#/components/schemas/Book" } },
          total: { type: "integer" },
        },
      },
      AddBookInput: {
        type: "object",
        properties: {
          title: { type: "string", maxLength: 500 },
          author: { type: "string", maxLength: 255 },
          quantity: { type: "integer", minimum: 1, maximum: MAX_COPIES },
        },
        required: ["title", "author", "quantity"],
      },
      QuantityInput: {
        type: "object",
        properties: {
          quantity: { type: "integer", minimum: 1, maximum: MAX_COPIES },
        },
        required: ["quantity"],
      },
      Error: {
        type: "object",
        properties: {
          error: {
            type: "object",
            properties: {
              code: { type: "string" },
              message: { type: "string" },
            },
          },
        },
      },
    },
    securitySchemes: {
      basicAuth: {
        type: "http",
        scheme: "basic",
      },
    },
  },
};

export function setupSwaggerUI(app: Hono) {
  // Serve OpenAPI spec as JSON
  app.get("/api/docs/openapi.json", (c) => {
    return c.json(openApiSpec);
  });

  // Serve Swagger UI
  app.get(
    "/api/docs",
    swaggerUI({
      url: "/api/docs/openapi.json",
    })
  );
}
