/**
 * Test utilities and helpers
 */
import { InMemoryUserStore } from "@/auth";

export const TEST_USERNAME = "librarian";
export const TEST_PASSWORD = "test-password";

export function basicAuthHeader(username: string = TEST_USERNAME, password: string = TEST_PASSWORD): string {
  return "Basic " + Buffer.from(`${username}:${password}`).toString("base64");
}

export function createTestUsers(): Promise<InMemoryUserStore> {
  return InMemoryUserStore.withUser(TEST_USERNAME, TEST_PASSWORD);
}

// JSON request init with Basic auth
export function jsonRequest(method: string, body?: unknown, auth: string = basicAuthHeader()): RequestInit {
  return {
    method,
    headers: {
      "Content-Type": "application/json",
      Authorization: auth,
    },
    body: body === undefined ? undefined : JSON.stringify(body),
  };
}

// Generate test book data
export function createTestBook(overrides: Partial<TestBook> = {}): TestBook {
  return {
    title: "The Left Hand of Darkness",
    author: "Ursula K. Le Guin",
    quantity: 3,
    ...overrides,
  };
}

export interface TestBook {
  title: string;
  author: string;
  quantity: number;
}
