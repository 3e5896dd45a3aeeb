import { sql } from "drizzle-orm";
import type { Database } from "./index";

// Creates the books table when missing; mirrors src/db/schema/books.ts
export async function ensureSchema(db: Database): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS books (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      position SERIAL NOT NULL,
      title VARCHAR(500) NOT NULL,
      title_key VARCHAR(500) NOT NULL,
      author VARCHAR(255) NOT NULL,
      author_key VARCHAR(255) NOT NULL,
      copies_available INTEGER NOT NULL DEFAULT 0,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      CONSTRAINT books_copies_available_check CHECK (copies_available >= 0)
    )
  `);
  await db.execute(sql`
    CREATE UNIQUE INDEX IF NOT EXISTS books_title_author_idx ON books (title_key, author_key)
  `);
  await db.execute(sql`
    CREATE INDEX IF NOT EXISTS books_title_key_idx ON books (title_key)
  `);
}
