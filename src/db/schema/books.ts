import { pgTable, uuid, serial, varchar, integer, uniqueIndex, index, check } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import { timestamps } from "./common";

// Books table: one row per title/author pair
export const books = pgTable("books", {
  id: uuid("id").primaryKey().defaultRandom(),
  position: serial("position").notNull(), // insertion order within a title
  title: varchar("title", { length: 500 }).notNull(),
  titleKey: varchar("title_key", { length: 500 }).notNull(), // lower-cased title
  author: varchar("author", { length: 255 }).notNull(),
  authorKey: varchar("author_key", { length: 255 }).notNull(),
  copiesAvailable: integer("copies_available").notNull().default(0),
  ...timestamps,
}, (table) => ({
  titleAuthorIdx: uniqueIndex("books_title_author_idx").on(table.titleKey, table.authorKey),
  titleIdx: index("books_title_key_idx").on(table.titleKey),
  copiesCheck: check("books_copies_available_check", sql`${table.copiesAvailable} >= 0`),
}));

export type BookRow = typeof books.$inferSelect;
