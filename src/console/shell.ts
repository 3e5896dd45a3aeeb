// Console Shell
// src/console/shell.ts

import type { Logger } from "@/config";
import type { Book, BookStore } from "@/books";
import { MAX_COPIES } from "@/catalog";
import type { ConsoleIO } from "./io.js";

export const MENU = [
  "--- Main Menu ---",
  "1. Add Book",
  "2. Borrow Book",
  "3. Return Book",
  "4. List Books",
  "5. Exit",
] as const;

const MENU_PROMPT = "Please enter your choice (1-5): ";
const INTEGER = /^-?\d+$/;
const STOCK_LIMIT_MESSAGE = `Error: a book cannot hold more than ${MAX_COPIES} copies.`;

type Circulation = "borrow" | "return";

/**
 * Interactive menu over a book store. Quantities of 0 cancel the current
 * action; running out of input behaves like choosing Exit.
 */
export class LibraryShell {
  private readonly log: Logger;

  constructor(
    private readonly store: BookStore,
    private readonly io: ConsoleIO,
    logger: Logger,
  ) {
    this.log = logger.child({ component: "console" });
  }

  async run(): Promise<void> {
    this.io.print("Welcome to the Library software!");

    while (true) {
      const choice = await this.readMenuChoice();
      if (choice === null || choice === 5) {
        this.io.print("Exiting application. Goodbye!");
        return;
      }

      try {
        switch (choice) {
          case 1:
            await this.handleAddBook();
            break;
          case 2:
            await this.handleCirculation("borrow");
            break;
          case 3:
            await this.handleCirculation("return");
            break;
          case 4:
            await this.printBooks();
            break;
        }
      } catch (err) {
        this.log.error({ err, choice }, "Console operation failed");
        this.io.print(`An unexpected error occurred: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  private async readMenuChoice(): Promise<number | null> {
    while (true) {
      this.io.print();
      for (const line of MENU) this.io.print(line);

      const answer = await this.io.ask(MENU_PROMPT);
      if (answer === null) return null;

      const trimmed = answer.trim();
      if (!INTEGER.test(trimmed)) {
        this.io.print("Invalid input. Please enter a number (1-5).");
        continue;
      }

      const choice = Number(trimmed);
      if (choice < 1 || choice > 5) {
        this.io.print(`Invalid choice: ${choice}. Please select a number between 1 and 5.`);
        continue;
      }
      return choice;
    }
  }

  // Non-negative integer, 0 meaning cancel
  private async readQuantity(prompt: string): Promise<number | null> {
    while (true) {
      const answer = await this.io.ask(prompt);
      if (answer === null) return null;

      const trimmed = answer.trim();
      if (!INTEGER.test(trimmed)) {
        this.io.print("Invalid input. Please enter an integer.");
        continue;
      }

      const quantity = Number(trimmed);
      if (quantity < 0) {
        this.io.print("Invalid input. Please enter a number greater than or equal to 0.");
        continue;
      }
      return quantity;
    }
  }

  private async handleAddBook(): Promise<void> {
    const author = await this.io.ask("Author? ");
    if (author === null) return;
    const title = await this.io.ask("Title? ");
    if (title === null) return;

    if (!author.trim() || !title.trim()) {
      this.io.print("Title and author must not be empty.");
      return;
    }

    const quantity = await this.readQuantity("Quantity? (Enter 0 to cancel) ");
    if (quantity === null) return;
    if (quantity === 0) {
      this.io.print("Action cancelled.");
      return;
    }

    const outcome = await this.store.addBook({ title: title.trim(), author: author.trim(), quantity });
    if (!outcome.ok) {
      this.io.print(STOCK_LIMIT_MESSAGE);
      return;
    }

    this.log.debug({ bookId: outcome.book.id, quantity }, "Book stock added");
    this.io.print("Book added/updated successfully!");
  }

  private async handleCirculation(kind: Circulation): Promise<void> {
    const title = await this.io.ask(kind === "borrow" ? "Title to borrow? " : "Title to return? ");
    if (title === null) return;

    const matches = await this.store.findBook(title.trim());
    if (matches.length === 0) {
      this.io.print("Title not found.");
      return;
    }

    const book = matches.length === 1 ? matches[0] : await this.chooseBook(matches);
    if (!book) return;

    const prompt = kind === "borrow"
      ? "Quantity to borrow? (Enter 0 to cancel) "
      : "Quantity to return? (Enter 0 to cancel) ";

    // Re-ask until the store accepts the quantity or the user cancels
    while (true) {
      const quantity = await this.readQuantity(prompt);
      if (quantity === null) return;
      if (quantity === 0) {
        this.io.print("Transaction cancelled.");
        return;
      }

      const outcome = kind === "borrow"
        ? await this.store.borrowBook(book.id, quantity)
        : await this.store.returnBook(book.id, quantity);

      if (outcome.ok) {
        this.log.debug({ bookId: book.id, kind, quantity }, "Circulation recorded");
        this.io.print(kind === "borrow"
          ? `Successfully borrowed ${quantity} copies of '${book.title}'. ${outcome.book.copiesAvailable} remaining.`
          : `Successfully returned ${quantity} copies of '${book.title}'. Total stock: ${outcome.book.copiesAvailable}.`);
        return;
      }

      if (outcome.error === "NOT_FOUND") {
        this.io.print("Error: Book not found.");
        return;
      }

      // A return can only fail here by passing the stock limit
      if (kind === "return") {
        this.io.print(STOCK_LIMIT_MESSAGE);
        continue;
      }

      // Borrow quantities above the stock limit exceed any stock as well
      const current = await this.store.getBook(book.id);
      this.io.print(
        `Only ${current?.copiesAvailable ?? 0} copies of '${book.title}' are available (requested: ${quantity}).`,
      );
    }
  }

  private async chooseBook(matches: Book[]): Promise<Book | null> {
    this.io.print();
    matches.forEach((book, i) => this.io.print(`${i + 1}. ${book.title} by ${book.author}`));

    let answer = await this.io.ask("Which book exactly? (Enter the number) ");
    while (answer !== null) {
      const trimmed = answer.trim();
      const index = INTEGER.test(trimmed) ? Number(trimmed) : 0;
      if (index >= 1 && index <= matches.length) {
        return matches[index - 1];
      }

      this.io.print(`Invalid input. Please enter a number between 1 and ${matches.length}.`);
      answer = await this.io.ask("Which book exactly? (Enter the number) ");
    }
    return null;
  }

  private async printBooks(): Promise<void> {
    this.io.print("--- Current Inventory ---");

    const books = await this.store.listBooks();
    if (books.length === 0) {
      this.io.print("The library is currently empty.");
      return;
    }

    for (const book of books) {
      this.io.print(`${book.title} by ${book.author}: ${book.copiesAvailable} available`);
    }
  }
}
