import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

/**
 * Line-oriented terminal I/O. `ask` resolves to null once input is exhausted.
 */
export interface ConsoleIO {
  ask(prompt: string): Promise<string | null>;
  print(line?: string): void;
  close(): void;
}

export function createTerminalIO(input: Readable = process.stdin, output: Writable = process.stdout): ConsoleIO {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(prompt) {
      output.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    print(line = "") {
      output.write(line + "\n");
    },
    close() {
      rl.close();
    },
  };
}

// Scripted I/O for tests and piped sessions: answers are consumed in order
export function createScriptedIO(answers: string[]): ConsoleIO & { output: string[] } {
  const queue = [...answers];
  const output: string[] = [];

  return {
    output,
    async ask(prompt) {
      output.push(prompt);
      return queue.shift() ?? null;
    },
    print(line = "") {
      output.push(line);
    },
    close() {
      queue.length = 0;
    },
  };
}
