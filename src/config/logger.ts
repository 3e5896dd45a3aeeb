import pino from "pino";
import { env } from "./env.js";

export type { Logger } from "pino";

// The console shell owns stdout, so its logs go to stderr
export const logger = pino(
  {
    name: "shelfstock",
    level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
    base: { mode: env.APP_MODE },
    redact: ["req.headers.authorization", "password"],
  },
  pino.destination(env.APP_MODE === "console" ? 2 : 1),
);
