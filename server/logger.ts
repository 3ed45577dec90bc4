import pino, { type Logger } from "pino";

import { env } from "./config/env";

// Logs go to stderr; stdout carries command output.
export const logger: Logger = pino(
  {
    name: "corpus-translate",
    level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
  },
  pino.destination(2),
);

export const createLogger = (component: string): Logger =>
  logger.child({ component });

export type { Logger };
