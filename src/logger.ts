import * as Sentry from "@sentry/node";

type Attributes = Record<string, unknown>;
type Level = "info" | "warn" | "error";

/**
 * Structured logger using Sentry.logger
 *
 * Without a Sentry client (no SENTRY_DSN) records go to the console instead,
 * except under test.
 *
 * @example
 * ```ts
 * logger.info("Bill uploaded", { sessionId, pages: doc.pageCount });
 * logger.warn("Page skipped", { page: 3, error: err.message });
 * ```
 */
export const logger = {
  info: write("info"),
  warn: write("warn"),
  error: write("error"),
};

function write(level: Level) {
  return (message: string, attributes?: Attributes): void => {
    if (Sentry.isInitialized()) {
      Sentry.logger[level](message, attributes);
    } else if (process.env.NODE_ENV !== "test") {
      console[level](`[${level}] ${message}`, attributes ?? {});
    }
  };
}
