import pino from "pino";
import type { Logger } from "pino";

/**
 * Diagnostic logger for refsync.
 * Writes JSON lines to stderr so stdout only carries the sync log stream.
 */
function createLogger(): Logger {
  const isTest = process.env.NODE_ENV === "test";
  const level = process.env.LOG_LEVEL || (isTest ? "silent" : "info");

  return pino(
    {
      level,
      base: {
        service: "refsync",
      },
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2)
  );
}

export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
