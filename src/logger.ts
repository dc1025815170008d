/**
 * Package logger.
 *
 * Logs go to stderr: stdout carries the MCP stdio transport.
 */

import pino from "pino";
import type { Logger } from "pino";

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.VITEST ? "silent" : "info";
}

export const logger: Logger = pino(
  {
    name: "paper-harvest",
    level: resolveLevel(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

/** Create a child logger bound to a module name or other context. */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
