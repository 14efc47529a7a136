import pino, { type Logger } from "pino";

const LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function resolveLevel(raw: string | undefined): string {
  const level = raw?.trim().toLowerCase();
  return level && LEVELS.has(level) ? level : "info";
}

// stdout carries the MCP stdio stream, so logs go to stderr.
export const logger: Logger = pino(
  {
    level: resolveLevel(process.env.LOG_LEVEL),
    base: { service: "doc-rag-service" },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

export type { Logger };
