// ──────────────────────────────────────────────
// Weft - Structured Logger (Pino)
// ──────────────────────────────────────────────

import { pino, type Logger } from "pino";
import { randomUUID } from "node:crypto";

const LOG_LEVEL = process.env["LOG_LEVEL"] ?? "info";

export const rootLogger: Logger = pino({
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  redact: {
    paths: [
      "apiKey",
      "tavilyApiKey",
      "password",
      "authorization",
      "*.apiKey",
      "*.tavilyApiKey",
      "*.password",
    ],
    censor: "[REDACTED]",
  },
});

export function createLogger(module: string, extra?: Record<string, unknown>): Logger {
  return rootLogger.child({ module, ...extra });
}

export function createTurnId(): string {
  return randomUUID();
}

export function createTurnLogger(workflowId: string, turnId: string): Logger {
  return rootLogger.child({
    module: "canvas",
    workflowId,
    turnId,
  });
}
