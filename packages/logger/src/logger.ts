/**
 * Structured pino loggers shared by every ragweave package.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactRecord } from "./pii-redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

/**
 * `pino-pretty` in development, plain JSON everywhere else.
 */
function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "ragweave";

  const transport = buildTransport();

  return pino({
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    formatters: {
      log: redactRecord,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(transport ? { transport } : {}),
  });
}

/**
 * Derive a logger that adds call-scoped bindings (`component`, `strategyId`,
 * `namespace`) to every line.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/**
 * A logger that discards everything; the default for components built without one.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
