/**
 * @ragweave/logger
 *
 * Structured logging with secret and PII redaction.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactRecord, REDACT_PATHS } from "./pii-redactor.js";
