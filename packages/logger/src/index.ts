/**
 * @docsift/logger
 *
 * Structured pino logging with secret redaction.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactConnectionString, REDACT_PATHS } from "./pii-redactor.js";
