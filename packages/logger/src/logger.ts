import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./pii-redactor.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to LOG_LEVEL, then "debug" in development and "info" elsewhere. */
  level?: string;
  /** Component name attached to every line as `name`. */
  service?: string;
  /** Force pino-pretty on or off; by default only in development. */
  pretty?: boolean;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function resolveLevel(level: string | undefined): string {
  if (level) return level;
  const fromEnv = process.env["LOG_LEVEL"];
  if (fromEnv) return fromEnv;
  if (process.env["NODE_ENV"] === "test") return "silent";
  return isDevelopment() ? "debug" : "info";
}

function buildTransport(pretty: boolean): pino.TransportSingleOptions | undefined {
  if (!pretty) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  };
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const transport = buildTransport(options?.pretty ?? isDevelopment());

  return pino({
    level: resolveLevel(options?.level),
    name: options?.service ?? "docsift",
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(transport ? { transport } : {}),
  });
}

/**
 * Child logger carrying per-operation bindings such as `documentId` or `jobId`.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/** Default for components constructed without a logger. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
