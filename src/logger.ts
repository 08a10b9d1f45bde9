/**
 * Structured logging backed by pino.
 *
 * The library logs at `debug` only (computed connection ids, produced
 * signatures) and is silent unless `SIGNER_LOG_LEVEL` is set. Key material
 * never reaches a log call; `privateKey` paths are redacted regardless.
 */

import pino from "pino";
import { z } from "zod";

// ── Types ───────────────────────────────────────────────────────────

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly redactPaths?: readonly string[];
  readonly destination?: { write(msg: string): void };
}

export interface Logger {
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): Logger;
}

/** Paths censored in every logger built here. */
export const DEFAULT_REDACT_PATHS = ["privateKey", "*.privateKey", "privateKeyHex", "*.privateKeyHex"];

// ── Factory ─────────────────────────────────────────────────────────

type PinoMethod = "info" | "warn" | "error" | "debug";

function forward(target: pino.Logger, method: PinoMethod, objOrMsg: unknown, msg?: string): void {
  if (typeof objOrMsg === "string") {
    target[method](objOrMsg);
  } else {
    target[method](objOrMsg, msg ?? "");
  }
}

function wrapPino(pinoLogger: pino.Logger): Logger {
  return {
    info(objOrMsg: unknown, msg?: string): void {
      forward(pinoLogger, "info", objOrMsg, msg);
    },
    warn(objOrMsg: unknown, msg?: string): void {
      forward(pinoLogger, "warn", objOrMsg, msg);
    },
    error(objOrMsg: unknown, msg?: string): void {
      forward(pinoLogger, "error", objOrMsg, msg);
    },
    debug(objOrMsg: unknown, msg?: string): void {
      forward(pinoLogger, "debug", objOrMsg, msg);
    },
    child(bindings: Record<string, unknown>): Logger {
      return wrapPino(pinoLogger.child(bindings));
    },
  };
}

/**
 * Create a pino-backed {@link Logger}.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.debug({ connectionId }, "signed L1 action");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: config.level,
    redact: {
      paths: [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])],
      censor: "[REDACTED]",
    },
  };

  const destination = config.destination;
  const pinoLogger = destination
    ? pino(pinoOptions, {
        write(chunk: string): void {
          destination.write(chunk);
        },
      })
    : pino(pinoOptions);

  return wrapPino(pinoLogger);
}

const levelSchema = z.enum(LOG_LEVELS);

/** Read the log level from `SIGNER_LOG_LEVEL`; anything unrecognized means `silent`. */
export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = levelSchema.safeParse(env.SIGNER_LOG_LEVEL?.trim().toLowerCase());
  return parsed.success ? parsed.data : "silent";
}

/** Library-wide logger. */
export const logger: Logger = createLogger({ level: logLevelFromEnv() });
