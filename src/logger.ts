/**
 * Standalone logger.
 *
 * Provides a Logger factory backed by Winston. Embedders that already have a
 * logger can pass any object satisfying Logger instead.
 */

import winston from "winston";
import type { Logger } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface HandoffLoggerOptions {
  /** Prefix for all log lines. Default: "handoff". */
  prefix?: string;
  /** Minimum log level. Default: "info". */
  level?: LogLevel;
}

export function createHandoffLogger(opts?: HandoffLoggerOptions): Logger {
  const prefix = opts?.prefix ?? "handoff";
  const minLevel = opts?.level ?? "info";

  const winstonLogger = winston.createLogger({
    level: minLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
      winston.format.printf(({ timestamp, level, message }) =>
        `${String(timestamp)} [${prefix}:${level}] ${String(message)}`
      ),
    ),
    transports: [
      new winston.transports.Console({ forceConsole: true }),
    ],
  });

  return {
    info: (msg: string) => winstonLogger.info(msg),
    warn: (msg: string) => winstonLogger.warn(msg),
    error: (msg: string) => winstonLogger.error(msg),
    debug: (msg: string) => winstonLogger.debug(msg),
  };
}
