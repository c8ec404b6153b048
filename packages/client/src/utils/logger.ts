/**
 * Tagged console logger with an optional append-only file sink.
 *
 * Console lines keep the `[Tag] message` shape used across the client; the
 * file sink adds an ISO timestamp and level so a long-running watcher leaves
 * a readable trail behind.
 */

import { appendFileSync } from "node:fs";
import { format } from "node:util";
import { isDebugEnabled } from "./debug.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Append every line to this file as well. */
  file?: string | null;
  /** Emit debug lines. Falls back to WHATSWEB_DEBUG. */
  debug?: boolean;
}

export function formatLogLine(
  level: LogLevel,
  tag: string,
  message: string,
  now: Date = new Date(),
): string {
  return `${now.toISOString()} - ${tag} - ${level.toUpperCase()} - ${message}`;
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? isDebugEnabled();
  const file = options.file ?? null;

  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (level === "debug" && !debugEnabled) return;

    const prefix = level === "debug" ? `[DEBUG:${tag}]` : `[${tag}]`;
    switch (level) {
      case "error":
        console.error(prefix, message, ...args);
        break;
      case "warn":
        console.warn(prefix, message, ...args);
        break;
      default:
        console.log(prefix, message, ...args);
    }

    if (file) {
      const text = args.length > 0 ? format(message, ...args) : message;
      try {
        appendFileSync(file, formatLogLine(level, tag, text) + "\n");
      } catch (err) {
        console.error(`[${tag}] Could not write to log file ${file}:`, err);
      }
    }
  };

  return {
    debug: (message, ...args) => write("debug", message, args),
    info: (message, ...args) => write("info", message, args),
    warn: (message, ...args) => write("warn", message, args),
    error: (message, ...args) => write("error", message, args),
  };
}
