import { pino, destination, type Logger } from "pino";
import type { LogLevel } from "./config.js";

const isDev = process.env.NODE_ENV !== "production";

/**
 * Diagnostic logger. Writes to stderr so the operator report on stdout
 * stays clean; pretty-printed outside production, JSON otherwise.
 */
export function createLogger(level: LogLevel, pretty = isDev): Logger {
  if (pretty) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    });
  }
  return pino({ level }, destination(2));
}

export type { Logger };
