import pino from "pino";
import { z } from "zod";
import { createFormatterStream } from "./formatter.js";

/**
 * Structured diagnostic logging with Pino.
 *
 * Design decisions:
 * - JSON output in production for machine parsing
 * - Compact, readable formats for development (via LOG_FORMAT)
 * - Everything goes to stderr, leaving stdout to progress output and messages
 */

const isDev = process.env.NODE_ENV !== "production";

const logFormatSchema = z.enum(["compact", "hybrid", "minimal", "pretty", "json"]).catch("compact");
const logFormat = logFormatSchema.parse(process.env.LOG_FORMAT);

const STDERR = 2;

const baseConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || "info",
  messageKey: "msg",
  timestamp: pino.stdTimeFunctions.isoTime,

  base: isDev
    ? null
    : {
        service: "loopwatch",
        version: process.env.npm_package_version || "0.0.0",
        pid: process.pid,
      },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

function createBaseLogger(): pino.Logger {
  if (!isDev || logFormat === "json") {
    return pino(baseConfig, pino.destination(STDERR));
  }
  if (logFormat === "pretty") {
    return pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          destination: STDERR,
        },
      },
    });
  }
  return pino(baseConfig, createFormatterStream(logFormat));
}

const baseLogger = createBaseLogger();

export interface LogContext {
  [key: string]: unknown;
}

export type Logger = pino.Logger;

export function createLogger(component: string, context?: LogContext): Logger {
  return baseLogger.child({
    component,
    ...context,
  });
}

// Re-export for convenience
export { baseLogger as logger };
