/**
 * Logging
 *
 * Structured JSON logging to the console, one line per event.
 * Warnings and errors are also forwarded to the observability provider.
 */

import type { Logger } from "@foodvote/contracts";
import { captureMessage } from "../observability/index.js";

/**
 * Creates a simple structured logger.
 * Prefixes all messages with a context identifier.
 */
export function createLogger(context: string): Logger {
  return {
    info(message, data) {
      console.log(
        JSON.stringify({ level: "info", context, message, ...data })
      );
    },
    warn(message, data) {
      console.warn(
        JSON.stringify({ level: "warn", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      console.error(
        JSON.stringify({ level: "error", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (process.env.NODE_ENV !== "production") {
        console.debug(
          JSON.stringify({ level: "debug", context, message, ...data })
        );
      }
    },
  };
}

/**
 * Logs one handled HTTP request with its duration.
 */
export function logRequest(entry: {
  method: string;
  url: string;
  statusCode: number;
  durationMs: number;
}) {
  const line = JSON.stringify({
    level: entry.statusCode >= 500 ? "error" : "info",
    context: "http",
    event: "request.completed",
    ...entry,
  });

  if (entry.statusCode >= 500) {
    console.error(line);
  } else {
    console.log(line);
  }
}
