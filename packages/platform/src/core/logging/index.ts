/**
 * Logging
 *
 * Structured JSON logger used across the engine. One line per entry,
 * written through the console so any log shipper can pick it up.
 * Warnings and errors are also forwarded to the observability provider.
 */

import type { Logger } from "@adminforge/contracts";
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
 * Logs one admin request with its duration.
 * Called by the router builder after every handler settles.
 */
export function logRequest(
  route: string,
  subject: string,
  durationMs: number,
  status: number
) {
  const entry = {
    level: status >= 500 ? "error" : "info",
    context: "admin-router",
    event: "request.completed",
    route,
    subject,
    durationMs,
    status,
  };

  if (status >= 500) {
    console.error(JSON.stringify(entry));
  } else {
    console.log(JSON.stringify(entry));
  }
}
