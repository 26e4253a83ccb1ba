/**
 * Observability Module
 *
 * Captures errors, structured logs, and operational telemetry.
 * Follows the provider pattern: pluggable backends with a console fallback.
 *
 * Default: ConsoleObservabilityProvider (structured console output).
 * Hosts plug an error tracker in with setObservabilityProvider().
 *
 * Usage:
 *   import { initObservability, captureException, captureMessage } from "./observability";
 *
 *   initObservability();  // Call once at startup
 *
 *   captureException(error, { userId: "alice", contentType: "blog.post" });
 *   captureMessage("Deferred action cancelled", "warning", { taskHandle });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Severity levels for messages */
export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Context tags attached to every event for filtering */
export interface ObservabilityContext {
  userId?: string;
  contentType?: string;
  [key: string]: unknown;
}

/** The provider contract. Every observability backend implements this. */
export interface ObservabilityProvider {
  /** Provider name (for logging) */
  readonly name: string;

  /** Capture an exception / error */
  captureException(error: Error, context?: ObservabilityContext): void;

  /** Capture a message with severity level */
  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Set user context for all subsequent captures */
  setContext(context: ObservabilityContext): void;

  /** Flush pending events to the backend (for graceful shutdown) */
  flush(timeoutMs?: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Console Provider (dev fallback)
// ---------------------------------------------------------------------------

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";

  captureException(error: Error, context?: ObservabilityContext): void {
    console.error(
      JSON.stringify({
        level: "error",
        context: "observability",
        event: "exception",
        message: error.message,
        stack: error.stack,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    const logFn =
      level === "fatal" || level === "error"
        ? console.error
        : level === "warning"
          ? console.warn
          : level === "debug"
            ? console.debug
            : console.log;

    logFn(
      JSON.stringify({
        level,
        context: "observability",
        event: "message",
        message,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  setContext(_context: ObservabilityContext): void {
    // Console provider: no-op (context is passed per-call)
  }

  async flush(): Promise<void> {
    // Console provider: no-op (console writes are synchronous)
  }
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

// ---------------------------------------------------------------------------
// Initialization
// ---------------------------------------------------------------------------

/**
 * Initialize the observability module with the console provider,
 * unless a provider was already installed with setObservabilityProvider().
 *
 * Safe to call multiple times. Never throws.
 */
export function initObservability(): void {
  if (provider.name !== "console") return;
  provider = new ConsoleObservabilityProvider();
  console.log("[observability] Using console provider");
}

// ---------------------------------------------------------------------------
// Public API (delegates to provider)
// ---------------------------------------------------------------------------

/** Capture an exception through the observability provider */
export function captureException(
  error: Error,
  context?: ObservabilityContext
): void {
  provider.captureException(error, context);
}

/** Capture a message with severity level */
export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: ObservabilityContext
): void {
  provider.captureMessage(message, level, context);
}

/** Set user context for subsequent captures */
export function setObservabilityContext(context: ObservabilityContext): void {
  provider.setContext(context);
}

/** Flush pending events (call during graceful shutdown) */
export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

/** Get the current observability provider (for testing/inspection) */
export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

/** Install a different observability provider (error tracker, tests) */
export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

// ---------------------------------------------------------------------------
// Testing Helpers
// ---------------------------------------------------------------------------

/** Reset observability module state (for testing only) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
