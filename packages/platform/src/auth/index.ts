/**
 * Auth Module
 *
 * Manages the active AuthProvider instance. The provider is set at
 * startup (in bootstrap) and used by the auth middleware to verify
 * every admin request.
 *
 * Provider selection:
 *   - If ADMIN_API_TOKENS is set → TokenAuthProvider
 *   - Otherwise in non-production → DevAuthProvider (bypasses auth)
 *   - In production without tokens → throws (fail fast)
 */

import type { AuthProvider } from "@adminforge/contracts";
import type { AdminConfig } from "../core/config/index.js";
import { ConfigurationError } from "../core/errors/index.js";
import { createLogger } from "../core/logging/index.js";
import type { SubjectDirectory } from "../core/permissions/store.js";
import { DevAuthProvider } from "./dev-provider.js";
import { TokenAuthProvider } from "./token-provider.js";

const logger = createLogger("auth");

/** The singleton auth provider instance */
let authProvider: AuthProvider | null = null;

/**
 * Initialize the auth provider based on configuration.
 * Call this once at startup (in bootstrap).
 */
export function initAuthProvider(config: AdminConfig, directory: SubjectDirectory): AuthProvider {
  if (Object.keys(config.admin.apiTokens).length > 0) {
    authProvider = new TokenAuthProvider(config.admin.apiTokens, directory);
    logger.info("Using token auth provider", { tokens: Object.keys(config.admin.apiTokens).length });
  } else if (config.env === "production") {
    throw new ConfigurationError(
      "Authentication must be configured in production. Set ADMIN_API_TOKENS."
    );
  } else {
    authProvider = new DevAuthProvider();
    logger.info("Using development auth provider (no authentication)");
  }

  return authProvider;
}

/**
 * Get the active auth provider.
 * Throws if initAuthProvider() hasn't been called.
 */
export function getAuthProvider(): AuthProvider {
  if (!authProvider) {
    throw new ConfigurationError(
      "Auth provider not initialized. Call initAuthProvider() in bootstrap."
    );
  }
  return authProvider;
}

/**
 * Set a custom auth provider (for testing or custom implementations).
 */
export function setAuthProvider(provider: AuthProvider): void {
  authProvider = provider;
}

/** Forget the active provider (tests) */
export function resetAuthProvider(): void {
  authProvider = null;
}

// Re-export provider implementations
export { DevAuthProvider, DEV_SUBJECT } from "./dev-provider.js";
export { TokenAuthProvider } from "./token-provider.js";
