/**
 * Authentication Contract
 *
 * Decouples the admin from any specific authentication implementation.
 * The concrete provider is injected at startup; the auth middleware only
 * sees this interface.
 */

import type { Subject } from "./subject.js";

/**
 * The result of verifying an authentication token.
 * Either the authenticated Subject or null (invalid/unknown token).
 */
export type AuthResult = Subject | null;

export interface AuthProvider {
  /**
   * Verify a bearer token and load the subject it belongs to.
   * Must return null rather than throw for tokens it does not recognise.
   */
  verifyToken(token: string): Promise<AuthResult>;

  /**
   * Public configuration for clients (provider name, login hints).
   * Served without authentication; never include secrets.
   */
  getPublicConfig(): Record<string, string>;
}
