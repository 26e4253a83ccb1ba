/**
 * Development Auth Provider
 *
 * A no-op auth provider for local development when no API tokens are
 * configured. Always returns a hardcoded superuser.
 *
 * NEVER use this in production; it bypasses all authentication.
 *
 * Activated automatically when ADMIN_API_TOKENS is not set and
 * NODE_ENV !== "production".
 */

import type { AuthProvider, AuthResult, Subject } from "@adminforge/contracts";

/** The subject every request runs as in development mode */
export const DEV_SUBJECT: Subject = {
  id: "dev-admin",
  username: "dev-admin",
  isActive: true,
  isStaff: true,
  isSuperuser: true,
};

export class DevAuthProvider implements AuthProvider {
  /**
   * In dev mode, any token (or no token) returns the hardcoded superuser.
   */
  async verifyToken(_token: string): Promise<AuthResult> {
    return { ...DEV_SUBJECT };
  }

  getPublicConfig(): Record<string, string> {
    return {
      provider: "dev",
      message: "Development mode: authentication is bypassed",
    };
  }
}
