/**
 * Token Auth Provider
 *
 * Static bearer tokens from ADMIN_API_TOKENS ("token=username,...").
 * The username is looked up in the SubjectDirectory on every request, so
 * deactivating a user takes effect immediately.
 */

import { timingSafeEqual } from "node:crypto";
import type { AuthProvider, AuthResult } from "@adminforge/contracts";
import type { SubjectDirectory } from "../core/permissions/store.js";

function sameToken(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

export class TokenAuthProvider implements AuthProvider {
  private readonly tokens: Array<[token: string, username: string]>;

  constructor(
    tokens: Record<string, string>,
    private readonly directory: SubjectDirectory
  ) {
    this.tokens = Object.entries(tokens);
  }

  async verifyToken(token: string): Promise<AuthResult> {
    if (!token) return null;
    const match = this.tokens.find(([known]) => sameToken(known, token));
    if (!match) return null;
    return this.directory.findSubject(match[1]);
  }

  getPublicConfig(): Record<string, string> {
    return {
      provider: "token",
      message: "Send an API token as: Authorization: Bearer <token>",
    };
  }
}
