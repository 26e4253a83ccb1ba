/**
 * Scope Tokens
 *
 * A signed, time-limited description of a bulk-action selection. A client
 * previews a selection, receives a token, and runs an action against the
 * same selection without resending it.
 *
 * Format: base64url(JSON payload) "." base64url(HMAC-SHA256(payload))
 *
 * Verification is stateless. The token is bound to the content type and
 * the subject it was issued for; any mismatch, bad signature, malformed
 * payload or expiry raises TokenError.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import type { ContentType, Scope, Subject } from "@adminforge/contracts";
import { ConfigurationError, TokenError } from "../errors/index.js";

const primaryKey = z.union([z.string().min(1), z.number().int()]);

export const scopeSchema: z.ZodType<Scope> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("ids"), ids: z.array(primaryKey).min(1) }).strict(),
  z.object({ kind: z.literal("query"), params: z.record(z.string()) }).strict(),
]);

const payloadSchema = z.object({
  ct: z.string(),
  scope: scopeSchema,
  sub: z.string(),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type ScopeTokenPayload = z.infer<typeof payloadSchema>;

export interface ScopeTokenOptions {
  secret: string;

  /** Lifetime when the caller asks for none, in seconds */
  ttlSeconds: number;

  /** Upper bound for a requested lifetime, in seconds */
  maxTtlSeconds: number;

  /** Clock in milliseconds */
  now?: () => number;
}

export interface IssuedToken {
  token: string;

  /** Unix seconds */
  expiresAt: number;
}

export class ScopeTokenService {
  private readonly now: () => number;

  constructor(private readonly options: ScopeTokenOptions) {
    if (!options.secret) {
      throw new ConfigurationError("Scope tokens need a non-empty secret");
    }
    this.now = options.now ?? Date.now;
  }

  private sign(encoded: string): Buffer {
    return createHmac("sha256", this.options.secret).update(encoded).digest();
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }

  issue(contentType: ContentType, scope: Scope, subject: Subject, ttlSeconds?: number): IssuedToken {
    const ttl = Math.min(ttlSeconds ?? this.options.ttlSeconds, this.options.maxTtlSeconds);
    const iat = this.nowSeconds();
    const payload: ScopeTokenPayload = {
      ct: contentType.id,
      scope,
      sub: subject.id,
      iat,
      exp: iat + ttl,
    };
    const encoded = Buffer.from(JSON.stringify(payload)).toString("base64url");
    return {
      token: `${encoded}.${this.sign(encoded).toString("base64url")}`,
      expiresAt: payload.exp,
    };
  }

  /** Signature, shape and expiry; nothing about who presents it */
  verify(token: string): ScopeTokenPayload {
    const parts = token.split(".");
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new TokenError("Invalid token");
    }
    const [encoded, signature] = parts;

    const expected = this.sign(encoded);
    const given = Buffer.from(signature, "base64url");
    if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
      throw new TokenError("Invalid token");
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(Buffer.from(encoded, "base64url").toString("utf8"));
    } catch {
      throw new TokenError("Invalid token");
    }
    const parsed = payloadSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new TokenError("Invalid token");
    }
    if (this.nowSeconds() >= parsed.data.exp) {
      throw new TokenError("Token has expired");
    }
    return parsed.data;
  }

  /** Verifies the token and its binding, returning the signed scope */
  resolve(token: string, contentType: ContentType, subject: Subject): Scope {
    const payload = this.verify(token);
    if (payload.ct !== contentType.id) {
      throw new TokenError("Token does not match this resource");
    }
    if (payload.sub !== subject.id) {
      throw new TokenError("Token was issued to another user");
    }
    return payload.scope;
  }
}
