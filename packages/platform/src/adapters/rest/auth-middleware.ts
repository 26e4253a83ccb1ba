/**
 * Fastify Authentication Middleware
 *
 * Extracts the Bearer token from the Authorization header, verifies it
 * through the configured AuthProvider, and attaches the Subject to the
 * request for downstream handlers.
 *
 * Registered as a preHandler inside the admin plugin only, so public
 * routes (health check, auth config) never reach it.
 */

import type { FastifyRequest, FastifyReply } from "fastify";
import type { Subject } from "@adminforge/contracts";
import { getAuthProvider } from "../../auth/index.js";
import { UnauthorizedError } from "../../core/errors/index.js";
import { sendError } from "./result.js";

/**
 * Extend Fastify's request type to include the authenticated subject.
 * This is the standard Fastify pattern for adding custom properties.
 */
declare module "fastify" {
  interface FastifyRequest {
    subject?: Subject;
  }
}

/**
 * Extracts the Bearer token from the Authorization header.
 * Returns null if the header is missing or malformed.
 */
function extractBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) return null;

  const parts = header.split(" ");
  if (parts.length !== 2 || parts[0].toLowerCase() !== "bearer") return null;

  return parts[1];
}

/**
 * Fastify preHandler hook that enforces authentication.
 *
 *   1. Extracts the Bearer token from the Authorization header
 *   2. Verifies it through the AuthProvider
 *   3. Attaches the Subject to request.subject
 *   4. Replies 401 if the token is missing or invalid
 */
export async function authMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | void> {
  // Preflight requests never carry credentials; @fastify/cors answers them
  if (request.method === "OPTIONS") {
    return;
  }

  const token = extractBearerToken(request);

  // The DevAuthProvider accepts an empty token; real providers return null
  const subject = await getAuthProvider().verifyToken(token ?? "");

  if (!subject) {
    return sendError(
      reply,
      new UnauthorizedError(
        token
          ? "Invalid or expired authentication token."
          : "Authentication required. Provide a Bearer token in the Authorization header."
      )
    );
  }

  request.subject = subject;
}

/** The authenticated subject, or UnauthorizedError */
export function requireSubject(request: FastifyRequest): Subject {
  if (!request.subject) {
    throw new UnauthorizedError();
  }
  return request.subject;
}
