/**
 * HTTP error mapping for the admin routes.
 *
 *   not_found → 404, permission → 403, validation → 422,
 *   unauthorized → 401, anything else → 500 (generic message)
 */

import type { FastifyReply } from "fastify";
import { isAdminError, ValidationError, type AdminErrorType } from "../../core/errors/index.js";

const ERROR_TYPE_TO_STATUS: Record<AdminErrorType, number> = {
  not_found: 404,
  permission: 403,
  validation: 422,
  unauthorized: 401,
  configuration: 500,
};

export interface ErrorBody {
  success: false;
  error: string;
  errorType: AdminErrorType | "unknown";
  errors?: Record<string, string[]>;
}

export function statusFor(error: unknown): number {
  return isAdminError(error) ? ERROR_TYPE_TO_STATUS[error.errorType] : 500;
}

/** Client-safe body. Internal errors never expose their message. */
export function errorBody(error: unknown): ErrorBody {
  if (!isAdminError(error) || statusFor(error) === 500) {
    return { success: false, error: "An unexpected error occurred", errorType: "unknown" };
  }
  const body: ErrorBody = { success: false, error: error.message, errorType: error.errorType };
  if (error instanceof ValidationError) {
    body.errors = error.toFieldMap();
  }
  return body;
}

export function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  return reply.status(statusFor(error)).send(errorBody(error));
}
