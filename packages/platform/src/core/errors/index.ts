/**
 * Admin Errors
 *
 * Every failure the engine raises on purpose is one of these classes.
 * The REST adapter maps `errorType` to an HTTP status:
 *   not_found     → 404
 *   permission    → 403
 *   validation    → 422 (with a field-keyed error map)
 *   unauthorized  → 401
 *   configuration → 500 (should never reach a request; raised at startup)
 *   anything else → 500 with a generic message
 */

import type { ZodError } from "zod";

export type AdminErrorType =
  | "not_found"
  | "permission"
  | "validation"
  | "unauthorized"
  | "configuration";

/** One field-level validation problem */
export interface FieldError {
  field: string;
  message: string;
  code: string;
}

export abstract class AdminError extends Error {
  abstract readonly errorType: AdminErrorType;
}

/** Unknown content type or an object hidden from (or missing for) the caller */
export class NotFoundError extends AdminError {
  readonly errorType = "not_found";

  constructor(message = "Not found") {
    super(message);
    this.name = "NotFoundError";
  }
}

/** A permission gate or an object-level hook refused the request */
export class ForbiddenError extends AdminError {
  readonly errorType = "permission";

  constructor(message = "You do not have permission to perform this action") {
    super(message);
    this.name = "ForbiddenError";
  }
}

export class UnauthorizedError extends AdminError {
  readonly errorType = "unauthorized";

  constructor(message = "Authentication required") {
    super(message);
    this.name = "UnauthorizedError";
  }
}

/**
 * Structured validation error.
 * Contains per-field error details for form rendering.
 */
export class ValidationError extends AdminError {
  readonly errorType = "validation";
  readonly fieldErrors: FieldError[];

  constructor(message: string, fieldErrors: FieldError[] = []) {
    super(message);
    this.name = "ValidationError";
    this.fieldErrors = fieldErrors;
  }

  /** Shorthand for a single-field error */
  static field(field: string, message: string, code = "invalid"): ValidationError {
    return new ValidationError(message, [{ field, message, code }]);
  }

  /** Groups messages by field: { "filter.title.gt": ["..."] } */
  toFieldMap(): Record<string, string[]> {
    const map: Record<string, string[]> = {};
    for (const fe of this.fieldErrors) {
      const key = fe.field || "_";
      (map[key] ??= []).push(fe.message);
    }
    return map;
  }
}

/**
 * A scope token failed verification. Treated as a validation failure
 * (422), and always fails closed.
 */
export class TokenError extends ValidationError {
  constructor(message: string) {
    super(message, [{ field: "scope_token", message, code: "invalid_token" }]);
    this.name = "TokenError";
  }
}

/**
 * Misconfiguration detected while registering or finalizing: conflicting
 * content types, duplicate action names, hooks that do not return a
 * queryset, invalid environment.
 */
export class ConfigurationError extends AdminError {
  readonly errorType = "configuration";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function isAdminError(error: unknown): error is AdminError {
  return error instanceof AdminError;
}

/**
 * Flattens zod issues into field errors. Unrecognized keys become one
 * error per key so clients can highlight each of them.
 */
export function fieldErrorsFromZod(
  error: ZodError,
  unknownKeyMessage = "Unknown field"
): FieldError[] {
  return error.issues.flatMap<FieldError>((issue) => {
    const base = issue.path.join(".");
    if (issue.code === "unrecognized_keys") {
      return issue.keys.map((key) => ({
        field: base ? `${base}.${key}` : key,
        message: unknownKeyMessage,
        code: issue.code,
      }));
    }
    return [{ field: base, message: issue.message, code: issue.code }];
  });
}
