/**
 * Request body schemas for the action endpoints.
 *
 * A selection is given in exactly one of four ways:
 *   { "ids": [1, 2] }
 *   { "query": { "filter.status.eq": "draft" } }
 *   { "scope": { "kind": "ids", "ids": [1, 2] } }
 *   { "scope_token": "…" }
 */

import { z } from "zod";
import { ValidationError, fieldErrorsFromZod } from "../../core/errors/index.js";
import { scopeSchema } from "../../core/actions/scope-token.js";
import type { ScopeInput } from "../../core/actions/runner.js";

const primaryKey = z.union([z.string().min(1), z.number().int()]);

const selection = {
  ids: z.array(primaryKey).min(1).optional(),
  query: z.record(z.string()).optional(),
  scope: scopeSchema.optional(),
  scope_token: z.string().min(1).optional(),
};

type Selection = {
  ids?: Array<string | number>;
  query?: Record<string, string>;
  scope?: z.infer<typeof scopeSchema>;
  scope_token?: string;
};

const SELECTION_KEYS = ["ids", "query", "scope", "scope_token"] as const;

function exactlyOneSelection(value: Selection, ctx: z.RefinementCtx): void {
  const given = SELECTION_KEYS.filter((key) => value[key] !== undefined);
  if (given.length !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["scope"],
      message: "Provide exactly one of ids, query, scope or scope_token",
    });
  }
}

export const tokenBodySchema = z
  .object({
    ids: selection.ids,
    query: selection.query,
    scope: selection.scope,
    ttl: z.number().int().positive().optional(),
  })
  .strict()
  .superRefine(exactlyOneSelection);

export const previewBodySchema = z.object(selection).strict().superRefine(exactlyOneSelection);

export const runBodySchema = z
  .object({ ...selection, params: z.record(z.unknown()).optional() })
  .strict()
  .superRefine(exactlyOneSelection);

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError("Invalid request body", fieldErrorsFromZod(result.error, "Unexpected field"));
  }
  return result.data;
}

export function toScopeInput(body: Selection): ScopeInput {
  if (body.scope_token !== undefined) return { scopeToken: body.scope_token };
  if (body.ids !== undefined) return { scope: { kind: "ids", ids: body.ids } };
  if (body.query !== undefined) return { scope: { kind: "query", params: body.query } };
  if (body.scope !== undefined) return { scope: body.scope };
  throw ValidationError.field("scope", "Provide exactly one of ids, query, scope or scope_token");
}
