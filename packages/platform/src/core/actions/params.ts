/**
 * Action parameter validation.
 *
 * paramsSchema declares names and primitive types; the payload must match
 * exactly. Destructive actions additionally accept `confirm`, which the
 * runner checks before anything else and strips before execute().
 */

import { z } from "zod";
import type { ActionParamSpec, ActionSpec } from "@adminforge/contracts";
import { ValidationError, fieldErrorsFromZod } from "../errors/index.js";

function zodForParam(spec: ActionParamSpec): z.ZodTypeAny {
  switch (spec.type) {
    case "string":
      return z.string();
    case "integer":
      return z.number().int();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
  }
}

export function actionParamsSchema(action: ActionSpec) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(action.paramsSchema)) {
    const schema = zodForParam(spec);
    shape[name] = spec.required === false ? schema.optional() : schema;
  }
  if (action.isDestructive) {
    shape.confirm = z.boolean().optional();
  }
  return z.object(shape).strict();
}

/** True only for an explicit boolean `confirm: true` */
export function isConfirmed(raw: unknown): boolean {
  return typeof raw === "object" && raw !== null && "confirm" in raw && raw.confirm === true;
}

/**
 * Validated params without `confirm`.
 * Unknown names → "Unexpected parameter", missing required → "Required".
 */
export function validateActionParams(action: ActionSpec, raw: unknown): Record<string, unknown> {
  const result = actionParamsSchema(action).safeParse(raw ?? {});
  if (!result.success) {
    throw new ValidationError(
      `Invalid parameters for action "${action.name}"`,
      fieldErrorsFromZod(result.error, "Unexpected parameter").map((fe) => ({
        ...fe,
        field: fe.field ? `params.${fe.field}` : "params",
      }))
    );
  }
  const params: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(result.data)) {
    if (key !== "confirm" && value !== undefined) params[key] = value;
  }
  return params;
}
