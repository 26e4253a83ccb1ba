/**
 * Form Schema & Payload Cleaning
 *
 * Both sides of a form are derived from the same field metadata:
 *   - buildFormSchema() → JSON Schema a client renders (json-editor style)
 *   - cleanPayload()    → zod validation of what the client sends back
 */

import { z } from "zod";
import type { FieldInfo, Row } from "@adminforge/contracts";
import { ValidationError, fieldErrorsFromZod } from "../errors/index.js";
import type { ModelDescriptor } from "./descriptor.js";

export type JsonSchema = Record<string, unknown>;

/** create: required fields enforced; replace (PUT): same; partial (PATCH): all optional */
export type PayloadMode = "create" | "replace" | "partial";

export function isRequired(field: FieldInfo): boolean {
  return !field.nullable && field.default === undefined && !field.readOnly;
}

// ---------------------------------------------------------------------------
// JSON Schema
// ---------------------------------------------------------------------------

function propertySchema(field: FieldInfo): JsonSchema {
  switch (field.kind) {
    case "string":
      return field.maxLength ? { type: "string", maxLength: field.maxLength } : { type: "string" };
    case "text":
      return { type: "string", format: "textarea" };
    case "integer":
      return { type: "integer" };
    case "number":
      return { type: "number" };
    case "boolean":
      return { type: "boolean", format: "checkbox" };
    case "date":
      return { type: "string", format: "date" };
    case "datetime":
      return { type: "string", format: "date-time" };
    case "uuid":
      return { type: "string", format: "uuid" };
    case "json":
      return { type: "object" };
    case "choice": {
      const choices = field.choices ?? [];
      const numeric = choices.length > 0 && choices.every((c) => typeof c.value === "number");
      return {
        type: numeric ? "integer" : "string",
        enum: choices.map((c) => c.value),
        options: { enum_titles: choices.map((c) => c.label) },
      };
    }
    case "fk":
      return { type: ["integer", "string"], relatedModel: field.relatedModel ?? null };
    case "m2m":
      return {
        type: "array",
        items: { type: ["integer", "string"] },
        uniqueItems: true,
        relatedModel: field.relatedModel ?? null,
      };
  }
}

/** A primary key is writable on create only (natural keys); it never changes afterwards */
function isLocked(descriptor: ModelDescriptor, field: FieldInfo, editing: boolean): boolean {
  return descriptor.isReadOnly(field) || (editing && field.name === descriptor.pk);
}

export function buildFormSchema(descriptor: ModelDescriptor, editing = false): JsonSchema {
  const fields = descriptor.formFields();
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  fields.forEach((field, index) => {
    const readOnly = isLocked(descriptor, field, editing);
    const schema: JsonSchema = {
      ...propertySchema(field),
      title: descriptor.fieldLabel(field),
      propertyOrder: index + 1,
    };
    if (readOnly) schema.readOnly = true;
    if (field.default !== undefined) schema.default = field.default;
    properties[field.name] = field.nullable
      ? { ...schema, type: [schema.type, "null"].flat() }
      : schema;
    if (!readOnly && isRequired(field)) required.push(field.name);
  });

  return {
    type: "object",
    title: descriptor.label,
    properties,
    required,
    propertyOrder: fields.map((f) => f.name),
    defaultProperties: fields.map((f) => f.name),
    additionalProperties: false,
  };
}

/** Initial form values: field defaults, or the current row when editing */
export function startValues(descriptor: ModelDescriptor, row: Row | null): Row {
  const values: Row = {};
  for (const field of descriptor.formFields()) {
    if (row) {
      values[field.name] = row[field.name] ?? null;
    } else if (field.default !== undefined) {
      values[field.name] = field.default;
    }
  }
  return values;
}

// ---------------------------------------------------------------------------
// Payload validation
// ---------------------------------------------------------------------------

const pkValue = z.union([z.string().min(1), z.number().int()]);

function zodFor(field: FieldInfo): z.ZodTypeAny {
  switch (field.kind) {
    case "string":
      return field.maxLength ? z.string().max(field.maxLength) : z.string();
    case "text":
      return z.string();
    case "uuid":
      return z.string().uuid();
    case "integer":
      return z.number().int();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
    case "date":
      return z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a date (YYYY-MM-DD)");
    case "datetime":
      return z.string().datetime({ offset: true });
    case "json":
      return z.unknown();
    case "choice": {
      const allowed = (field.choices ?? []).map((c) => c.value);
      return z
        .union([z.string(), z.number()])
        .refine((v) => allowed.includes(v), { message: "Invalid choice" });
    }
    case "fk":
      return pkValue;
    case "m2m":
      return z.array(pkValue);
  }
}

export function payloadSchema(descriptor: ModelDescriptor, mode: PayloadMode) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const field of descriptor.editableFields()) {
    if (mode !== "create" && field.name === descriptor.pk) continue;
    let schema = zodFor(field);
    if (field.nullable) schema = schema.nullable();
    if (mode === "partial" || !isRequired(field)) schema = schema.optional();
    shape[field.name] = schema;
  }
  return z.object(shape).strict();
}

/**
 * Validates a create/update payload.
 * Unknown and read-only fields are rejected, not silently dropped; so is
 * the primary key on updates.
 */
export function cleanPayload(descriptor: ModelDescriptor, payload: unknown, mode: PayloadMode): Row {
  const result = payloadSchema(descriptor, mode).safeParse(payload ?? {});
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${descriptor.label} payload`,
      fieldErrorsFromZod(result.error, "Unknown or read-only field")
    );
  }
  const cleaned: Row = {};
  for (const [key, value] of Object.entries(result.data)) {
    if (value !== undefined) cleaned[key] = value;
  }
  return cleaned;
}
