/**
 * List Parameters & Filters
 *
 * Turns list query parameters into adapter conditions:
 *
 *   ?filter.status.eq=draft       → { field: "status", op: "eq", value: "draft" }
 *   ?filter.id.in=1,2,3           → { field: "id", op: "in", value: [1, 2, 3] }
 *   ?filter.published_at.eq=null  → { field: "published_at", op: "isnull", value: true }
 *
 * Every problem is collected into one ValidationError keyed by the
 * offending parameter name.
 */

import type {
  Condition,
  FieldInfo,
  FieldKind,
  FilterOp,
} from "@adminforge/contracts";
import { ValidationError, type FieldError } from "../errors/index.js";
import type { ModelDescriptor } from "./descriptor.js";

export const FILTER_OPS: readonly FilterOp[] = ["eq", "icontains", "gte", "lte", "gt", "lt", "in"];

export const OPS_BY_KIND: Record<FieldKind, readonly FilterOp[]> = {
  string: ["eq", "icontains", "in"],
  text: ["eq", "icontains", "in"],
  uuid: ["eq", "icontains", "in"],
  integer: ["eq", "gte", "lte", "gt", "lt", "in"],
  number: ["eq", "gte", "lte", "gt", "lt", "in"],
  boolean: ["eq"],
  date: ["eq", "gte", "lte", "gt", "lt"],
  datetime: ["eq", "gte", "lte", "gt", "lt"],
  choice: ["eq", "in"],
  fk: ["eq", "in"],
  m2m: [],
  json: [],
};

const FILTER_PREFIX = "filter.";
const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function isFilterOp(value: string): value is FilterOp {
  return (FILTER_OPS as readonly string[]).includes(value);
}

/**
 * Coerces one raw parameter value to the field's type.
 * Throws an Error whose message is shown to the client.
 */
export function coerceValue(field: FieldInfo, raw: string): unknown {
  switch (field.kind) {
    case "integer":
      if (!/^-?\d+$/.test(raw)) throw new Error("Expected an integer");
      return Number(raw);
    case "number": {
      const n = Number(raw);
      if (raw.trim() === "" || !Number.isFinite(n)) throw new Error("Expected a number");
      return n;
    }
    case "boolean": {
      const lowered = raw.toLowerCase();
      if (TRUE_VALUES.has(lowered)) return true;
      if (FALSE_VALUES.has(lowered)) return false;
      throw new Error("Expected a boolean");
    }
    case "date":
      if (!/^\d{4}-\d{2}-\d{2}$/.test(raw) || Number.isNaN(Date.parse(raw))) {
        throw new Error("Expected a date (YYYY-MM-DD)");
      }
      return raw;
    case "datetime":
      if (Number.isNaN(Date.parse(raw))) throw new Error("Expected a date-time");
      return raw;
    case "choice": {
      const match = field.choices?.find((c) => String(c.value) === raw);
      if (!match) throw new Error(`"${raw}" is not a valid choice`);
      return match.value;
    }
    case "fk":
      return /^-?\d+$/.test(raw) ? Number(raw) : raw;
    default:
      return raw;
  }
}

function parseOne(descriptor: ModelDescriptor, key: string, raw: string): Condition {
  const rest = key.slice(FILTER_PREFIX.length);
  const dot = rest.lastIndexOf(".");
  if (dot <= 0) throw new Error("Expected filter.<field>.<op>");

  const fieldName = rest.slice(0, dot);
  const op = rest.slice(dot + 1);
  const field = descriptor.field(fieldName);
  if (!field || !descriptor.listFilter.includes(fieldName)) {
    throw new Error(`Filtering on "${fieldName}" is not allowed`);
  }
  if (!isFilterOp(op)) {
    throw new Error(`Unknown operator "${op}"`);
  }
  if (!OPS_BY_KIND[field.kind].includes(op)) {
    throw new Error(`Operator "${op}" is not supported for ${field.kind} fields`);
  }

  if (op === "eq" && raw === "null") {
    return { field: fieldName, op: "isnull", value: true };
  }
  if (op === "in") {
    const parts = raw.split(",").map((p) => p.trim()).filter((p) => p.length > 0);
    if (parts.length === 0) throw new Error("Expected a comma-separated list");
    return { field: fieldName, op, value: parts.map((p) => coerceValue(field, p)) };
  }
  return { field: fieldName, op, value: coerceValue(field, raw) };
}

/** Conditions for every filter.* key in params; other keys are ignored */
export function parseFilterParams(
  descriptor: ModelDescriptor,
  params: Record<string, string>
): Condition[] {
  const conditions: Condition[] = [];
  const errors: FieldError[] = [];

  for (const [key, raw] of Object.entries(params)) {
    if (!key.startsWith(FILTER_PREFIX)) continue;
    try {
      conditions.push(parseOne(descriptor, key, raw));
    } catch (error) {
      errors.push({
        field: key,
        message: error instanceof Error ? error.message : "Invalid filter",
        code: "invalid_filter",
      });
    }
  }

  if (errors.length > 0) {
    throw new ValidationError("Invalid filter parameters", errors);
  }
  return conditions;
}

/**
 * Resolves the "order" parameter. Unknown or unsortable fields fall back
 * to the descriptor's default ordering.
 */
export function resolveOrdering(descriptor: ModelDescriptor, order: string | undefined): string[] {
  if (order) {
    const bare = order.startsWith("-") ? order.slice(1) : order;
    if (descriptor.isSortable(bare)) return [order];
  }
  return [...descriptor.ordering];
}

/**
 * Validates "search". Searching a resource with no search fields is a
 * client error rather than a silent no-op.
 */
export function resolveSearch(descriptor: ModelDescriptor, search: string | undefined): string | null {
  const term = search?.trim() ?? "";
  if (!term) return null;
  if (descriptor.searchFields.length === 0) {
    throw ValidationError.field("search", "Search is not enabled for this resource", "search_disabled");
  }
  return term;
}

export interface FilterSpec {
  field: string;
  label: string;
  kind: FieldKind;
  ops: readonly FilterOp[];
  choices?: FieldInfo["choices"];
}

/** What the _filters endpoint advertises */
export function filterSpecs(descriptor: ModelDescriptor): FilterSpec[] {
  return descriptor.listFilter.flatMap((name) => {
    const field = descriptor.field(name);
    if (!field) return [];
    const spec: FilterSpec = {
      field: name,
      label: descriptor.fieldLabel(field),
      kind: field.kind,
      ops: OPS_BY_KIND[field.kind],
    };
    if (field.choices) spec.choices = field.choices;
    return [spec];
  });
}
