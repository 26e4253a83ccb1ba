/**
 * Bulk Action Definition
 *
 * An admin action is a named operation applied to a selection of rows:
 * "delete selected", "publish", "assign author". The selection (scope) is
 * either an explicit id list or a query that is re-derived through the
 * list pipeline, so it is always subject to row-level security.
 */

import type { PermAction } from "./permission.js";
import type { PrimaryKey } from "./adapter.js";

// ---------------------------------------------------------------------------
// Parameters
// ---------------------------------------------------------------------------

export type ActionParamType = "string" | "integer" | "number" | "boolean";

export interface ActionParamSpec {
  type: ActionParamType;

  /** Defaults to true */
  required?: boolean;

  label?: string;
}

// ---------------------------------------------------------------------------
// Scope
// ---------------------------------------------------------------------------

export type ScopeKind = "ids" | "query";

/**
 * A selection of target rows.
 * Query params use the list endpoint's vocabulary:
 * { search: "draft", order: "-id", "filter.status.eq": "draft" }
 */
export type Scope =
  | { kind: "ids"; ids: PrimaryKey[] }
  | { kind: "query"; params: Record<string, string> };

// ---------------------------------------------------------------------------
// Spec
// ---------------------------------------------------------------------------

/** Static, serializable metadata for one action */
export interface ActionSpec {
  /** Unique within a descriptor (e.g., "delete_selected") */
  name: string;

  label: string;

  description?: string;

  /** Declared parameters. Anything else is rejected. */
  paramsSchema: Record<string, ActionParamSpec>;

  /** Which scope kinds the action accepts */
  scopeKinds: ScopeKind[];

  /**
   * Destructive actions refuse to run unless params.confirm === true.
   * The check happens before any row is read.
   */
  isDestructive: boolean;

  /** Permission required to run the action. Defaults to "change". */
  requiredPerm?: PermAction;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface ActionItemError {
  pk: PrimaryKey | null;
  error: string;
}

/** What an action's execute function reports for one batch */
export interface ActionOutcome {
  affected: number;
  skipped: number;
  errors: ActionItemError[];
}

/** Synchronous run: the full outcome is returned inline */
export interface ActionInlineResult extends ActionOutcome {
  ok: boolean;
  background: false;
}

/** Deferred run: the caller polls the task handle */
export interface ActionDeferredResult {
  ok: true;
  background: true;
  taskHandle: string;
  total: number;
}

export type ActionRunResult = ActionInlineResult | ActionDeferredResult;
