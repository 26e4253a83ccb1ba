/**
 * Wire serializers. The HTTP surface speaks snake_case; row contents are
 * passed through untouched.
 */

import type { ActionRunResult, ActionSpec, PermAction } from "@adminforge/contracts";
import type { ColumnMeta } from "../../core/descriptor/descriptor.js";
import type { FilterSpec } from "../../core/descriptor/filters.js";
import type { ListResult } from "../../core/services/admin-service.js";
import type { TaskRecord } from "../../core/actions/tasks.js";
import { DEFAULT_ACTION_PERM } from "../../core/actions/types.js";

export function serializeColumn(column: ColumnMeta) {
  return {
    key: column.key,
    label: column.label,
    type: column.type,
    sortable: column.sortable,
    choices_map: column.choicesMap,
  };
}

export function serializeList(result: ListResult) {
  return {
    columns: result.columns,
    columns_meta: result.columnsMeta.map(serializeColumn),
    items: result.items.map((item) => ({
      data: item.row,
      can_change: item.canChange,
      can_delete: item.canDelete,
    })),
    page: result.page,
    pages: result.pages,
    total: result.total,
    order: result.order,
    per_page: result.perPage,
    id_field: result.idField,
  };
}

export function serializeFilter(spec: FilterSpec) {
  return {
    field: spec.field,
    label: spec.label,
    kind: spec.kind,
    ops: spec.ops,
    choices: spec.choices ?? null,
  };
}

export function serializeActionSpec(action: ActionSpec) {
  const requiredPerm: PermAction = action.requiredPerm ?? DEFAULT_ACTION_PERM;
  return {
    name: action.name,
    label: action.label,
    description: action.description ?? null,
    params_schema: action.paramsSchema,
    scope_kinds: action.scopeKinds,
    danger: action.isDestructive,
    required_perm: requiredPerm,
  };
}

export function serializeRunResult(result: ActionRunResult) {
  if (result.background) {
    return { ok: true, background: true, task_handle: result.taskHandle, total: result.total };
  }
  return {
    ok: result.ok,
    background: false,
    affected: result.affected,
    skipped: result.skipped,
    errors: result.errors,
  };
}

export function serializeTask(task: TaskRecord) {
  return {
    task_handle: task.handle,
    action: task.action,
    status: task.status,
    total: task.total,
    processed: task.processed,
    affected: task.affected,
    skipped: task.skipped,
    errors: task.errors,
    batches: task.batches,
    cancel_requested: task.cancelRequested,
    error: task.error,
    created_at: task.createdAt.toISOString(),
    updated_at: task.updatedAt.toISOString(),
    finished_at: task.finishedAt ? task.finishedAt.toISOString() : null,
  };
}
