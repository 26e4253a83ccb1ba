/**
 * Admin Action Types
 *
 * An AdminAction is the serializable ActionSpec plus its business logic.
 * execute() receives a queryset that is already scoped, permission-gated
 * and (for deferred runs) limited to one batch. It reports counts instead
 * of throwing for per-row problems.
 */

import type {
  ActionOutcome,
  ActionSpec,
  Logger,
  PermAction,
  QuerySet,
  Subject,
} from "@adminforge/contracts";
import type { ModelDescriptor } from "../descriptor/descriptor.js";

export interface ActionExecution {
  /** The selection (or one batch of it) */
  queryset: QuerySet;

  /** Validated params; `confirm` is stripped */
  params: Record<string, unknown>;

  subject: Subject;
  descriptor: ModelDescriptor;
  logger: Logger;
}

export interface AdminAction extends ActionSpec {
  execute(run: ActionExecution): Promise<ActionOutcome>;
}

/**
 * Helper to define an action with type checking.
 * Use this in descriptor files for autocomplete and validation.
 */
export function defineAdminAction(action: AdminAction): AdminAction {
  return action;
}

/** Permission an action requires when it declares none */
export const DEFAULT_ACTION_PERM: PermAction = "change";
