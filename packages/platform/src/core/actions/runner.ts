/**
 * Action Runner
 *
 * Resolves a selection, previews its size and executes bulk actions.
 *
 *   run()
 *     1. unknown action            → NotFoundError
 *     2. destructive, no confirm   → ValidationError (nothing is read)
 *     3. params vs paramsSchema    → ValidationError
 *     4. scope (or scope token)    → TokenError / ValidationError
 *     5. count ≤ batchThreshold    → execute inline, full result returned
 *        count > batchThreshold    → task scheduled, handle returned
 *
 * Deferred tasks walk the selection by primary key in chunkSize batches
 * (keyset pagination), checkpointing the task record after each batch.
 * There is no cross-batch rollback: rows changed by finished batches stay
 * changed and the task's counts say how many.
 *
 * Permission gates are applied by the caller (router builder);
 * requiredPermission() tells it which one an action needs.
 */

import type {
  ActionDeferredResult,
  ActionInlineResult,
  ActionOutcome,
  ActionRunResult,
  PermAction,
  PrimaryKey,
  QuerySet,
  Scope,
} from "@adminforge/contracts";
import { NotFoundError, ValidationError } from "../errors/index.js";
import { publish } from "../event-bus/index.js";
import { captureException } from "../observability/index.js";
import type { AdminContext, ModelDescriptor } from "../descriptor/descriptor.js";
import type { AdminService } from "../services/admin-service.js";
import type { ModelResource } from "../site/admin-site.js";
import { DEFAULT_ACTION_PERM, type AdminAction } from "./types.js";
import { isConfirmed, validateActionParams } from "./params.js";
import type { IssuedToken, ScopeTokenService } from "./scope-token.js";
import { isFinished, type TaskRecord, type TaskStore } from "./tasks.js";

/** A selection given inline or by a previously issued token */
export type ScopeInput = { scope: Scope } | { scopeToken: string };

export interface ActionRunnerOptions {
  service: AdminService;
  tokens: ScopeTokenService;
  tasks: TaskStore;

  /** Selections larger than this run as deferred tasks */
  batchThreshold: number;

  /** Rows per deferred batch */
  chunkSize: number;
}

/** Permission an action requires; unknown actions are not found */
export function requiredPermission(descriptor: ModelDescriptor, actionName: string): PermAction {
  return getActionOrThrow(descriptor, actionName).requiredPerm ?? DEFAULT_ACTION_PERM;
}

function getActionOrThrow(descriptor: ModelDescriptor, actionName: string): AdminAction {
  const action = descriptor.getAction(actionName);
  if (!action) {
    throw new NotFoundError(`Unknown action "${actionName}" for ${descriptor.dottedName}`);
  }
  return action;
}

function asPk(value: unknown): PrimaryKey | null {
  return typeof value === "string" || typeof value === "number" ? value : null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ActionRunner {
  private readonly inflight = new Set<Promise<void>>();

  constructor(private readonly options: ActionRunnerOptions) {}

  // ---------------------------------------------------------------------------
  // Scopes
  // ---------------------------------------------------------------------------

  /** Signs a scope after checking it against the current descriptor */
  async issueToken(
    resource: ModelResource,
    scope: Scope,
    ctx: AdminContext,
    ttlSeconds?: number
  ): Promise<IssuedToken> {
    await this.options.service.scopedQuerySet(resource, scope, ctx);
    return this.options.tokens.issue(resource.contentType, scope, ctx.subject, ttlSeconds);
  }

  /** Size of the selection as the subject would act on it */
  async preview(resource: ModelResource, input: ScopeInput, ctx: AdminContext): Promise<number> {
    const scope = this.resolveScope(resource, input, ctx);
    const qs = await this.options.service.scopedQuerySet(resource, scope, ctx);
    return qs.count();
  }

  private resolveScope(resource: ModelResource, input: ScopeInput, ctx: AdminContext): Scope {
    if ("scopeToken" in input) {
      return this.options.tokens.resolve(input.scopeToken, resource.contentType, ctx.subject);
    }
    return input.scope;
  }

  // ---------------------------------------------------------------------------
  // Run
  // ---------------------------------------------------------------------------

  async run(
    resource: ModelResource,
    actionName: string,
    input: ScopeInput,
    rawParams: unknown,
    ctx: AdminContext
  ): Promise<ActionRunResult> {
    const { descriptor } = resource;
    const action = getActionOrThrow(descriptor, actionName);

    if (action.isDestructive && !isConfirmed(rawParams)) {
      throw ValidationError.field(
        "params.confirm",
        `"${action.label}" is destructive and requires confirm: true`,
        "confirmation_required"
      );
    }
    const params = validateActionParams(action, rawParams);

    const scope = this.resolveScope(resource, input, ctx);
    if (!action.scopeKinds.includes(scope.kind)) {
      throw ValidationError.field("scope", `Action "${action.name}" does not accept ${scope.kind} scopes`, "scope_kind");
    }

    const queryset = await this.options.service.scopedQuerySet(resource, scope, ctx);
    const total = await queryset.count();

    if (total > this.options.batchThreshold) {
      return this.schedule(resource, action, queryset, params, total, ctx);
    }
    return this.runInline(resource, action, queryset, params, total, ctx);
  }

  private async runInline(
    resource: ModelResource,
    action: AdminAction,
    queryset: QuerySet,
    params: Record<string, unknown>,
    total: number,
    ctx: AdminContext
  ): Promise<ActionInlineResult> {
    const { descriptor } = resource;
    let outcome: ActionOutcome;
    try {
      outcome = await action.execute({
        queryset,
        params,
        subject: ctx.subject,
        descriptor,
        logger: ctx.logger,
      });
    } catch (error) {
      const message = errorMessage(error);
      ctx.logger.error("Action failed", { resource: descriptor.dottedName, action: action.name, error: message });
      await publish({
        type: "admin.action.failed",
        payload: { contentType: descriptor.dottedName, action: action.name, error: message, userId: ctx.subject.id },
      });
      throw error;
    }

    ctx.logger.info("Action completed", {
      resource: descriptor.dottedName,
      action: action.name,
      total,
      affected: outcome.affected,
      errors: outcome.errors.length,
    });
    await publish({
      type: "admin.action.completed",
      payload: {
        contentType: descriptor.dottedName,
        action: action.name,
        background: false,
        affected: outcome.affected,
        skipped: outcome.skipped,
        errors: outcome.errors.length,
        userId: ctx.subject.id,
      },
    });

    return {
      ok: outcome.errors.length === 0,
      background: false,
      affected: outcome.affected,
      skipped: outcome.skipped,
      errors: outcome.errors,
    };
  }

  private async schedule(
    resource: ModelResource,
    action: AdminAction,
    queryset: QuerySet,
    params: Record<string, unknown>,
    total: number,
    ctx: AdminContext
  ): Promise<ActionDeferredResult> {
    const task = await this.options.tasks.create({
      contentType: resource.contentType.id,
      action: action.name,
      subjectId: ctx.subject.id,
      total,
    });
    ctx.logger.info("Action deferred", {
      resource: resource.descriptor.dottedName,
      action: action.name,
      total,
      taskHandle: task.handle,
    });

    const job: Promise<void> = this.process(task.handle, resource, action, queryset, params, ctx).finally(() => {
      this.inflight.delete(job);
    });
    this.inflight.add(job);

    return { ok: true, background: true, taskHandle: task.handle, total };
  }

  /** Keyset-batched execution of a deferred task. Never rejects. */
  private async process(
    handle: string,
    resource: ModelResource,
    action: AdminAction,
    queryset: QuerySet,
    params: Record<string, unknown>,
    ctx: AdminContext
  ): Promise<void> {
    const { tasks, chunkSize } = this.options;
    const { descriptor } = resource;
    const pk = descriptor.pk;

    // Let the request that scheduled the task respond first
    await new Promise<void>((resolve) => setImmediate(resolve));

    let processed = 0;
    let affected = 0;
    let skipped = 0;
    let batches = 0;
    let errorCount = 0;

    try {
      await tasks.update(handle, { status: "running" });
      let last: PrimaryKey | null = null;

      for (;;) {
        if (await tasks.isCancelRequested(handle)) {
          await tasks.update(handle, { status: "cancelled", finishedAt: new Date() });
          ctx.logger.info("Action cancelled", { taskHandle: handle, processed });
          return;
        }

        let page = queryset.orderBy([pk]);
        if (last !== null) page = page.filter([{ field: pk, op: "gt", value: last }]);
        const rows = await page.slice(0, chunkSize).fetch();
        if (rows.length === 0) break;

        const ids = rows.map((row) => asPk(row[pk])).filter((id): id is PrimaryKey => id !== null);
        const lastId = ids[ids.length - 1];
        if (lastId === undefined) break;
        last = lastId;

        const outcome = await action.execute({
          queryset: queryset.filter([{ field: pk, op: "in", value: ids }]),
          params,
          subject: ctx.subject,
          descriptor,
          logger: ctx.logger,
        });

        processed += rows.length;
        affected += outcome.affected;
        skipped += outcome.skipped;
        errorCount += outcome.errors.length;
        batches += 1;
        await tasks.checkpoint(handle, { processed, affected, skipped, batches, errors: outcome.errors });
      }

      await tasks.update(handle, { status: "completed", finishedAt: new Date() });
      ctx.logger.info("Deferred action completed", { taskHandle: handle, processed, affected, batches });
      await publish({
        type: "admin.action.completed",
        payload: {
          contentType: descriptor.dottedName,
          action: action.name,
          background: true,
          taskHandle: handle,
          affected,
          skipped,
          errors: errorCount,
          userId: ctx.subject.id,
        },
      });
    } catch (error) {
      const message = errorMessage(error);
      ctx.logger.error("Deferred action failed", { taskHandle: handle, processed, affected, error: message });
      captureException(error instanceof Error ? error : new Error(message), {
        userId: ctx.subject.id,
        contentType: descriptor.dottedName,
        taskHandle: handle,
      });
      try {
        await tasks.update(handle, { status: "failed", error: message, finishedAt: new Date() });
        await publish({
          type: "admin.action.failed",
          payload: {
            contentType: descriptor.dottedName,
            action: action.name,
            taskHandle: handle,
            error: message,
            affected,
            userId: ctx.subject.id,
          },
        });
      } catch (recordError) {
        ctx.logger.error("Could not record task failure", { taskHandle: handle, error: errorMessage(recordError) });
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  /** Task of this resource, or NotFoundError */
  async getTask(resource: ModelResource, handle: string): Promise<TaskRecord> {
    const task = await this.options.tasks.get(handle);
    if (!task || task.contentType !== resource.contentType.id) {
      throw new NotFoundError("Task not found");
    }
    return task;
  }

  /** Best effort: honoured before the next batch starts */
  async cancel(resource: ModelResource, handle: string): Promise<TaskRecord> {
    const task = await this.getTask(resource, handle);
    if (isFinished(task)) {
      throw ValidationError.field("task", `Task is already ${task.status}`, "task_finished");
    }
    const updated = await this.options.tasks.requestCancel(handle);
    if (!updated) throw new NotFoundError("Task not found");
    return updated;
  }

  /** Resolves once every deferred task has settled */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight));
    }
  }

  get pendingTasks(): number {
    return this.inflight.size;
  }
}
