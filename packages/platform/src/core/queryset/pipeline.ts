/**
 * QuerySet Pipeline
 *
 * The three canonical query shapes, each a fixed fold over descriptor hooks:
 *
 *   list       base → prefetch → projection → row-level security
 *   object     base → prefetch → row-level security
 *   form-base  base → prefetch-for-writes
 *
 * Row-level security is always the last stage, so nothing applied after it
 * can widen what it narrowed. Callers may still narrow the result (filters,
 * search, slicing) but cannot reorder or skip stages.
 *
 * Every stage result is checked with adapter.isQuerySet(); a hook that
 * returns anything else raises ConfigurationError naming the hook.
 */

import type { QuerySet } from "@adminforge/contracts";
import { ConfigurationError } from "../errors/index.js";
import type { AdminContext, Awaitable, ModelDescriptor } from "../descriptor/descriptor.js";

export type QueryShape = "list" | "object" | "formBase";

type Stage = {
  hook: string;
  apply: (qs: QuerySet, ctx: AdminContext) => Awaitable<unknown>;
};

function stagesFor(descriptor: ModelDescriptor, shape: QueryShape): Stage[] {
  const prefetch: Stage = {
    hook: "applyRelationPrefetch",
    apply: (qs, ctx) => descriptor.applyRelationPrefetch(qs, ctx),
  };
  const rls: Stage = {
    hook: "applyRowLevelSecurity",
    apply: (qs, ctx) => descriptor.applyRowLevelSecurity(qs, ctx),
  };
  switch (shape) {
    case "list":
      return [
        prefetch,
        { hook: "applyProjection", apply: (qs, ctx) => descriptor.applyProjection(qs, ctx) },
        rls,
      ];
    case "object":
      return [prefetch, rls];
    case "formBase":
      return [
        {
          hook: "applyRelationPrefetchForWrites",
          apply: (qs, ctx) => descriptor.applyRelationPrefetchForWrites(qs, ctx),
        },
      ];
  }
}

function ensureQuerySet(descriptor: ModelDescriptor, hook: string, value: unknown): QuerySet {
  if (!descriptor.adapter.isQuerySet(value)) {
    throw new ConfigurationError(
      `${descriptor.dottedName}: ${hook}() must return a queryset from the "${descriptor.adapter.name}" adapter`
    );
  }
  return value;
}

export async function buildQuerySet(
  descriptor: ModelDescriptor,
  shape: QueryShape,
  ctx: AdminContext
): Promise<QuerySet> {
  let qs = ensureQuerySet(descriptor, "getQuerySet", await descriptor.getQuerySet(ctx));
  for (const stage of stagesFor(descriptor, shape)) {
    qs = ensureQuerySet(descriptor, stage.hook, await stage.apply(qs, ctx));
  }
  return qs;
}

export function listQuerySet(descriptor: ModelDescriptor, ctx: AdminContext): Promise<QuerySet> {
  return buildQuerySet(descriptor, "list", ctx);
}

export function objectQuerySet(descriptor: ModelDescriptor, ctx: AdminContext): Promise<QuerySet> {
  return buildQuerySet(descriptor, "object", ctx);
}

export function formBaseQuerySet(descriptor: ModelDescriptor, ctx: AdminContext): Promise<QuerySet> {
  return buildQuerySet(descriptor, "formBase", ctx);
}

