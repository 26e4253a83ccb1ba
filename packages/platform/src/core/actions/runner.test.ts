/**
 * Action Runner: Test Suite
 *
 * Inline vs deferred execution around the batch threshold, the
 * destructive confirmation gate, scope tokens and task lifecycle.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { ActionDeferredResult, ActionRunResult, DomainEvent, QuerySet } from "@adminforge/contracts";
import { ActionRunner, requiredPermission } from "./runner.js";
import { ScopeTokenService } from "./scope-token.js";
import { MemoryTaskStore } from "./tasks.js";
import { defineAdminAction } from "./types.js";
import { AdminService } from "../services/admin-service.js";
import { AdminSite, type ModelResource } from "../site/admin-site.js";
import { ModelDescriptor, type AdminContext } from "../descriptor/descriptor.js";
import { NotFoundError, TokenError, ValidationError } from "../errors/index.js";
import { PermissionChecker } from "../permissions/checker.js";
import { MemoryPermissionStore } from "../permissions/memory-store.js";
import { clearSubscribers, subscribe } from "../event-bus/index.js";
import { MemoryAdapter } from "../../adapters/memory/adapter.js";
import { articleRows, makeAdapter, makeContext, makeSubject } from "../../testing/fixtures.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const publish = defineAdminAction({
  name: "publish",
  label: "Publish",
  paramsSchema: {},
  scopeKinds: ["ids", "query"],
  isDestructive: false,
  async execute({ queryset }) {
    const affected = await queryset.update({ status: "published" });
    return { affected, skipped: 0, errors: [] };
  },
});

const stamp = defineAdminAction({
  name: "stamp",
  label: "Stamp",
  paramsSchema: { note: { type: "string" } },
  scopeKinds: ["ids"],
  isDestructive: false,
  async execute({ queryset, params }) {
    const affected = await queryset.update({ body: String(params.note) });
    return { affected, skipped: 0, errors: [] };
  },
});

const explode = defineAdminAction({
  name: "explode",
  label: "Explode",
  paramsSchema: {},
  scopeKinds: ["ids", "query"],
  isDestructive: false,
  async execute({ queryset }) {
    const rows = await queryset.fetch();
    if (rows.some((row) => Number(row.id) > 80)) throw new Error("Batch exploded");
    return { affected: rows.length, skipped: 0, errors: [] };
  },
});

const audit = defineAdminAction({
  name: "audit",
  label: "Audit",
  paramsSchema: {},
  scopeKinds: ["query"],
  isDestructive: false,
  async execute({ queryset }) {
    const rows = await queryset.fetch();
    const flagged = rows.filter((row) => Number(row.id) % 50 === 0);
    return {
      affected: rows.length - flagged.length,
      skipped: 0,
      errors: flagged.map((row) => ({ pk: Number(row.id), error: "Flagged" })),
    };
  },
});

class ArticleDescriptor extends ModelDescriptor {
  applyRowLevelSecurity(qs: QuerySet, ctx: AdminContext) {
    if (ctx.subject.isSuperuser) return qs;
    return qs.filter([{ field: "author", op: "eq", value: ctx.subject.username }]);
  }
}

let adapter: MemoryAdapter;
let articles: ModelResource;
let categories: ModelResource;
let runner: ActionRunner;
let tasks: MemoryTaskStore;
let events: DomainEvent[];

async function setup(rowCount: number): Promise<void> {
  adapter = makeAdapter();
  await adapter.load("Article", articleRows(rowCount));

  const site = new AdminSite();
  site.register(
    new ArticleDescriptor({
      adapter,
      model: "Article",
      appLabel: "blog",
      listDisplay: ["title", "status"],
      listFilter: ["status"],
      actions: [publish, stamp, explode, audit],
    })
  );
  site.register(new ModelDescriptor({ adapter, model: "Category", appLabel: "blog" }));
  await site.finalize();
  articles = site.resolve("blog", "article") ?? fail("blog.article missing");
  categories = site.resolve("blog", "category") ?? fail("blog.category missing");

  const checker = new PermissionChecker(new MemoryPermissionStore(), site.registry);
  tasks = new MemoryTaskStore();
  runner = new ActionRunner({
    service: new AdminService(checker, { defaultPerPage: 20, maxPerPage: 100 }),
    tokens: new ScopeTokenService({ secret: "test-secret", ttlSeconds: 60, maxTtlSeconds: 300 }),
    tasks,
    batchThreshold: 100,
    chunkSize: 40,
  });
}

function fail(message: string): never {
  throw new Error(message);
}

function deferred(result: ActionRunResult): ActionDeferredResult {
  if (!result.background) throw new Error("expected a deferred result");
  return result;
}

const everything = { scope: { kind: "query" as const, params: {} } };

async function countWhere(field: string, value: unknown): Promise<number> {
  return adapter.all("Article").filter([{ field, op: "eq", value }]).count();
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  events = [];
  subscribe({ eventType: "admin.action.*", name: "Collect", handler: async (e) => void events.push(e) });
});

afterEach(async () => {
  await runner.drain();
  clearSubscribers();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("batch threshold", () => {
  it("runs a selection of exactly the threshold inline", async () => {
    await setup(100);
    const result = await runner.run(articles, "publish", everything, {}, makeContext());
    expect(result).toEqual({ ok: true, background: false, affected: 100, skipped: 0, errors: [] });
    expect(await countWhere("status", "published")).toBe(100);
  });

  it("defers a selection of threshold + 1", async () => {
    await setup(101);
    const result = deferred(await runner.run(articles, "publish", everything, {}, makeContext()));
    expect(result).toMatchObject({ ok: true, background: true, total: 101 });
    expect(typeof result.taskHandle).toBe("string");

    await runner.drain();
    const task = await runner.getTask(articles, result.taskHandle);
    expect(task).toMatchObject({ status: "completed", total: 101, processed: 101, affected: 101, batches: 3 });
    expect(await countWhere("status", "published")).toBe(101);
  });

  it("deletes a large selection batch by batch", async () => {
    await setup(130);
    const result = deferred(
      await runner.run(articles, "delete_selected", everything, { confirm: true }, makeContext())
    );
    await runner.drain();
    expect(await runner.getTask(articles, result.taskHandle)).toMatchObject({
      status: "completed",
      processed: 130,
      affected: 130,
      batches: 4,
    });
    expect(await adapter.all("Article").count()).toBe(0);
  });
});

describe("destructive confirmation", () => {
  it("refuses to run without confirm: true and touches nothing", async () => {
    await setup(10);
    const ids = { scope: { kind: "ids" as const, ids: [1, 2] } };
    await expect(runner.run(articles, "delete_selected", ids, {}, makeContext())).rejects.toThrow(ValidationError);
    await expect(
      runner.run(articles, "delete_selected", ids, { confirm: "true" }, makeContext())
    ).rejects.toThrow('"Delete selected" is destructive and requires confirm: true');
    expect(await adapter.all("Article").count()).toBe(10);
  });

  it("checks confirmation before resolving the scope", async () => {
    await setup(10);
    await expect(
      runner.run(articles, "delete_selected", { scopeToken: "not-a-token" }, {}, makeContext())
    ).rejects.toThrow("requires confirm: true");
  });

  it("runs once confirmed", async () => {
    await setup(10);
    const result = await runner.run(
      articles,
      "delete_selected",
      { scope: { kind: "ids", ids: [1, 2] } },
      { confirm: true },
      makeContext()
    );
    expect(result).toEqual({ ok: true, background: false, affected: 2, skipped: 0, errors: [] });
    expect(await adapter.all("Article").count()).toBe(8);
  });
});

describe("validation", () => {
  beforeEach(() => setup(10));

  it("rejects unknown actions", async () => {
    await expect(runner.run(articles, "nope", everything, {}, makeContext())).rejects.toThrow(NotFoundError);
  });

  it("validates params and passes them to the action", async () => {
    const ids = { scope: { kind: "ids" as const, ids: [3] } };
    await expect(runner.run(articles, "stamp", ids, { note: 5 }, makeContext())).rejects.toThrow(ValidationError);
    await runner.run(articles, "stamp", ids, { note: "checked" }, makeContext());
    expect(await countWhere("body", "checked")).toBe(1);
  });

  it("rejects scope kinds the action does not accept", async () => {
    await expect(runner.run(articles, "stamp", everything, { note: "x" }, makeContext())).rejects.toThrow(
      'Action "stamp" does not accept query scopes'
    );
  });

  it("re-validates query scopes against the descriptor", async () => {
    const bad = { scope: { kind: "query" as const, params: { "filter.title.eq": "x" } } };
    await expect(runner.run(articles, "publish", bad, {}, makeContext())).rejects.toThrow(
      "Invalid filter parameters"
    );
  });
});

describe("row-level security", () => {
  it("only acts on rows the subject can see", async () => {
    await setup(10);
    const bob = makeSubject({ id: "u-bob", username: "bob" });
    const result = await runner.run(
      articles,
      "publish",
      { scope: { kind: "ids", ids: [1, 3, 4] } },
      {},
      makeContext(bob)
    );
    expect(result).toMatchObject({ affected: 1 });
    expect(await runner.preview(articles, everything, makeContext(bob))).toBe(5);
  });
});

describe("scope tokens", () => {
  beforeEach(() => setup(10));

  it("previews and runs the signed selection", async () => {
    const ctx = makeContext();
    const filter = { kind: "query" as const, params: { "filter.status.eq": "draft" } };
    const { token } = await runner.issueToken(articles, filter, ctx);

    expect(await runner.preview(articles, { scopeToken: token }, ctx)).toBe(5);
    const result = await runner.run(articles, "publish", { scopeToken: token }, {}, ctx);
    expect(result).toMatchObject({ ok: true, affected: 5 });
  });

  it("refuses a token issued for another resource", async () => {
    const { token } = await runner.issueToken(categories, { kind: "ids", ids: [1] }, makeContext());
    await expect(runner.preview(articles, { scopeToken: token }, makeContext())).rejects.toThrow(TokenError);
  });

  it("validates the scope before signing it", async () => {
    await expect(
      runner.issueToken(articles, { kind: "query", params: { "filter.views.eq": "1" } }, makeContext())
    ).rejects.toThrow(ValidationError);
  });
});

describe("deferred tasks", () => {
  it("honours a cancel request before the next batch", async () => {
    await setup(150);
    const { taskHandle } = deferred(await runner.run(articles, "publish", everything, {}, makeContext()));
    const requested = await runner.cancel(articles, taskHandle);
    expect(requested.cancelRequested).toBe(true);

    await runner.drain();
    expect(await runner.getTask(articles, taskHandle)).toMatchObject({ status: "cancelled", processed: 0 });
    expect(await countWhere("status", "published")).toBe(75);
  });

  it("refuses to cancel a finished task", async () => {
    await setup(120);
    const { taskHandle } = deferred(await runner.run(articles, "publish", everything, {}, makeContext()));
    await runner.drain();
    await expect(runner.cancel(articles, taskHandle)).rejects.toThrow("Task is already completed");
  });

  it("records partial progress when a batch fails", async () => {
    await setup(150);
    const { taskHandle } = deferred(await runner.run(articles, "explode", everything, {}, makeContext()));
    await runner.drain();
    expect(await runner.getTask(articles, taskHandle)).toMatchObject({
      status: "failed",
      processed: 80,
      affected: 80,
      batches: 2,
      error: "Batch exploded",
    });
    expect(events.map((e) => e.type)).toEqual(["admin.action.failed"]);
  });

  it("accumulates per-item errors across batches", async () => {
    await setup(150);
    const checkpoint = vi.spyOn(tasks, "checkpoint");
    const { taskHandle } = deferred(await runner.run(articles, "audit", everything, {}, makeContext()));
    await runner.drain();

    expect(checkpoint.mock.calls.map(([, progress]) => progress.errors.map((e) => e.pk))).toEqual([
      [],
      [50],
      [100],
      [150],
    ]);
    expect(await runner.getTask(articles, taskHandle)).toMatchObject({
      status: "completed",
      processed: 150,
      affected: 147,
      batches: 4,
      errors: [
        { pk: 50, error: "Flagged" },
        { pk: 100, error: "Flagged" },
        { pk: 150, error: "Flagged" },
      ],
    });
  });

  it("keeps tasks private to their resource", async () => {
    await setup(101);
    const { taskHandle } = deferred(await runner.run(articles, "publish", everything, {}, makeContext()));
    await expect(runner.getTask(categories, taskHandle)).rejects.toThrow("Task not found");
    await expect(runner.getTask(articles, "unknown")).rejects.toThrow(NotFoundError);
  });
});

describe("events", () => {
  it("publishes completion of inline runs", async () => {
    await setup(3);
    await runner.run(articles, "publish", everything, {}, makeContext());
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "admin.action.completed",
      payload: { contentType: "blog.article", action: "publish", background: false, affected: 3 },
    });
  });

  it("publishes failures of inline runs and rethrows", async () => {
    await setup(90);
    await expect(runner.run(articles, "explode", everything, {}, makeContext())).rejects.toThrow("Batch exploded");
    expect(events.map((e) => e.type)).toEqual(["admin.action.failed"]);
  });
});

describe("requiredPermission", () => {
  it("uses the declared permission or change", async () => {
    await setup(1);
    expect(requiredPermission(articles.descriptor, "delete_selected")).toBe("delete");
    expect(requiredPermission(articles.descriptor, "publish")).toBe("change");
    expect(() => requiredPermission(articles.descriptor, "nope")).toThrow('Unknown action "nope" for blog.article');
  });
});
