/**
 * QuerySet Pipeline: Test Suite
 *
 * Stage order, row-level security as the last word, and fail-fast on
 * hooks that return something other than one of the adapter's querysets.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { QuerySet } from "@adminforge/contracts";
import { ModelDescriptor, type AdminContext } from "../descriptor/descriptor.js";
import { formBaseQuerySet, listQuerySet, objectQuerySet } from "./pipeline.js";
import { ConfigurationError } from "../errors/index.js";
import { MemoryAdapter, MemoryQuerySet } from "../../adapters/memory/adapter.js";
import { articleRows, makeAdapter, makeContext, makeSubject } from "../../testing/fixtures.js";

let adapter: MemoryAdapter;

beforeEach(async () => {
  adapter = makeAdapter();
  await adapter.load("Article", articleRows(6));
});

/** Records the order hooks run in */
class TracingDescriptor extends ModelDescriptor {
  readonly calls: string[] = [];

  getQuerySet(ctx: AdminContext) {
    this.calls.push("getQuerySet");
    return super.getQuerySet(ctx);
  }
  applyRelationPrefetch(qs: QuerySet, ctx: AdminContext) {
    this.calls.push("applyRelationPrefetch");
    return super.applyRelationPrefetch(qs, ctx);
  }
  applyProjection(qs: QuerySet, ctx: AdminContext) {
    this.calls.push("applyProjection");
    return super.applyProjection(qs, ctx);
  }
  applyRowLevelSecurity(qs: QuerySet, ctx: AdminContext) {
    this.calls.push("applyRowLevelSecurity");
    return super.applyRowLevelSecurity(qs, ctx);
  }
  applyRelationPrefetchForWrites(qs: QuerySet, ctx: AdminContext) {
    this.calls.push("applyRelationPrefetchForWrites");
    return super.applyRelationPrefetchForWrites(qs, ctx);
  }
}

/** Non-superusers only see their own articles */
class OwnArticles extends ModelDescriptor {
  applyRowLevelSecurity(qs: QuerySet, ctx: AdminContext) {
    if (ctx.subject.isSuperuser) return qs;
    return qs.filter([{ field: "author", op: "eq", value: ctx.subject.username }]);
  }
}

function options(a: MemoryAdapter) {
  return {
    adapter: a,
    model: "Article",
    appLabel: "blog",
    listDisplay: ["title"],
    prefetch: ["category"],
    prefetchForWrites: ["category"],
  };
}

describe("stage order", () => {
  it("list: base → prefetch → projection → row-level security", async () => {
    const d = new TracingDescriptor(options(adapter));
    await listQuerySet(d, makeContext());
    expect(d.calls).toEqual([
      "getQuerySet",
      "applyRelationPrefetch",
      "applyProjection",
      "applyRowLevelSecurity",
    ]);
  });

  it("object: base → prefetch → row-level security", async () => {
    const d = new TracingDescriptor(options(adapter));
    await objectQuerySet(d, makeContext());
    expect(d.calls).toEqual(["getQuerySet", "applyRelationPrefetch", "applyRowLevelSecurity"]);
  });

  it("form-base: base → prefetch for writes", async () => {
    const d = new TracingDescriptor(options(adapter));
    await formBaseQuerySet(d, makeContext());
    expect(d.calls).toEqual(["getQuerySet", "applyRelationPrefetchForWrites"]);
  });
});

describe("composed querysets", () => {
  it("projects list rows but not object rows", async () => {
    const d = new ModelDescriptor(options(adapter));
    const listRow = await (await listQuerySet(d, makeContext())).first();
    const objectRow = await (await objectQuerySet(d, makeContext())).first();
    expect(listRow).toEqual({ id: 6, title: "Article 6" });
    expect(objectRow).toMatchObject({ id: 6, title: "Article 6", author: "bob", views: 50 });
  });

  it("carries prefetch hints", async () => {
    const qs = await listQuerySet(new ModelDescriptor(options(adapter)), makeContext());
    expect(qs instanceof MemoryQuerySet && qs.describeQuery().prefetch).toEqual(["category"]);
  });

  it("applies row-level security for non-superusers", async () => {
    const d = new OwnArticles(options(adapter));
    const bob = makeSubject({ id: "u-bob", username: "bob" });
    expect(await (await listQuerySet(d, makeContext(bob))).count()).toBe(3);
    expect(await (await listQuerySet(d, makeContext())).count()).toBe(6);
  });

  it("returns zero rows when row-level security narrows to nothing", async () => {
    class NothingVisible extends ModelDescriptor {
      applyRowLevelSecurity(qs: QuerySet) {
        return qs.filter([{ field: "id", op: "in", value: [] }]);
      }
    }
    const d = new NothingVisible(options(adapter));
    const ctx = makeContext();
    expect(await (await d.getQuerySet(ctx)).count()).toBe(6);
    expect(await (await listQuerySet(d, ctx)).count()).toBe(0);
    expect(await (await listQuerySet(d, ctx)).fetch()).toEqual([]);
    expect(await (await objectQuerySet(d, ctx)).count()).toBe(0);
  });
});

describe("fail fast", () => {
  it("rejects a hook that returns a queryset from another adapter", async () => {
    const foreign = makeAdapter();
    class Misconfigured extends ModelDescriptor {
      applyProjection() {
        return foreign.all("Article");
      }
    }
    const d = new Misconfigured(options(adapter));
    await expect(listQuerySet(d, makeContext())).rejects.toThrow(ConfigurationError);
    await expect(listQuerySet(d, makeContext())).rejects.toThrow(
      'blog.article: applyProjection() must return a queryset from the "memory" adapter'
    );
  });

  it("rejects an async base hook resolving to a foreign queryset", async () => {
    const foreign = makeAdapter();
    class Misconfigured extends ModelDescriptor {
      async getQuerySet() {
        return foreign.all("Article");
      }
    }
    await expect(formBaseQuerySet(new Misconfigured(options(adapter)), makeContext())).rejects.toThrow(
      "blog.article: getQuerySet() must return"
    );
  });
});
