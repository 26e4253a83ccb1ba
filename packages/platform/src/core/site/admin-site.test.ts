/**
 * Admin Site: Test Suite
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { QuerySet } from "@adminforge/contracts";
import { AdminSite, permissionTarget } from "./admin-site.js";
import { ModelDescriptor, type AdminContext } from "../descriptor/descriptor.js";
import { ConfigurationError } from "../errors/index.js";
import { MemoryContentTypeStore } from "../content-types/registry.js";
import { PermissionChecker } from "../permissions/checker.js";
import { MemoryPermissionStore } from "../permissions/memory-store.js";
import { makeAdapter, makeSubject } from "../../testing/fixtures.js";

const adapter = makeAdapter();

function articles(extra: { permissionScope?: "model" | "global" } = {}) {
  return new ModelDescriptor({ adapter, model: "Article", appLabel: "blog", ...extra });
}

function categories() {
  return new ModelDescriptor({ adapter, model: "Category", appLabel: "blog", label: "Categories" });
}

let site: AdminSite;

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  site = new AdminSite();
});

describe("registration", () => {
  it("resolves nothing before finalize", () => {
    site.register(articles());
    expect(site.resolve("blog", "article")).toBeNull();
    expect(site.registry.hasPending()).toBe(true);
  });

  it("resolves model resources after finalize", async () => {
    site.register(articles()).register(categories());
    await site.finalize();

    const resource = site.resolve("blog", "article");
    expect(resource?.contentType).toEqual({
      id: "blog:article",
      appLabel: "blog",
      modelSlug: "article",
      dottedName: "blog.article",
      isVirtual: false,
    });
    expect(site.resolve("blog", "missing")).toBeNull();
    expect(site.modelResources()).toHaveLength(2);
  });

  it("rejects registering the same model twice", () => {
    site.register(articles());
    expect(() => site.register(articles())).toThrow("blog.article is already registered on this site");
  });

  it("persists content types through the store", async () => {
    const store = new MemoryContentTypeStore();
    site.register(articles()).registerVirtual("blog", "card", "Recent Posts");
    await site.finalize(store);
    expect(store.list().map((ct) => ct.dottedName)).toEqual(["blog.article", "blog.card.recent-posts"]);
  });
});

describe("virtual resources", () => {
  it("registers cards under a kind-prefixed slug", async () => {
    site.registerVirtual("Blog", "card", "Recent Posts!");
    await site.finalize();
    const [resource] = site.resources();
    expect(resource).toMatchObject({
      kind: "virtual",
      virtualKind: "card",
      label: "Recent Posts!",
      contentType: { id: "blog:card.recent-posts", dottedName: "blog.card.recent-posts", isVirtual: true },
    });
    expect(site.resolve("blog", "card.recent-posts")).toBeNull();
  });

  it("rejects two virtual resources with the same dotted name", () => {
    site.registerVirtual("blog", "page", "Stats");
    expect(() => site.registerVirtual("blog", "page", "stats")).toThrow(ConfigurationError);
  });
});

describe("finalize", () => {
  it("freezes the site", async () => {
    site.register(articles());
    await site.finalize();
    await site.finalize();
    expect(site.isFinalized).toBe(true);
    expect(() => site.register(categories())).toThrow(
      "Cannot register blog.category: the admin site is already finalized"
    );
  });

  it("fails at startup when a hook returns a foreign queryset", async () => {
    const foreign = makeAdapter();
    class Broken extends ModelDescriptor {
      applyRowLevelSecurity(_qs: QuerySet): QuerySet {
        return foreign.all("Article");
      }
    }
    site.register(new Broken({ adapter, model: "Article", appLabel: "blog" }));
    await expect(site.finalize()).rejects.toThrow(
      'blog.article: applyRowLevelSecurity() must return a queryset from the "memory" adapter'
    );
    expect(site.isFinalized).toBe(false);
  });

  it("dry-runs the hooks for staff users as well as superusers", async () => {
    const foreign = makeAdapter();
    class StaffOnlyBroken extends ModelDescriptor {
      applyRowLevelSecurity(qs: QuerySet, ctx: AdminContext): QuerySet {
        if (ctx.subject.isSuperuser) return qs;
        return foreign.all("Article");
      }
    }
    site.register(new StaffOnlyBroken({ adapter, model: "Article", appLabel: "blog" }));
    await expect(site.finalize()).rejects.toThrow(
      'blog.article: applyRowLevelSecurity() must return a queryset from the "memory" adapter'
    );
  });
});

describe("permissionTarget", () => {
  it("is the content type, or null for global resources", async () => {
    const global = new ModelDescriptor({
      adapter,
      model: "Category",
      appLabel: "config",
      permissionScope: "global",
    });
    site.register(articles()).register(global);
    await site.finalize();
    const article = site.resolve("blog", "article");
    const config = site.resolve("config", "category");
    expect(article && permissionTarget(article)?.dottedName).toBe("blog.article");
    expect(config && permissionTarget(config)).toBeNull();
  });
});

describe("navigation", () => {
  it("lists what the subject may view", async () => {
    const store = new MemoryPermissionStore();
    site.register(articles()).register(categories()).registerVirtual("blog", "card", "Recent Posts");
    await site.finalize();
    const checker = new PermissionChecker(store, site.registry);
    await store.addUserPermission("u-alice", "blog:category", "view");
    await store.addUserPermission("u-alice", "blog:card.recent-posts", "view");

    const items = await site.navigation(makeSubject(), checker);
    expect(items).toEqual([
      { label: "Categories", href: "/blog/category", contentType: "blog.category", kind: "model", group: "blog" },
      {
        label: "Recent Posts",
        href: "/blog/card.recent-posts",
        contentType: "blog.card.recent-posts",
        kind: "card",
        group: "blog",
      },
    ]);
  });
});
