/**
 * Content-Type Registry: Test Suite
 *
 * Validates:
 *   - idempotent registration and conflict detection
 *   - resolve() returns null until finalize() has run
 *   - finalize() is repeatable and only adds new entries
 *   - finalized entries are persisted through the store once
 *   - virtual content type naming
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { ContentTypeRegistry, MemoryContentTypeStore } from "./registry.js";
import { slugify, virtualContentType } from "./virtual.js";
import { ConfigurationError } from "../errors/index.js";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

describe("ContentTypeRegistry.register", () => {
  it("is a no-op for identical data", async () => {
    const registry = new ContentTypeRegistry();
    const first = registry.register("blog", "post", "blog.post", false);
    const second = registry.register("blog", "post", "blog.post", false);
    await registry.finalize();

    expect(first).toBe("blog:post");
    expect(second).toBe(first);
    expect(registry.all()).toHaveLength(1);
  });

  it("rejects the same pair with a different dotted name", () => {
    const registry = new ContentTypeRegistry();
    registry.register("blog", "post", "blog.post", false);

    expect(() => registry.register("blog", "post", "blog.article", false)).toThrow(
      ConfigurationError
    );
  });

  it("rejects the same pair with a different virtual flag, even after finalize", async () => {
    const registry = new ContentTypeRegistry();
    registry.register("blog", "post", "blog.post", false);
    await registry.finalize();

    expect(() => registry.register("blog", "post", "blog.post", true)).toThrow(
      /already registered as "blog.post" \(virtual: false\)/
    );
  });

  it("rejects a dotted name owned by another pair", () => {
    const registry = new ContentTypeRegistry();
    registry.register("blog", "post", "blog.post", false);

    expect(() => registry.register("cms", "post", "blog.post", false)).toThrow(
      'Dotted name "blog.post" is already used by content type blog:post'
    );
  });
});

describe("ContentTypeRegistry.resolve", () => {
  it("returns null before finalize and the content type after", async () => {
    const registry = new ContentTypeRegistry();
    registry.register("blog", "post", "blog.post", false);

    expect(registry.resolve("blog", "post")).toBeNull();
    expect(registry.resolveDotted("blog.post")).toBeNull();

    await registry.finalize();

    expect(registry.resolve("blog", "post")).toEqual({
      id: "blog:post",
      appLabel: "blog",
      modelSlug: "post",
      dottedName: "blog.post",
      isVirtual: false,
    });
    expect(registry.resolveDotted("blog.post")?.id).toBe("blog:post");
    expect(registry.resolve("blog", "comment")).toBeNull();
  });
});

describe("ContentTypeRegistry.finalize", () => {
  it("only adds newly registered content types on later passes", async () => {
    const registry = new ContentTypeRegistry();
    registry.register("blog", "post", "blog.post", false);

    const firstPass = await registry.finalize();
    const secondPass = await registry.finalize();
    registry.register("blog", "comment", "blog.comment", false);
    const thirdPass = await registry.finalize();

    expect(firstPass.map((ct) => ct.id)).toEqual(["blog:post"]);
    expect(secondPass).toEqual([]);
    expect(thirdPass.map((ct) => ct.id)).toEqual(["blog:comment"]);
    expect(registry.all().map((ct) => ct.id)).toEqual(["blog:post", "blog:comment"]);
    expect(registry.hasPending()).toBe(false);
  });

  it("persists each content type once", async () => {
    const registry = new ContentTypeRegistry();
    const store = new MemoryContentTypeStore();
    const upsert = vi.spyOn(store, "upsert");
    registry.register("blog", "post", "blog.post", false);

    await registry.finalize(store);
    await registry.finalize(store);

    expect(upsert).toHaveBeenCalledTimes(1);
    expect(store.list().map((ct) => ct.dottedName)).toEqual(["blog.post"]);
  });
});

describe("virtual content types", () => {
  it("slugifies names", () => {
    expect(slugify("Recent Posts!")).toBe("recent-posts");
    expect(slugify("  --Q3 / Revenue--  ")).toBe("q3-revenue");
  });

  it("builds app.kind.slug names", () => {
    expect(virtualContentType("Dashboard", "card", "Recent Posts")).toEqual({
      appLabel: "dashboard",
      modelSlug: "card.recent-posts",
      dottedName: "dashboard.card.recent-posts",
      isVirtual: true,
    });
  });

  it("rejects names with nothing to slugify", () => {
    expect(() => virtualContentType("dashboard", "card", "!!!")).toThrow(ConfigurationError);
  });
});
