/**
 * Grant Service: Test Suite
 *
 * Validates grant-time policy: change/delete imply view; revocation does
 * not cascade; codenames must name finalized content types.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { GrantService, impliedActions } from "./grants.js";
import { MemoryPermissionStore } from "./memory-store.js";
import { ContentTypeRegistry } from "../content-types/registry.js";
import { ConfigurationError } from "../errors/index.js";
import { CachedPermissionStore } from "./cache.js";
import { PermissionChecker } from "./checker.js";
import { makeSubject } from "../../testing/fixtures.js";

let store: MemoryPermissionStore;
let registry: ContentTypeRegistry;
let grants: GrantService;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  store = new MemoryPermissionStore();
  registry = new ContentTypeRegistry();
  registry.register("blog", "post", "blog.post", false);
  await registry.finalize();
  grants = new GrantService(store, registry);
});

describe("impliedActions", () => {
  it("adds view to change and delete only", () => {
    expect(impliedActions("change")).toEqual(["change", "view"]);
    expect(impliedActions("delete")).toEqual(["delete", "view"]);
    expect(impliedActions("add")).toEqual(["add"]);
    expect(impliedActions("view")).toEqual(["view"]);
  });
});

describe("GrantService", () => {
  it("granting change to a group also grants view", async () => {
    store.addGroup("editors");
    await grants.grantToGroup("editors", "blog.post.change");

    expect(await store.hasGroupPermission("editors", "blog:post", "change")).toBe(true);
    expect(await store.hasGroupPermission("editors", "blog:post", "view")).toBe(true);
    expect(await store.hasGroupPermission("editors", "blog:post", "delete")).toBe(false);
  });

  it("granting a global delete implies global view only", async () => {
    await grants.grantToUser("u-bob", "delete");

    expect(await store.hasUserPermission("u-bob", null, "view")).toBe(true);
    expect(await store.hasUserPermission("u-bob", "blog:post", "view")).toBe(false);
  });

  it("revoking change keeps the implied view", async () => {
    await grants.grantToUser("u-bob", "blog.post.change");
    await grants.revokeFromUser("u-bob", "blog.post.change");

    expect(await store.hasUserPermission("u-bob", "blog:post", "change")).toBe(false);
    expect(await store.hasUserPermission("u-bob", "blog:post", "view")).toBe(true);
  });

  it("rejects malformed codenames and unknown content types", async () => {
    await expect(grants.grantToUser("u-bob", "blog.post.publish")).rejects.toThrow(
      ConfigurationError
    );
    await expect(grants.grantToUser("u-bob", "shop.order.view")).rejects.toThrow(
      /unknown content type "shop.order"/
    );
  });
});

describe("GrantService with a permission cache", () => {
  const alice = makeSubject();

  function cachedChecker() {
    const cached = new CachedPermissionStore(store, 300);
    return {
      checker: new PermissionChecker(cached, registry),
      grants: new GrantService(store, registry, cached),
    };
  }

  it("denies immediately after a group grant is revoked", async () => {
    const { checker, grants: cachedGrants } = cachedChecker();
    const post = registry.resolve("blog", "post");
    store.addUserToGroup(alice.id, store.addGroup("editors"));
    await cachedGrants.grantToGroup("editors", "blog.post.change");
    expect(await checker.check(alice, "change", post)).toBe(true);

    await cachedGrants.revokeFromGroup("editors", "blog.post.change");

    expect(await checker.check(alice, "change", post)).toBe(false);
  });

  it("allows immediately after a user grant is written", async () => {
    const { checker, grants: cachedGrants } = cachedChecker();
    const post = registry.resolve("blog", "post");
    expect(await checker.check(alice, "view", post)).toBe(false);

    await cachedGrants.grantToUser(alice.id, "blog.post.view");

    expect(await checker.check(alice, "view", post)).toBe(true);
  });
});
