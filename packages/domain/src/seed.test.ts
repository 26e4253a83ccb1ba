/**
 * Seed Data: Test Suite
 *
 * The shipped fixture file, and seeding it into the memory stores.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import {
  AdminSite,
  ConfigurationError,
  GrantService,
  MemoryPermissionStore,
  PermissionChecker,
  permissionTarget,
  type ModelResource,
} from "@adminforge/platform";
import { createDomainAdapter, loadSeedData, registerDomain, seedDomain } from "./index.js";

describe("loadSeedData", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "seed-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads the shipped fixtures", () => {
    const data = loadSeedData();

    expect(data.users.map((u) => u.username)).toEqual(["root", "alice", "bob", "carol", "dana"]);
    expect(data.rows.Post).toHaveLength(45);
    expect(data.rows.Post[41]).toMatchObject({ id: 42, author: "alice", status: "draft" });
  });

  it("rejects malformed fixtures with every problem listed", () => {
    const file = join(dir, "seed.json");
    writeFileSync(file, JSON.stringify({ users: [{ id: "u-x" }], groups: [], userGrants: [], rows: {} }));

    expect(() => loadSeedData(pathToFileURL(file))).toThrow(ConfigurationError);
    expect(() => loadSeedData(pathToFileURL(file))).toThrow("users.0.username: Required");
  });
});

describe("seedDomain", () => {
  let store: MemoryPermissionStore;
  let checker: PermissionChecker;
  let site: AdminSite;

  function resource(app: string, model: string): ModelResource {
    const found = site.resolve(app, model);
    if (!found) throw new Error(`${app}.${model} is not registered`);
    return found;
  }

  async function can(username: string, action: "view" | "add" | "change" | "delete", app: string, model: string) {
    const subject = await store.findSubject(username);
    if (!subject) throw new Error(`unknown user ${username}`);
    return checker.check(subject, action, permissionTarget(resource(app, model)));
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const adapter = createDomainAdapter();
    site = registerDomain(new AdminSite(), adapter);
    await site.finalize();
    store = new MemoryPermissionStore();
    checker = new PermissionChecker(store, site.registry);

    const summary = await seedDomain(loadSeedData(), adapter, store, new GrantService(store, site.registry));

    expect(summary).toEqual({
      users: 5,
      groups: 2,
      grants: 9,
      rows: { Post: 45, Comment: 12, SiteSetting: 3 },
    });
  });

  it("lets editors change posts without deleting them", async () => {
    expect(await can("alice", "change", "blog", "post")).toBe(true);
    expect(await can("alice", "view", "blog", "post")).toBe(true);
    expect(await can("alice", "delete", "blog", "post")).toBe(false);
  });

  it("grants nothing to staff outside every group", async () => {
    expect(await can("bob", "view", "blog", "post")).toBe(false);
    expect(await can("bob", "view", "config", "sitesetting")).toBe(false);
  });

  it("denies inactive members of a granted group", async () => {
    expect(await can("dana", "change", "blog", "post")).toBe(false);
  });

  it("keeps the global namespace apart from per-resource grants", async () => {
    expect(await can("carol", "view", "config", "sitesetting")).toBe(true);
    expect(await can("carol", "change", "config", "sitesetting")).toBe(false);
    expect(await can("alice", "view", "config", "sitesetting")).toBe(false);
  });

  it("lets superusers do everything", async () => {
    expect(await can("root", "delete", "config", "sitesetting")).toBe(true);
  });
});
