/**
 * Permission Codename Tests
 *
 * Validates the codename format shared by grant writers and the checker:
 *   - per-resource codenames ("app.model.action")
 *   - virtual resource codenames with dotted model slugs
 *   - bare global codenames
 *   - rejection of malformed input
 */

import { describe, it, expect } from "vitest";
import { parseCodename, formatCodename, isPermAction } from "./permission.js";
import { contentTypeId } from "./content-type.js";

describe("parseCodename", () => {
  it("parses a per-resource codename", () => {
    expect(parseCodename("blog.post.change")).toEqual({
      dottedName: "blog.post",
      action: "change",
    });
  });

  it("keeps dots inside a virtual model slug", () => {
    expect(parseCodename("dashboard.card.recent-posts.view")).toEqual({
      dottedName: "dashboard.card.recent-posts",
      action: "view",
    });
  });

  it("parses a bare action as a global codename", () => {
    expect(parseCodename("delete")).toEqual({ dottedName: null, action: "delete" });
  });

  it("rejects an unknown action", () => {
    expect(parseCodename("blog.post.publish")).toBeNull();
  });

  it("rejects a codename without a model", () => {
    expect(parseCodename("blog.view")).toBeNull();
  });

  it("rejects empty segments", () => {
    expect(parseCodename("blog..view")).toBeNull();
  });
});

describe("formatCodename", () => {
  it("round-trips per-resource and global codenames", () => {
    expect(formatCodename("blog.post", "add")).toBe("blog.post.add");
    expect(formatCodename(null, "view")).toBe("view");
  });
});

describe("isPermAction", () => {
  it("accepts exactly the four admin actions", () => {
    expect(["view", "add", "change", "delete"].every(isPermAction)).toBe(true);
    expect(isPermAction("publish")).toBe(false);
  });
});

describe("contentTypeId", () => {
  it("joins app label and model slug with a colon", () => {
    expect(contentTypeId("blog", "post")).toBe("blog:post");
    expect(contentTypeId("dashboard", "card.stats")).toBe("dashboard:card.stats");
  });
});
