/**
 * Configuration: Test Suite
 */

import { describe, it, expect } from "vitest";
import { loadConfig, parseApiTokens } from "./index.js";
import { ConfigurationError } from "../errors/index.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.admin).toEqual({
      secret: "dev-admin-secret",
      prefix: "/api/admin",
      apiTokens: {},
    });
    expect(config.actions).toEqual({
      batchThreshold: 100,
      chunkSize: 100,
      tokenTtl: 60,
      tokenMaxTtl: 3600,
    });
    expect(config.list).toEqual({ defaultPerPage: 20, maxPerPage: 100 });
    expect(config.permissions.cacheTtl).toBe(0);
    expect(config.database.url).toBeNull();
    expect(config.api).toEqual({
      port: 4000,
      host: "0.0.0.0",
      corsOrigin: "*",
      rateLimitMax: 1000,
      rateLimitWindowMs: 60000,
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ ACTION_BATCH_THRESHOLD: "5", ACTION_CHUNK_SIZE: "2" });
    expect(config.actions.batchThreshold).toBe(5);
    expect(config.actions.chunkSize).toBe(2);
  });

  it("treats empty strings as unset", () => {
    expect(loadConfig({ DATABASE_URL: "", API_PORT: "" }).api.port).toBe(4000);
  });

  it("names every invalid variable", () => {
    expect(() => loadConfig({ ACTION_BATCH_THRESHOLD: "zero", MAX_PER_PAGE: "-1" })).toThrow(
      /ACTION_BATCH_THRESHOLD.*MAX_PER_PAGE/
    );
  });

  it("requires ADMIN_SECRET in production", () => {
    expect(() => loadConfig({ NODE_ENV: "production" })).toThrow(ConfigurationError);
    expect(
      loadConfig({ NODE_ENV: "production", ADMIN_SECRET: "test-secret" }).admin.secret
    ).toBe("test-secret");
  });

  it("rejects a default token TTL above the maximum", () => {
    expect(() => loadConfig({ SCOPE_TOKEN_TTL: "120", SCOPE_TOKEN_MAX_TTL: "60" })).toThrow(
      "SCOPE_TOKEN_TTL must not exceed SCOPE_TOKEN_MAX_TTL"
    );
  });

  it("rejects a prefix with a trailing slash", () => {
    expect(() => loadConfig({ ADMIN_PREFIX: "/admin/" })).toThrow(ConfigurationError);
  });
});

describe("parseApiTokens", () => {
  it("parses token=username pairs", () => {
    expect(parseApiTokens(" alice-token=alice, bob-token=bob ,")).toEqual({
      "alice-token": "alice",
      "bob-token": "bob",
    });
  });

  it("rejects malformed entries", () => {
    expect(() => parseApiTokens("alice")).toThrow(ConfigurationError);
    expect(() => parseApiTokens("alice=")).toThrow(ConfigurationError);
  });
});
