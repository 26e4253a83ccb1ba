/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup; fail fast if misconfigured.
 */

import { z } from "zod";
import { ConfigurationError } from "../errors/index.js";

export interface AdminConfig {
  env: string;
  admin: {
    /** HMAC key for scope tokens */
    secret: string;
    /** Route prefix for every admin endpoint */
    prefix: string;
    /** Bearer tokens for the token auth provider: token → username */
    apiTokens: Record<string, string>;
  };
  actions: {
    /** Selections larger than this run as deferred tasks */
    batchThreshold: number;
    /** Rows processed per deferred batch */
    chunkSize: number;
    /** Default and maximum scope token lifetime, in seconds */
    tokenTtl: number;
    tokenMaxTtl: number;
  };
  list: {
    defaultPerPage: number;
    maxPerPage: number;
  };
  permissions: {
    /** Seconds a permission-store answer is cached; 0 disables the cache */
    cacheTtl: number;
  };
  database: {
    /** When unset, RBAC data lives in memory */
    url: string | null;
  };
  api: {
    port: number;
    host: string;
    /** Allowed CORS origin; "*" reflects any origin */
    corsOrigin: string;
    rateLimitMax: number;
    rateLimitWindowMs: number;
  };
}

const DEV_SECRET = "dev-admin-secret";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  ADMIN_SECRET: z.string().min(1).optional(),
  ADMIN_PREFIX: z
    .string()
    .regex(/^\/[A-Za-z0-9/_-]*[A-Za-z0-9_-]$/, "must start with '/' and not end with '/'")
    .default("/api/admin"),
  ADMIN_API_TOKENS: z.string().optional(),
  ACTION_BATCH_THRESHOLD: positiveInt(100),
  ACTION_CHUNK_SIZE: positiveInt(100),
  SCOPE_TOKEN_TTL: positiveInt(60),
  SCOPE_TOKEN_MAX_TTL: positiveInt(3600),
  DEFAULT_PER_PAGE: positiveInt(20),
  MAX_PER_PAGE: positiveInt(100),
  PERMISSION_CACHE_TTL: z.coerce.number().int().min(0).default(0),
  DATABASE_URL: z.string().url().optional(),
  API_PORT: positiveInt(4000),
  API_HOST: z.string().default("0.0.0.0"),
  CORS_ORIGIN: z.string().default("*"),
  RATE_LIMIT_MAX: positiveInt(1000),
  RATE_LIMIT_WINDOW_MS: positiveInt(60_000),
});

/**
 * Parses "token=username,token2=username2".
 * Blank entries are ignored; an entry without "=" is a configuration error.
 */
export function parseApiTokens(raw: string | undefined): Record<string, string> {
  const tokens: Record<string, string> = {};
  if (!raw) return tokens;

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf("=");
    if (eq <= 0 || eq === trimmed.length - 1) {
      throw new ConfigurationError(
        `ADMIN_API_TOKENS entry "${trimmed}" must look like token=username`
      );
    }
    tokens[trimmed.slice(0, eq)] = trimmed.slice(eq + 1);
  }
  return tokens;
}

/**
 * Loads configuration from process.env (or the given map).
 * Throws a ConfigurationError naming every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AdminConfig {
  // Empty strings mean "unset" so .env files can leave keys blank
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${problems}`);
  }
  const vars = parsed.data;

  if (!vars.ADMIN_SECRET && vars.NODE_ENV === "production") {
    throw new ConfigurationError(
      "ADMIN_SECRET environment variable is required in production. See .env.example."
    );
  }
  if (vars.SCOPE_TOKEN_TTL > vars.SCOPE_TOKEN_MAX_TTL) {
    throw new ConfigurationError("SCOPE_TOKEN_TTL must not exceed SCOPE_TOKEN_MAX_TTL");
  }
  if (vars.DEFAULT_PER_PAGE > vars.MAX_PER_PAGE) {
    throw new ConfigurationError("DEFAULT_PER_PAGE must not exceed MAX_PER_PAGE");
  }

  return {
    env: vars.NODE_ENV,
    admin: {
      secret: vars.ADMIN_SECRET ?? DEV_SECRET,
      prefix: vars.ADMIN_PREFIX,
      apiTokens: parseApiTokens(vars.ADMIN_API_TOKENS),
    },
    actions: {
      batchThreshold: vars.ACTION_BATCH_THRESHOLD,
      chunkSize: vars.ACTION_CHUNK_SIZE,
      tokenTtl: vars.SCOPE_TOKEN_TTL,
      tokenMaxTtl: vars.SCOPE_TOKEN_MAX_TTL,
    },
    list: {
      defaultPerPage: vars.DEFAULT_PER_PAGE,
      maxPerPage: vars.MAX_PER_PAGE,
    },
    permissions: {
      cacheTtl: vars.PERMISSION_CACHE_TTL,
    },
    database: {
      url: vars.DATABASE_URL ?? null,
    },
    api: {
      port: vars.API_PORT,
      host: vars.API_HOST,
      corsOrigin: vars.CORS_ORIGIN,
      rateLimitMax: vars.RATE_LIMIT_MAX,
      rateLimitWindowMs: vars.RATE_LIMIT_WINDOW_MS,
    },
  };
}
