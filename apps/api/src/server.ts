/**
 * API Server
 *
 * Builds the Fastify instance: security headers, rate limiting, CORS,
 * the health and auth-config routes, and the generated admin routes.
 * Kept apart from index.ts so tests can inject() without listening.
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { getAuthProvider, registerAdminRoutes } from "@adminforge/platform";
import type { AdminDeps } from "./bootstrap.js";

const PUBLIC_PATHS = new Set(["/api/health", "/api/auth/config"]);

export async function buildServer(deps: AdminDeps): Promise<FastifyInstance> {
  const { config } = deps;
  const isProd = config.env === "production";

  const app = Fastify({
    logger: false,
    // Rate limiting must key on the client IP, not the proxy's
    trustProxy: isProd,
  });

  await app.register(helmet, { contentSecurityPolicy: isProd });

  await app.register(rateLimit, {
    max: (request) =>
      PUBLIC_PATHS.has(request.url) ? 10_000 : config.api.rateLimitMax,
    timeWindow: config.api.rateLimitWindowMs,
  });

  await app.register(cors, {
    origin:
      config.api.corsOrigin === "*"
        ? true
        : config.api.corsOrigin.split(",").map((o) => o.trim()),
    credentials: true,
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
  });

  app.get("/api/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  app.get("/api/auth/config", async () => getAuthProvider().getPublicConfig());

  await registerAdminRoutes(
    app,
    {
      site: deps.site,
      checker: deps.checker,
      service: deps.service,
      runner: deps.runner,
    },
    { prefix: config.admin.prefix }
  );

  return app;
}
