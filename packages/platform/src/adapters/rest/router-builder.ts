/**
 * Admin Router Builder
 *
 * Wires the admin site onto a Fastify instance. Every route is pure
 * composition: resolve the resource, pass the permission gate, call the
 * service or the action runner, serialize. Behaviour changes belong in
 * descriptor hooks or the permission checker, never here.
 *
 * Routes (under the configured prefix, per resource {app}/{model}):
 *
 *   GET    /_resources                               navigation      (per resource view)
 *   GET    /:app/:model/_list                        list            view
 *   GET    /:app/:model/_schema[?pk=]                form schema     add | change
 *   GET    /:app/:model/_filters                     filter specs    view
 *   GET    /:app/:model/_lookup/:field[?q=&page=&pk=] relation choices view
 *   GET    /:app/:model/_actions                     action specs    view
 *   POST   /:app/:model/_actions/token               scope token     view
 *   POST   /:app/:model/_actions/preview             selection size  view
 *   GET    /:app/:model/_actions/tasks/:handle       task status     view
 *   POST   /:app/:model/_actions/tasks/:handle/cancel                action's perm
 *   POST   /:app/:model/_actions/:action             run             action's perm
 *   POST   /:app/:model                              create          add
 *   GET    /:app/:model/:pk                          retrieve        view
 *   PUT    /:app/:model/:pk                          replace         change
 *   PATCH  /:app/:model/:pk                          partial update  change
 *   DELETE /:app/:model/:pk                          delete          delete
 */

import type { FastifyInstance, FastifyRequest } from "fastify";
import type { PermAction } from "@adminforge/contracts";
import type { AdminContext } from "../../core/descriptor/descriptor.js";
import { isAdminError, NotFoundError, ValidationError } from "../../core/errors/index.js";
import { createLogger, logRequest } from "../../core/logging/index.js";
import { captureException } from "../../core/observability/index.js";
import type { PermissionChecker } from "../../core/permissions/checker.js";
import { requirePermission } from "../../core/permissions/gate.js";
import { permissionTarget, type AdminSite, type ModelResource } from "../../core/site/admin-site.js";
import type { AdminService } from "../../core/services/admin-service.js";
import { requiredPermission, type ActionRunner } from "../../core/actions/runner.js";
import { authMiddleware, requireSubject } from "./auth-middleware.js";
import { sendError } from "./result.js";
import {
  parseBody,
  previewBodySchema,
  runBodySchema,
  toScopeInput,
  tokenBodySchema,
} from "./bodies.js";
import {
  serializeActionSpec,
  serializeFilter,
  serializeList,
  serializeRunResult,
  serializeTask,
} from "./serializers.js";

export interface AdminRouterDeps {
  site: AdminSite;
  checker: PermissionChecker;
  service: AdminService;
  runner: ActionRunner;
}

export interface AdminRouterOptions {
  /** Route prefix, e.g. "/api/admin" */
  prefix: string;
}

interface ResourceParams {
  app: string;
  model: string;
}

type ObjectParams = ResourceParams & { pk: string };
type ActionParams = ResourceParams & { action: string };
type TaskParams = ResourceParams & { handle: string };
type LookupParams = ResourceParams & { field: string };

const logger = createLogger("admin-router");

/** Flattens a parsed query string into string values */
function queryParams(query: unknown): Record<string, string> {
  const params: Record<string, string> = {};
  if (typeof query !== "object" || query === null) return params;
  for (const [key, value] of Object.entries(query)) {
    if (typeof value === "string") params[key] = value;
    else if (Array.isArray(value)) params[key] = value.map(String).join(",");
  }
  return params;
}

/**
 * Registers the admin routes as an encapsulated plugin under the prefix.
 * The site must be finalized first.
 */
export async function registerAdminRoutes(
  app: FastifyInstance,
  deps: AdminRouterDeps,
  options: AdminRouterOptions
): Promise<void> {
  const { site, checker, service, runner } = deps;

  /** Resolves the resource and applies the permission gate */
  async function gate(
    request: FastifyRequest,
    params: ResourceParams,
    action: PermAction
  ): Promise<{ resource: ModelResource; ctx: AdminContext }> {
    const subject = requireSubject(request);
    const { app: appLabel, model } = params;
    const resource = site.resolve(appLabel, model);
    if (!resource) {
      throw new NotFoundError(`Unknown resource ${appLabel}/${model}`);
    }
    await requirePermission(checker, subject, action, permissionTarget(resource));
    return { resource, ctx: { subject, logger } };
  }

  await app.register(
    async (admin) => {
      admin.addHook("preHandler", authMiddleware);

      admin.addHook("onResponse", async (request, reply) => {
        logRequest(
          `${request.method} ${request.routeOptions.url ?? request.url}`,
          request.subject?.username ?? "anonymous",
          Math.round(reply.elapsedTime),
          reply.statusCode
        );
      });

      admin.setNotFoundHandler(async (request, reply) => {
        return sendError(reply, new NotFoundError(`No admin route for ${request.method} ${request.url}`));
      });

      admin.setErrorHandler(async (error, request, reply) => {
        if (isAdminError(error)) {
          if (error.errorType === "configuration") {
            logger.error("Configuration error during request", { url: request.url, error: error.message });
            captureException(error, { userId: request.subject?.id });
          }
          return sendError(reply, error);
        }
        // Fastify's own client errors (malformed JSON, wrong content type)
        if (typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500) {
          const status = error.statusCode === 400 ? 422 : error.statusCode;
          return reply.status(status).send({ success: false, error: error.message, errorType: "validation" });
        }
        logger.error("Unhandled admin error", { url: request.url, error: error.message });
        captureException(error, { userId: request.subject?.id });
        return sendError(reply, error);
      });

      // -----------------------------------------------------------------------
      // Site
      // -----------------------------------------------------------------------

      admin.get("/_resources", async (request) => {
        const items = await site.navigation(requireSubject(request), checker);
        return {
          resources: items.map((item) => ({
            label: item.label,
            href: item.href,
            content_type: item.contentType,
            kind: item.kind,
            group: item.group,
          })),
        };
      });

      // -----------------------------------------------------------------------
      // Metadata
      // -----------------------------------------------------------------------

      admin.get<{ Params: ResourceParams }>("/:app/:model/_list", async (request) => {
        const { resource, ctx } = await gate(request, request.params, "view");
        return serializeList(await service.listData(resource, queryParams(request.query), ctx));
      });

      admin.get<{ Params: ResourceParams; Querystring: { pk?: string } }>(
        "/:app/:model/_schema",
        async (request) => {
          const pk = request.query.pk;
          const { resource, ctx } = await gate(request, request.params, pk === undefined ? "add" : "change");
          const row = pk === undefined ? null : await service.retrieve(resource, pk, ctx);
          return service.formSchema(resource, row);
        }
      );

      admin.get<{ Params: ResourceParams }>("/:app/:model/_filters", async (request) => {
        const { resource } = await gate(request, request.params, "view");
        return { filters: service.filters(resource).map(serializeFilter) };
      });

      admin.get<{ Params: LookupParams }>("/:app/:model/_lookup/:field", async (request) => {
        const { resource, ctx } = await gate(request, request.params, "view");
        const related = site.relatedResource(resource.descriptor, request.params.field);
        return service.lookup(resource, request.params.field, related, queryParams(request.query), ctx);
      });

      // -----------------------------------------------------------------------
      // Actions
      // -----------------------------------------------------------------------

      admin.get<{ Params: ResourceParams }>("/:app/:model/_actions", async (request) => {
        const { resource } = await gate(request, request.params, "view");
        return { actions: resource.descriptor.actions().map(serializeActionSpec) };
      });

      admin.post<{ Params: ResourceParams }>("/:app/:model/_actions/token", async (request) => {
        const { resource, ctx } = await gate(request, request.params, "view");
        const body = parseBody(tokenBodySchema, request.body);
        const input = toScopeInput(body);
        if (!("scope" in input)) {
          throw ValidationError.field("scope", "A token cannot be issued from another token");
        }
        const issued = await runner.issueToken(resource, input.scope, ctx, body.ttl);
        return { scope_token: issued.token, expires_at: issued.expiresAt };
      });

      admin.post<{ Params: ResourceParams }>("/:app/:model/_actions/preview", async (request) => {
        const { resource, ctx } = await gate(request, request.params, "view");
        const input = toScopeInput(parseBody(previewBodySchema, request.body));
        return { count: await runner.preview(resource, input, ctx) };
      });

      admin.get<{ Params: TaskParams }>("/:app/:model/_actions/tasks/:handle", async (request) => {
        const { resource } = await gate(request, request.params, "view");
        return serializeTask(await runner.getTask(resource, request.params.handle));
      });

      admin.post<{ Params: TaskParams }>("/:app/:model/_actions/tasks/:handle/cancel", async (request) => {
        const { resource, ctx } = await gate(request, request.params, "view");
        const task = await runner.getTask(resource, request.params.handle);
        await requirePermission(
          checker,
          ctx.subject,
          requiredPermission(resource.descriptor, task.action),
          permissionTarget(resource)
        );
        return serializeTask(await runner.cancel(resource, task.handle));
      });

      admin.post<{ Params: ActionParams }>("/:app/:model/_actions/:action", async (request, reply) => {
        const actionName = request.params.action;
        // view first, so an unknown action is a 404 only to callers who can see the resource
        const { resource, ctx } = await gate(request, request.params, "view");
        await requirePermission(
          checker,
          ctx.subject,
          requiredPermission(resource.descriptor, actionName),
          permissionTarget(resource)
        );
        const body = parseBody(runBodySchema, request.body);
        const result = await runner.run(resource, actionName, toScopeInput(body), body.params ?? {}, ctx);
        if (result.background) reply.status(202);
        return serializeRunResult(result);
      });

      // -----------------------------------------------------------------------
      // CRUD
      // -----------------------------------------------------------------------

      admin.post<{ Params: ResourceParams }>("/:app/:model", async (request, reply) => {
        const { resource, ctx } = await gate(request, request.params, "add");
        const row = await service.create(resource, request.body, ctx);
        return reply.status(201).send({ data: row });
      });

      admin.get<{ Params: ObjectParams }>("/:app/:model/:pk", async (request) => {
        const { resource, ctx } = await gate(request, request.params, "view");
        return { data: await service.retrieve(resource, request.params.pk, ctx) };
      });

      async function update(request: FastifyRequest, params: ObjectParams, partial: boolean) {
        const { resource, ctx } = await gate(request, params, "change");
        return { data: await service.update(resource, params.pk, request.body, partial, ctx) };
      }
      admin.put<{ Params: ObjectParams }>("/:app/:model/:pk", (request) => update(request, request.params, false));
      admin.patch<{ Params: ObjectParams }>("/:app/:model/:pk", (request) => update(request, request.params, true));

      admin.delete<{ Params: ObjectParams }>("/:app/:model/:pk", async (request, reply) => {
        const { resource, ctx } = await gate(request, request.params, "delete");
        await service.remove(resource, request.params.pk, ctx);
        return reply.status(204).send();
      });
    },
    { prefix: options.prefix }
  );
}
