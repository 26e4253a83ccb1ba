/**
 * @adminforge/platform
 *
 * The admin engine. Provides the content-type registry, permissions,
 * descriptors, queryset pipelines, the action runner, the admin site and
 * the REST router builder.
 */

// Config
export { loadConfig, parseApiTokens, type AdminConfig } from "./core/config/index.js";

// Errors
export {
  AdminError,
  NotFoundError,
  ForbiddenError,
  UnauthorizedError,
  ValidationError,
  TokenError,
  ConfigurationError,
  isAdminError,
  type AdminErrorType,
  type FieldError,
} from "./core/errors/index.js";

// Logging & Observability
export { createLogger, logRequest } from "./core/logging/index.js";
export {
  initObservability,
  captureException,
  captureMessage,
  setObservabilityContext,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  type ObservabilityProvider,
  type ObservabilityContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";

// Event Bus
export { subscribe, subscribeAll, publish, getSubscriberCount, clearSubscribers } from "./core/event-bus/index.js";

// Database
export { initDatabase, getDatabase, closeDatabase, isDatabaseInitialized, type AdminDatabase } from "./core/database/connection.js";
export { runAdminMigrations, ADMIN_MIGRATIONS, type MigrationClient } from "./core/database/migrate.js";
export { DrizzlePermissionStore } from "./core/database/permission-store.js";
export { DrizzleContentTypeStore } from "./core/database/content-type-store.js";

// Content Types
export { ContentTypeRegistry, MemoryContentTypeStore, type ContentTypeStore } from "./core/content-types/registry.js";
export { virtualContentType, slugify } from "./core/content-types/virtual.js";

// Permissions
export { PermissionChecker } from "./core/permissions/checker.js";
export { GrantService, impliedActions } from "./core/permissions/grants.js";
export { CachedPermissionStore } from "./core/permissions/cache.js";
export { MemoryPermissionStore } from "./core/permissions/memory-store.js";
export { requirePermission } from "./core/permissions/gate.js";
export type { PermissionStore, PermissionCache, GrantWriter, SubjectDirectory } from "./core/permissions/store.js";

// Descriptors & Pipelines
export {
  ModelDescriptor,
  titleCase,
  type AdminContext,
  type DescriptorOptions,
  type PermissionScope,
  type ColumnMeta,
} from "./core/descriptor/descriptor.js";
export { filterSpecs, parseFilterParams, type FilterSpec } from "./core/descriptor/filters.js";
export { buildFormSchema, cleanPayload, startValues, type JsonSchema, type PayloadMode } from "./core/descriptor/form.js";
export { buildQuerySet, listQuerySet, objectQuerySet, formBaseQuerySet, type QueryShape } from "./core/queryset/pipeline.js";

// Actions
export { defineAdminAction, DEFAULT_ACTION_PERM, type AdminAction, type ActionExecution } from "./core/actions/types.js";
export { deleteSelectedAction } from "./core/actions/delete-selected.js";
export { ActionRunner, requiredPermission, type ActionRunnerOptions, type ScopeInput } from "./core/actions/runner.js";
export { ScopeTokenService, type IssuedToken, type ScopeTokenOptions } from "./core/actions/scope-token.js";
export { MemoryTaskStore, isFinished, type TaskCheckpoint, type TaskRecord, type TaskStatus, type TaskStore } from "./core/actions/tasks.js";

// Site & Services
export {
  AdminSite,
  permissionTarget,
  type AdminResource,
  type ModelResource,
  type VirtualResource,
} from "./core/site/admin-site.js";
export { AdminService, type ListSettings, type ListResult } from "./core/services/admin-service.js";

// Authentication
export { initAuthProvider, getAuthProvider, setAuthProvider, resetAuthProvider } from "./auth/index.js";
export { DevAuthProvider, DEV_SUBJECT } from "./auth/dev-provider.js";
export { TokenAuthProvider } from "./auth/token-provider.js";

// Adapters
export { MemoryAdapter, MemoryQuerySet } from "./adapters/memory/adapter.js";
export { registerAdminRoutes, type AdminRouterDeps, type AdminRouterOptions } from "./adapters/rest/router-builder.js";
export { authMiddleware, requireSubject } from "./adapters/rest/auth-middleware.js";
export { sendError } from "./adapters/rest/result.js";
