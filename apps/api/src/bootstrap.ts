/**
 * Bootstrap
 *
 * Wires the platform and the domain together:
 *   1. Load configuration and start observability
 *   2. Pick the RBAC store (Postgres when DATABASE_URL is set, memory otherwise)
 *   3. Register the domain's resources and finalize the site
 *   4. Build the checker, the admin service and the action runner
 *   5. Initialize auth and the event subscribers
 *
 * Everything the server needs comes back in AdminDeps; nothing is read
 * from module state after this point except the auth provider.
 */

import {
  ActionRunner,
  AdminService,
  AdminSite,
  CachedPermissionStore,
  DrizzleContentTypeStore,
  DrizzlePermissionStore,
  GrantService,
  MemoryContentTypeStore,
  MemoryPermissionStore,
  MemoryTaskStore,
  PermissionChecker,
  ScopeTokenService,
  createLogger,
  initAuthProvider,
  initDatabase,
  initObservability,
  loadConfig,
  runAdminMigrations,
  subscribeAll,
  type AdminConfig,
  type ContentTypeStore,
  type GrantWriter,
  type PermissionStore,
  type SubjectDirectory,
} from "@adminforge/platform";
import {
  createDomainAdapter,
  eventSubscribers,
  loadSeedData,
  registerDomain,
  seedDomain,
  type SeedDirectory,
  type SeedSummary,
} from "@adminforge/domain";

const logger = createLogger("bootstrap");

export interface AdminDeps {
  config: AdminConfig;
  site: AdminSite;
  checker: PermissionChecker;
  grants: GrantService;
  service: AdminService;
  runner: ActionRunner;
  seeded: SeedSummary | null;
}

export interface BootstrapOptions {
  /** Environment to read configuration from; defaults to process.env */
  env?: Record<string, string | undefined>;

  /** Load the demo fixtures; defaults to true outside production */
  seed?: boolean;
}

type RbacStore = PermissionStore & GrantWriter & SubjectDirectory & SeedDirectory;

interface Stores {
  rbac: RbacStore;
  contentTypes: ContentTypeStore;
}

async function openStores(config: AdminConfig): Promise<Stores> {
  if (!config.database.url) {
    logger.info("No DATABASE_URL set, keeping RBAC data in memory");
    return { rbac: new MemoryPermissionStore(), contentTypes: new MemoryContentTypeStore() };
  }

  const { db, sql } = initDatabase(config.database.url);
  await runAdminMigrations(sql);
  return { rbac: new DrizzlePermissionStore(db), contentTypes: new DrizzleContentTypeStore(db) };
}

export async function bootstrap(options: BootstrapOptions = {}): Promise<AdminDeps> {
  const config = loadConfig(options.env);
  initObservability();

  const { rbac, contentTypes } = await openStores(config);
  const cache =
    config.permissions.cacheTtl > 0
      ? new CachedPermissionStore(rbac, config.permissions.cacheTtl)
      : null;
  const store: PermissionStore = cache ?? rbac;

  const adapter = createDomainAdapter();
  const site = registerDomain(new AdminSite(), adapter);
  await site.finalize(contentTypes);

  const checker = new PermissionChecker(store, site.registry);
  const grants = new GrantService(rbac, site.registry, cache ?? undefined);
  const service = new AdminService(checker, config.list);
  const runner = new ActionRunner({
    service,
    tokens: new ScopeTokenService({
      secret: config.admin.secret,
      ttlSeconds: config.actions.tokenTtl,
      maxTtlSeconds: config.actions.tokenMaxTtl,
    }),
    tasks: new MemoryTaskStore(),
    batchThreshold: config.actions.batchThreshold,
    chunkSize: config.actions.chunkSize,
  });

  const shouldSeed = options.seed ?? config.env !== "production";
  const seeded = shouldSeed ? await seedDomain(loadSeedData(), adapter, rbac, grants) : null;
  if (seeded) {
    logger.info("Demo data loaded", { users: seeded.users, groups: seeded.groups, grants: seeded.grants });
  }

  initAuthProvider(config, rbac);
  subscribeAll(eventSubscribers);

  logger.info("Admin site ready", {
    resources: site.resources().length,
    prefix: config.admin.prefix,
  });

  return { config, site, checker, grants, service, runner, seeded };
}
