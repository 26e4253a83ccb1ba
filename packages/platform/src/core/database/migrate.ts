/**
 * Migration Runner
 *
 * Creates the RBAC tables the drizzle stores read and write.
 * Idempotent: every statement uses IF NOT EXISTS, so it is safe to run
 * on every deploy. Columns are never altered or dropped here.
 *
 * Grants may target the global namespace (content_type_id NULL), so their
 * uniqueness is enforced by expression indexes over COALESCE.
 */

import { createLogger } from "../logging/index.js";
import { getDatabase } from "./connection.js";

/** The part of a postgres.js client the runner needs */
export interface MigrationClient {
  unsafe(query: string): PromiseLike<unknown>;
}

export interface AdminMigration {
  name: string;
  statements: string[];
}

const logger = createLogger("migrate");

export const ADMIN_MIGRATIONS: readonly AdminMigration[] = [
  {
    name: "admin_content_types",
    statements: [
      `CREATE TABLE IF NOT EXISTS admin_content_types (
        id TEXT PRIMARY KEY,
        app_label TEXT NOT NULL,
        model_slug TEXT NOT NULL,
        dotted_name TEXT NOT NULL,
        is_virtual BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    ],
  },
  {
    name: "admin_users",
    statements: [
      `CREATE TABLE IF NOT EXISTS admin_users (
        id TEXT PRIMARY KEY,
        username TEXT NOT NULL UNIQUE,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        is_staff BOOLEAN NOT NULL DEFAULT FALSE,
        is_superuser BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    ],
  },
  {
    name: "admin_groups",
    statements: [
      `CREATE TABLE IF NOT EXISTS admin_groups (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL UNIQUE
      )`,
    ],
  },
  {
    name: "admin_user_groups",
    statements: [
      `CREATE TABLE IF NOT EXISTS admin_user_groups (
        user_id TEXT NOT NULL REFERENCES admin_users(id) ON DELETE CASCADE,
        group_id TEXT NOT NULL REFERENCES admin_groups(id) ON DELETE CASCADE,
        PRIMARY KEY (user_id, group_id)
      )`,
    ],
  },
  {
    name: "admin_user_permissions",
    statements: [
      `CREATE TABLE IF NOT EXISTS admin_user_permissions (
        user_id TEXT NOT NULL REFERENCES admin_users(id) ON DELETE CASCADE,
        content_type_id TEXT REFERENCES admin_content_types(id) ON DELETE CASCADE,
        action TEXT NOT NULL
      )`,
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_admin_user_permissions_unique
        ON admin_user_permissions(user_id, COALESCE(content_type_id, ''), action)`,
    ],
  },
  {
    name: "admin_group_permissions",
    statements: [
      `CREATE TABLE IF NOT EXISTS admin_group_permissions (
        group_id TEXT NOT NULL REFERENCES admin_groups(id) ON DELETE CASCADE,
        content_type_id TEXT REFERENCES admin_content_types(id) ON DELETE CASCADE,
        action TEXT NOT NULL
      )`,
      `CREATE UNIQUE INDEX IF NOT EXISTS idx_admin_group_permissions_unique
        ON admin_group_permissions(group_id, COALESCE(content_type_id, ''), action)`,
    ],
  },
];

/**
 * Runs every admin migration in order.
 * Defaults to the connection opened by initDatabase().
 */
export async function runAdminMigrations(client: MigrationClient = getDatabase().sql): Promise<void> {
  for (const migration of ADMIN_MIGRATIONS) {
    for (const statement of migration.statements) {
      await client.unsafe(statement);
    }
    logger.info("Migration applied", { table: migration.name });
  }
}
