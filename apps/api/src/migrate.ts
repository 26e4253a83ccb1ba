/**
 * Migration Script
 *
 * Creates the admin tables (content types, users, groups, grants)
 * without starting the server. Every statement is idempotent.
 *
 * Usage: npm run migrate
 */

import dotenv from "dotenv";
import { fileURLToPath } from "node:url";

dotenv.config({ path: fileURLToPath(new URL("../../../.env", import.meta.url)) });

import {
  ADMIN_MIGRATIONS,
  closeDatabase,
  createLogger,
  initDatabase,
  loadConfig,
  runAdminMigrations,
} from "@adminforge/platform";

const logger = createLogger("migrate");

async function migrate() {
  const config = loadConfig();
  if (!config.database.url) {
    throw new Error("DATABASE_URL is not set; nothing to migrate");
  }
  logger.info("Starting migration", { database: config.database.url.replace(/\/\/.*@/, "//***@") });

  const { sql } = initDatabase(config.database.url);
  await runAdminMigrations(sql);
  logger.info("Migration finished", { migrations: ADMIN_MIGRATIONS.length });

  await closeDatabase();
}

migrate().then(
  () => process.exit(0),
  (err: unknown) => {
    logger.error("Migration failed", { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  }
);
