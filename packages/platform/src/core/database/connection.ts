/**
 * Database Connection
 *
 * Establishes and manages the PostgreSQL connection via Drizzle ORM.
 * Only used when DATABASE_URL is set; without it the platform runs on
 * the in-memory stores.
 */

import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { createLogger } from "../logging/index.js";
import * as schema from "./schema.js";

export type AdminDatabase = PostgresJsDatabase<typeof schema>;

const logger = createLogger("database");

/** The raw postgres.js client instance */
let sqlClient: ReturnType<typeof postgres> | null = null;

/** The Drizzle ORM instance */
let drizzleInstance: AdminDatabase | null = null;

/**
 * Initializes the database connection.
 * Call once at application startup.
 */
export function initDatabase(url: string) {
  sqlClient = postgres(url, { onnotice: () => {} });
  drizzleInstance = drizzle(sqlClient, { schema });
  logger.info("Database connection initialized");

  return { sql: sqlClient, db: drizzleInstance };
}

/**
 * Returns the active Drizzle instance.
 * Throws if initDatabase() hasn't been called.
 */
export function getDatabase() {
  if (!drizzleInstance || !sqlClient) {
    throw new Error(
      "Database not initialized. Call initDatabase() at startup."
    );
  }
  return { sql: sqlClient, db: drizzleInstance };
}

export function isDatabaseInitialized(): boolean {
  return drizzleInstance !== null;
}

/**
 * Closes the database connection gracefully.
 * Call on application shutdown.
 */
export async function closeDatabase() {
  if (sqlClient) {
    await sqlClient.end();
    sqlClient = null;
    drizzleInstance = null;
  }
}
