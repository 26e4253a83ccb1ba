/**
 * Seed Script
 *
 * Writes the demo users, groups and grants into the configured RBAC store.
 * Against Postgres the writes are idempotent, so the script can be rerun.
 *
 * Usage: npm run seed
 */

import dotenv from "dotenv";
import { fileURLToPath } from "node:url";

dotenv.config({ path: fileURLToPath(new URL("../../../.env", import.meta.url)) });

import { closeDatabase, createLogger } from "@adminforge/platform";
import { bootstrap } from "./bootstrap.js";

const logger = createLogger("seed");

async function seed() {
  const { seeded, runner } = await bootstrap({ seed: true });
  if (seeded) {
    logger.info("Seed complete", {
      users: seeded.users,
      groups: seeded.groups,
      grants: seeded.grants,
      rows: seeded.rows,
    });
  }
  await runner.drain();
  await closeDatabase();
}

seed().then(
  () => process.exit(0),
  (err: unknown) => {
    logger.error("Seed failed", { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  }
);
