/**
 * API Server Entry Point
 *
 * Loads .env, bootstraps the admin site and starts listening.
 * SIGINT and SIGTERM close the server, wait for deferred action tasks,
 * flush observability and close the database.
 */

import dotenv from "dotenv";
import { fileURLToPath } from "node:url";

// .env lives at the repository root
dotenv.config({ path: fileURLToPath(new URL("../../../.env", import.meta.url)) });

import {
  captureException,
  closeDatabase,
  createLogger,
  flushObservability,
} from "@adminforge/platform";
import { bootstrap } from "./bootstrap.js";
import { buildServer } from "./server.js";

const logger = createLogger("server");

async function main() {
  const deps = await bootstrap();
  const app = await buildServer(deps);

  await app.listen({ port: deps.config.api.port, host: deps.config.api.host });
  logger.info("Admin API listening", {
    url: `http://localhost:${deps.config.api.port}${deps.config.admin.prefix}`,
  });

  let closing = false;
  const shutdown = async () => {
    if (closing) return;
    closing = true;
    logger.info("Shutting down");
    await app.close();
    await deps.runner.drain();
    await flushObservability(2000);
    await closeDatabase();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch(async (err: unknown) => {
  logger.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability(2000);
  process.exit(1);
});
