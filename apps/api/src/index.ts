/**
 * Food Vote API Server
 *
 * Fastify entry point. Boots the platform, builds the server, starts listening.
 */

import {
  captureException,
  createBcryptHasher,
  createLogger,
  createScopeFactory,
  flushObservability,
} from "@foodvote/platform";
import { bootstrap } from "./bootstrap.js";
import { createServer } from "./server.js";

const logger = createLogger("server");

async function main() {
  const { config, database } = await bootstrap();

  const app = await createServer({
    config,
    openScope: createScopeFactory(database, createBcryptHasher()),
  });

  await app.listen({
    port: config.api.port,
    host: config.api.host,
  });

  logger.info("Food Vote API listening", {
    url: `http://localhost:${config.api.port}`,
  });

  const shutdown = async () => {
    logger.info("Shutting down");
    await app.close();
    await flushObservability(2000);
    await database.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      console.error("[shutdown] Failed:", err);
      process.exit(1);
    });
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

main().catch(async (err: unknown) => {
  console.error("Fatal error:", err);
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability(2000);
  process.exit(1);
});
