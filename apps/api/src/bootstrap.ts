/**
 * Bootstrap
 *
 * Shared startup for the server and the scripts.
 *
 * Sequence:
 *   1. Initialize observability
 *   2. Load .env from the repository root, then validate config
 *   3. Open the database handle
 *   4. Run migrations (create tables if they don't exist)
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import {
  createDatabase,
  createLogger,
  initObservability,
  loadConfig,
  redactDatabaseUrl,
  runMigrations,
  type AppConfig,
  type DatabaseHandle,
} from "@foodvote/platform";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const logger = createLogger("bootstrap");

export interface Bootstrapped {
  config: AppConfig;
  database: DatabaseHandle;
}

/**
 * Initializes the application. Call once per process.
 */
export async function bootstrap(): Promise<Bootstrapped> {
  // Observability first, so it sees failures in every later step
  initObservability();

  dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
  const config = loadConfig();

  const database = createDatabase(config);
  logger.info("Database configured", { url: redactDatabaseUrl(config.database.url) });

  try {
    await runMigrations(database.sql);
  } catch (err) {
    await database.close();
    throw err;
  }

  return { config, database };
}
