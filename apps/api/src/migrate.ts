/**
 * Migration Script
 *
 * Creates every table without starting the server.
 *
 * Usage: npm run db:migrate
 */

import { bootstrap } from "./bootstrap.js";

async function migrate() {
  console.log("[migrate] Starting database migration...");

  // bootstrap() runs the migrations
  const { database } = await bootstrap();

  await database.close();
  console.log("[migrate] Done.");
}

migrate().catch((err: unknown) => {
  console.error("[migrate] Fatal error:", err);
  process.exit(1);
});
