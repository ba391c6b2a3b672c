/**
 * Seed Script
 *
 * Populates a freshly migrated database with demo data.
 * Run with: npm run db:seed
 *
 * Day, category and user names are unique, so a second run against the
 * same database fails on the first duplicate.
 */

import { seedData } from "@foodvote/domain";
import { createBcryptHasher, createScopeFactory, withScope } from "@foodvote/platform";
import { bootstrap } from "./bootstrap.js";
import { seedDatabase } from "./seeding.js";

async function seed() {
  console.log("[seed] Starting...");

  const { database } = await bootstrap();
  const openScope = createScopeFactory(database, createBcryptHasher());

  try {
    await withScope(openScope, (services) => seedDatabase(services, seedData));
  } finally {
    await database.close();
  }

  console.log("[seed] Done!");
}

seed().catch((err: unknown) => {
  console.error("[seed] Fatal error:", err);
  process.exit(1);
});
