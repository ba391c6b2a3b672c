/**
 * Migration Runner
 *
 * Creates the tables behind tables.ts. Idempotent: every statement uses
 * IF NOT EXISTS, so running it against an up-to-date database is a no-op.
 *
 * Order matters — parent tables must exist before the children that
 * reference them via foreign keys.
 *
 * Deleting a parent that still has children (a user with foods, a food
 * with votes) is rejected by the foreign keys; there is no cascade.
 */

import type { Logger } from "@foodvote/contracts";
import { createLogger } from "../logging/index.js";

/** Anything that can run a raw SQL string (postgres.js client, reserved connection) */
export interface MigrationExecutor {
  unsafe(query: string): PromiseLike<unknown>;
}

export interface MigrationStep {
  table: string;
  statements: string[];
}

export const MIGRATIONS: MigrationStep[] = [
  {
    table: "users",
    statements: [
      `CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        username TEXT NOT NULL UNIQUE,
        email TEXT NOT NULL UNIQUE,
        hashed_password TEXT NOT NULL
      )`,
    ],
  },
  {
    table: "days",
    statements: [
      `CREATE TABLE IF NOT EXISTS days (
        id SERIAL PRIMARY KEY,
        name TEXT NOT NULL UNIQUE
      )`,
    ],
  },
  {
    table: "categories",
    statements: [
      `CREATE TABLE IF NOT EXISTS categories (
        id SERIAL PRIMARY KEY,
        name TEXT NOT NULL UNIQUE
      )`,
    ],
  },
  {
    table: "foods",
    statements: [
      `CREATE TABLE IF NOT EXISTS foods (
        id SERIAL PRIMARY KEY,
        name TEXT NOT NULL,
        price DOUBLE PRECISION NOT NULL,
        description TEXT,
        creator_id INTEGER NOT NULL REFERENCES users(id),
        day_id INTEGER REFERENCES days(id),
        category_id INTEGER REFERENCES categories(id)
      )`,
      `CREATE INDEX IF NOT EXISTS idx_foods_name ON foods(name)`,
    ],
  },
  {
    table: "food_availabilities",
    statements: [
      `CREATE TABLE IF NOT EXISTS food_availabilities (
        id SERIAL PRIMARY KEY,
        food_id INTEGER NOT NULL REFERENCES foods(id),
        day_id INTEGER NOT NULL REFERENCES days(id),
        CONSTRAINT food_availabilities_food_id_day_id_key UNIQUE (food_id, day_id)
      )`,
    ],
  },
  {
    table: "votes",
    statements: [
      `CREATE TABLE IF NOT EXISTS votes (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id),
        food_id INTEGER NOT NULL REFERENCES foods(id),
        vote_value INTEGER NOT NULL
      )`,
    ],
  },
];

/**
 * Runs every migration step in order.
 * Stops at the first failing statement and rethrows its error.
 */
export async function runMigrations(
  executor: MigrationExecutor,
  logger: Logger = createLogger("migrate")
): Promise<void> {
  for (const step of MIGRATIONS) {
    for (const statement of step.statements) {
      await executor.unsafe(statement);
    }
    logger.debug("Ensured table", { table: step.table });
  }
  logger.info("Migrations complete", { tables: MIGRATIONS.length });
}
