/**
 * Database Connection
 *
 * Creates the PostgreSQL connection pool and Drizzle instance.
 * The handle is an explicit value: build it once at startup and pass it
 * to whatever needs storage. There is no module-level connector.
 *
 * Requests never share a connection. Each one opens a session (a reserved
 * connection from the pool) and must release it when done.
 */

import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import type { AppConfig } from "../config/index.js";

/** Query interface handed to repositories. Any Postgres driver fits. */
export type Database = PgDatabase<PgQueryResultHKT>;

/** The raw postgres.js client instance */
export type SqlClient = ReturnType<typeof postgres>;

/** One reserved connection, scoped to a single request */
export interface StorageSession {
  db: Database;
  release(): void;
}

export interface DatabaseHandle {
  /** Pool-level client, for migrations and scripts */
  sql: SqlClient;
  /** Pool-level Drizzle instance */
  db: Database;
  /** Reserves a dedicated connection. Callers must release it. */
  openSession(): Promise<StorageSession>;
  /** Closes the pool gracefully. Call on application shutdown. */
  close(): Promise<void>;
}

/**
 * Initializes the database connection pool.
 * Call once at application startup.
 */
export function createDatabase(config: AppConfig): DatabaseHandle {
  const sqlClient = postgres(config.database.url);
  const db = drizzle(sqlClient);

  return {
    sql: sqlClient,
    db,

    async openSession() {
      const reserved = await sqlClient.reserve();
      return {
        db: drizzle(reserved),
        release: () => reserved.release(),
      };
    },

    async close() {
      await sqlClient.end();
    },
  };
}
