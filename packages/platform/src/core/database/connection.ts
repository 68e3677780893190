/**
 * Database Connection
 *
 * Establishes and manages the PostgreSQL connection via Drizzle ORM.
 * Only used when DATABASE_URL is configured; without it the runtime keeps
 * instances in memory.
 */

import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/** The raw postgres.js client instance */
let sqlClient: ReturnType<typeof postgres> | null = null;

/** The Drizzle ORM instance */
let drizzleInstance: PostgresJsDatabase | null = null;

/**
 * Initializes the database connection.
 * Call once at application startup.
 */
export function initDatabase(url: string) {
  sqlClient = postgres(url);
  drizzleInstance = drizzle(sqlClient);

  return { sql: sqlClient, db: drizzleInstance };
}

/**
 * Returns the active connection.
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
