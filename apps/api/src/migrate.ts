/**
 * Migration Script
 *
 * Runs database migrations independently of server startup.
 * Creates the process_instances and task_instances tables.
 *
 * Usage: npm run db:migrate --workspace @procflow/api
 *
 * This is useful for:
 *   - Setting up a fresh database
 *   - Running migrations in CI/CD pipelines
 *   - Running migrations without starting the server
 */

import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

import {
  closeDatabase,
  initDatabase,
  loadConfig,
  runProcessMigrations,
} from "@procflow/platform";

async function migrate() {
  console.log("[migrate] Starting database migration...");

  const config = loadConfig();
  if (!config.database.url) {
    throw new Error("DATABASE_URL is not set; there is nothing to migrate.");
  }
  console.log(`[migrate] Database: ${config.database.url.replace(/\/\/.*@/, "//***@")}`);

  const { sql } = initDatabase(config.database.url);
  await runProcessMigrations(sql);

  await closeDatabase();
  console.log("[migrate] Done.");
  process.exit(0);
}

migrate().catch((err: unknown) => {
  console.error("[migrate] Fatal error:", err);
  process.exit(1);
});
