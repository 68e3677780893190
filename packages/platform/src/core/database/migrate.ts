/**
 * Migration Runner
 *
 * Creates the runtime's tables. These are platform tables, not generated
 * from process definitions: every process shares the same two tables and
 * keeps its variables and task data in JSONB columns.
 *
 * Idempotent: uses CREATE TABLE IF NOT EXISTS / CREATE INDEX IF NOT EXISTS.
 * Keep in sync with schema.ts.
 */

import { createLogger } from "../logging/index.js";
import { getDatabase } from "./connection.js";

/** The slice of a postgres.js client the runner needs */
export interface SqlExecutor {
  unsafe(query: string): PromiseLike<unknown>;
}

export const PROCESS_MIGRATIONS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS process_instances (
    id TEXT PRIMARY KEY,
    definition_name TEXT NOT NULL,
    current_state TEXT NOT NULL,
    status TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL,
    completed_at TIMESTAMPTZ,
    suspended_at TIMESTAMPTZ,
    suspension_reason TEXT,
    status_reason TEXT,
    entity_id TEXT,
    variables JSONB NOT NULL DEFAULT '{}',
    activated_steps JSONB NOT NULL DEFAULT '[]'
  )`,
  `CREATE INDEX IF NOT EXISTS idx_process_instances_definition ON process_instances(definition_name)`,
  `CREATE TABLE IF NOT EXISTS task_instances (
    id TEXT PRIMARY KEY,
    instance_id TEXT NOT NULL REFERENCES process_instances(id) ON DELETE CASCADE,
    step TEXT NOT NULL,
    status TEXT NOT NULL,
    assigned_role TEXT,
    assigned_user TEXT,
    created_at TIMESTAMPTZ NOT NULL,
    completed_at TIMESTAMPTZ,
    data JSONB NOT NULL DEFAULT '{}'
  )`,
  `CREATE INDEX IF NOT EXISTS idx_task_instances_instance ON task_instances(instance_id)`,
];

/**
 * Runs every migration statement in order.
 * Uses the initialized connection unless an executor is passed in.
 */
export async function runProcessMigrations(
  executor: SqlExecutor = getDatabase().sql
): Promise<void> {
  const logger = createLogger("migrate");

  for (const statement of PROCESS_MIGRATIONS) {
    await executor.unsafe(statement);
  }

  logger.info("Process tables are up to date", {
    statements: PROCESS_MIGRATIONS.length,
  });
}
