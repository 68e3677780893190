/**
 * Database Schema
 *
 * Drizzle table definitions for process instances and their tasks.
 * Column names are snake_case; the store maps rows to the camelCase
 * snapshots the runtime works with. Keep in sync with migrate.ts.
 */

import { index, jsonb, pgTable, text, timestamp } from "drizzle-orm/pg-core";
import {
  INSTANCE_STATUSES,
  TASK_STATUSES,
  type VariableBag,
} from "@procflow/contracts";

export const processInstances = pgTable(
  "process_instances",
  {
    id: text("id").primaryKey(),
    definitionName: text("definition_name").notNull(),
    currentState: text("current_state").notNull(),
    status: text("status", { enum: INSTANCE_STATUSES }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    completedAt: timestamp("completed_at", { withTimezone: true }),
    suspendedAt: timestamp("suspended_at", { withTimezone: true }),
    suspensionReason: text("suspension_reason"),
    statusReason: text("status_reason"),
    entityId: text("entity_id"),
    variables: jsonb("variables").$type<VariableBag>().notNull(),
    activatedSteps: jsonb("activated_steps").$type<string[]>().notNull(),
  },
  (table) => ({
    definitionIdx: index("idx_process_instances_definition").on(table.definitionName),
  })
);

export const taskInstances = pgTable(
  "task_instances",
  {
    id: text("id").primaryKey(),
    instanceId: text("instance_id").notNull(),
    step: text("step").notNull(),
    status: text("status", { enum: TASK_STATUSES }).notNull(),
    assignedRole: text("assigned_role"),
    assignedUser: text("assigned_user"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    completedAt: timestamp("completed_at", { withTimezone: true }),
    data: jsonb("data").$type<Record<string, unknown>>().notNull(),
  },
  (table) => ({
    instanceIdx: index("idx_task_instances_instance").on(table.instanceId),
  })
);

export type ProcessInstanceRow = typeof processInstances.$inferSelect;
export type TaskInstanceRow = typeof taskInstances.$inferSelect;
