/**
 * PostgreSQL Instance Store
 *
 * Persists instance and task snapshots through Drizzle ORM over postgres.js.
 * Every save is an upsert of the whole snapshot.
 */

import { asc } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { ProcessInstance, TaskInstance } from "@procflow/contracts";
import {
  processInstances,
  taskInstances,
  type ProcessInstanceRow,
  type TaskInstanceRow,
} from "./schema.js";
import type { InstanceStore, StoredState } from "./store.js";

export function toInstanceRow(instance: ProcessInstance): ProcessInstanceRow {
  return {
    id: instance.id,
    definitionName: instance.definitionName,
    currentState: instance.currentState,
    status: instance.status,
    createdAt: instance.createdAt,
    completedAt: instance.completedAt,
    suspendedAt: instance.suspendedAt,
    suspensionReason: instance.suspensionReason,
    statusReason: instance.statusReason,
    entityId: instance.entityId,
    variables: instance.variables,
    activatedSteps: instance.activatedSteps,
  };
}

export function fromInstanceRow(row: ProcessInstanceRow): ProcessInstance {
  return {
    ...row,
    variables: { ...row.variables },
    activatedSteps: [...row.activatedSteps],
  };
}

export function toTaskRow(task: TaskInstance): TaskInstanceRow {
  return {
    id: task.id,
    instanceId: task.instanceId,
    step: task.step,
    status: task.status,
    assignedRole: task.assignedRole,
    assignedUser: task.assignedUser,
    createdAt: task.createdAt,
    completedAt: task.completedAt,
    data: task.data,
  };
}

export function fromTaskRow(row: TaskInstanceRow): TaskInstance {
  return { ...row, data: { ...row.data } };
}

export class PostgresInstanceStore implements InstanceStore {
  constructor(private readonly db: PostgresJsDatabase) {}

  async saveInstance(instance: ProcessInstance): Promise<void> {
    const { id, ...changes } = toInstanceRow(instance);
    await this.db
      .insert(processInstances)
      .values({ id, ...changes })
      .onConflictDoUpdate({ target: processInstances.id, set: changes });
  }

  async saveTask(task: TaskInstance): Promise<void> {
    const { id, ...changes } = toTaskRow(task);
    await this.db
      .insert(taskInstances)
      .values({ id, ...changes })
      .onConflictDoUpdate({ target: taskInstances.id, set: changes });
  }

  async loadAll(): Promise<StoredState> {
    const instanceRows = await this.db
      .select()
      .from(processInstances)
      .orderBy(asc(processInstances.createdAt));
    const taskRows = await this.db
      .select()
      .from(taskInstances)
      .orderBy(asc(taskInstances.createdAt));

    return {
      instances: instanceRows.map(fromInstanceRow),
      tasks: taskRows.map(fromTaskRow),
    };
  }
}
