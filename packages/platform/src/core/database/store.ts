/**
 * Instance Store
 *
 * The durable side of the runtime. The runtime writes a full snapshot of
 * every instance and task it changes, after the change has committed in
 * memory; saves are upserts keyed by id. At startup the stored snapshots
 * are read back to restore the runtime.
 *
 * Two implementations:
 *   - InMemoryInstanceStore: development and tests
 *   - PostgresInstanceStore: production (see postgres-store.ts)
 */

import type { ProcessInstance, TaskInstance } from "@procflow/contracts";

export interface StoredState {
  instances: ProcessInstance[];
  tasks: TaskInstance[];
}

export interface InstanceStore {
  saveInstance(instance: ProcessInstance): Promise<void>;
  saveTask(task: TaskInstance): Promise<void>;
  /** Every stored instance and task, instances in creation order */
  loadAll(): Promise<StoredState>;
}

export function cloneInstance(instance: ProcessInstance): ProcessInstance {
  return {
    ...instance,
    variables: { ...instance.variables },
    activatedSteps: [...instance.activatedSteps],
  };
}

export function cloneTask(task: TaskInstance): TaskInstance {
  return { ...task, data: structuredClone(task.data) };
}

export class InMemoryInstanceStore implements InstanceStore {
  private readonly instances = new Map<string, ProcessInstance>();
  private readonly tasks = new Map<string, TaskInstance>();

  async saveInstance(instance: ProcessInstance): Promise<void> {
    this.instances.set(instance.id, cloneInstance(instance));
  }

  async saveTask(task: TaskInstance): Promise<void> {
    this.tasks.set(task.id, cloneTask(task));
  }

  async loadAll(): Promise<StoredState> {
    return {
      instances: Array.from(this.instances.values(), cloneInstance),
      tasks: Array.from(this.tasks.values(), cloneTask),
    };
  }
}
