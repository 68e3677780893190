/**
 * Process Instance Runtime
 *
 * Owns every process instance and task in the process. Each mutating
 * operation:
 *
 *   1. Takes the per-instance lock
 *   2. Checks every precondition (throws before changing anything)
 *   3. Applies the change in memory and schedules newly eligible tasks
 *   4. Hands the changed snapshots and domain events to the side-effect
 *      tracker, which persists and publishes them without blocking
 *   5. Returns a snapshot copy
 *
 * An instance keeps the definition it was started with, even if the
 * registry is reloaded while it runs.
 */

import { randomUUID } from "node:crypto";
import {
  TERMINAL_INSTANCE_STATUSES,
  TERMINAL_TASK_STATUSES,
  type Actor,
  type DomainEvent,
  type InstanceFilter,
  type Logger,
  type ProcessDefinition,
  type ProcessInstance,
  type SideEffectWarning,
  type StateId,
  type StepId,
  type StepNode,
  type TaskFilter,
  type TaskInstance,
  type TaskStatus,
  type TransitionNode,
  type VariableBag,
} from "@procflow/contracts";
import type { RegistryRef } from "../definitions/registry.js";
import { cloneInstance, cloneTask, type InstanceStore, type StoredState } from "../database/store.js";
import { AuthorizationError, ReferenceNotFoundError, StateError } from "../errors/index.js";
import { publish, type PublishFailure } from "../event-bus/index.js";
import { createLogger } from "../logging/index.js";
import { authorize, authorizeRole } from "./authorizer.js";
import { selectBranch } from "./conditions.js";
import { KeyedMutex } from "./instance-lock.js";
import { computeEligibleSteps } from "./scheduler.js";
import { SideEffectTracker } from "./side-effects.js";

/** Delivers a domain event and reports the subscribers that failed */
export type EventEmitter = (event: DomainEvent) => Promise<PublishFailure[]>;

export interface ProcessRuntimeOptions {
  /** Definitions are read from here when an instance starts */
  registry: RegistryRef;
  /** Durable store. Without one, instances live in memory only. */
  store?: InstanceStore;
  /** Defaults to the platform event bus */
  emit?: EventEmitter;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
  /** Side-effect warnings kept for listWarnings. Defaults to 1000. */
  warningLimit?: number;
}

/**
 * A status change decided by the caller of changeStatus.
 * Returning null from the decision leaves the instance untouched.
 */
export interface StatusChange {
  /** Terminal statuses go through finish(), which also cancels tasks */
  status: "RUNNING" | "SUSPENDED";
  suspendedAt: Date | null;
  suspensionReason: string | null;
  /** Domain event emitted once the change commits */
  event: string;
}

export type StatusDecision = (instance: ProcessInstance) => StatusChange | null;

export interface RestoreSummary {
  instances: number;
  tasks: number;
  skipped: number;
}

interface InstanceRecord {
  instance: ProcessInstance;
  definition: ProcessDefinition;
  stateId: StateId;
  /** Task ids in creation order */
  taskIds: string[];
}

/**
 * What one operation changed. Dispatched to the side-effect tracker only
 * after the operation has finished without throwing.
 */
class Commit {
  instanceChanged = false;
  readonly tasks = new Set<TaskInstance>();
  readonly events: DomainEvent[] = [];

  constructor(private readonly record: InstanceRecord) {}

  touchInstance() {
    this.instanceChanged = true;
  }

  touchTask(task: TaskInstance) {
    this.tasks.add(task);
  }

  emit(type: string, payload: Record<string, unknown> = {}) {
    const { instance } = this.record;
    this.events.push({
      type,
      payload: {
        instanceId: instance.id,
        definitionName: instance.definitionName,
        ...payload,
      },
    });
  }
}

export class ProcessRuntime {
  private readonly registry: RegistryRef;
  private readonly store: InstanceStore | null;
  private readonly emitEvent: EventEmitter;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  private readonly records = new Map<string, InstanceRecord>();
  private readonly tasks = new Map<string, TaskInstance>();
  private readonly lock = new KeyedMutex();
  private readonly effects: SideEffectTracker;

  constructor(options: ProcessRuntimeOptions) {
    this.registry = options.registry;
    this.store = options.store ?? null;
    this.emitEvent = options.emit ?? publish;
    this.logger = options.logger ?? createLogger("process-runtime");
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.effects = new SideEffectTracker(this.logger, this.now, options.warningLimit);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Starts an instance at the definition's initial state, or at the named
   * state. Eligible steps get tasks immediately. Starting in a terminal
   * state completes the instance at once.
   */
  async start(
    definitionName: string,
    initialState?: string,
    entityId?: string,
    variables: VariableBag = {}
  ): Promise<ProcessInstance> {
    const definition = this.registry.current().get(definitionName);

    let stateId = definition.initialStateId;
    if (initialState !== undefined) {
      const requested = definition.stateIds.get(initialState);
      if (requested === undefined) {
        throw new ReferenceNotFoundError("StateNotFound", initialState);
      }
      stateId = requested;
    }

    const state = definition.states[stateId];
    const record: InstanceRecord = {
      definition,
      stateId,
      taskIds: [],
      instance: {
        id: this.generateId(),
        definitionName: definition.name,
        currentState: state.name,
        status: "RUNNING",
        createdAt: this.now(),
        completedAt: null,
        suspendedAt: null,
        suspensionReason: null,
        statusReason: null,
        entityId: entityId ?? null,
        variables: { ...variables },
        activatedSteps: [],
      },
    };
    this.records.set(record.instance.id, record);

    return this.mutate(record.instance.id, (_record, commit) => {
      commit.touchInstance();
      commit.emit("process.started", { state: state.name, entityId: entityId ?? null });

      if (state.terminal) {
        this.finish(record, "COMPLETED", null, commit);
      } else {
        this.schedule(record, commit);
      }
      return cloneInstance(record.instance);
    });
  }

  /**
   * Moves a RUNNING instance along a named transition leaving its current
   * state. `variables` are merged into the instance before the transition's
   * required variables are checked.
   */
  async executeTransition(
    instanceId: string,
    transitionName: string,
    actingRole: string,
    variables: VariableBag = {}
  ): Promise<ProcessInstance> {
    return this.mutate(instanceId, (record, commit) => {
      const { instance, definition } = record;
      this.assertNotTerminal(record);

      if (instance.status !== "RUNNING") {
        throw new StateError(
          "InvalidTransition",
          `Process instance "${instance.id}" is ${instance.status}; transitions are not accepted`,
          { status: instance.status }
        );
      }

      const available = definition.states[record.stateId].outgoing.map(
        (id) => definition.transitions[id]
      );
      const transition = available.find((t) => t.name === transitionName);
      if (!transition) {
        throw new StateError(
          "InvalidTransition",
          `Transition "${transitionName}" is not available from state "${instance.currentState}"`,
          {
            state: instance.currentState,
            validTransitions: available.map((t) => t.name),
          }
        );
      }

      if (!authorize(transition, actingRole, definition)) {
        throw new AuthorizationError(
          "RoleMismatch",
          `Role "${actingRole}" may not execute "${transition.name}"; ` +
            `it requires "${definition.roles[transition.roleId].name}" or a supervising role`
        );
      }

      const merged = { ...instance.variables, ...variables };
      const missing = missingVariables(transition, merged);
      if (missing.length > 0) {
        throw new StateError(
          "MissingRequiredVariable",
          `Transition "${transition.name}" requires variables: ${missing.join(", ")}`,
          { missing }
        );
      }

      instance.variables = merged;
      commit.touchInstance();
      this.applyTransition(record, transition, actingRole, commit);
      return cloneInstance(instance);
    });
  }

  /** RUNNING or SUSPENDED → TERMINATED. Open tasks are cancelled. */
  async terminate(instanceId: string, reason: string): Promise<ProcessInstance> {
    return this.mutate(instanceId, (record, commit) => {
      this.assertNotTerminal(record);
      this.finish(record, "TERMINATED", reason, commit);
      return cloneInstance(record.instance);
    });
  }

  /** Any non-terminal status → ERROR. Open tasks are cancelled. */
  async fail(instanceId: string, reason: string): Promise<ProcessInstance> {
    return this.mutate(instanceId, (record, commit) => {
      this.assertNotTerminal(record);
      this.finish(record, "ERROR", reason, commit);
      return cloneInstance(record.instance);
    });
  }

  /**
   * Applies a status change decided from the current snapshot.
   * The decision runs under the instance lock and may throw to reject it.
   * Only moves between RUNNING and SUSPENDED; a terminal instance is
   * never revived.
   */
  async changeStatus(instanceId: string, decide: StatusDecision): Promise<ProcessInstance> {
    return this.mutate(instanceId, (record, commit) => {
      const change = decide(cloneInstance(record.instance));
      if (change === null) return cloneInstance(record.instance);
      this.assertNotTerminal(record);

      const { instance } = record;
      instance.status = change.status;
      instance.suspendedAt = change.suspendedAt;
      instance.suspensionReason = change.suspensionReason;
      commit.touchInstance();
      commit.emit(change.event, {
        status: change.status,
        reason: change.suspensionReason,
      });
      return cloneInstance(instance);
    });
  }

  // -------------------------------------------------------------------------
  // Tasks
  // -------------------------------------------------------------------------

  /**
   * Assigns an open task to a user. Claiming again as the same user is a
   * no-op; a task held by someone else is a ClaimConflict.
   */
  async claimTask(taskId: string, userId: string): Promise<TaskInstance> {
    const { instanceId } = this.requireTask(taskId);
    return this.mutate(instanceId, (record, commit) => {
      const task = this.requireTask(taskId);
      this.assertNotTerminal(record);
      this.assertTaskOpen(task);

      if (task.assignedUser === userId) return cloneTask(task);
      if (task.assignedUser !== null) {
        throw new AuthorizationError(
          "ClaimConflict",
          `Task "${task.step}" is already claimed by "${task.assignedUser}"`
        );
      }

      task.assignedUser = userId;
      task.status = "IN_PROGRESS";
      commit.touchTask(task);
      commit.emit("task.claimed", { taskId: task.id, step: task.step, userId });
      return cloneTask(task);
    });
  }

  /**
   * Completes an open task, merges its output, follows the first matching
   * onComplete branch and schedules whatever became eligible.
   */
  async completeTask(
    taskId: string,
    actor: Actor,
    output: Record<string, unknown> = {}
  ): Promise<TaskInstance> {
    const { instanceId } = this.requireTask(taskId);
    return this.mutate(instanceId, (record, commit) => {
      const task = this.requireTask(taskId);
      this.assertNotTerminal(record);
      this.assertTaskOpen(task);
      const step = this.stepOf(record, task);
      this.assertActor(record, step, task, actor);

      task.data = { ...task.data, ...output };
      task.status = "COMPLETED";
      task.completedAt = this.now();
      commit.touchTask(task);
      commit.emit("task.completed", {
        taskId: task.id,
        step: task.step,
        userId: actor.userId ?? null,
        role: actor.role ?? null,
      });

      this.applyBranches(record, step, task, commit);
      this.schedule(record, commit);
      return cloneTask(task);
    });
  }

  /**
   * Marks an open task SKIPPED. Skipping satisfies dependents like
   * completion does, but no branch is followed.
   */
  async skipTask(taskId: string, actor: Actor): Promise<TaskInstance> {
    const { instanceId } = this.requireTask(taskId);
    return this.mutate(instanceId, (record, commit) => {
      const task = this.requireTask(taskId);
      this.assertNotTerminal(record);
      this.assertTaskOpen(task);
      this.assertActor(record, this.stepOf(record, task), task, actor);

      task.status = "SKIPPED";
      task.completedAt = this.now();
      commit.touchTask(task);
      commit.emit("task.skipped", {
        taskId: task.id,
        step: task.step,
        userId: actor.userId ?? null,
        role: actor.role ?? null,
      });

      this.schedule(record, commit);
      return cloneTask(task);
    });
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  getInstance(instanceId: string): ProcessInstance {
    return cloneInstance(this.requireRecord(instanceId).instance);
  }

  /** Instances in creation order */
  listInstances(filter: InstanceFilter = {}): ProcessInstance[] {
    return Array.from(this.records.values(), (r) => r.instance)
      .filter(
        (i) =>
          (filter.definitionName === undefined || i.definitionName === filter.definitionName) &&
          (filter.status === undefined || i.status === filter.status) &&
          (filter.entityId === undefined || i.entityId === filter.entityId)
      )
      .map(cloneInstance);
  }

  getTask(taskId: string): TaskInstance {
    return cloneTask(this.requireTask(taskId));
  }

  /** Tasks in creation order */
  listTasks(filter: TaskFilter = {}): TaskInstance[] {
    return Array.from(this.tasks.values())
      .filter(
        (t) =>
          (filter.instanceId === undefined || t.instanceId === filter.instanceId) &&
          (filter.role === undefined || t.assignedRole === filter.role) &&
          (filter.userId === undefined || t.assignedUser === filter.userId) &&
          (filter.status === undefined || t.status === filter.status)
      )
      .map(cloneTask);
  }

  /** The definition an instance runs under */
  getDefinition(instanceId: string): ProcessDefinition {
    return this.requireRecord(instanceId).definition;
  }

  listWarnings(instanceId?: string): SideEffectWarning[] {
    return this.effects.list(instanceId);
  }

  /** Resolves once all pending persistence and event delivery has settled */
  flushSideEffects(): Promise<void> {
    return this.effects.flush();
  }

  // -------------------------------------------------------------------------
  // Restore
  // -------------------------------------------------------------------------

  /**
   * Rehydrates instances and tasks read from a durable store. Restored
   * instances run under the registry's current definition of the same name.
   * Instances whose definition or state no longer exists are skipped.
   */
  restore(state: StoredState): RestoreSummary {
    const summary: RestoreSummary = { instances: 0, tasks: 0, skipped: 0 };
    const registry = this.registry.current();

    for (const stored of state.instances) {
      if (this.records.has(stored.id)) continue;

      const definition = registry.find(stored.definitionName);
      const stateId = definition?.stateIds.get(stored.currentState);
      if (!definition || stateId === undefined) {
        summary.skipped++;
        this.logger.warn("Skipping stored instance", {
          instanceId: stored.id,
          definitionName: stored.definitionName,
          state: stored.currentState,
        });
        continue;
      }

      this.records.set(stored.id, {
        instance: cloneInstance(stored),
        definition,
        stateId,
        taskIds: [],
      });
      summary.instances++;
    }

    for (const stored of state.tasks) {
      const record = this.records.get(stored.instanceId);
      if (!record || this.tasks.has(stored.id)) continue;
      this.tasks.set(stored.id, cloneTask(stored));
      record.taskIds.push(stored.id);
      summary.tasks++;
    }

    return summary;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async mutate<T>(
    instanceId: string,
    work: (record: InstanceRecord, commit: Commit) => T
  ): Promise<T> {
    return this.lock.run(instanceId, () => {
      const record = this.requireRecord(instanceId);
      const commit = new Commit(record);
      const result = work(record, commit);
      this.dispatch(record, commit);
      return result;
    });
  }

  private dispatch(record: InstanceRecord, commit: Commit) {
    const instanceId = record.instance.id;
    const store = this.store;

    if (store) {
      if (commit.instanceChanged) {
        const snapshot = cloneInstance(record.instance);
        this.effects.enqueue(
          { instanceId, effect: "persist_instance", code: "StoreWriteFailed" },
          () => store.saveInstance(snapshot)
        );
      }
      for (const task of commit.tasks) {
        const snapshot = cloneTask(task);
        this.effects.enqueue(
          { instanceId, taskId: task.id, effect: "persist_task", code: "StoreWriteFailed" },
          () => store.saveTask(snapshot)
        );
      }
    }

    for (const event of commit.events) {
      const stamped: DomainEvent = { ...event, timestamp: this.now() };
      this.effects.enqueue(
        { instanceId, effect: "emit_event", code: "EmitFailed" },
        async () => {
          const failures = await this.emitEvent(stamped);
          for (const failure of failures) {
            this.effects.report(
              { instanceId, effect: "emit_event", code: "SubscriberFailed" },
              `Subscriber "${failure.subscriber}" failed on "${failure.eventType}": ${failure.error.message}`
            );
          }
        }
      );
    }
  }

  /**
   * Creates tasks for every eligible step, repeating while automated steps
   * complete and unlock more. Stops once the instance is terminal.
   */
  private schedule(record: InstanceRecord, commit: Commit) {
    const { definition } = record;

    while (!this.isTerminal(record)) {
      const eligible = computeEligibleSteps(
        definition,
        this.taskStatusByStep(record),
        this.activatedStepIds(record)
      );
      if (eligible.length === 0) return;

      for (const stepId of eligible) {
        if (this.isTerminal(record)) return;
        const step = definition.steps[stepId];
        const task = this.createTask(record, step, commit);
        if (step.auto) this.applyBranches(record, step, task, commit);
      }
    }
  }

  private createTask(record: InstanceRecord, step: StepNode, commit: Commit): TaskInstance {
    const { definition, instance } = record;
    const now = this.now();
    const task: TaskInstance = {
      id: this.generateId(),
      instanceId: instance.id,
      step: step.name,
      status: step.auto ? "COMPLETED" : "PENDING",
      assignedRole: step.roleId === null ? null : definition.roles[step.roleId].name,
      assignedUser: null,
      createdAt: now,
      completedAt: step.auto ? now : null,
      data: {},
    };

    this.tasks.set(task.id, task);
    record.taskIds.push(task.id);
    commit.touchTask(task);
    commit.emit("task.created", {
      taskId: task.id,
      step: task.step,
      assignedRole: task.assignedRole,
    });
    if (step.auto) {
      commit.emit("task.completed", { taskId: task.id, step: task.step, automated: true });
    }
    return task;
  }

  /**
   * Follows the first matching onComplete branch of a completed task.
   * A transition that cannot apply is reported as a warning, not an error:
   * the task completion itself stands.
   */
  private applyBranches(
    record: InstanceRecord,
    step: StepNode,
    task: TaskInstance,
    commit: Commit
  ) {
    const { instance, definition } = record;
    const branch = selectBranch(step.onComplete, task.data);
    if (!branch) return;

    if (branch.target === "step") {
      const name = definition.steps[branch.stepId].name;
      if (!instance.activatedSteps.includes(name)) {
        instance.activatedSteps.push(name);
        commit.touchInstance();
      }
      return;
    }

    const transition = definition.transitions[branch.transitionId];
    const skip = (reason: string) => {
      this.effects.report(
        { instanceId: instance.id, taskId: task.id, effect: "branch", code: "BranchNotApplicable" },
        `Branch transition "${transition.name}" from step "${step.name}" skipped: ${reason}`
      );
    };

    if (instance.status !== "RUNNING") {
      skip(`instance is ${instance.status}`);
      return;
    }
    if (transition.fromId !== record.stateId) {
      skip(`it does not leave the current state "${instance.currentState}"`);
      return;
    }
    const missing = missingVariables(transition, instance.variables);
    if (missing.length > 0) {
      skip(`missing required variables ${missing.join(", ")}`);
      return;
    }

    this.applyTransition(record, transition, null, commit);
  }

  /**
   * @param actingRole - null when the process itself follows a branch
   */
  private applyTransition(
    record: InstanceRecord,
    transition: TransitionNode,
    actingRole: string | null,
    commit: Commit
  ) {
    const { instance, definition } = record;
    const from = instance.currentState;
    const to = definition.states[transition.toId];

    instance.currentState = to.name;
    record.stateId = to.id;
    commit.touchInstance();
    commit.emit("process.transitioned", {
      transition: transition.name,
      from,
      to: to.name,
      actingRole,
    });
    for (const trigger of transition.triggers) {
      commit.emit(trigger, { transition: transition.name, state: to.name });
    }

    if (to.terminal) {
      this.finish(record, "COMPLETED", null, commit);
    }
  }

  /**
   * Moves an instance into a terminal status and cancels its open tasks.
   */
  private finish(
    record: InstanceRecord,
    status: "COMPLETED" | "TERMINATED" | "ERROR",
    reason: string | null,
    commit: Commit
  ) {
    const { instance } = record;
    instance.status = status;
    instance.statusReason = reason;
    instance.suspendedAt = null;
    instance.suspensionReason = null;
    if (status === "COMPLETED") instance.completedAt = this.now();
    commit.touchInstance();

    for (const taskId of record.taskIds) {
      const task = this.tasks.get(taskId);
      if (!task || TERMINAL_TASK_STATUSES.includes(task.status)) continue;
      task.status = "CANCELLED";
      commit.touchTask(task);
      commit.emit("task.cancelled", { taskId: task.id, step: task.step });
    }

    commit.emit(FINISH_EVENTS[status], reason === null ? {} : { reason });
  }

  private assertActor(
    record: InstanceRecord,
    step: StepNode,
    task: TaskInstance,
    actor: Actor
  ) {
    if (task.assignedUser !== null) {
      if (actor.userId === task.assignedUser) return;
      throw new AuthorizationError(
        "RoleMismatch",
        `Task "${task.step}" is claimed by "${task.assignedUser}"`
      );
    }

    if (step.roleId === null) return;
    if (actor.role !== undefined && authorizeRole(step.roleId, actor.role, record.definition)) {
      return;
    }
    throw new AuthorizationError(
      "RoleMismatch",
      `Task "${task.step}" requires role "${task.assignedRole}" or a supervising role`
    );
  }

  private assertNotTerminal(record: InstanceRecord) {
    const { instance } = record;
    if (TERMINAL_INSTANCE_STATUSES.includes(instance.status)) {
      throw new StateError(
        "TerminalStateReached",
        `Process instance "${instance.id}" is ${instance.status}`,
        { status: instance.status }
      );
    }
  }

  private assertTaskOpen(task: TaskInstance) {
    if (TERMINAL_TASK_STATUSES.includes(task.status)) {
      throw new StateError(
        "InvalidTaskState",
        `Task "${task.step}" is ${task.status}`,
        { status: task.status }
      );
    }
  }

  private isTerminal(record: InstanceRecord): boolean {
    return TERMINAL_INSTANCE_STATUSES.includes(record.instance.status);
  }

  private requireRecord(instanceId: string): InstanceRecord {
    const record = this.records.get(instanceId);
    if (!record) throw new ReferenceNotFoundError("InstanceNotFound", instanceId);
    return record;
  }

  private requireTask(taskId: string): TaskInstance {
    const task = this.tasks.get(taskId);
    if (!task) throw new ReferenceNotFoundError("TaskNotFound", taskId);
    return task;
  }

  private stepOf(record: InstanceRecord, task: TaskInstance): StepNode {
    const stepId = record.definition.stepIds.get(task.step);
    if (stepId === undefined) {
      throw new Error(`Task "${task.id}" refers to unknown step "${task.step}"`);
    }
    return record.definition.steps[stepId];
  }

  private taskStatusByStep(record: InstanceRecord): Map<StepId, TaskStatus> {
    const statuses = new Map<StepId, TaskStatus>();
    for (const taskId of record.taskIds) {
      const task = this.tasks.get(taskId);
      const stepId = task && record.definition.stepIds.get(task.step);
      if (task && stepId !== undefined) statuses.set(stepId, task.status);
    }
    return statuses;
  }

  private activatedStepIds(record: InstanceRecord): Set<StepId> {
    const ids = new Set<StepId>();
    for (const name of record.instance.activatedSteps) {
      const id = record.definition.stepIds.get(name);
      if (id !== undefined) ids.add(id);
    }
    return ids;
  }
}

const FINISH_EVENTS = {
  COMPLETED: "process.completed",
  TERMINATED: "process.terminated",
  ERROR: "process.failed",
} as const;

function missingVariables(transition: TransitionNode, variables: VariableBag): string[] {
  return transition.requires.filter((name) => {
    const value = variables[name];
    return value === undefined || value === "";
  });
}
