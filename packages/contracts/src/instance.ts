/**
 * Process and Task Instances
 *
 * Snapshots of runtime state handed out by the platform. Callers never
 * mutate these; every change goes through a runtime operation.
 */

import type { ScalarValue } from "./definition-source.js";

export const INSTANCE_STATUSES = [
  "RUNNING",
  "COMPLETED",
  "SUSPENDED",
  "TERMINATED",
  "ERROR",
] as const;

export type InstanceStatus = (typeof INSTANCE_STATUSES)[number];

/** Statuses that freeze an instance for good */
export const TERMINAL_INSTANCE_STATUSES: readonly InstanceStatus[] = [
  "COMPLETED",
  "TERMINATED",
  "ERROR",
];

export const TASK_STATUSES = [
  "PENDING",
  "IN_PROGRESS",
  "COMPLETED",
  "SKIPPED",
  "CANCELLED",
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

/** Statuses from which a task can no longer change */
export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = [
  "COMPLETED",
  "SKIPPED",
  "CANCELLED",
];

/** String-keyed bag of scalar values */
export type VariableBag = Record<string, ScalarValue>;

export interface ProcessInstance {
  id: string;
  definitionName: string;
  /** Name of a state declared in the definition */
  currentState: string;
  status: InstanceStatus;
  createdAt: Date;
  completedAt: Date | null;
  suspendedAt: Date | null;
  suspensionReason: string | null;
  /** Why the instance was terminated or failed */
  statusReason: string | null;
  /** Linked business-entity record */
  entityId: string | null;
  variables: VariableBag;
  /** Steps outside the flow that an onComplete branch has activated */
  activatedSteps: string[];
}

export interface TaskInstance {
  id: string;
  instanceId: string;
  /** Name of the originating step */
  step: string;
  status: TaskStatus;
  assignedRole: string | null;
  assignedUser: string | null;
  createdAt: Date;
  completedAt: Date | null;
  /** Task data bag. Free-form JSON output merged in on completion. */
  data: Record<string, unknown>;
}

/**
 * Who is acting on a task. A task assigned to a user only accepts that
 * user; an unassigned task accepts its role or a supervising role.
 */
export interface Actor {
  userId?: string;
  role?: string;
}

export interface InstanceFilter {
  definitionName?: string;
  status?: InstanceStatus;
  entityId?: string;
}

export interface TaskFilter {
  instanceId?: string;
  role?: string;
  userId?: string;
  status?: TaskStatus;
}

/** Which delegated action failed after a commit */
export type SideEffectKind =
  | "persist_instance"
  | "persist_task"
  | "emit_event"
  | "branch";

/**
 * Reported when a delegated action fails after a state change has already
 * committed. The state change stands; the warning is the only trace.
 */
export interface SideEffectWarning {
  instanceId: string;
  taskId: string | null;
  effect: SideEffectKind;
  /** Short machine-readable code (e.g., "StoreWriteFailed", "BranchNotApplicable") */
  code: string;
  message: string;
  occurredAt: Date;
}
