/**
 * Process Service Contract
 *
 * The operations the runtime exposes to a presentation or API layer.
 * Every call resolves to a ServiceResult: the current snapshot on success,
 * or a typed error. Nothing here throws for expected failures.
 *
 * Only claimTask by the same user, and suspend/resume when the instance is
 * already in the target status, are safely repeatable.
 */

import type {
  Actor,
  InstanceFilter,
  ProcessInstance,
  TaskFilter,
  TaskInstance,
  VariableBag,
} from "./instance.js";

/**
 * Error categories. The REST adapter maps these to HTTP status codes:
 *   validation    → 400
 *   authorization → 403
 *   not_found     → 404
 *   state         → 409
 *   unknown       → 500
 */
export type ServiceErrorType =
  | "validation"
  | "authorization"
  | "not_found"
  | "state"
  | "unknown";

export type ServiceResult<T> =
  | { success: true; data: T }
  | {
      success: false;
      error: string;
      errorType: ServiceErrorType;
      /** The specific error code (e.g., "RoleMismatch", "InstanceNotFound") */
      code: string;
      details?: unknown;
    };

export interface StartInstanceInput {
  definitionName: string;
  initialState?: string;
  entityId?: string;
  variables?: VariableBag;
}

export interface ProcessService {
  startInstance(input: StartInstanceInput): Promise<ServiceResult<ProcessInstance>>;
  getInstance(instanceId: string): Promise<ServiceResult<ProcessInstance>>;
  listInstances(filter?: InstanceFilter): Promise<ServiceResult<ProcessInstance[]>>;
  executeTransition(
    instanceId: string,
    transitionName: string,
    actingRole: string,
    variables?: VariableBag
  ): Promise<ServiceResult<ProcessInstance>>;
  listTasks(filter?: TaskFilter): Promise<ServiceResult<TaskInstance[]>>;
  claimTask(taskId: string, userId: string): Promise<ServiceResult<TaskInstance>>;
  completeTask(
    taskId: string,
    actor: Actor,
    output?: Record<string, unknown>
  ): Promise<ServiceResult<TaskInstance>>;
  skipTask(taskId: string, actor: Actor): Promise<ServiceResult<TaskInstance>>;
  suspendInstance(instanceId: string, reason: string): Promise<ServiceResult<ProcessInstance>>;
  resumeInstance(instanceId: string): Promise<ServiceResult<ProcessInstance>>;
  terminateInstance(instanceId: string, reason: string): Promise<ServiceResult<ProcessInstance>>;
}
