/**
 * Process Service
 *
 * The facade every outer layer calls. Each operation runs through the
 * same pipeline:
 *
 *   1. Call the runtime (or the suspension manager)
 *   2. Log the operation with its duration
 *   3. Convert expected errors into a structured failure
 *   4. Log and capture anything unexpected, returning a generic message
 *
 * Nothing here throws for expected failures.
 */

import type {
  Actor,
  InstanceFilter,
  ProcessInstance,
  ProcessService,
  ServiceResult,
  StartInstanceInput,
  TaskFilter,
  TaskInstance,
  VariableBag,
} from "@procflow/contracts";
import {
  DefinitionValidationError,
  StateError,
  isProcessError,
  type ProcessError,
} from "../errors/index.js";
import { createLogger, logOperation } from "../logging/index.js";
import { captureException } from "../observability/index.js";
import type { ProcessRuntime } from "../runtime/runtime.js";
import { SuspensionManager } from "../runtime/suspension.js";

const logger = createLogger("process-service");

export class RuntimeProcessService implements ProcessService {
  private readonly suspension: SuspensionManager;

  constructor(
    private readonly runtime: ProcessRuntime,
    suspension?: SuspensionManager
  ) {
    this.suspension = suspension ?? new SuspensionManager(runtime);
  }

  startInstance(input: StartInstanceInput): Promise<ServiceResult<ProcessInstance>> {
    return run("startInstance", () =>
      this.runtime.start(
        input.definitionName,
        input.initialState,
        input.entityId,
        input.variables
      )
    );
  }

  getInstance(instanceId: string): Promise<ServiceResult<ProcessInstance>> {
    return run("getInstance", () => this.runtime.getInstance(instanceId));
  }

  listInstances(filter: InstanceFilter = {}): Promise<ServiceResult<ProcessInstance[]>> {
    return run("listInstances", () => this.runtime.listInstances(filter));
  }

  executeTransition(
    instanceId: string,
    transitionName: string,
    actingRole: string,
    variables?: VariableBag
  ): Promise<ServiceResult<ProcessInstance>> {
    return run("executeTransition", () =>
      this.runtime.executeTransition(instanceId, transitionName, actingRole, variables)
    );
  }

  listTasks(filter: TaskFilter = {}): Promise<ServiceResult<TaskInstance[]>> {
    return run("listTasks", () => this.runtime.listTasks(filter));
  }

  claimTask(taskId: string, userId: string): Promise<ServiceResult<TaskInstance>> {
    return run("claimTask", () => this.runtime.claimTask(taskId, userId));
  }

  completeTask(
    taskId: string,
    actor: Actor,
    output?: Record<string, unknown>
  ): Promise<ServiceResult<TaskInstance>> {
    return run("completeTask", () => this.runtime.completeTask(taskId, actor, output));
  }

  skipTask(taskId: string, actor: Actor): Promise<ServiceResult<TaskInstance>> {
    return run("skipTask", () => this.runtime.skipTask(taskId, actor));
  }

  suspendInstance(instanceId: string, reason: string): Promise<ServiceResult<ProcessInstance>> {
    return run("suspendInstance", () => this.suspension.suspend(instanceId, reason));
  }

  resumeInstance(instanceId: string): Promise<ServiceResult<ProcessInstance>> {
    return run("resumeInstance", () => this.suspension.resume(instanceId));
  }

  terminateInstance(
    instanceId: string,
    reason: string
  ): Promise<ServiceResult<ProcessInstance>> {
    return run("terminateInstance", () => this.runtime.terminate(instanceId, reason));
  }
}

/**
 * Runs one operation and converts its outcome into a ServiceResult.
 */
async function run<T>(
  operation: string,
  work: () => Promise<T> | T
): Promise<ServiceResult<T>> {
  const startTime = performance.now();

  try {
    const data = await work();
    logOperation(operation, Math.round(performance.now() - startTime), true);
    return { success: true, data };
  } catch (error) {
    const durationMs = Math.round(performance.now() - startTime);
    const errorMessage = error instanceof Error ? error.message : "Unknown error";
    logOperation(operation, durationMs, false, errorMessage);

    if (isProcessError(error)) {
      return {
        success: false,
        error: error.message,
        errorType: error.category,
        code: error.code,
        ...detailsOf(error),
      };
    }

    // Unknown error: full details stay server-side
    logger.error("Process operation failed", {
      operation,
      error: errorMessage,
      stack: error instanceof Error ? error.stack : undefined,
    });
    if (error instanceof Error) {
      captureException(error, { operation });
    }

    return {
      success: false,
      error: "An unexpected error occurred",
      errorType: "unknown",
      code: "Unexpected",
    };
  }
}

function detailsOf(error: ProcessError): { details?: unknown } {
  if (error instanceof DefinitionValidationError) {
    return { details: { issues: error.issues } };
  }
  if (error instanceof StateError && error.details) {
    return { details: error.details };
  }
  return {};
}
