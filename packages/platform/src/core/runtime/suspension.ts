/**
 * Suspension Manager
 *
 * Pauses and resumes instances through the runtime's status-change
 * operation. Both operations are repeatable: suspending a SUSPENDED
 * instance or resuming a RUNNING one returns the snapshot unchanged.
 *
 * While SUSPENDED, transitions are rejected but tasks stay claimable and
 * completable.
 */

import type { ProcessInstance } from "@procflow/contracts";
import { StateError } from "../errors/index.js";
import type { ProcessRuntime } from "./runtime.js";

export class SuspensionManager {
  constructor(
    private readonly runtime: ProcessRuntime,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * RUNNING → SUSPENDED, recording when and why.
   */
  suspend(instanceId: string, reason: string): Promise<ProcessInstance> {
    return this.runtime.changeStatus(instanceId, (instance) => {
      if (instance.status === "SUSPENDED") return null;
      if (instance.status !== "RUNNING") {
        throw new StateError(
          "TerminalStateReached",
          `Process instance "${instance.id}" is ${instance.status} and cannot be suspended`,
          { status: instance.status }
        );
      }
      return {
        status: "SUSPENDED",
        suspendedAt: this.now(),
        suspensionReason: reason,
        event: "process.suspended",
      };
    });
  }

  /**
   * SUSPENDED → RUNNING, clearing the suspension fields.
   */
  resume(instanceId: string): Promise<ProcessInstance> {
    return this.runtime.changeStatus(instanceId, (instance) => {
      if (instance.status === "RUNNING") return null;
      if (instance.status !== "SUSPENDED") {
        throw new StateError(
          "TerminalStateReached",
          `Process instance "${instance.id}" is ${instance.status} and cannot be resumed`,
          { status: instance.status }
        );
      }
      return {
        status: "RUNNING",
        suspendedAt: null,
        suspensionReason: null,
        event: "process.resumed",
      };
    });
  }
}
