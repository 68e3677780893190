/**
 * Side-Effect Tracker
 *
 * Runs the delegated actions that follow a committed change (store writes,
 * event delivery) without making the caller wait for them.
 *
 * Work is queued per instance so writes for one instance land in commit
 * order. A failure never reaches the caller: it becomes a
 * SideEffectWarning, is logged at warn level, and is kept for listWarnings.
 * Only the most recent warnings are kept; older ones survive in the logs.
 */

import type {
  Logger,
  SideEffectKind,
  SideEffectWarning,
} from "@procflow/contracts";

export interface EffectTarget {
  instanceId: string;
  taskId?: string | null;
  effect: SideEffectKind;
  /** Warning code used if the work fails */
  code: string;
}

/** Warnings kept in memory before the oldest are dropped */
export const DEFAULT_WARNING_LIMIT = 1000;

export class SideEffectTracker {
  private readonly warnings: SideEffectWarning[] = [];
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly logger: Logger,
    private readonly now: () => Date,
    private readonly warningLimit = DEFAULT_WARNING_LIMIT
  ) {}

  /**
   * Queues work behind earlier work for the same instance.
   * Returns immediately.
   */
  enqueue(target: EffectTarget, work: () => Promise<unknown>): void {
    const previous = this.queues.get(target.instanceId) ?? Promise.resolve();
    const next = previous
      .then(work)
      .then(
        () => undefined,
        (error: unknown) => {
          this.report(target, error instanceof Error ? error.message : String(error));
        }
      );
    this.queues.set(target.instanceId, next);
    next.finally(() => {
      if (this.queues.get(target.instanceId) === next) {
        this.queues.delete(target.instanceId);
      }
    }).catch((error: unknown) => {
      this.logger.error("Side-effect queue cleanup failed", {
        instanceId: target.instanceId,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  /**
   * Records a warning directly (used for branch outcomes, which are
   * decided synchronously but do not fail the operation).
   */
  report(target: EffectTarget, message: string): SideEffectWarning {
    const warning: SideEffectWarning = {
      instanceId: target.instanceId,
      taskId: target.taskId ?? null,
      effect: target.effect,
      code: target.code,
      message,
      occurredAt: this.now(),
    };
    this.warnings.push(warning);
    if (this.warnings.length > this.warningLimit) {
      this.warnings.splice(0, this.warnings.length - this.warningLimit);
    }
    this.logger.warn("Side effect did not apply", {
      instanceId: warning.instanceId,
      taskId: warning.taskId,
      effect: warning.effect,
      code: warning.code,
      detail: message,
    });
    return warning;
  }

  /** Warnings in the order they occurred, optionally for one instance */
  list(instanceId?: string): SideEffectWarning[] {
    return this.warnings
      .filter((w) => instanceId === undefined || w.instanceId === instanceId)
      .map((w) => ({ ...w }));
  }

  /** Resolves once every queued piece of work has settled */
  async flush(): Promise<void> {
    while (this.queues.size > 0) {
      await Promise.all(this.queues.values());
    }
  }
}
