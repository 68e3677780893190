/**
 * Task Scheduler
 *
 * Decides which steps of an instance are ready for a task. Pure: it reads
 * the definition and the instance's task statuses and returns step ids.
 *
 * A step is eligible when:
 *   - it is schedulable: listed in the flow, or the flow is empty, or an
 *     onComplete branch activated it
 *   - every step it depends on has a COMPLETED or SKIPPED task
 *   - it has no task yet
 */

import type { ProcessDefinition, StepId, TaskStatus } from "@procflow/contracts";

const SATISFIED: readonly TaskStatus[] = ["COMPLETED", "SKIPPED"];

/**
 * Returns newly eligible steps in flow order, then declaration order.
 *
 * @param taskStatusByStep - Status of the task created for each step so far
 * @param activatedSteps   - Steps outside the flow activated by a branch
 */
export function computeEligibleSteps(
  definition: ProcessDefinition,
  taskStatusByStep: ReadonlyMap<StepId, TaskStatus>,
  activatedSteps: ReadonlySet<StepId>
): StepId[] {
  return schedulableSteps(definition, activatedSteps).filter((stepId) => {
    if (taskStatusByStep.has(stepId)) return false;
    return definition.steps[stepId].dependsOn.every((dep) => {
      const status = taskStatusByStep.get(dep);
      return status !== undefined && SATISFIED.includes(status);
    });
  });
}

function schedulableSteps(
  definition: ProcessDefinition,
  activatedSteps: ReadonlySet<StepId>
): StepId[] {
  if (definition.flow.length === 0) {
    return definition.steps.map((step) => step.id);
  }
  const outsideFlow = definition.steps
    .filter((step) => !step.inFlow && activatedSteps.has(step.id))
    .map((step) => step.id);
  return [...definition.flow, ...outsideFlow];
}
