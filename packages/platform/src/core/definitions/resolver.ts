/**
 * Definition Resolver
 *
 * Builds the immutable ProcessDefinition for a process that has already
 * passed every validation check. Names become array-index ids and the
 * result is deeply frozen.
 */

import type {
  BranchNode,
  EntityNode,
  ProcessDefinition,
  ProcessSource,
  ProjectInfo,
  RoleNode,
  StateNode,
  StepNode,
  TransitionNode,
} from "@procflow/contracts";

/**
 * Resolves a validated process.
 * Throws if a reference is dangling, which means validation was skipped.
 */
export function resolveProcess(
  process: ProcessSource,
  project: ProjectInfo
): ProcessDefinition {
  const entityIds = indexByName(process.entities);
  const roleIds = indexByName(process.roles);
  const stateIds = indexByName(process.states);
  const stepIds = indexByName(process.steps);
  const transitionIds = indexByName(process.transitions);

  const entities: EntityNode[] = process.entities.map((entity, id) => ({
    id,
    name: entity.name,
    fields: entity.fields.map((field) => ({
      name: field.name,
      type: field.type,
      variants: field.variants ?? [],
    })),
  }));

  const supervisorOf = new Map<string, number>();
  process.roles.forEach((role, id) => {
    for (const name of role.supervises ?? []) {
      if (!supervisorOf.has(name)) supervisorOf.set(name, id);
    }
  });

  const roles: RoleNode[] = process.roles.map((role, id) => ({
    id,
    name: role.name,
    supervisorId: supervisorOf.get(role.name) ?? null,
  }));

  const transitions: TransitionNode[] = process.transitions.map((t, id) => ({
    id,
    name: t.name,
    fromId: lookup(stateIds, t.from, "state"),
    toId: lookup(stateIds, t.to, "state"),
    roleId: lookup(roleIds, t.by, "role"),
    requires: t.requires ?? [],
    triggers: t.triggers ?? [],
  }));

  const states: StateNode[] = process.states.map((state, id) => {
    const outgoing = transitions.filter((t) => t.fromId === id).map((t) => t.id);
    return {
      id,
      name: state.name,
      outgoing,
      incoming: transitions.filter((t) => t.toId === id).map((t) => t.id),
      terminal: outgoing.length === 0,
    };
  });

  const flow = process.flow.map((name) => lookup(stepIds, name, "step"));
  const inFlow = new Set(flow);

  const dependsOn = process.steps.map((step) =>
    (step.dependsOn ?? []).map((name) => lookup(stepIds, name, "step"))
  );

  const steps: StepNode[] = process.steps.map((step, id) => ({
    id,
    name: step.name,
    roleId: step.role === undefined ? null : lookup(roleIds, step.role, "role"),
    entityId: lookup(entityIds, step.entity, "entity"),
    dependsOn: dependsOn[id],
    dependents: dependsOn.flatMap((deps, other) => (deps.includes(id) ? [other] : [])),
    auto: step.auto ?? false,
    inFlow: inFlow.has(id),
    onComplete: (step.onComplete ?? []).map((branch): BranchNode => {
      const when = branch.when ?? null;
      if (branch.transition !== undefined) {
        return {
          when,
          target: "transition",
          transitionId: lookup(transitionIds, branch.transition, "transition"),
        };
      }
      return {
        when,
        target: "step",
        stepId: lookup(stepIds, branch.step ?? "", "step"),
      };
    }),
  }));

  const initialStateId =
    process.initialState !== undefined
      ? lookup(stateIds, process.initialState, "state")
      : states.findIndex((s) => s.incoming.length === 0);

  if (initialStateId < 0) {
    throw new Error(`Process "${process.name}" has no initial state`);
  }

  return deepFreeze({
    name: process.name,
    description: process.description ?? null,
    project: { ...project },
    entities,
    roles,
    states,
    steps,
    transitions,
    flow,
    initialStateId,
    roleIds,
    stateIds,
    stepIds,
  });
}

function indexByName(elements: readonly { name: string }[]): Map<string, number> {
  const ids = new Map<string, number>();
  elements.forEach((element, index) => {
    if (!ids.has(element.name)) ids.set(element.name, index);
  });
  return ids;
}

function lookup(ids: ReadonlyMap<string, number>, name: string, kind: string): number {
  const id = ids.get(name);
  if (id === undefined) {
    throw new Error(`Unresolved ${kind} reference "${name}"`);
  }
  return id;
}

/**
 * Freezes a value and everything reachable through its own properties.
 * Map contents are not frozen; the definition only exposes them as ReadonlyMap.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
