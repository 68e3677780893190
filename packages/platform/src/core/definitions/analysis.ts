/**
 * Definition Analysis
 *
 * Read-only views over a validated definition: a documentation summary,
 * non-fatal completeness warnings, and effective role authority.
 * None of these affect execution.
 */

import type { ProcessDefinition, RoleId } from "@procflow/contracts";
import { reachableFrom } from "./graph.js";

export interface StepSummary {
  name: string;
  role: string | null;
  entity: string;
  dependsOn: string[];
  auto: boolean;
}

export interface TransitionSummary {
  name: string;
  from: string;
  to: string;
  by: string;
}

export interface DefinitionSummary {
  name: string;
  description: string | null;
  initialState: string;
  terminalStates: string[];
  roles: string[];
  entities: string[];
  flow: string[];
  steps: StepSummary[];
  transitions: TransitionSummary[];
}

export type CompletenessWarningKind =
  | "UnreachableState"
  | "UnscheduledStep"
  | "UnusedRole";

export interface CompletenessWarning {
  kind: CompletenessWarningKind;
  element: string;
  message: string;
}

/**
 * Summarizes a definition for documentation and the meta API.
 */
export function describeDefinition(definition: ProcessDefinition): DefinitionSummary {
  const { roles, states, steps, entities, transitions } = definition;

  return {
    name: definition.name,
    description: definition.description,
    initialState: states[definition.initialStateId].name,
    terminalStates: states.filter((s) => s.terminal).map((s) => s.name),
    roles: roles.map((r) => r.name),
    entities: entities.map((e) => e.name),
    flow: definition.flow.map((id) => steps[id].name),
    steps: steps.map((step) => ({
      name: step.name,
      role: step.roleId === null ? null : roles[step.roleId].name,
      entity: entities[step.entityId].name,
      dependsOn: step.dependsOn.map((id) => steps[id].name),
      auto: step.auto,
    })),
    transitions: transitions.map((t) => ({
      name: t.name,
      from: states[t.fromId].name,
      to: states[t.toId].name,
      by: roles[t.roleId].name,
    })),
  };
}

/**
 * Finds parts of a definition that can never take effect.
 *
 *   - states not reachable from the initial state
 *   - steps that are never scheduled (the flow is non-empty, the step is
 *     not in it, and no branch activates it)
 *   - roles that own no step, authorize no transition and supervise no
 *     role that does
 */
export function checkCompleteness(definition: ProcessDefinition): CompletenessWarning[] {
  const warnings: CompletenessWarning[] = [];
  const { states, steps, roles, transitions } = definition;

  const edges = new Map<string, string[]>();
  for (const t of transitions) {
    const from = states[t.fromId].name;
    edges.set(from, [...(edges.get(from) ?? []), states[t.toId].name]);
  }
  const reachable = reachableFrom(states[definition.initialStateId].name, edges);
  for (const state of states) {
    if (!reachable.has(state.name)) {
      warnings.push({
        kind: "UnreachableState",
        element: state.name,
        message: `State "${state.name}" cannot be reached from "${states[definition.initialStateId].name}"`,
      });
    }
  }

  if (definition.flow.length > 0) {
    const activated = new Set(
      steps.flatMap((s) =>
        s.onComplete.flatMap((b) => (b.target === "step" ? [b.stepId] : []))
      )
    );
    for (const step of steps) {
      if (!step.inFlow && !activated.has(step.id)) {
        warnings.push({
          kind: "UnscheduledStep",
          element: step.name,
          message: `Step "${step.name}" is neither in the flow nor activated by a branch`,
        });
      }
    }
  }

  const used = new Set<RoleId>([
    ...steps.flatMap((s) => (s.roleId === null ? [] : [s.roleId])),
    ...transitions.map((t) => t.roleId),
  ]);
  for (const role of roles) {
    const authority = effectiveRoleIds(definition, role.id);
    if (![...authority].some((id) => used.has(id))) {
      warnings.push({
        kind: "UnusedRole",
        element: role.name,
        message: `Role "${role.name}" owns no step and authorizes no transition`,
      });
    }
  }

  return warnings;
}

/**
 * The named role and every role it transitively supervises.
 * Returns an empty list for an undeclared role.
 */
export function effectiveRoles(definition: ProcessDefinition, role: string): string[] {
  const id = definition.roleIds.get(role);
  if (id === undefined) return [];
  return [...effectiveRoleIds(definition, id)].map((r) => definition.roles[r].name);
}

function effectiveRoleIds(definition: ProcessDefinition, root: RoleId): Set<RoleId> {
  const result = new Set<RoleId>([root]);
  let grew = true;
  while (grew) {
    grew = false;
    for (const role of definition.roles) {
      if (
        role.supervisorId !== null &&
        result.has(role.supervisorId) &&
        !result.has(role.id)
      ) {
        result.add(role.id);
        grew = true;
      }
    }
  }
  return result;
}
