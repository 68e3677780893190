/**
 * Process Definition
 *
 * The validated, immutable form of a process. Produced only by the
 * platform's validator; nothing else constructs it.
 *
 * Every element lives in an array and is identified by its index in that
 * array. Cross-references are resolved to those ids once, during
 * validation, so the runtime never looks a name up twice.
 */

import type { FieldType } from "./field-types.js";
import type { Condition, ProjectInfo } from "./definition-source.js";

export type EntityId = number;
export type RoleId = number;
export type StateId = number;
export type StepId = number;
export type TransitionId = number;

export interface EntityField {
  readonly name: string;
  readonly type: FieldType;
  /** Empty unless type is "enum" */
  readonly variants: readonly string[];
}

export interface EntityNode {
  readonly id: EntityId;
  readonly name: string;
  readonly fields: readonly EntityField[];
}

/**
 * A role in the supervision forest.
 * `supervisorId` is the parent pointer; roots have null.
 */
export interface RoleNode {
  readonly id: RoleId;
  readonly name: string;
  readonly supervisorId: RoleId | null;
}

export interface StateNode {
  readonly id: StateId;
  readonly name: string;
  /** Transitions leaving this state */
  readonly outgoing: readonly TransitionId[];
  /** Transitions entering this state */
  readonly incoming: readonly TransitionId[];
  /** True when no transition leaves this state */
  readonly terminal: boolean;
}

/** A resolved onComplete rule. Exactly one of the targets is set. */
export type BranchNode =
  | { readonly when: Condition | null; readonly target: "transition"; readonly transitionId: TransitionId }
  | { readonly when: Condition | null; readonly target: "step"; readonly stepId: StepId };

export interface StepNode {
  readonly id: StepId;
  readonly name: string;
  /** Null only for automated steps declared without a role */
  readonly roleId: RoleId | null;
  readonly entityId: EntityId;
  readonly dependsOn: readonly StepId[];
  /** Steps that list this step in their dependsOn */
  readonly dependents: readonly StepId[];
  readonly auto: boolean;
  /** Whether the step is listed in the flow */
  readonly inFlow: boolean;
  readonly onComplete: readonly BranchNode[];
}

export interface TransitionNode {
  readonly id: TransitionId;
  readonly name: string;
  readonly fromId: StateId;
  readonly toId: StateId;
  /** The authorizing role */
  readonly roleId: RoleId;
  readonly requires: readonly string[];
  readonly triggers: readonly string[];
}

export interface ProcessDefinition {
  readonly name: string;
  readonly description: string | null;
  readonly project: Readonly<ProjectInfo>;
  readonly entities: readonly EntityNode[];
  readonly roles: readonly RoleNode[];
  readonly states: readonly StateNode[];
  readonly steps: readonly StepNode[];
  readonly transitions: readonly TransitionNode[];
  /** Declared step ordering, consistent with the dependency DAG */
  readonly flow: readonly StepId[];
  readonly initialStateId: StateId;

  /** Name lookups, built once at validation time for the service boundary */
  readonly roleIds: ReadonlyMap<string, RoleId>;
  readonly stateIds: ReadonlyMap<string, StateId>;
  readonly stepIds: ReadonlyMap<string, StepId>;
}
