/**
 * Definition Source
 *
 * The structured document handed over by the definition language front end
 * (or read back from a persisted JSON file). It is the INPUT to validation:
 * cross-references are still plain names here and may dangle.
 *
 * The Zod schemas only check shape. Every semantic rule (uniqueness,
 * referential integrity, acyclicity, flow order) is enforced by the
 * platform's validator, which reports all violations at once.
 */

import { z } from "zod";
import { FIELD_TYPES } from "./field-types.js";

// ---------------------------------------------------------------------------
// Conditions and branches
// ---------------------------------------------------------------------------

export const CONDITION_OPERATORS = ["==", "!=", ">", ">=", "<", "<="] as const;

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

/** Element names: processes, entities, fields, roles, states, steps, transitions */
export const NameSchema = z.string().regex(/\S/, "Name must not be empty");

/** A scalar value as stored in variables, task data and conditions */
export const ScalarValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export type ScalarValue = z.infer<typeof ScalarValueSchema>;

/**
 * A single boolean comparison against task output.
 * `field` is a dot path into the task's data bag (e.g., "form.decision").
 */
export const ConditionSchema = z.object({
  field: z.string(),
  operator: z.enum(CONDITION_OPERATORS),
  value: ScalarValueSchema,
});

export type Condition = z.infer<typeof ConditionSchema>;

/**
 * An onComplete rule. A branch without `when` always matches.
 * It names exactly one target: a transition to execute or a step to activate.
 */
export const BranchSourceSchema = z.object({
  when: ConditionSchema.optional(),
  transition: z.string().optional(),
  step: z.string().optional(),
});

export type BranchSource = z.infer<typeof BranchSourceSchema>;

// ---------------------------------------------------------------------------
// Elements
// ---------------------------------------------------------------------------

export const FieldSourceSchema = z.object({
  name: NameSchema,
  type: z.enum(FIELD_TYPES),
  /** For "enum" fields: the allowed variants */
  variants: z.array(z.string()).optional(),
});

export type FieldSource = z.infer<typeof FieldSourceSchema>;

export const EntitySourceSchema = z.object({
  name: NameSchema,
  fields: z.array(FieldSourceSchema).default([]),
});

export type EntitySource = z.infer<typeof EntitySourceSchema>;

export const RoleSourceSchema = z.object({
  name: NameSchema,
  /** Roles this role directly supervises */
  supervises: z.array(z.string()).optional(),
});

export type RoleSource = z.infer<typeof RoleSourceSchema>;

export const StateSourceSchema = z.object({
  name: NameSchema,
});

export type StateSource = z.infer<typeof StateSourceSchema>;

export const StepSourceSchema = z.object({
  name: NameSchema,
  /** Owning role. May be omitted only for automated steps. */
  role: z.string().optional(),
  /** The entity this step affects */
  entity: z.string(),
  dependsOn: z.array(z.string()).optional(),
  /** Executes without a human actor once eligible */
  auto: z.boolean().optional(),
  onComplete: z.array(BranchSourceSchema).optional(),
});

export type StepSource = z.infer<typeof StepSourceSchema>;

export const TransitionSourceSchema = z.object({
  name: NameSchema,
  from: z.string(),
  to: z.string(),
  /** The authorizing role */
  by: z.string(),
  /** Instance variables that must have a value before this transition is allowed */
  requires: z.array(z.string()).optional(),
  /** Domain event types emitted after the transition commits */
  triggers: z.array(z.string()).optional(),
});

export type TransitionSource = z.infer<typeof TransitionSourceSchema>;

export const ProcessSourceSchema = z.object({
  name: NameSchema,
  description: z.string().optional(),
  /** Explicit start state. Defaults to the first state with no incoming transitions. */
  initialState: z.string().optional(),
  entities: z.array(EntitySourceSchema).default([]),
  roles: z.array(RoleSourceSchema).default([]),
  states: z.array(StateSourceSchema).default([]),
  steps: z.array(StepSourceSchema).default([]),
  transitions: z.array(TransitionSourceSchema).default([]),
  flow: z.array(z.string()).default([]),
});

export type ProcessSource = z.infer<typeof ProcessSourceSchema>;

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

/** Project metadata. Not used by the runtime. */
export const ProjectInfoSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  version: z.string().optional(),
  author: z.string().optional(),
});

export type ProjectInfo = z.infer<typeof ProjectInfoSchema>;

export const DefinitionDocumentSchema = z.object({
  project: ProjectInfoSchema.default({}),
  processes: z.array(ProcessSourceSchema).default([]),
});

export type DefinitionDocument = z.infer<typeof DefinitionDocumentSchema>;

/** The document shape as authored, before schema defaults are applied */
export type DefinitionDocumentInput = z.input<typeof DefinitionDocumentSchema>;

/** A process as authored, before schema defaults are applied */
export type ProcessSourceInput = z.input<typeof ProcessSourceSchema>;

/**
 * Helper to author a process with type checking.
 * Use this in domain process files for autocomplete.
 */
export function defineProcess(process: ProcessSourceInput): ProcessSourceInput {
  return process;
}
