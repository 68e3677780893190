/**
 * @procflow/contracts
 *
 * Public API: the shared boundary between platform and domain.
 * Both sides import from this package. Neither imports from the other.
 */

// Field types
export type { FieldType } from "./field-types.js";
export { FIELD_TYPES } from "./field-types.js";

// Definition source (input to validation)
export type {
  BranchSource,
  Condition,
  ConditionOperator,
  DefinitionDocument,
  DefinitionDocumentInput,
  EntitySource,
  FieldSource,
  ProcessSource,
  ProcessSourceInput,
  ProjectInfo,
  RoleSource,
  ScalarValue,
  StateSource,
  StepSource,
  TransitionSource,
} from "./definition-source.js";
export {
  BranchSourceSchema,
  CONDITION_OPERATORS,
  ConditionSchema,
  DefinitionDocumentSchema,
  EntitySourceSchema,
  FieldSourceSchema,
  ProcessSourceSchema,
  ProjectInfoSchema,
  RoleSourceSchema,
  ScalarValueSchema,
  StateSourceSchema,
  StepSourceSchema,
  TransitionSourceSchema,
  defineProcess,
} from "./definition-source.js";

// Validated definitions
export type {
  BranchNode,
  EntityField,
  EntityId,
  EntityNode,
  ProcessDefinition,
  RoleId,
  RoleNode,
  StateId,
  StateNode,
  StepId,
  StepNode,
  TransitionId,
  TransitionNode,
} from "./definition.js";

// Validation
export type { ValidationIssue, ValidationIssueKind } from "./validation.js";
export { VALIDATION_ISSUE_KINDS } from "./validation.js";

// Instances and tasks
export type {
  Actor,
  InstanceFilter,
  InstanceStatus,
  ProcessInstance,
  SideEffectKind,
  SideEffectWarning,
  TaskFilter,
  TaskInstance,
  TaskStatus,
  VariableBag,
} from "./instance.js";
export {
  INSTANCE_STATUSES,
  TASK_STATUSES,
  TERMINAL_INSTANCE_STATUSES,
  TERMINAL_TASK_STATUSES,
} from "./instance.js";

// Service contract
export type {
  ProcessService,
  ServiceErrorType,
  ServiceResult,
  StartInstanceInput,
} from "./service.js";

// Platform context
export type { DomainEvent, EventSubscriber, Logger } from "./context.js";
