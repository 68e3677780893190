/**
 * Validation Issues
 *
 * A definition document is checked exhaustively: every violation becomes
 * one ValidationIssue, and all of them are returned together.
 */

export const VALIDATION_ISSUE_KINDS = [
  "MalformedDocument",
  "MissingProjectName",
  "DuplicateName",
  "InvalidField",
  "MissingStepRole",
  "AutomatedStepRole",
  "UnknownReference",
  "CyclicDependency",
  "InvalidFlowOrder",
  "SelfTransition",
  "AmbiguousTransition",
  "MissingInitialState",
  "ConflictingSupervisor",
  "InvalidCondition",
] as const;

export type ValidationIssueKind = (typeof VALIDATION_ISSUE_KINDS)[number];

export interface ValidationIssue {
  kind: ValidationIssueKind;

  /** The process the issue belongs to. Absent for document-level issues. */
  process?: string;

  /**
   * Where in the document the issue was found
   * (e.g., "processes.OrderApproval.steps.Ship.dependsOn").
   */
  path: string;

  message: string;
}
