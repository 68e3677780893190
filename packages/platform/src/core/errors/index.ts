/**
 * Runtime Errors
 *
 * Every expected failure is one of four Error subclasses. Each carries a
 * `category` (mapped by the Process Service to a ServiceErrorType) and a
 * `code` naming the specific failure.
 *
 * Runtime operations throw these; the service facade catches them and
 * returns structured results. Anything else is treated as unexpected.
 */

import type { ServiceErrorType, ValidationIssue } from "@procflow/contracts";

export type ProcessErrorCategory = Exclude<ServiceErrorType, "unknown">;

export type AuthorizationErrorCode = "RoleMismatch" | "ClaimConflict";

export type StateErrorCode =
  | "InvalidTransition"
  | "TerminalStateReached"
  | "InvalidTaskState"
  | "MissingRequiredVariable";

export type ReferenceNotFoundCode =
  | "DefinitionNotFound"
  | "InstanceNotFound"
  | "TaskNotFound"
  | "StateNotFound";

/**
 * Thrown when a definition document fails validation.
 * Carries every issue found, not just the first.
 */
export class DefinitionValidationError extends Error {
  public readonly category = "validation" satisfies ProcessErrorCategory;
  public readonly code = "DefinitionInvalid";
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues
      .slice(0, 3)
      .map((issue) => issue.message)
      .join("; ");
    const more = issues.length > 3 ? ` (and ${issues.length - 3} more)` : "";
    super(
      `Definition document has ${issues.length} issue(s): ${summary}${more}`
    );
    this.name = "DefinitionValidationError";
    this.issues = issues;
  }
}

/**
 * The caller's role or identity does not permit the operation.
 */
export class AuthorizationError extends Error {
  public readonly category = "authorization" satisfies ProcessErrorCategory;
  public readonly code: AuthorizationErrorCode;

  constructor(code: AuthorizationErrorCode, message: string) {
    super(message);
    this.name = "AuthorizationError";
    this.code = code;
  }
}

/**
 * The operation is not allowed in the instance's or task's current state.
 */
export class StateError extends Error {
  public readonly category = "state" satisfies ProcessErrorCategory;
  public readonly code: StateErrorCode;

  /** Extra context returned to API callers (e.g., missing variable names) */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: StateErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "StateError";
    this.code = code;
    this.details = details;
  }
}

/**
 * A definition, instance, task or state name did not resolve.
 */
export class ReferenceNotFoundError extends Error {
  public readonly category = "not_found" satisfies ProcessErrorCategory;
  public readonly code: ReferenceNotFoundCode;

  /** The name or id that failed to resolve */
  public readonly reference: string;

  constructor(code: ReferenceNotFoundCode, reference: string) {
    super(`${describeReference(code)} "${reference}" not found`);
    this.name = "ReferenceNotFoundError";
    this.code = code;
    this.reference = reference;
  }
}

function describeReference(code: ReferenceNotFoundCode): string {
  switch (code) {
    case "DefinitionNotFound":
      return "Process definition";
    case "InstanceNotFound":
      return "Process instance";
    case "TaskNotFound":
      return "Task";
    case "StateNotFound":
      return "State";
  }
}

/** Any of the runtime's expected errors */
export type ProcessError =
  | DefinitionValidationError
  | AuthorizationError
  | StateError
  | ReferenceNotFoundError;

export function isProcessError(error: unknown): error is ProcessError {
  return (
    error instanceof DefinitionValidationError ||
    error instanceof AuthorizationError ||
    error instanceof StateError ||
    error instanceof ReferenceNotFoundError
  );
}
