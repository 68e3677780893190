/**
 * Branch Conditions
 *
 * Evaluates onComplete branches against a task's data bag.
 * A condition compares one field, addressed by a dot path, with a scalar.
 * A field that is missing or not a scalar never matches.
 */

import type { BranchNode, Condition, ScalarValue } from "@procflow/contracts";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is ScalarValue {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

/**
 * Reads a dot path ("form.decision") from a data bag.
 */
export function readPath(data: Record<string, unknown>, path: string): unknown {
  let current: unknown = data;
  for (const segment of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

export function evaluateCondition(
  condition: Condition,
  data: Record<string, unknown>
): boolean {
  const actual = readPath(data, condition.field);
  if (!isScalar(actual)) return false;

  const expected = condition.value;
  switch (condition.operator) {
    case "==":
      return actual === expected;
    case "!=":
      return actual !== expected;
    case ">":
      return typeof actual === "number" && typeof expected === "number" && actual > expected;
    case ">=":
      return typeof actual === "number" && typeof expected === "number" && actual >= expected;
    case "<":
      return typeof actual === "number" && typeof expected === "number" && actual < expected;
    case "<=":
      return typeof actual === "number" && typeof expected === "number" && actual <= expected;
  }
}

/**
 * Returns the first branch whose condition holds (a branch without a
 * condition always holds), or undefined.
 */
export function selectBranch(
  branches: readonly BranchNode[],
  data: Record<string, unknown>
): BranchNode | undefined {
  return branches.find(
    (branch) => branch.when === null || evaluateCondition(branch.when, data)
  );
}
