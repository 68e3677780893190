/**
 * Definition Analysis: Test Suite
 */

import { describe, it, expect } from "vitest";
import { checkCompleteness, describeDefinition, effectiveRoles } from "./analysis.js";
import { loadRegistry } from "./registry.js";
import { documentOf, minimalProcess, orderApprovalDocument } from "../../testing/fixtures.js";

const orderApproval = loadRegistry(orderApprovalDocument()).get("OrderApproval");

describe("describeDefinition", () => {
  it("summarizes states, roles and flow by name", () => {
    const summary = describeDefinition(orderApproval);

    expect(summary.initialState).toBe("Draft");
    expect(summary.terminalStates).toEqual(["Approved", "Rejected"]);
    expect(summary.roles).toEqual(["Director", "Manager", "Employee"]);
    expect(summary.entities).toEqual(["Order"]);
    expect(summary.flow).toEqual(["Enter", "Review", "Archive"]);
  });

  it("lists steps and transitions with resolved names", () => {
    const summary = describeDefinition(orderApproval);

    expect(summary.steps[1]).toEqual({
      name: "Review",
      role: "Manager",
      entity: "Order",
      dependsOn: ["Enter"],
      auto: false,
    });
    expect(summary.steps[2].role).toBeNull();
    expect(summary.transitions[0]).toEqual({
      name: "submit",
      from: "Draft",
      to: "Submitted",
      by: "Employee",
    });
  });
});

describe("checkCompleteness", () => {
  it("reports nothing for a complete definition", () => {
    expect(checkCompleteness(orderApproval)).toEqual([]);
  });

  it("reports unreachable states, unscheduled steps and unused roles", () => {
    const definition = loadRegistry(
      documentOf(
        minimalProcess({
          roles: [{ name: "Clerk" }, { name: "Auditor" }],
          states: [{ name: "Open" }, { name: "Closed" }, { name: "Limbo" }],
          steps: [
            { name: "Draft", role: "Clerk", entity: "Doc" },
            { name: "Extra", role: "Clerk", entity: "Doc" },
          ],
          flow: ["Draft"],
        })
      )
    ).get("Minimal");

    expect(checkCompleteness(definition)).toEqual([
      {
        kind: "UnreachableState",
        element: "Limbo",
        message: 'State "Limbo" cannot be reached from "Open"',
      },
      {
        kind: "UnscheduledStep",
        element: "Extra",
        message: 'Step "Extra" is neither in the flow nor activated by a branch',
      },
      {
        kind: "UnusedRole",
        element: "Auditor",
        message: 'Role "Auditor" owns no step and authorizes no transition',
      },
    ]);
  });

  it("does not flag steps activated by a branch", () => {
    const definition = loadRegistry(
      documentOf(
        minimalProcess({
          steps: [
            {
              name: "Draft",
              role: "Clerk",
              entity: "Doc",
              onComplete: [{ step: "Extra" }],
            },
            { name: "Extra", role: "Clerk", entity: "Doc" },
          ],
          flow: ["Draft"],
        })
      )
    ).get("Minimal");

    expect(checkCompleteness(definition)).toEqual([]);
  });
});

describe("effectiveRoles", () => {
  it("includes every transitively supervised role", () => {
    expect(effectiveRoles(orderApproval, "Director")).toEqual([
      "Director",
      "Manager",
      "Employee",
    ]);
    expect(effectiveRoles(orderApproval, "Manager")).toEqual(["Manager", "Employee"]);
    expect(effectiveRoles(orderApproval, "Employee")).toEqual(["Employee"]);
  });

  it("returns an empty list for undeclared roles", () => {
    expect(effectiveRoles(orderApproval, "Intern")).toEqual([]);
  });
});
