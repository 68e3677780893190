/**
 * Transition Authorizer: Test Suite
 *
 * Hierarchy under test (OrderApproval fixture):
 *   Director → Manager → Employee
 */

import { describe, it, expect } from "vitest";
import { loadRegistry } from "../definitions/registry.js";
import { orderApprovalDocument } from "../../testing/fixtures.js";
import { authorize, authorizeRole, supervises } from "./authorizer.js";

const definition = loadRegistry(orderApprovalDocument()).get("OrderApproval");
const role = (name: string) => {
  const id = definition.roleIds.get(name);
  if (id === undefined) throw new Error(`unknown role ${name}`);
  return id;
};

// ---------------------------------------------------------------------------
// supervises
// ---------------------------------------------------------------------------

describe("supervises", () => {
  it("follows supervision transitively", () => {
    expect(supervises(definition.roles, role("Director"), role("Employee"))).toBe(true);
    expect(supervises(definition.roles, role("Manager"), role("Employee"))).toBe(true);
  });

  it("does not run downward", () => {
    expect(supervises(definition.roles, role("Employee"), role("Manager"))).toBe(false);
  });

  it("is strict: a role does not supervise itself", () => {
    expect(supervises(definition.roles, role("Manager"), role("Manager"))).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// authorizeRole / authorize
// ---------------------------------------------------------------------------

describe("authorizeRole", () => {
  it("allows the required role itself", () => {
    expect(authorizeRole(role("Manager"), "Manager", definition)).toBe(true);
  });

  it("allows any supervising role", () => {
    expect(authorizeRole(role("Employee"), "Director", definition)).toBe(true);
  });

  it("denies subordinate and unknown roles", () => {
    expect(authorizeRole(role("Manager"), "Employee", definition)).toBe(false);
    expect(authorizeRole(role("Manager"), "Auditor", definition)).toBe(false);
  });
});

describe("authorize", () => {
  it("checks the transition's authorizing role", () => {
    const approve = definition.transitions.find((t) => t.name === "approve");
    if (!approve) throw new Error("fixture has no approve transition");

    expect(authorize(approve, "Director", definition)).toBe(true);
    expect(authorize(approve, "Employee", definition)).toBe(false);
  });
});
