/**
 * Shared test fixtures.
 *
 * Each call returns a fresh document so tests can mutate their copy.
 */

import type { DefinitionDocumentInput, ProcessSourceInput } from "@procflow/contracts";

/**
 * Employee enters an order, Manager reviews it, an automated step archives it.
 * Director supervises Manager, Manager supervises Employee.
 *
 * States: Draft → Submitted → Approved | Rejected
 */
export function orderApprovalProcess(): ProcessSourceInput {
  return {
    name: "OrderApproval",
    description: "Approve customer orders",
    entities: [
      {
        name: "Order",
        fields: [
          { name: "amount", type: "float" },
          { name: "status", type: "enum", variants: ["open", "closed"] },
        ],
      },
    ],
    roles: [
      { name: "Director", supervises: ["Manager"] },
      { name: "Manager", supervises: ["Employee"] },
      { name: "Employee" },
    ],
    states: [
      { name: "Draft" },
      { name: "Submitted" },
      { name: "Approved" },
      { name: "Rejected" },
    ],
    transitions: [
      { name: "submit", from: "Draft", to: "Submitted", by: "Employee" },
      {
        name: "approve",
        from: "Submitted",
        to: "Approved",
        by: "Manager",
        triggers: ["order.approved"],
      },
      { name: "reject", from: "Submitted", to: "Rejected", by: "Manager" },
    ],
    steps: [
      { name: "Enter", role: "Employee", entity: "Order" },
      {
        name: "Review",
        role: "Manager",
        entity: "Order",
        dependsOn: ["Enter"],
        onComplete: [
          {
            when: { field: "decision", operator: "==", value: "approve" },
            transition: "approve",
          },
          { transition: "reject" },
        ],
      },
      { name: "Archive", entity: "Order", dependsOn: ["Review"], auto: true },
    ],
    flow: ["Enter", "Review", "Archive"],
  };
}

export function orderApprovalDocument(): DefinitionDocumentInput {
  return {
    project: { name: "Acme Orders", version: "1.0.0" },
    processes: [orderApprovalProcess()],
  };
}

/**
 * A minimal valid process: one entity, one role, Open → Closed.
 * Overrides replace whole collections.
 */
export function minimalProcess(
  overrides: Partial<ProcessSourceInput> = {}
): ProcessSourceInput {
  return {
    name: "Minimal",
    entities: [{ name: "Doc", fields: [] }],
    roles: [{ name: "Clerk" }],
    states: [{ name: "Open" }, { name: "Closed" }],
    transitions: [{ name: "close", from: "Open", to: "Closed", by: "Clerk" }],
    steps: [],
    flow: [],
    ...overrides,
  };
}

export function documentOf(...processes: ProcessSourceInput[]): DefinitionDocumentInput {
  return { project: { name: "Test Project" }, processes };
}
