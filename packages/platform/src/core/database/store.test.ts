/**
 * Instance Store: Test Suite
 */

import { describe, it, expect } from "vitest";
import type { ProcessInstance, TaskInstance } from "@procflow/contracts";
import { InMemoryInstanceStore, cloneInstance, cloneTask } from "./store.js";
import { fromInstanceRow, fromTaskRow, toInstanceRow, toTaskRow } from "./postgres-store.js";

const createdAt = new Date("2026-01-05T10:00:00.000Z");

function instance(overrides: Partial<ProcessInstance> = {}): ProcessInstance {
  return {
    id: "inst-1",
    definitionName: "OrderApproval",
    currentState: "Draft",
    status: "RUNNING",
    createdAt,
    completedAt: null,
    suspendedAt: null,
    suspensionReason: null,
    statusReason: null,
    entityId: "order-9",
    variables: { amount: 250 },
    activatedSteps: [],
    ...overrides,
  };
}

function task(overrides: Partial<TaskInstance> = {}): TaskInstance {
  return {
    id: "task-1",
    instanceId: "inst-1",
    step: "Enter",
    status: "PENDING",
    assignedRole: "Employee",
    assignedUser: null,
    createdAt,
    completedAt: null,
    data: { form: { note: "rush" } },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Snapshot copies
// ---------------------------------------------------------------------------

describe("cloneInstance / cloneTask", () => {
  it("copies the mutable collections", () => {
    const original = instance();
    const copy = cloneInstance(original);
    copy.variables.amount = 1;
    copy.activatedSteps.push("Escalate");

    expect(original.variables).toEqual({ amount: 250 });
    expect(original.activatedSteps).toEqual([]);
  });

  it("copies task data deeply", () => {
    const original = task();
    const copy = cloneTask(original);
    const form = copy.data.form;
    if (typeof form === "object" && form !== null) Object.assign(form, { note: "changed" });

    expect(original.data).toEqual({ form: { note: "rush" } });
  });
});

// ---------------------------------------------------------------------------
// InMemoryInstanceStore
// ---------------------------------------------------------------------------

describe("InMemoryInstanceStore", () => {
  it("upserts by id", async () => {
    const store = new InMemoryInstanceStore();

    await store.saveInstance(instance());
    await store.saveInstance(instance({ currentState: "Submitted" }));
    await store.saveTask(task());
    await store.saveTask(task({ status: "COMPLETED", completedAt: createdAt }));

    const state = await store.loadAll();
    expect(state.instances).toHaveLength(1);
    expect(state.instances[0].currentState).toBe("Submitted");
    expect(state.tasks).toEqual([task({ status: "COMPLETED", completedAt: createdAt })]);
  });

  it("keeps instances in insertion order", async () => {
    const store = new InMemoryInstanceStore();
    await store.saveInstance(instance({ id: "a" }));
    await store.saveInstance(instance({ id: "b" }));
    await store.saveInstance(instance({ id: "a", status: "COMPLETED" }));

    const state = await store.loadAll();
    expect(state.instances.map((i) => i.id)).toEqual(["a", "b"]);
  });

  it("is not affected by later changes to saved objects", async () => {
    const store = new InMemoryInstanceStore();
    const saved = instance();
    await store.saveInstance(saved);
    saved.variables.amount = 0;

    const state = await store.loadAll();
    expect(state.instances[0].variables).toEqual({ amount: 250 });
  });
});

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

describe("row mapping", () => {
  it("maps instances to rows and back", () => {
    const original = instance({ status: "SUSPENDED", suspendedAt: createdAt, suspensionReason: "audit" });
    const row = toInstanceRow(original);

    expect(row.suspensionReason).toBe("audit");
    expect(row.entityId).toBe("order-9");
    expect(fromInstanceRow(row)).toEqual(original);
  });

  it("maps tasks to rows and back", () => {
    const original = task({ assignedUser: "alice", status: "IN_PROGRESS" });
    const row = toTaskRow(original);

    expect(row.instanceId).toBe("inst-1");
    expect(fromTaskRow(row)).toEqual(original);
  });
});
