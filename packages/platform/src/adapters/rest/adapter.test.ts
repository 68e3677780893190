/**
 * REST Adapter: Test Suite
 *
 * Drives the routes through Fastify's inject(). No network is opened.
 *
 * Validates:
 *   - Metadata endpoints read the current registry
 *   - Body and query validation (400)
 *   - Actor headers
 *   - Error type → HTTP status mapping (403, 404, 409)
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import { RuntimeProcessService } from "../../core/service/process-service.js";
import { createHarness } from "../../testing/runtime.js";
import { registerRESTRoutes } from "./adapter.js";

let app: FastifyInstance;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});

  const { runtime, registry } = createHarness();
  app = Fastify();
  await registerRESTRoutes(app, {
    service: new RuntimeProcessService(runtime),
    registry,
  });
  await app.ready();
});

afterEach(async () => {
  await app.close();
  vi.restoreAllMocks();
});

async function startOrder() {
  const res = await app.inject({
    method: "POST",
    url: "/api/instances",
    payload: { definitionName: "OrderApproval", entityId: "order-1" },
  });
  return res.json();
}

// ---------------------------------------------------------------------------
// Health and metadata
// ---------------------------------------------------------------------------

describe("health and metadata", () => {
  it("reports health with the number of loaded processes", async () => {
    const res = await app.inject({ method: "GET", url: "/api/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok", processes: 1 });
  });

  it("lists process summaries", async () => {
    const res = await app.inject({ method: "GET", url: "/api/meta/processes" });
    const body = res.json();

    expect(body).toHaveLength(1);
    expect(body[0]).toMatchObject({
      name: "OrderApproval",
      initialState: "Draft",
      terminalStates: ["Approved", "Rejected"],
      flow: ["Enter", "Review", "Archive"],
    });
  });

  it("returns one process with its completeness warnings", async () => {
    const res = await app.inject({ method: "GET", url: "/api/meta/processes/OrderApproval" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ name: "OrderApproval", warnings: [] });
  });

  it("returns 404 for an unknown process", async () => {
    const res = await app.inject({ method: "GET", url: "/api/meta/processes/Payroll" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ code: "DefinitionNotFound" });
  });
});

// ---------------------------------------------------------------------------
// Instances
// ---------------------------------------------------------------------------

describe("instances", () => {
  it("starts an instance with 201", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/instances",
      payload: { definitionName: "OrderApproval", variables: { priority: 1 } },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toMatchObject({
      success: true,
      data: {
        id: "id-1",
        currentState: "Draft",
        status: "RUNNING",
        variables: { priority: 1 },
        createdAt: "2026-03-02T09:00:00.000Z",
      },
    });
  });

  it("rejects an invalid body with field errors", async () => {
    const res = await app.inject({ method: "POST", url: "/api/instances", payload: {} });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      success: false,
      errorType: "validation",
      code: "InvalidRequest",
      details: { fieldErrors: [{ field: "definitionName", code: "invalid_type" }] },
    });
  });

  it("maps an unknown definition to 404", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/instances",
      payload: { definitionName: "Payroll" },
    });

    expect(res.statusCode).toBe(404);
    expect(res.json().code).toBe("DefinitionNotFound");
  });

  it("gets and lists instances", async () => {
    await startOrder();

    const one = await app.inject({ method: "GET", url: "/api/instances/id-1" });
    const list = await app.inject({ method: "GET", url: "/api/instances?entityId=order-1" });
    const missing = await app.inject({ method: "GET", url: "/api/instances/nope" });

    expect(one.json().data.entityId).toBe("order-1");
    expect(list.json().data).toHaveLength(1);
    expect(missing.statusCode).toBe(404);
  });

  it("rejects an unknown status filter", async () => {
    const res = await app.inject({ method: "GET", url: "/api/instances?status=PAUSED" });

    expect(res.statusCode).toBe(400);
  });
});

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

describe("transitions", () => {
  it("requires the x-role header", async () => {
    await startOrder();

    const res = await app.inject({
      method: "POST",
      url: "/api/instances/id-1/transitions/submit",
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      code: "MissingActor",
      error: 'The "x-role" header is required for this operation',
    });
  });

  it("executes a transition as the given role", async () => {
    await startOrder();

    const res = await app.inject({
      method: "POST",
      url: "/api/instances/id-1/transitions/submit",
      headers: { "x-role": "Employee" },
      payload: { variables: { note: "urgent" } },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toMatchObject({
      currentState: "Submitted",
      variables: { note: "urgent" },
    });
  });

  it("maps a role mismatch to 403", async () => {
    await startOrder();
    await app.inject({
      method: "POST",
      url: "/api/instances/id-1/transitions/submit",
      headers: { "x-role": "Employee" },
    });

    const res = await app.inject({
      method: "POST",
      url: "/api/instances/id-1/transitions/approve",
      headers: { "x-role": "Employee" },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json().code).toBe("RoleMismatch");
  });

  it("maps an unavailable transition to 409 with details", async () => {
    await startOrder();

    const res = await app.inject({
      method: "POST",
      url: "/api/instances/id-1/transitions/approve",
      headers: { "x-role": "Manager" },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({
      code: "InvalidTransition",
      details: { state: "Draft", validTransitions: ["submit"] },
    });
  });
});

// ---------------------------------------------------------------------------
// Suspension and termination
// ---------------------------------------------------------------------------

describe("suspend, resume, terminate", () => {
  it("requires a reason to suspend", async () => {
    await startOrder();

    const res = await app.inject({
      method: "POST",
      url: "/api/instances/id-1/suspend",
      payload: {},
    });

    expect(res.statusCode).toBe(400);
  });

  it("suspends and resumes", async () => {
    await startOrder();

    const suspended = await app.inject({
      method: "POST",
      url: "/api/instances/id-1/suspend",
      payload: { reason: "awaiting stock" },
    });
    const resumed = await app.inject({ method: "POST", url: "/api/instances/id-1/resume" });

    expect(suspended.json().data).toMatchObject({
      status: "SUSPENDED",
      suspensionReason: "awaiting stock",
    });
    expect(resumed.json().data.status).toBe("RUNNING");
  });

  it("terminates, then refuses further changes with 409", async () => {
    await startOrder();

    const terminated = await app.inject({
      method: "POST",
      url: "/api/instances/id-1/terminate",
      payload: { reason: "duplicate order" },
    });
    const again = await app.inject({
      method: "POST",
      url: "/api/instances/id-1/terminate",
      payload: { reason: "twice" },
    });

    expect(terminated.json().data.status).toBe("TERMINATED");
    expect(again.statusCode).toBe(409);
    expect(again.json().code).toBe("TerminalStateReached");
  });
});

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

describe("tasks", () => {
  it("lists tasks by status", async () => {
    await startOrder();

    const res = await app.inject({ method: "GET", url: "/api/tasks?status=PENDING" });

    expect(res.json().data).toMatchObject([{ id: "id-2", step: "Enter" }]);
  });

  it("requires x-user-id to claim", async () => {
    await startOrder();

    const res = await app.inject({ method: "POST", url: "/api/tasks/id-2/claim" });

    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe("MissingActor");
  });

  it("claims a task and rejects a second claimant with 403", async () => {
    await startOrder();

    const first = await app.inject({
      method: "POST",
      url: "/api/tasks/id-2/claim",
      headers: { "x-user-id": "erin" },
    });
    const second = await app.inject({
      method: "POST",
      url: "/api/tasks/id-2/claim",
      headers: { "x-user-id": "frank" },
    });

    expect(first.json().data).toMatchObject({ status: "IN_PROGRESS", assignedUser: "erin" });
    expect(second.statusCode).toBe(403);
    expect(second.json().code).toBe("ClaimConflict");
  });

  it("completes a task with output", async () => {
    await startOrder();

    const res = await app.inject({
      method: "POST",
      url: "/api/tasks/id-2/complete",
      headers: { "x-role": "Employee" },
      payload: { output: { amount: 42 } },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toMatchObject({ status: "COMPLETED", data: { amount: 42 } });
  });

  it("rejects completion without an authorized role", async () => {
    await startOrder();

    const res = await app.inject({ method: "POST", url: "/api/tasks/id-2/complete" });

    expect(res.statusCode).toBe(403);
  });

  it("skips a task", async () => {
    await startOrder();

    const res = await app.inject({
      method: "POST",
      url: "/api/tasks/id-2/skip",
      headers: { "x-role": "Manager" },
    });

    expect(res.json().data.status).toBe("SKIPPED");
  });

  it("returns 404 for an unknown task", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/tasks/missing/skip",
      headers: { "x-role": "Manager" },
    });

    expect(res.statusCode).toBe(404);
  });
});
