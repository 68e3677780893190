/**
 * API Server: Integration Tests
 *
 * Boots the full stack (domain definitions, in-memory store, event
 * subscribers) and drives it through Fastify's inject().
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { FastifyInstance } from "fastify";
import { InMemoryInstanceStore, clearSubscribers } from "@procflow/platform";
import { bootstrap, type AppContext } from "./bootstrap.js";
import { buildServer } from "./server.js";

let context: AppContext;
let app: FastifyInstance;

async function start(env: NodeJS.ProcessEnv = {}, store?: InMemoryInstanceStore) {
  context = await bootstrap({ env, store });
  app = await buildServer(context, env);
  await app.ready();
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  await app.close();
  clearSubscribers();
  vi.restoreAllMocks();
});

async function pendingTask(instanceId: string) {
  const res = await app.inject({
    method: "GET",
    url: `/api/tasks?instanceId=${instanceId}&status=PENDING`,
  });
  const tasks = res.json().data;
  expect(tasks).toHaveLength(1);
  return tasks[0];
}

describe("bootstrap", () => {
  it("loads the domain processes when no definitions file is configured", async () => {
    await start();

    const res = await app.inject({ method: "GET", url: "/api/health" });

    expect(res.json()).toEqual({ status: "ok", processes: 2 });
    expect(context.config.database.url).toBeNull();
  });

  it("reports no completeness warnings for the purchase order process", async () => {
    await start();

    const res = await app.inject({ method: "GET", url: "/api/meta/processes/PurchaseOrder" });

    expect(res.json()).toMatchObject({
      name: "PurchaseOrder",
      initialState: "Draft",
      warnings: [],
    });
  });

  it("loads definitions from DEFINITIONS_PATH", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "procflow-"));
    const file = path.join(dir, "definitions.json");
    await writeFile(
      file,
      JSON.stringify({
        project: { name: "Helpdesk" },
        processes: [
          {
            name: "Ticket",
            roles: [{ name: "Agent" }],
            states: [{ name: "Open" }, { name: "Closed" }],
            transitions: [{ name: "close", from: "Open", to: "Closed", by: "Agent" }],
          },
        ],
      })
    );

    try {
      await start({ DEFINITIONS_PATH: file });
      const res = await app.inject({ method: "GET", url: "/api/meta/processes" });

      expect(res.json()).toMatchObject([{ name: "Ticket", initialState: "Open" }]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("restores stored instances and skips ones without a definition", async () => {
    const store = new InMemoryInstanceStore();
    const base = {
      status: "RUNNING" as const,
      createdAt: new Date("2026-05-01T08:00:00.000Z"),
      completedAt: null,
      suspendedAt: null,
      suspensionReason: null,
      statusReason: null,
      entityId: null,
      variables: { supplier: "Acme" },
      activatedSteps: [],
    };
    await store.saveInstance({
      ...base,
      id: "po-restored",
      definitionName: "PurchaseOrder",
      currentState: "PendingApproval",
    });
    await store.saveInstance({
      ...base,
      id: "gone",
      definitionName: "Payroll",
      currentState: "Open",
    });

    await start({}, store);
    const restored = await app.inject({ method: "GET", url: "/api/instances/po-restored" });
    const skipped = await app.inject({ method: "GET", url: "/api/instances/gone" });

    expect(restored.json().data).toMatchObject({
      currentState: "PendingApproval",
      variables: { supplier: "Acme" },
    });
    expect(skipped.statusCode).toBe(404);
  });
});

describe("purchase order over HTTP", () => {
  it("routes a large order through director signoff to placement", async () => {
    await start();

    const created = await app.inject({
      method: "POST",
      url: "/api/instances",
      payload: {
        definitionName: "PurchaseOrder",
        entityId: "po-1",
        variables: { supplier: "Acme" },
      },
    });
    expect(created.statusCode).toBe(201);
    const instanceId: string = created.json().data.id;

    // Prepare
    const prepare = await pendingTask(instanceId);
    expect(prepare).toMatchObject({ step: "Prepare", assignedRole: "Requester" });
    await app.inject({
      method: "POST",
      url: `/api/tasks/${prepare.id}/complete`,
      headers: { "x-role": "Requester" },
      payload: { output: { amount: 25_000 } },
    });

    const submitted = await app.inject({
      method: "POST",
      url: `/api/instances/${instanceId}/transitions/submit`,
      headers: { "x-role": "Requester" },
    });
    expect(submitted.json().data.currentState).toBe("PendingApproval");

    // Review: over the limit, so the director is asked
    const review = await pendingTask(instanceId);
    expect(review.step).toBe("Review");
    await app.inject({
      method: "POST",
      url: `/api/tasks/${review.id}/complete`,
      headers: { "x-role": "Manager" },
      payload: { output: { amount: 25_000 } },
    });

    const afterReview = await app.inject({ method: "GET", url: `/api/instances/${instanceId}` });
    expect(afterReview.json().data).toMatchObject({
      currentState: "PendingApproval",
      activatedSteps: ["DirectorSignoff"],
    });

    const notified = await app.inject({
      method: "GET",
      url: `/api/tasks?instanceId=${instanceId}&status=COMPLETED`,
    });
    expect(notified.json().data.map((t: { step: string }) => t.step)).toEqual([
      "Prepare",
      "Review",
      "NotifySupplier",
    ]);

    // Director signs off
    const signoff = await pendingTask(instanceId);
    expect(signoff).toMatchObject({ step: "DirectorSignoff", assignedRole: "Director" });
    await app.inject({
      method: "POST",
      url: `/api/tasks/${signoff.id}/complete`,
      headers: { "x-role": "Director" },
      payload: { output: { decision: "approve" } },
    });

    const approved = await app.inject({ method: "GET", url: `/api/instances/${instanceId}` });
    expect(approved.json().data).toMatchObject({ currentState: "Approved", status: "RUNNING" });

    // Director supervises Finance, so may place the order
    const placed = await app.inject({
      method: "POST",
      url: `/api/instances/${instanceId}/transitions/place`,
      headers: { "x-role": "Director" },
    });
    expect(placed.json().data).toMatchObject({ currentState: "Ordered", status: "COMPLETED" });

    await context.runtime.flushSideEffects();
    expect(vi.mocked(console.log)).toHaveBeenCalledWith(
      `[subscriber] Purchase order ${instanceId} approved`
    );
    expect(context.runtime.listWarnings(instanceId)).toEqual([]);
  });

  it("refuses submission without a supplier", async () => {
    await start();
    const created = await app.inject({
      method: "POST",
      url: "/api/instances",
      payload: { definitionName: "PurchaseOrder" },
    });

    const res = await app.inject({
      method: "POST",
      url: `/api/instances/${created.json().data.id}/transitions/submit`,
      headers: { "x-role": "Requester" },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({
      code: "MissingRequiredVariable",
      details: { missing: ["supplier"] },
    });
  });
});
