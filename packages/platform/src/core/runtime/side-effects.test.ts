/**
 * Side-Effect Tracker: Test Suite
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { FIXED_NOW, silentLogger } from "../../testing/runtime.js";
import { createLogger } from "../logging/index.js";
import {
  resetObservability,
  setObservabilityProvider,
  type ObservabilityProvider,
} from "../observability/index.js";
import { SideEffectTracker } from "./side-effects.js";

afterEach(() => {
  resetObservability();
  vi.restoreAllMocks();
});

const target = {
  instanceId: "inst-1",
  effect: "persist_instance",
  code: "StoreWriteFailed",
} as const;

describe("SideEffectTracker", () => {
  it("runs work for one instance in the order it was queued", async () => {
    const tracker = new SideEffectTracker(silentLogger(), () => FIXED_NOW);
    const order: number[] = [];

    tracker.enqueue(target, async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push(1);
    });
    tracker.enqueue(target, async () => {
      order.push(2);
    });
    await tracker.flush();

    expect(order).toEqual([1, 2]);
  });

  it("turns failures into warnings and keeps the queue going", async () => {
    const logger = silentLogger();
    const tracker = new SideEffectTracker(logger, () => FIXED_NOW);
    let ranAfter = false;

    tracker.enqueue(target, async () => {
      throw new Error("connection reset");
    });
    tracker.enqueue(target, async () => {
      ranAfter = true;
    });
    await tracker.flush();

    expect(ranAfter).toBe(true);
    expect(tracker.list()).toEqual([
      {
        instanceId: "inst-1",
        taskId: null,
        effect: "persist_instance",
        code: "StoreWriteFailed",
        message: "connection reset",
        occurredAt: FIXED_NOW,
      },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("filters warnings by instance", () => {
    const tracker = new SideEffectTracker(silentLogger(), () => FIXED_NOW);

    tracker.report(target, "first");
    tracker.report({ ...target, instanceId: "inst-2" }, "second");

    expect(tracker.list("inst-2").map((w) => w.message)).toEqual(["second"]);
    expect(tracker.list()).toHaveLength(2);
  });

  it("keeps only the most recent warnings", () => {
    const tracker = new SideEffectTracker(silentLogger(), () => FIXED_NOW, 2);

    tracker.report(target, "first");
    tracker.report(target, "second");
    tracker.report(target, "third");

    expect(tracker.list().map((w) => w.message)).toEqual(["second", "third"]);
  });

  it("logs every warning, including those later dropped", () => {
    const logger = silentLogger();
    const tracker = new SideEffectTracker(logger, () => FIXED_NOW, 1);

    tracker.report(target, "first");
    tracker.report(target, "second");

    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(tracker.list()).toHaveLength(1);
  });

  it("forwards warnings to observability with the instance and task ids", () => {
    const provider: ObservabilityProvider = {
      name: "mock",
      captureException: vi.fn(),
      captureMessage: vi.fn(),
      flush: vi.fn(async () => {}),
    };
    setObservabilityProvider(provider);
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const tracker = new SideEffectTracker(createLogger("process-runtime"), () => FIXED_NOW);

    tracker.report({ ...target, taskId: "task-9" }, "disk full");

    expect(provider.captureMessage).toHaveBeenCalledWith(
      "[process-runtime] Side effect did not apply",
      "warning",
      {
        instanceId: "inst-1",
        taskId: "task-9",
        effect: "persist_instance",
        code: "StoreWriteFailed",
        detail: "disk full",
      }
    );
  });

  it("flush resolves at once when nothing is queued", async () => {
    const tracker = new SideEffectTracker(silentLogger(), () => FIXED_NOW);

    await expect(tracker.flush()).resolves.toBeUndefined();
  });
});
