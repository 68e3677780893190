/**
 * Keyed Mutex: Test Suite
 */

import { describe, it, expect } from "vitest";
import { KeyedMutex } from "./instance-lock.js";

function deferred() {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs work for one key in order", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.run("a", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = mutex.run("a", () => {
      order.push("second");
    });

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first", "second"]);
  });

  it("lets different keys proceed independently", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const blocked = mutex.run("a", async () => {
      await gate.promise;
      order.push("a");
    });
    await mutex.run("b", () => {
      order.push("b");
    });
    gate.resolve();
    await blocked;

    expect(order).toEqual(["b", "a"]);
  });

  it("releases the key when work throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.run("a", () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(mutex.run("a", () => 42)).resolves.toBe(42);
  });

  it("drops keys once drained", async () => {
    const mutex = new KeyedMutex();
    const running = mutex.run("a", () => "x");

    expect(mutex.activeKeys).toBe(1);
    await running;
    expect(mutex.activeKeys).toBe(0);
  });
});
