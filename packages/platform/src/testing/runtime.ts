/**
 * Runtime test harness.
 *
 * Builds a ProcessRuntime with a fixed clock, predictable ids, a silent
 * logger and an in-process event recorder.
 */

import { vi } from "vitest";
import type { DefinitionDocumentInput, DomainEvent, Logger } from "@procflow/contracts";
import { RegistryRef, loadRegistry } from "../core/definitions/registry.js";
import { ProcessRuntime, type ProcessRuntimeOptions } from "../core/runtime/runtime.js";
import { orderApprovalDocument } from "./fixtures.js";

export const FIXED_NOW = new Date("2026-03-02T09:00:00.000Z");

export function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

export interface Harness {
  runtime: ProcessRuntime;
  registry: RegistryRef;
  events: DomainEvent[];
  logger: Logger;
}

export function createHarness(
  document: DefinitionDocumentInput = orderApprovalDocument(),
  options: Partial<ProcessRuntimeOptions> & { idPrefix?: string } = {}
): Harness {
  const { idPrefix = "id", ...overrides } = options;
  const registry = overrides.registry ?? new RegistryRef(loadRegistry(document));
  const events: DomainEvent[] = [];
  const logger = overrides.logger ?? silentLogger();
  let counter = 0;

  const runtime = new ProcessRuntime({
    emit: async (event) => {
      events.push(event);
      return [];
    },
    now: () => FIXED_NOW,
    generateId: () => `${idPrefix}-${++counter}`,
    ...overrides,
    registry,
    logger,
  });

  return { runtime, registry, events, logger };
}
