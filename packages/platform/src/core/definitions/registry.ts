/**
 * Process Definition Registry
 *
 * Immutable, name-keyed collection of validated process definitions.
 * A registry is never modified after it is built: reloading builds a new
 * registry and swaps it into the RegistryRef in one assignment.
 *
 * Running instances keep the definition they were started with, so a swap
 * never changes the rules under an instance that is already in flight.
 */

import { readFile, writeFile } from "node:fs/promises";
import type {
  BranchSource,
  DefinitionDocument,
  ProcessDefinition,
  ProcessSource,
} from "@procflow/contracts";
import {
  DefinitionValidationError,
  ReferenceNotFoundError,
} from "../errors/index.js";
import { validateDefinitionDocument } from "./validator.js";

export class DefinitionRegistry {
  private readonly definitions: ReadonlyMap<string, ProcessDefinition>;

  constructor(definitions: readonly ProcessDefinition[]) {
    const byName = new Map<string, ProcessDefinition>();
    for (const definition of definitions) {
      if (byName.has(definition.name)) {
        throw new Error(
          `Process "${definition.name}" is already registered. Process names must be unique.`
        );
      }
      byName.set(definition.name, definition);
    }
    this.definitions = byName;
  }

  /**
   * Retrieves a definition by name.
   * Throws ReferenceNotFoundError (DefinitionNotFound) when absent.
   */
  get(name: string): ProcessDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new ReferenceNotFoundError("DefinitionNotFound", name);
    }
    return definition;
  }

  find(name: string): ProcessDefinition | undefined {
    return this.definitions.get(name);
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  /** All definitions, in declaration order */
  list(): ProcessDefinition[] {
    return Array.from(this.definitions.values());
  }

  get size(): number {
    return this.definitions.size;
  }
}

/**
 * Builds a registry from already validated definitions.
 */
export function createRegistry(
  definitions: readonly ProcessDefinition[] = []
): DefinitionRegistry {
  return new DefinitionRegistry(definitions);
}

/**
 * Validates a definition document and builds a registry from it.
 * Fails closed: any issue throws DefinitionValidationError with every issue.
 */
export function loadRegistry(document: unknown): DefinitionRegistry {
  const result = validateDefinitionDocument(document);
  if (!result.ok) {
    throw new DefinitionValidationError(result.issues);
  }
  return createRegistry(result.definitions);
}

/**
 * Reads a persisted JSON definition document and loads it.
 */
export async function loadRegistryFromFile(path: string): Promise<DefinitionRegistry> {
  const raw = await readFile(path, "utf8");

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new DefinitionValidationError([
      {
        kind: "MalformedDocument",
        path: "(root)",
        message: `${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      },
    ]);
  }

  return loadRegistry(document);
}

/**
 * Writes a registry back to its persisted document form.
 * The output loads into an equivalent registry.
 */
export function serializeRegistry(registry: DefinitionRegistry): DefinitionDocument {
  const definitions = registry.list();
  return {
    project: { ...(definitions[0]?.project ?? {}) },
    processes: definitions.map(serializeDefinition),
  };
}

export async function saveRegistryToFile(
  registry: DefinitionRegistry,
  path: string
): Promise<void> {
  await writeFile(path, `${JSON.stringify(serializeRegistry(registry), null, 2)}\n`, "utf8");
}

function serializeDefinition(definition: ProcessDefinition): ProcessSource {
  const { entities, roles, states, steps, transitions } = definition;
  const nameOf = <T extends { name: string }>(items: readonly T[], id: number) =>
    items[id].name;

  return {
    name: definition.name,
    ...(definition.description !== null ? { description: definition.description } : {}),
    initialState: nameOf(states, definition.initialStateId),
    entities: entities.map((entity) => ({
      name: entity.name,
      fields: entity.fields.map((field) => ({
        name: field.name,
        type: field.type,
        ...(field.type === "enum" ? { variants: [...field.variants] } : {}),
      })),
    })),
    roles: roles.map((role) => {
      const supervised = roles
        .filter((other) => other.supervisorId === role.id)
        .map((other) => other.name);
      return supervised.length > 0
        ? { name: role.name, supervises: supervised }
        : { name: role.name };
    }),
    states: states.map((state) => ({ name: state.name })),
    steps: steps.map((step) => ({
      name: step.name,
      ...(step.roleId !== null ? { role: nameOf(roles, step.roleId) } : {}),
      entity: nameOf(entities, step.entityId),
      ...(step.dependsOn.length > 0
        ? { dependsOn: step.dependsOn.map((id) => nameOf(steps, id)) }
        : {}),
      ...(step.auto ? { auto: true } : {}),
      ...(step.onComplete.length > 0
        ? {
            onComplete: step.onComplete.map((branch): BranchSource => ({
              ...(branch.when ? { when: { ...branch.when } } : {}),
              ...(branch.target === "transition"
                ? { transition: nameOf(transitions, branch.transitionId) }
                : { step: nameOf(steps, branch.stepId) }),
            })),
          }
        : {}),
    })),
    transitions: transitions.map((t) => ({
      name: t.name,
      from: nameOf(states, t.fromId),
      to: nameOf(states, t.toId),
      by: nameOf(roles, t.roleId),
      ...(t.requires.length > 0 ? { requires: [...t.requires] } : {}),
      ...(t.triggers.length > 0 ? { triggers: [...t.triggers] } : {}),
    })),
    flow: definition.flow.map((id) => nameOf(steps, id)),
  };
}

// ---------------------------------------------------------------------------
// Registry reference
// ---------------------------------------------------------------------------

/**
 * Holds the registry currently in effect.
 * Readers call current() per operation; reload swaps the whole value.
 */
export class RegistryRef {
  private registry: DefinitionRegistry;

  constructor(initial: DefinitionRegistry = createRegistry()) {
    this.registry = initial;
  }

  current(): DefinitionRegistry {
    return this.registry;
  }

  /** Replaces the registry and returns the previous one */
  swap(next: DefinitionRegistry): DefinitionRegistry {
    const previous = this.registry;
    this.registry = next;
    return previous;
  }

  /**
   * Validates a document and swaps it in.
   * On failure the current registry stays in effect and the error is thrown.
   */
  reload(document: unknown): DefinitionRegistry {
    const next = loadRegistry(document);
    this.swap(next);
    return next;
  }
}
