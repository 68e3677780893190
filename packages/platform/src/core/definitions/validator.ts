/**
 * Definition Validator
 *
 * Turns a structured definition document into validated, immutable
 * ProcessDefinitions, or reports every problem it finds.
 *
 * Pipeline:
 *   0. Shape check against the Zod schema (stops here on failure)
 *   1. Project name
 *   2. Process name uniqueness
 *   3. Element name uniqueness, enum variants
 *   4. Step role and entity references
 *   5. Step dependencies and dependency cycles
 *   6. Flow membership and ordering
 *   7. Transitions and the initial state
 *   8. Role supervision
 *   9. onComplete branches
 *
 * Each check is a pure function over the parsed document that returns its
 * own issues. All checks always run, so one pass reports everything.
 * Definitions are only built when no check reported anything.
 */

import {
  DefinitionDocumentSchema,
  type DefinitionDocument,
  type ProcessDefinition,
  type ProcessSource,
  type ValidationIssue,
  type ValidationIssueKind,
} from "@procflow/contracts";
import { findCycles } from "./graph.js";
import { resolveProcess } from "./resolver.js";

export type ValidationResult =
  | { ok: true; definitions: ProcessDefinition[] }
  | { ok: false; issues: ValidationIssue[] };

/** A check over a single process */
type ProcessCheck = (process: ProcessSource) => ValidationIssue[];

/**
 * Validates a definition document.
 * Never throws for bad input; callers decide whether issues are fatal.
 */
export function validateDefinitionDocument(input: unknown): ValidationResult {
  const parsed = DefinitionDocumentSchema.safeParse(input);

  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue): ValidationIssue => ({
        kind: "MalformedDocument",
        path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
        message: issue.message,
      })),
    };
  }

  const issues = collectIssues(parsed.data);
  if (issues.length > 0) {
    return { ok: false, issues };
  }

  return {
    ok: true,
    definitions: parsed.data.processes.map((process) =>
      resolveProcess(process, parsed.data.project)
    ),
  };
}

/**
 * Runs every semantic check over an already shape-checked document.
 */
export function collectIssues(document: DefinitionDocument): ValidationIssue[] {
  const issues = [
    ...checkProjectName(document),
    ...checkProcessNames(document),
  ];

  for (const process of document.processes) {
    for (const check of PROCESS_CHECKS) {
      issues.push(...check(process));
    }
  }

  return issues;
}

// ---------------------------------------------------------------------------
// Document-level checks
// ---------------------------------------------------------------------------

export function checkProjectName(document: DefinitionDocument): ValidationIssue[] {
  if (document.project.name?.trim()) return [];
  return [
    {
      kind: "MissingProjectName",
      path: "project.name",
      message: "The project must declare a non-empty name",
    },
  ];
}

export function checkProcessNames(document: DefinitionDocument): ValidationIssue[] {
  return duplicatesOf(document.processes.map((p) => p.name)).map(
    (name): ValidationIssue => ({
      kind: "DuplicateName",
      process: name,
      path: `processes.${name}`,
      message: `Process "${name}" is declared more than once`,
    })
  );
}

// ---------------------------------------------------------------------------
// Process-level checks
// ---------------------------------------------------------------------------

export function checkElementNames(process: ProcessSource): ValidationIssue[] {
  const report = issueReporter(process);
  const issues: ValidationIssue[] = [];

  const groups = [
    ["entities", "Entity", process.entities.map((e) => e.name)],
    ["roles", "Role", process.roles.map((r) => r.name)],
    ["states", "State", process.states.map((s) => s.name)],
    ["steps", "Step", process.steps.map((s) => s.name)],
    ["transitions", "Transition", process.transitions.map((t) => t.name)],
  ] as const;

  for (const [collection, label, names] of groups) {
    for (const name of duplicatesOf(names)) {
      issues.push(
        report(
          "DuplicateName",
          `${collection}.${name}`,
          `${label} "${name}" is declared more than once`
        )
      );
    }
  }

  for (const entity of process.entities) {
    for (const name of duplicatesOf(entity.fields.map((f) => f.name))) {
      issues.push(
        report(
          "DuplicateName",
          `entities.${entity.name}.fields.${name}`,
          `Field "${name}" is declared more than once on entity "${entity.name}"`
        )
      );
    }

    for (const field of entity.fields) {
      if (field.type === "enum" && (field.variants ?? []).length === 0) {
        issues.push(
          report(
            "InvalidField",
            `entities.${entity.name}.fields.${field.name}`,
            `Enum field "${entity.name}.${field.name}" must list at least one variant`
          )
        );
      }
    }
  }

  return issues;
}

export function checkStepReferences(process: ProcessSource): ValidationIssue[] {
  const report = issueReporter(process);
  const roles = namesOf(process.roles);
  const entities = namesOf(process.entities);
  const issues: ValidationIssue[] = [];

  for (const step of process.steps) {
    if (step.role === undefined) {
      if (!step.auto) {
        issues.push(
          report(
            "MissingStepRole",
            `steps.${step.name}.role`,
            `Step "${step.name}" must name a role unless it is automated`
          )
        );
      }
    } else if (step.auto) {
      issues.push(
        report(
          "AutomatedStepRole",
          `steps.${step.name}.role`,
          `Automated step "${step.name}" cannot be assigned to role "${step.role}"`
        )
      );
    } else if (!roles.has(step.role)) {
      issues.push(
        report(
          "UnknownReference",
          `steps.${step.name}.role`,
          `Step "${step.name}" references unknown role "${step.role}"`
        )
      );
    }

    if (!entities.has(step.entity)) {
      issues.push(
        report(
          "UnknownReference",
          `steps.${step.name}.entity`,
          `Step "${step.name}" references unknown entity "${step.entity}"`
        )
      );
    }
  }

  return issues;
}

export function checkStepDependencies(process: ProcessSource): ValidationIssue[] {
  const report = issueReporter(process);
  const steps = namesOf(process.steps);
  const issues: ValidationIssue[] = [];
  const edges = new Map<string, string[]>();

  for (const step of process.steps) {
    const deps = step.dependsOn ?? [];
    for (const dep of deps) {
      if (!steps.has(dep)) {
        issues.push(
          report(
            "UnknownReference",
            `steps.${step.name}.dependsOn`,
            `Step "${step.name}" depends on unknown step "${dep}"`
          )
        );
      }
    }
    if (!edges.has(step.name)) edges.set(step.name, deps);
  }

  for (const cycle of findCycles([...steps], edges)) {
    issues.push(
      report(
        "CyclicDependency",
        `steps.${cycle[0]}.dependsOn`,
        `Step dependencies form a cycle: ${cycle.join(" → ")}`
      )
    );
  }

  return issues;
}

export function checkFlow(process: ProcessSource): ValidationIssue[] {
  const report = issueReporter(process);
  const issues: ValidationIssue[] = [];
  const steps = new Map(process.steps.map((s) => [s.name, s] as const));

  for (const name of process.flow) {
    if (!steps.has(name)) {
      issues.push(
        report(
          "UnknownReference",
          "flow",
          `Flow references unknown step "${name}"`
        )
      );
    }
  }

  for (const name of duplicatesOf(process.flow)) {
    issues.push(
      report("DuplicateName", "flow", `Step "${name}" appears more than once in the flow`)
    );
  }

  // First position wins for steps that are listed twice
  const position = new Map<string, number>();
  process.flow.forEach((name, index) => {
    if (!position.has(name)) position.set(name, index);
  });

  for (const [name, index] of position) {
    for (const dep of dependencyClosure(name, steps)) {
      const depIndex = position.get(dep);
      if (depIndex !== undefined && depIndex > index) {
        issues.push(
          report(
            "InvalidFlowOrder",
            "flow",
            `Step "${name}" appears in the flow before its dependency "${dep}"`
          )
        );
      }
    }
  }

  return issues;
}

export function checkTransitions(process: ProcessSource): ValidationIssue[] {
  const report = issueReporter(process);
  const issues: ValidationIssue[] = [];
  const states = namesOf(process.states);
  const roles = namesOf(process.roles);
  const seen = new Set<string>();

  for (const transition of process.transitions) {
    const path = `transitions.${transition.name}`;

    for (const [end, state] of [
      ["from", transition.from],
      ["to", transition.to],
    ] as const) {
      if (!states.has(state)) {
        issues.push(
          report(
            "UnknownReference",
            `${path}.${end}`,
            `Transition "${transition.name}" references unknown state "${state}"`
          )
        );
      }
    }

    if (!roles.has(transition.by)) {
      issues.push(
        report(
          "UnknownReference",
          `${path}.by`,
          `Transition "${transition.name}" references unknown role "${transition.by}"`
        )
      );
    }

    if (transition.from === transition.to) {
      issues.push(
        report(
          "SelfTransition",
          path,
          `Transition "${transition.name}" leads from "${transition.from}" back to itself`
        )
      );
    }

    const key = JSON.stringify([transition.from, transition.to, transition.by]);
    if (seen.has(key)) {
      issues.push(
        report(
          "AmbiguousTransition",
          path,
          `Transition "${transition.name}" duplicates another transition from "${transition.from}" to "${transition.to}" by "${transition.by}"`
        )
      );
    }
    seen.add(key);
  }

  if (process.initialState !== undefined) {
    if (!states.has(process.initialState)) {
      issues.push(
        report(
          "UnknownReference",
          "initialState",
          `Initial state "${process.initialState}" is not declared`
        )
      );
    }
  } else {
    const entered = new Set(process.transitions.map((t) => t.to));
    if (!process.states.some((s) => !entered.has(s.name))) {
      issues.push(
        report(
          "MissingInitialState",
          "states",
          process.states.length === 0
            ? `Process "${process.name}" declares no states`
            : `Process "${process.name}" has no state without incoming transitions; declare an initialState`
        )
      );
    }
  }

  return issues;
}

export function checkRoles(process: ProcessSource): ValidationIssue[] {
  const report = issueReporter(process);
  const issues: ValidationIssue[] = [];
  const roles = namesOf(process.roles);
  const supervisorsOf = new Map<string, string[]>();
  const edges = new Map<string, string[]>();

  for (const role of process.roles) {
    const supervised = role.supervises ?? [];
    for (const name of supervised) {
      if (!roles.has(name)) {
        issues.push(
          report(
            "UnknownReference",
            `roles.${role.name}.supervises`,
            `Role "${role.name}" supervises unknown role "${name}"`
          )
        );
        continue;
      }
      const supervisors = supervisorsOf.get(name) ?? [];
      if (!supervisors.includes(role.name)) supervisors.push(role.name);
      supervisorsOf.set(name, supervisors);
    }
    edges.set(role.name, [...(edges.get(role.name) ?? []), ...supervised]);
  }

  for (const [name, supervisors] of supervisorsOf) {
    if (supervisors.length > 1) {
      issues.push(
        report(
          "ConflictingSupervisor",
          `roles.${supervisors[1]}.supervises`,
          `Role "${name}" is supervised by more than one role: ${supervisors.join(", ")}`
        )
      );
    }
  }

  for (const cycle of findCycles([...roles], edges)) {
    issues.push(
      report(
        "CyclicDependency",
        `roles.${cycle[0]}.supervises`,
        `Role supervision forms a cycle: ${cycle.join(" → ")}`
      )
    );
  }

  return issues;
}

export function checkBranches(process: ProcessSource): ValidationIssue[] {
  const report = issueReporter(process);
  const issues: ValidationIssue[] = [];
  const steps = namesOf(process.steps);
  const transitions = namesOf(process.transitions);

  for (const step of process.steps) {
    (step.onComplete ?? []).forEach((branch, index) => {
      const path = `steps.${step.name}.onComplete.${index}`;
      const targets = [branch.transition, branch.step].filter(
        (target) => target !== undefined
      );

      if (targets.length !== 1) {
        issues.push(
          report(
            "InvalidCondition",
            path,
            `Branch ${index} of step "${step.name}" must name exactly one transition or step`
          )
        );
      }

      if (branch.transition !== undefined && !transitions.has(branch.transition)) {
        issues.push(
          report(
            "UnknownReference",
            `${path}.transition`,
            `Branch ${index} of step "${step.name}" references unknown transition "${branch.transition}"`
          )
        );
      }

      if (branch.step !== undefined && !steps.has(branch.step)) {
        issues.push(
          report(
            "UnknownReference",
            `${path}.step`,
            `Branch ${index} of step "${step.name}" references unknown step "${branch.step}"`
          )
        );
      }

      if (branch.when) {
        if (!branch.when.field.trim()) {
          issues.push(
            report(
              "InvalidCondition",
              `${path}.when.field`,
              `Branch ${index} of step "${step.name}" has an empty condition field`
            )
          );
        }
        if (isOrdering(branch.when.operator) && typeof branch.when.value !== "number") {
          issues.push(
            report(
              "InvalidCondition",
              `${path}.when.value`,
              `Branch ${index} of step "${step.name}" compares with "${branch.when.operator}" against a non-numeric value`
            )
          );
        }
      }
    });
  }

  return issues;
}

const PROCESS_CHECKS: readonly ProcessCheck[] = [
  checkElementNames,
  checkStepReferences,
  checkStepDependencies,
  checkFlow,
  checkTransitions,
  checkRoles,
  checkBranches,
];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function issueReporter(process: ProcessSource) {
  return (
    kind: ValidationIssueKind,
    path: string,
    message: string
  ): ValidationIssue => ({
    kind,
    process: process.name,
    path: `processes.${process.name}.${path}`,
    message,
  });
}

function namesOf(elements: readonly { name: string }[]): Set<string> {
  return new Set(elements.map((e) => e.name));
}

/** Names that occur more than once, each reported once, in first-seen order */
function duplicatesOf(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  return [...duplicates];
}

/**
 * Every step a step waits on, directly or through other steps, nearest
 * first. Unknown names are included; cycles end the walk.
 */
function dependencyClosure(
  name: string,
  steps: ReadonlyMap<string, { dependsOn?: string[] }>
): string[] {
  const seen = new Set<string>([name]);
  const closure: string[] = [];
  const queue = [...(steps.get(name)?.dependsOn ?? [])];

  while (queue.length > 0) {
    const dep = queue.shift();
    if (dep === undefined || seen.has(dep)) continue;
    seen.add(dep);
    closure.push(dep);
    queue.push(...(steps.get(dep)?.dependsOn ?? []));
  }
  return closure;
}

function isOrdering(operator: string): boolean {
  return operator === ">" || operator === ">=" || operator === "<" || operator === "<=";
}
