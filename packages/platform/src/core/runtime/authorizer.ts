/**
 * Transition Authorizer
 *
 * Pure role-hierarchy checks. A role may act for itself and for every
 * role it transitively supervises; nothing else grants authority.
 *
 * Evaluation logic:
 *   1. Unknown acting role → denied
 *   2. Acting role is the required role → allowed
 *   3. Walk parent pointers upward from the required role; meeting the
 *      acting role → allowed
 *   4. Otherwise → denied (default deny)
 */

import type {
  ProcessDefinition,
  RoleId,
  RoleNode,
  TransitionNode,
} from "@procflow/contracts";

/** The part of a definition the authorizer reads */
export type RoleHierarchy = Pick<ProcessDefinition, "roles" | "roleIds">;

/**
 * True if `supervisorId` is a strict ancestor of `roleId`.
 * The walk is bounded by the number of roles.
 */
export function supervises(
  roles: readonly RoleNode[],
  supervisorId: RoleId,
  roleId: RoleId
): boolean {
  let current = roles[roleId]?.supervisorId ?? null;
  for (let hops = 0; current !== null && hops < roles.length; hops++) {
    if (current === supervisorId) return true;
    current = roles[current]?.supervisorId ?? null;
  }
  return false;
}

/**
 * Checks whether `actingRole` (a role name) may act for the role `requiredRoleId`.
 */
export function authorizeRole(
  requiredRoleId: RoleId,
  actingRole: string,
  hierarchy: RoleHierarchy
): boolean {
  const actingId = hierarchy.roleIds.get(actingRole);
  if (actingId === undefined) return false;
  if (actingId === requiredRoleId) return true;
  return supervises(hierarchy.roles, actingId, requiredRoleId);
}

/**
 * Checks whether `actingRole` may execute the transition.
 */
export function authorize(
  transition: TransitionNode,
  actingRole: string,
  hierarchy: RoleHierarchy
): boolean {
  return authorizeRole(transition.roleId, actingRole, hierarchy);
}
