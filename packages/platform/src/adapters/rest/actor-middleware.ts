/**
 * Fastify Actor Middleware
 *
 * Reads who is acting from the request headers and attaches it to the
 * request for downstream handlers:
 *
 *   x-user-id → actor.userId
 *   x-role    → actor.role
 *
 * Identity is asserted by the caller (typically a gateway in front of
 * this service). Authorization against the process definition happens in
 * the runtime, not here.
 *
 * Usage: Register this as a Fastify preHandler hook during bootstrap.
 */

import type { FastifyRequest } from "fastify";
import type { Actor } from "@procflow/contracts";

export const USER_HEADER = "x-user-id";
export const ROLE_HEADER = "x-role";

declare module "fastify" {
  interface FastifyRequest {
    actor: Actor;
  }
}

/**
 * Returns the first non-empty value of a header, or undefined.
 */
function readHeader(request: FastifyRequest, name: string): string | undefined {
  const raw = request.headers[name];
  const value = (Array.isArray(raw) ? raw[0] : raw)?.trim();
  return value ? value : undefined;
}

export function readActor(request: FastifyRequest): Actor {
  const actor: Actor = {};
  const userId = readHeader(request, USER_HEADER);
  const role = readHeader(request, ROLE_HEADER);
  if (userId !== undefined) actor.userId = userId;
  if (role !== undefined) actor.role = role;
  return actor;
}

/**
 * Fastify preHandler hook that attaches request.actor.
 * Never rejects a request: routes that need a user or a role check for it.
 */
export async function actorMiddleware(request: FastifyRequest): Promise<void> {
  request.actor = readActor(request);
}
