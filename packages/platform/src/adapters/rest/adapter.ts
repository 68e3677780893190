/**
 * REST Adapter
 *
 * Maps the Process Service to HTTP endpoints on a Fastify instance.
 *
 *   1. Health: GET /api/health
 *   2. Metadata: GET /api/meta/processes[/:name]
 *      Definition summaries and completeness warnings, read from the
 *      current registry
 *   3. Instances: /api/instances, transitions, suspend/resume/terminate
 *   4. Tasks: /api/tasks, claim/complete/skip
 *
 * Request bodies and query strings are validated with Zod before reaching
 * the service. Every response body is a ServiceResult.
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import {
  INSTANCE_STATUSES,
  ScalarValueSchema,
  TASK_STATUSES,
  type ProcessService,
  type ServiceErrorType,
  type ServiceResult,
} from "@procflow/contracts";
import { checkCompleteness, describeDefinition } from "../../core/definitions/analysis.js";
import type { RegistryRef } from "../../core/definitions/registry.js";
import { actorMiddleware } from "./actor-middleware.js";

export interface RESTAdapterOptions {
  service: ProcessService;
  registry: RegistryRef;
}

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const VariablesSchema = z.record(ScalarValueSchema);

const StartInstanceBody = z.object({
  definitionName: z.string().min(1),
  initialState: z.string().min(1).optional(),
  entityId: z.string().min(1).optional(),
  variables: VariablesSchema.optional(),
});

const TransitionBody = z
  .object({ variables: VariablesSchema.optional() })
  .default({});

const ReasonBody = z.object({ reason: z.string().min(1) });

const CompleteTaskBody = z
  .object({ output: z.record(z.unknown()).optional() })
  .default({});

const InstanceQuery = z.object({
  definitionName: z.string().optional(),
  status: z.enum(INSTANCE_STATUSES).optional(),
  entityId: z.string().optional(),
});

const TaskQuery = z.object({
  instanceId: z.string().optional(),
  role: z.string().optional(),
  userId: z.string().optional(),
  status: z.enum(TASK_STATUSES).optional(),
});

type IdParams = { Params: { id: string } };

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

/**
 * Maps service error types to HTTP status codes.
 *   validation → 400, authorization → 403, not_found → 404,
 *   state → 409, unknown → 500
 */
const ERROR_TYPE_TO_STATUS: Record<ServiceErrorType, number> = {
  validation: 400,
  authorization: 403,
  not_found: 404,
  state: 409,
  unknown: 500,
};

function sendResult<T>(
  reply: FastifyReply,
  result: ServiceResult<T>,
  successStatus = 200
): ServiceResult<T> {
  reply.status(result.success ? successStatus : ERROR_TYPE_TO_STATUS[result.errorType]);
  return result;
}

type Failure = Extract<ServiceResult<never>, { success: false }>;

/**
 * Parses request input, or sends a 400 and returns null.
 */
function parseOrReply<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  reply: FastifyReply
): z.infer<S> | null {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const failure: Failure = {
    success: false,
    error: "Request validation failed",
    errorType: "validation",
    code: "InvalidRequest",
    details: {
      fieldErrors: result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      })),
    },
  };
  reply.status(400).send(failure);
  return null;
}

function missingHeader(reply: FastifyReply, header: string) {
  const failure: Failure = {
    success: false,
    error: `The "${header}" header is required for this operation`,
    errorType: "validation",
    code: "MissingActor",
  };
  return reply.status(400).send(failure);
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

/**
 * Registers all REST routes on the Fastify instance.
 */
export async function registerRESTRoutes(
  app: FastifyInstance,
  { service, registry }: RESTAdapterOptions
) {
  app.addHook("preHandler", actorMiddleware);

  app.get("/api/health", async () => {
    return { status: "ok", processes: registry.current().size };
  });

  // ---------------------------------------------------------------
  // Metadata
  // ---------------------------------------------------------------

  app.get("/api/meta/processes", async () => {
    return registry.current().list().map(describeDefinition);
  });

  app.get<{ Params: { name: string } }>(
    "/api/meta/processes/:name",
    async (request, reply) => {
      const definition = registry.current().find(request.params.name);
      if (!definition) {
        const failure: Failure = {
          success: false,
          error: `Process definition "${request.params.name}" not found`,
          errorType: "not_found",
          code: "DefinitionNotFound",
        };
        return reply.status(404).send(failure);
      }
      return {
        ...describeDefinition(definition),
        warnings: checkCompleteness(definition),
      };
    }
  );

  // ---------------------------------------------------------------
  // Instances
  // ---------------------------------------------------------------

  app.post("/api/instances", async (request, reply) => {
    const body = parseOrReply(StartInstanceBody, request.body, reply);
    if (!body) return reply;
    return sendResult(reply, await service.startInstance(body), 201);
  });

  app.get("/api/instances", async (request, reply) => {
    const filter = parseOrReply(InstanceQuery, request.query, reply);
    if (!filter) return reply;
    return sendResult(reply, await service.listInstances(filter));
  });

  app.get<IdParams>("/api/instances/:id", async (request, reply) => {
    return sendResult(reply, await service.getInstance(request.params.id));
  });

  app.post<{ Params: { id: string; transition: string } }>(
    "/api/instances/:id/transitions/:transition",
    async (request, reply) => {
      const role = request.actor.role;
      if (role === undefined) return missingHeader(reply, "x-role");
      const body = parseOrReply(TransitionBody, request.body ?? {}, reply);
      if (!body) return reply;

      return sendResult(
        reply,
        await service.executeTransition(
          request.params.id,
          request.params.transition,
          role,
          body.variables
        )
      );
    }
  );

  app.post<IdParams>("/api/instances/:id/suspend", async (request, reply) => {
    const body = parseOrReply(ReasonBody, request.body, reply);
    if (!body) return reply;
    return sendResult(reply, await service.suspendInstance(request.params.id, body.reason));
  });

  app.post<IdParams>("/api/instances/:id/resume", async (request, reply) => {
    return sendResult(reply, await service.resumeInstance(request.params.id));
  });

  app.post<IdParams>("/api/instances/:id/terminate", async (request, reply) => {
    const body = parseOrReply(ReasonBody, request.body, reply);
    if (!body) return reply;
    return sendResult(
      reply,
      await service.terminateInstance(request.params.id, body.reason)
    );
  });

  // ---------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------

  app.get("/api/tasks", async (request, reply) => {
    const filter = parseOrReply(TaskQuery, request.query, reply);
    if (!filter) return reply;
    return sendResult(reply, await service.listTasks(filter));
  });

  app.post<IdParams>("/api/tasks/:id/claim", async (request, reply) => {
    const userId = request.actor.userId;
    if (userId === undefined) return missingHeader(reply, "x-user-id");
    return sendResult(reply, await service.claimTask(request.params.id, userId));
  });

  app.post<IdParams>("/api/tasks/:id/complete", async (request, reply) => {
    const body = parseOrReply(CompleteTaskBody, request.body ?? {}, reply);
    if (!body) return reply;
    return sendResult(
      reply,
      await service.completeTask(request.params.id, request.actor, body.output)
    );
  });

  app.post<IdParams>("/api/tasks/:id/skip", async (request, reply) => {
    return sendResult(reply, await service.skipTask(request.params.id, request.actor));
  });
}
