/**
 * HTTP Server
 *
 * Builds the Fastify instance: security headers, rate limiting, CORS,
 * then the platform's REST routes. Does not listen; index.ts does.
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { registerRESTRoutes } from "@procflow/platform";
import type { AppContext } from "./bootstrap.js";

export async function buildServer(
  context: Pick<AppContext, "service" | "registry">,
  env: NodeJS.ProcessEnv = process.env
): Promise<FastifyInstance> {
  const isProd = env.NODE_ENV === "production";

  const app = Fastify({
    logger: false, // We use our own structured logging
    // Behind a reverse proxy, rate limiting needs the real client IP
    trustProxy: isProd,
  });

  await app.register(helmet, {
    contentSecurityPolicy: isProd,
  });

  // Public routes (health, meta) get a much higher ceiling
  await app.register(rateLimit, {
    max: (req) => {
      if (req.url === "/api/health" || req.url.startsWith("/api/meta/")) return 10_000;
      return Number(env.RATE_LIMIT_MAX ?? (isProd ? 100 : 1_000));
    },
    timeWindow: Number(env.RATE_LIMIT_WINDOW_MS ?? 60_000),
  });

  // In production, only the configured origins; in development, any
  const corsOrigin = env.CORS_ORIGIN;
  await app.register(cors, {
    origin: corsOrigin ? corsOrigin.split(",").map((o) => o.trim()) : true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "x-user-id", "x-role"],
  });

  await registerRESTRoutes(app, context);

  return app;
}
