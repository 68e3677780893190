/**
 * Procflow API Server
 *
 * Fastify entry point. Boots the platform, registers routes, starts listening.
 * SIGHUP reloads definitions from DEFINITIONS_PATH without a restart;
 * running instances keep the definition they started with.
 */

import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import {
  captureException,
  closeDatabase,
  createLogger,
  flushObservability,
  loadRegistryFromFile,
} from "@procflow/platform";
import { bootstrap } from "./bootstrap.js";
import { buildServer } from "./server.js";

const logger = createLogger("server");

async function main() {
  // 1. Bootstrap platform + domain
  const context = await bootstrap();
  const { config, registry, runtime } = context;

  // 2. HTTP server
  const app = await buildServer(context);
  await app.listen({ port: config.api.port, host: config.api.host });
  logger.info("Procflow API running", { url: `http://localhost:${config.api.port}` });

  // 3. Definition reload
  const definitionsPath = config.definitions.path;
  if (definitionsPath) {
    process.on("SIGHUP", () => {
      loadRegistryFromFile(definitionsPath)
        .then((next) => {
          registry.swap(next);
          logger.info("Reloaded process definitions", { processes: next.size });
        })
        .catch((err: unknown) => {
          // The previous registry stays in effect
          logger.error("Definition reload failed", {
            error: err instanceof Error ? err.message : String(err),
          });
        });
    });
  }

  // 4. Graceful shutdown
  const shutdown = async () => {
    logger.info("Shutting down");
    await app.close();
    await runtime.flushSideEffects();
    await flushObservability(2000);
    await closeDatabase();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      console.error("[shutdown] Failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch(async (err: unknown) => {
  console.error("Fatal error:", err);
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability(2000).catch((flushError: unknown) => {
    console.error("[observability] Flush failed:", flushError);
  });
  process.exit(1);
});
