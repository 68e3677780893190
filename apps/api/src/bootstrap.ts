/**
 * Bootstrap
 *
 * Wires the platform engine with the domain layer.
 * This is the SINGLE place where platform meets domain.
 *
 * Sequence:
 *   1. Initialize observability
 *   2. Load config
 *   3. Load process definitions (DEFINITIONS_PATH, or the domain's own)
 *   4. Choose the instance store (Postgres when DATABASE_URL is set)
 *   5. Restore stored instances into the runtime
 *   6. Register event subscribers
 *   7. Return the wired context
 */

import {
  InMemoryInstanceStore,
  PostgresInstanceStore,
  ProcessRuntime,
  RegistryRef,
  RuntimeProcessService,
  createLogger,
  initDatabase,
  initObservability,
  loadConfig,
  loadRegistry,
  loadRegistryFromFile,
  runProcessMigrations,
  subscribeAll,
  type AppConfig,
  type InstanceStore,
} from "@procflow/platform";
import { definitionDocument, eventSubscribers } from "@procflow/domain";

const logger = createLogger("bootstrap");

export interface BootstrapOptions {
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Overrides the store chosen from config */
  store?: InstanceStore;
}

export interface AppContext {
  config: AppConfig;
  registry: RegistryRef;
  runtime: ProcessRuntime;
  service: RuntimeProcessService;
  store: InstanceStore;
}

/**
 * Initializes the entire application.
 * Call once at server startup.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<AppContext> {
  // 1. Observability
  initObservability(options.env);

  // 2. Configuration
  const config = loadConfig(options.env);

  // 3. Definitions
  const registry = new RegistryRef(
    config.definitions.path
      ? await loadRegistryFromFile(config.definitions.path)
      : loadRegistry(definitionDocument)
  );
  logger.info("Loaded process definitions", {
    source: config.definitions.path ?? "domain",
    processes: registry.current().list().map((d) => d.name),
  });

  // 4. Store
  const store = options.store ?? (await createStore(config));

  // 5. Runtime, rehydrated from the store
  const runtime = new ProcessRuntime({ registry, store });
  const restored = runtime.restore(await store.loadAll());
  logger.info("Restored process instances", { ...restored });

  // 6. Domain event subscribers
  subscribeAll(eventSubscribers);
  logger.info("Registered event subscribers", { count: eventSubscribers.length });

  return {
    config,
    registry,
    runtime,
    service: new RuntimeProcessService(runtime),
    store,
  };
}

async function createStore(config: AppConfig): Promise<InstanceStore> {
  if (!config.database.url) {
    logger.info("No DATABASE_URL: instances are kept in memory");
    return new InMemoryInstanceStore();
  }

  const { sql, db } = initDatabase(config.database.url);
  await runProcessMigrations(sql);
  return new PostgresInstanceStore(db);
}
