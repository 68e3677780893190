/**
 * @procflow/platform
 *
 * The process engine. Provides definition validation and loading, the
 * instance runtime, the service facade, persistence and protocol adapters.
 */

// Config
export { loadConfig, type AppConfig } from "./core/config/index.js";

// Errors
export {
  AuthorizationError,
  DefinitionValidationError,
  ReferenceNotFoundError,
  StateError,
  isProcessError,
  type AuthorizationErrorCode,
  type ProcessError,
  type ProcessErrorCategory,
  type ReferenceNotFoundCode,
  type StateErrorCode,
} from "./core/errors/index.js";

// Definitions
export { validateDefinitionDocument, type ValidationResult } from "./core/definitions/validator.js";
export {
  DefinitionRegistry,
  RegistryRef,
  createRegistry,
  loadRegistry,
  loadRegistryFromFile,
  saveRegistryToFile,
  serializeRegistry,
} from "./core/definitions/registry.js";
export {
  checkCompleteness,
  describeDefinition,
  effectiveRoles,
  type CompletenessWarning,
  type CompletenessWarningKind,
  type DefinitionSummary,
  type StepSummary,
  type TransitionSummary,
} from "./core/definitions/analysis.js";

// Runtime
export {
  ProcessRuntime,
  type EventEmitter,
  type ProcessRuntimeOptions,
  type RestoreSummary,
  type StatusChange,
  type StatusDecision,
} from "./core/runtime/runtime.js";
export { SuspensionManager } from "./core/runtime/suspension.js";
export { authorize, authorizeRole, supervises } from "./core/runtime/authorizer.js";
export { computeEligibleSteps } from "./core/runtime/scheduler.js";
export { evaluateCondition, selectBranch } from "./core/runtime/conditions.js";

// Service
export { RuntimeProcessService } from "./core/service/process-service.js";

// Database
export { initDatabase, getDatabase, closeDatabase } from "./core/database/connection.js";
export { runProcessMigrations, PROCESS_MIGRATIONS, type SqlExecutor } from "./core/database/migrate.js";
export {
  InMemoryInstanceStore,
  type InstanceStore,
  type StoredState,
} from "./core/database/store.js";
export { PostgresInstanceStore } from "./core/database/postgres-store.js";
export { processInstances, taskInstances } from "./core/database/schema.js";

// Event Bus
export {
  subscribe,
  subscribeAll,
  publish,
  getSubscriberCount,
  clearSubscribers,
  type PublishFailure,
} from "./core/event-bus/index.js";

// Logging
export { createLogger, logOperation } from "./core/logging/index.js";

// Observability
export {
  initObservability,
  captureException,
  captureMessage,
  flushObservability,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  SentryObservabilityProvider,
  splitContext,
  type ObservabilityProvider,
  type ObservabilityContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";

// Adapters
export { registerRESTRoutes, type RESTAdapterOptions } from "./adapters/rest/adapter.js";
export { actorMiddleware, readActor } from "./adapters/rest/actor-middleware.js";
