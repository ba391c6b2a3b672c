/**
 * @foodvote/platform
 *
 * The platform engine. Provides configuration, the database layer,
 * repositories and services for every entity, and the REST adapter.
 */

// Config
export { loadConfig, redactDatabaseUrl, type AppConfig } from "./core/config/index.js";

// Database
export {
  createDatabase,
  type Database,
  type DatabaseHandle,
  type SqlClient,
  type StorageSession,
} from "./core/database/connection.js";
export {
  runMigrations,
  MIGRATIONS,
  type MigrationExecutor,
  type MigrationStep,
} from "./core/database/migrate.js";
export * as tables from "./core/database/tables.js";

// Errors
export {
  NotFoundError,
  RequestValidationError,
  isStorageError,
  type FieldError,
} from "./core/errors/index.js";

// Logging
export { createLogger, logRequest } from "./core/logging/index.js";

// Observability
export {
  initObservability,
  captureException,
  captureMessage,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  type ObservabilityProvider,
  type ObservabilityContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";

// Security
export { createBcryptHasher } from "./core/security/password.js";

// Repositories
export {
  createRepositories,
  providedFields,
  isEmptyUpdate,
  UserRepository,
  FoodRepository,
  DayRepository,
  CategoryRepository,
  FoodAvailabilityRepository,
  VoteRepository,
  type Repositories,
  type UserStore,
} from "./core/repositories/index.js";

// Services
export {
  createServices,
  createScopeFactory,
  withScope,
  EntityService,
  UserService,
  type Services,
  type EntityOperations,
  type RequestScope,
  type ScopeFactory,
} from "./core/services/index.js";

// REST Adapter
export {
  registerRESTRoutes,
  registerEntityRoutes,
  registerErrorHandler,
  parseId,
  parseBody,
  requireStorableId,
} from "./adapters/rest/adapter.js";
export { toWire, fromWire, toWireName, fromWireName } from "./adapters/rest/wire.js";
