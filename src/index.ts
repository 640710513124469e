export { ModelsManager, DEFAULT_MODELS_FOLDER, DEFAULT_SUFFIX, DEFAULT_METADATA_SUFFIX } from './core/models-manager.js';
export type { ModelsManagerOptions, LoadOptions, InputResult } from './core/models-manager.js';
export { ModelsDBManager, type ModelsDBManagerOptions, type InputDbResult, type UpdateDbResult } from './core/models-db-manager.js';
export { ModelsHandler, type ModelsHandlerOptions } from './core/models-handler.js';
export { ModelInstance } from './core/model-instance.js';
export { ModelRegistry } from './core/model-registry.js';
export { createDefaultRegistry, demoModel, linearModel, type DemoModelState, type LinearModelState } from './models/index.js';

export type { TableDatabase } from './database/table-database.js';
export { validateTableName } from './database/table-database.js';
export { InMemoryTableDatabase } from './database/in-memory-table-database.js';
export {
  PostgresTableDatabase,
  fromPgPool,
  type SqlPool,
  type SqlPoolClient,
  type SqlClient,
  type SqlQueryResult,
} from './database/postgres-table-database.js';

export type { TaskBroker, TaskHandler, ControlHandler, BrokerSubscription } from './distributed/broker/task-broker.js';
export { NatsTaskBroker, type NatsTaskBrokerOptions } from './distributed/broker/nats-task-broker.js';
export { InMemoryTaskBroker } from './distributed/broker/in-memory-task-broker.js';
export type { ResultBackend, TaskUpdate } from './distributed/backend/result-backend.js';
export { RedisResultBackend, type RedisResultBackendOptions } from './distributed/backend/redis-result-backend.js';
export { InMemoryResultBackend } from './distributed/backend/in-memory-result-backend.js';
export { NatsClient, type NatsClientOptions } from './distributed/nats/client.js';
export { TaskQueue, type TaskQueueOptions, type SubmitOptions, type RevokeResult } from './distributed/task-queue.js';
export { TaskTracker, type TaskTrackerOptions } from './distributed/controller/task-tracker.js';
export {
  ModelsBackgroundManager,
  toTaskStatus,
  type ModelsBackgroundManagerOptions,
  type BackgroundOptions,
  type BackgroundOperationOptions,
  type WaitOptions,
} from './distributed/controller/models-background-manager.js';
export { ModelsDBBackgroundManager } from './distributed/controller/models-db-background-manager.js';
export { ModelsWorker, WorkerState, type ModelsWorkerOptions, type ModelsWorkerEvents } from './distributed/worker/models-worker.js';

export { createRuntime, type Runtime, type RuntimeOverrides } from './runtime.js';
export { loadConfig, initializeConfig, getConfig, resetConfig, validateConfig, type Environment } from './config/loader.js';
export { toManagerOptions, toBrokerOptions, toBackendOptions, toWorkerOptions, toOrchestratorOptions } from './config/options.js';
export { createLogger, setLogLevel, type Logger } from './utils/logger.js';
export * from './utils/errors.js';

export * from './types/index.js';
