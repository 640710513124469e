/**
 * Wires managers, queue and database from a loaded config. Scripts build one
 * runtime per process; tests pass in-process overrides for the broker,
 * backend and database.
 */

import pg from 'pg';
import type { Logger } from 'pino';
import type { ModelsConfig } from './types/schemas/config.js';
import { ModelRegistry } from './core/model-registry.js';
import { ModelsManager } from './core/models-manager.js';
import { ModelsDBManager } from './core/models-db-manager.js';
import { createDefaultRegistry } from './models/index.js';
import type { TableDatabase } from './database/table-database.js';
import { PostgresTableDatabase, fromPgPool } from './database/postgres-table-database.js';
import type { TaskBroker } from './distributed/broker/task-broker.js';
import { NatsTaskBroker } from './distributed/broker/nats-task-broker.js';
import type { ResultBackend } from './distributed/backend/result-backend.js';
import { RedisResultBackend } from './distributed/backend/redis-result-backend.js';
import { TaskQueue } from './distributed/task-queue.js';
import { ModelsDBBackgroundManager } from './distributed/controller/models-db-background-manager.js';
import { ModelsWorker } from './distributed/worker/models-worker.js';
import {
  toBackendOptions,
  toBrokerOptions,
  toManagerOptions,
  toOrchestratorOptions,
  toWorkerOptions,
} from './config/options.js';
import { createLogger, setLogLevel } from './utils/logger.js';

export interface RuntimeOverrides {
  registry?: ModelRegistry;
  broker?: TaskBroker;
  backend?: ResultBackend;
  database?: TableDatabase;
  logger?: Logger;
}

export interface WorkerRuntimeOptions {
  workerId?: string;
}

export interface Runtime {
  config: ModelsConfig;
  registry: ModelRegistry;
  manager: ModelsManager;
  database?: TableDatabase;
  dbManager?: ModelsDBManager;
  queue: TaskQueue;
  orchestrator: ModelsDBBackgroundManager;
  /** Worker with its own ModelsManager over the configured folder */
  createWorker(options?: WorkerRuntimeOptions): ModelsWorker;
  connect(): Promise<void>;
  close(): Promise<void>;
}

function createDatabase(config: ModelsConfig): TableDatabase | undefined {
  if (!config.database.url) {
    return undefined;
  }
  const pool = new pg.Pool({ connectionString: config.database.url, max: config.database.max_connections });
  return new PostgresTableDatabase(fromPgPool(pool));
}

export function createRuntime(config: ModelsConfig, overrides: RuntimeOverrides = {}): Runtime {
  setLogLevel(config.logging.level);
  const logger = overrides.logger ?? createLogger('Runtime');

  const registry = overrides.registry ?? createDefaultRegistry();
  const managerSettings = toManagerOptions(config);
  const manager = new ModelsManager({ models: registry, ...managerSettings });

  const database = overrides.database ?? createDatabase(config);
  const dbManager = database ? new ModelsDBManager({ manager, database }) : undefined;

  const orchestratorSettings = toOrchestratorOptions(config);
  const queue = new TaskQueue({
    broker: overrides.broker ?? new NatsTaskBroker(toBrokerOptions(config)),
    backend: overrides.backend ?? new RedisResultBackend(toBackendOptions(config)),
    defaultPriority: orchestratorSettings.defaultPriority,
  });
  const orchestrator = new ModelsDBBackgroundManager({ manager, queue, leaseMs: orchestratorSettings.leaseMs });

  const createWorker = (options: WorkerRuntimeOptions = {}): ModelsWorker => {
    const workerManager = new ModelsManager({ models: registry, ...managerSettings });
    return new ModelsWorker({
      ...toWorkerOptions(config),
      workerId: options.workerId,
      manager: workerManager,
      dbManager: database ? new ModelsDBManager({ manager: workerManager, database }) : undefined,
      broker: queue.broker,
      backend: queue.backend,
    });
  };

  return {
    config,
    registry,
    manager,
    database,
    dbManager,
    queue,
    orchestrator,
    createWorker,
    connect: async () => {
      await manager.initialize();
      await queue.connect();
      logger.info({ folder: manager.folder, database: database !== undefined }, 'Runtime connected');
    },
    close: async () => {
      await queue.close();
      await database?.close?.();
      logger.info('Runtime closed');
    },
  };
}
