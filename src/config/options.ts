/**
 * camelCase component options from the snake_case config file
 */

import type { ModelsConfig } from '../types/schemas/config.js';
import type { TaskPriority } from '../types/tasks.js';

export interface ManagerSettings {
  folder: string;
  suffix: string;
  metadataSuffix: string;
}

export interface BrokerSettings {
  url: string;
  user?: string;
  password?: string;
  subjectPrefix: string;
  queueGroup: string;
  reconnect: boolean;
  maxReconnectAttempts: number;
  reconnectTimeWait: number;
}

export interface BackendSettings {
  url: string;
  keyPrefix: string;
  resultTtlS: number;
  connectTimeoutMs: number;
}

export interface WorkerSettings {
  concurrency: number;
  maxQueueDepth: number;
  revokePollMs: number;
  drainTimeoutMs: number;
}

export interface OrchestratorSettings {
  leaseMs: number;
  defaultPriority: TaskPriority;
}

export function toManagerOptions(config: ModelsConfig): ManagerSettings {
  return {
    folder: config.models.folder,
    suffix: config.models.suffix,
    metadataSuffix: config.models.metadata_suffix,
  };
}

export function toBrokerOptions(config: ModelsConfig): BrokerSettings {
  return {
    url: config.broker.url,
    user: config.broker.user,
    password: config.broker.password,
    subjectPrefix: config.broker.subject_prefix,
    queueGroup: config.broker.queue_group,
    reconnect: config.broker.reconnect,
    maxReconnectAttempts: config.broker.max_reconnect_attempts,
    reconnectTimeWait: config.broker.reconnect_time_wait_ms,
  };
}

export function toBackendOptions(config: ModelsConfig): BackendSettings {
  return {
    url: config.backend.url,
    keyPrefix: config.backend.key_prefix,
    resultTtlS: config.backend.result_ttl_s,
    connectTimeoutMs: config.backend.connect_timeout_ms,
  };
}

export function toWorkerOptions(config: ModelsConfig): WorkerSettings {
  return {
    concurrency: config.worker.concurrency,
    maxQueueDepth: config.worker.max_queue_depth,
    revokePollMs: config.worker.revoke_poll_ms,
    drainTimeoutMs: config.worker.drain_timeout_ms,
  };
}

export function toOrchestratorOptions(config: ModelsConfig): OrchestratorSettings {
  return {
    leaseMs: config.tasks.lease_ms,
    defaultPriority: config.tasks.default_priority,
  };
}
