/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating config/models.yaml. Every key has a default so
 * an empty file (or no file section) still yields a complete config.
 *
 * @module schemas/config
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const PrioritySchema = z.enum(['high', 'medium', 'low']);

/**
 * Model folder and artifact naming
 */
export const ModelsFolderConfigSchema = z.object({
  folder: z.string().min(1, 'Models folder cannot be empty').default('./models'),
  suffix: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'Suffix must be a bare file extension')
    .default('model'),
  metadata_suffix: z
    .string()
    .regex(/^\.[A-Za-z0-9_.-]+$/, 'Metadata suffix must start with a dot')
    .default('.meta.json'),
});

/**
 * NATS broker connection
 */
export const BrokerConfigSchema = z.object({
  url: z.string().min(1).default('nats://localhost:4222'),
  user: z.string().optional(),
  password: z.string().optional(),
  subject_prefix: z
    .string()
    .regex(/^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/, 'Subject prefix must be dot-separated tokens')
    .default('models'),
  queue_group: z.string().min(1).default('models-workers'),
  reconnect: z.boolean().default(true),
  max_reconnect_attempts: z.number().int().min(-1, 'must be >= -1').default(10),
  reconnect_time_wait_ms: z.number().int().positive('must be positive').default(2000),
});

/**
 * Redis result backend
 */
export const BackendConfigSchema = z.object({
  url: z.string().min(1).default('redis://localhost:6379/0'),
  key_prefix: z.string().min(1).default('models:task'),
  result_ttl_s: z.number().int().positive('must be positive').default(86400),
  connect_timeout_ms: z.number().int().positive('must be positive').default(5000),
});

/**
 * Worker process
 */
export const WorkerConfigSchema = z.object({
  concurrency: z.number().int().min(1, 'must be >= 1').default(1),
  max_queue_depth: z.number().int().min(1, 'must be >= 1').default(100),
  revoke_poll_ms: z.number().int().positive('must be positive').default(1000),
  drain_timeout_ms: z.number().int().min(0, 'must be >= 0').default(30000),
});

/**
 * Orchestrator-side task tracking
 */
export const TasksConfigSchema = z.object({
  lease_ms: z.number().int().positive('must be positive').default(600000),
  default_priority: PrioritySchema.default('medium'),
});

export const DatabaseConfigSchema = z.object({
  url: z.string().min(1).optional(),
  max_connections: z.number().int().min(1, 'must be >= 1').default(10),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
});

export const ModelsConfigSchema = z
  .object({
    models: ModelsFolderConfigSchema.default({}),
    broker: BrokerConfigSchema.default({}),
    backend: BackendConfigSchema.default({}),
    worker: WorkerConfigSchema.default({}),
    tasks: TasksConfigSchema.default({}),
    database: DatabaseConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
  })
  .refine((data) => data.worker.revoke_poll_ms < data.tasks.lease_ms, {
    message: 'must be < tasks.lease_ms so running tasks refresh their heartbeat in time',
    path: ['worker', 'revoke_poll_ms'],
  });

export type ModelsConfig = z.infer<typeof ModelsConfigSchema>;
export type ModelsConfigInput = z.input<typeof ModelsConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type BrokerConfig = z.infer<typeof BrokerConfigSchema>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;
export type TasksConfig = z.infer<typeof TasksConfigSchema>;
