/**
 * Task payload schemas
 *
 * A task message crosses the broker boundary as JSON, so the worker parses
 * it with these schemas rather than trusting the shape.
 *
 * @module schemas/task
 */

import { z } from 'zod';
import { MetadataUpdateSchema, ModelNameSchema, ModelOptionsSchema, RowsSchema } from './model.js';
import { PrioritySchema } from './config.js';
import { TASK_STATES } from '../tasks.js';
import { MODELS_ERROR_CODES } from '../../utils/errors.js';

/** Table names are used as SQL identifiers */
export const TableNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]{0,62}$/, 'Table name must be a plain SQL identifier');

export const TaskOperationSchema = z.enum(['input', 'output', 'update', 'delete', 'input_db', 'update_db']);

export const TaskPayloadSchema = z.discriminatedUnion('operation', [
  z.object({
    operation: z.literal('input'),
    args: z.object({ rows: RowsSchema, options: ModelOptionsSchema.optional() }),
  }),
  z.object({
    operation: z.literal('output'),
    args: z.object({ rows: RowsSchema, options: ModelOptionsSchema.optional() }),
  }),
  z.object({
    operation: z.literal('update'),
    args: z.object({ metadata: MetadataUpdateSchema }),
  }),
  z.object({
    operation: z.literal('delete'),
    args: z.object({}).strict(),
  }),
  z.object({
    operation: z.literal('input_db'),
    args: z.object({ table: TableNameSchema, options: ModelOptionsSchema.optional() }),
  }),
  z.object({
    operation: z.literal('update_db'),
    args: z.object({
      inputTable: TableNameSchema,
      outputTable: TableNameSchema,
      options: ModelOptionsSchema.optional(),
    }),
  }),
]);

/**
 * Message published on `<prefix>.tasks`
 */
export const TaskMessageSchema = z.object({
  taskId: z.string().uuid(),
  modelName: ModelNameSchema,
  priority: PrioritySchema,
  payload: TaskPayloadSchema,
  submittedAt: z.number().int().nonnegative(),
});

/**
 * Message broadcast on `<prefix>.control`
 */
export const ControlMessageSchema = z.object({
  type: z.literal('revoke'),
  taskId: z.string().uuid(),
});

export const TaskErrorPayloadSchema = z.object({
  name: z.string(),
  code: z.enum(MODELS_ERROR_CODES),
  message: z.string(),
});

/**
 * Record as stored in the result backend
 */
export const TaskRecordSchema = z.object({
  taskId: z.string().uuid(),
  modelName: ModelNameSchema,
  operation: TaskOperationSchema,
  priority: PrioritySchema,
  state: z.enum(TASK_STATES),
  submittedAt: z.number().int().nonnegative(),
  startedAt: z.number().int().nonnegative().optional(),
  finishedAt: z.number().int().nonnegative().optional(),
  heartbeatAt: z.number().int().nonnegative().optional(),
  workerId: z.string().optional(),
  revokeRequested: z.boolean(),
  result: z.unknown().optional(),
  error: TaskErrorPayloadSchema.optional(),
});
