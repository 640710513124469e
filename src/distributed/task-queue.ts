/**
 * Task Queue
 *
 * Composes a broker and a result backend into the submit / result / revoke
 * interface the background managers use. A task's record is written before
 * its message is published, so a worker never sees a task without a record.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  TaskArgs,
  TaskMessage,
  TaskOperation,
  TaskPayload,
  TaskPriority,
  TaskRecord,
  TaskState,
} from '../types/tasks.js';
import { TaskPayloadSchema } from '../types/schemas/task.js';
import { BrokerError, NotFoundError, fromZodError, isModelsError, toError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ResultBackend } from './backend/result-backend.js';
import type { TaskBroker } from './broker/task-broker.js';

export interface SubmitOptions {
  priority?: TaskPriority;
}

export interface TaskQueueOptions {
  broker: TaskBroker;
  backend: ResultBackend;
  defaultPriority?: TaskPriority;
  logger?: Logger;
}

export interface RevokeResult {
  /** State after the revoke: `cancelled` if it never started */
  state: TaskState;
  /** Whether the task was stopped before a worker took it */
  immediate: boolean;
}

export class TaskQueue {
  readonly broker: TaskBroker;
  readonly backend: ResultBackend;
  readonly defaultPriority: TaskPriority;
  private readonly logger: Logger;

  constructor(options: TaskQueueOptions) {
    this.broker = options.broker;
    this.backend = options.backend;
    this.defaultPriority = options.defaultPriority ?? 'medium';
    this.logger = options.logger ?? createLogger('TaskQueue');
  }

  async connect(): Promise<void> {
    await Promise.all([this.broker.connect(), this.backend.connect()]);
  }

  async close(): Promise<void> {
    await Promise.all([this.broker.close(), this.backend.close()]);
  }

  /**
   * Record and publish one unit of work
   *
   * @returns the new record, in state `not_processed`
   * @throws {ValidationError} if `args` do not fit `operation`
   * @throws {BrokerError} if the backend or broker is unreachable
   */
  async submit<Op extends TaskOperation>(
    modelName: string,
    operation: Op,
    args: TaskArgs<Op>,
    options: SubmitOptions = {}
  ): Promise<TaskRecord> {
    const payload = this.parsePayload({ operation, args });
    const priority = options.priority ?? this.defaultPriority;
    const submittedAt = Date.now();

    const record: TaskRecord = {
      taskId: randomUUID(),
      modelName,
      operation,
      priority,
      state: 'not_processed',
      submittedAt,
      revokeRequested: false,
    };
    const message: TaskMessage = { taskId: record.taskId, modelName, priority, payload, submittedAt };

    await this.backend.create(record);
    try {
      await this.broker.publishTask(message);
    } catch (error) {
      await this.backend.compareAndSet(record.taskId, ['not_processed'], {
        state: 'failure',
        finishedAt: Date.now(),
        error: { name: 'BrokerError', code: 'BROKER_ERROR', message: toError(error).message },
      });
      throw isModelsError(error)
        ? error
        : new BrokerError(`Failed to publish task: ${toError(error).message}`, 'BROKER_ERROR', toError(error));
    }

    this.logger.info({ taskId: record.taskId, modelName, operation, priority }, 'Task submitted');
    return record;
  }

  /**
   * @throws {NotFoundError} if the backend holds no record for `taskId`
   */
  async getResult(taskId: string): Promise<TaskRecord> {
    const record = await this.backend.get(taskId);
    if (!record) {
      throw new NotFoundError(`Task "${taskId}" not found`);
    }
    return record;
  }

  /**
   * Cancel a queued task outright, or ask the worker running it to stop.
   * A task that already finished is left as it is.
   *
   * @throws {NotFoundError} if the backend holds no record for `taskId`
   */
  async revoke(taskId: string): Promise<RevokeResult> {
    const cancelled = await this.backend.compareAndSet(taskId, ['not_processed'], {
      state: 'cancelled',
      finishedAt: Date.now(),
    });
    if (cancelled.applied && cancelled.record) {
      this.logger.info({ taskId }, 'Task cancelled before start');
      return { state: cancelled.record.state, immediate: true };
    }
    if (!cancelled.record) {
      throw new NotFoundError(`Task "${taskId}" not found`);
    }

    const flagged = await this.backend.compareAndSet(taskId, ['processing'], { revokeRequested: true });
    if (!flagged.applied) {
      return { state: flagged.record?.state ?? cancelled.record.state, immediate: false };
    }

    await this.broker.publishControl({ type: 'revoke', taskId });
    this.logger.info({ taskId }, 'Revoke requested for running task');
    return { state: 'processing', immediate: false };
  }

  private parsePayload(candidate: { operation: TaskOperation; args: unknown }): TaskPayload {
    const parsed = TaskPayloadSchema.safeParse(candidate);
    if (!parsed.success) {
      throw fromZodError(parsed.error, `Invalid arguments for "${candidate.operation}"`);
    }
    return parsed.data;
  }
}
