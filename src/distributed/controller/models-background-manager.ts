/**
 * Models Background Manager
 *
 * Runs model operations as background tasks. Submission is validated here
 * and then handed to the task queue; the work itself happens in a worker
 * process with its own models manager over the same folder. Operation
 * failures never surface from `start`; they are recorded on the task and
 * read back through `getStatus` and `getResult`.
 */

import type { Logger } from 'pino';
import type { CreateModelOptions, MetadataUpdate, ModelOptions, ModelSnapshot, Row } from '../../types/models.js';
import type {
  TaskArgs,
  TaskOperation,
  TaskPriority,
  TaskRecord,
  TaskStatus,
} from '../../types/tasks.js';
import { isTerminalState } from '../../types/tasks.js';
import type { ModelsManager } from '../../core/models-manager.js';
import {
  CancelledError,
  ConflictError,
  NotFoundError,
  TimeoutError,
  WorkerFailure,
  isModelsError,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { TaskQueue } from '../task-queue.js';
import { TaskTracker } from './task-tracker.js';

export interface ModelsBackgroundManagerOptions {
  manager: ModelsManager;
  queue: TaskQueue;
  /** Age after which a silent non-terminal task counts as orphaned */
  leaseMs?: number;
  tracker?: TaskTracker;
  logger?: Logger;
}

export interface BackgroundOptions {
  priority?: TaskPriority;
}

export interface BackgroundOperationOptions extends BackgroundOptions {
  options?: ModelOptions;
}

export interface WaitOptions {
  pollMs?: number;
  timeoutMs?: number;
}

export const DEFAULT_LEASE_MS = 10 * 60 * 1000;

export function toTaskStatus(record: TaskRecord): TaskStatus {
  return {
    taskId: record.taskId,
    modelName: record.modelName,
    operation: record.operation,
    state: record.state,
    submittedAt: new Date(record.submittedAt),
    startedAt: record.startedAt !== undefined ? new Date(record.startedAt) : null,
    finishedAt: record.finishedAt !== undefined ? new Date(record.finishedAt) : null,
  };
}

export class ModelsBackgroundManager {
  readonly manager: ModelsManager;
  readonly queue: TaskQueue;
  readonly tracker: TaskTracker;
  protected readonly logger: Logger;

  constructor(options: ModelsBackgroundManagerOptions) {
    this.manager = options.manager;
    this.queue = options.queue;
    this.logger = options.logger ?? createLogger('ModelsBackgroundManager');
    this.tracker =
      options.tracker ?? new TaskTracker({ leaseMs: options.leaseMs ?? DEFAULT_LEASE_MS, logger: this.logger });
  }

  /**
   * Create a model in the shared folder. Runs inline.
   */
  create(name: string, modelType: string, options: CreateModelOptions = {}): Promise<ModelSnapshot> {
    return this.manager.create(name, modelType, options);
  }

  /**
   * Snapshot of a model in the shared folder. Runs inline.
   */
  get(name: string): Promise<ModelSnapshot> {
    return this.manager.get(name);
  }

  /**
   * Submit `operation` on `name` and return its task id without waiting.
   *
   * @throws {ConflictError} if `name` already has an active task
   * @throws {NotFoundError} if the model does not exist
   * @throws {ValidationError} for a bad name or bad arguments
   * @throws {BrokerError} if the queue is unreachable
   */
  async start<Op extends TaskOperation>(
    name: string,
    operation: Op,
    args: TaskArgs<Op>,
    options: BackgroundOptions = {}
  ): Promise<string> {
    this.manager.handler.handleName(name, this.manager.suffix);
    await this.refreshActive(name);

    const reservation = this.tracker.reserve(name);
    try {
      if (!(await this.manager.has(name))) {
        throw new NotFoundError(`Model instance "${name}" not found`);
      }
      const record = await this.queue.submit(name, operation, args, options);
      this.tracker.register(reservation, record);
      return record.taskId;
    } catch (error) {
      this.tracker.release(reservation);
      throw error;
    }
  }

  input(name: string, rows: Row[], options: BackgroundOperationOptions = {}): Promise<string> {
    return this.start(name, 'input', { rows, options: options.options }, options);
  }

  output(name: string, rows: Row[], options: BackgroundOperationOptions = {}): Promise<string> {
    return this.start(name, 'output', { rows, options: options.options }, options);
  }

  update(name: string, metadata: MetadataUpdate, options: BackgroundOptions = {}): Promise<string> {
    return this.start(name, 'update', { metadata }, options);
  }

  delete(name: string, options: BackgroundOptions = {}): Promise<string> {
    return this.start(name, 'delete', {}, options);
  }

  /**
   * Current state of the task tracked for `name`, polling the backend while
   * it is not terminal
   *
   * @throws {NotFoundError} if no task is tracked for `name`
   */
  async getStatus(name: string): Promise<TaskStatus> {
    return toTaskStatus(await this.poll(name));
  }

  /**
   * Result payload of a finished task
   *
   * @throws {NotFoundError} if no task is tracked for `name`
   * @throws {ConflictError} if the task has not finished
   * @throws {WorkerFailure} if the operation raised in the worker
   * @throws {CancelledError} if the task was cancelled
   */
  async getResult(name: string): Promise<unknown> {
    const record = await this.poll(name);

    switch (record.state) {
      case 'success':
        return record.result ?? null;
      case 'failure':
        throw new WorkerFailure(
          record.error?.message ?? `Task ${record.taskId} failed`,
          record.taskId,
          record.error
        );
      case 'cancelled':
        throw new CancelledError(`Task ${record.taskId} for model "${name}" was cancelled`);
      default:
        throw new ConflictError(`Task ${record.taskId} for model "${name}" is still ${record.state}`);
    }
  }

  /**
   * Poll until the task for `name` reaches a terminal state
   *
   * @throws {TimeoutError} if it is still running after `timeoutMs`
   */
  async wait(name: string, options: WaitOptions = {}): Promise<TaskStatus> {
    const pollMs = options.pollMs ?? 100;
    const timeoutMs = options.timeoutMs ?? 60_000;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const record = await this.poll(name);
      if (isTerminalState(record.state)) {
        return toTaskStatus(record);
      }
      if (Date.now() >= deadline) {
        throw new TimeoutError(`Task ${record.taskId} for model "${name}" did not finish within ${timeoutMs}ms`, timeoutMs);
      }
      await new Promise((resolve) => setTimeout(resolve, pollMs));
    }
  }

  /**
   * Ask the queue to stop the task for `name`. A task no worker has picked
   * up is cancelled at once; a running task is cancelled cooperatively and
   * may still finish.
   *
   * @throws {NotFoundError} if no task is tracked for `name`
   * @throws {ConflictError} if the task already finished
   */
  async cancel(name: string): Promise<TaskStatus> {
    const record = await this.poll(name);
    if (isTerminalState(record.state)) {
      throw new ConflictError(`Task ${record.taskId} for model "${name}" already finished as ${record.state}`);
    }

    const outcome = await this.queue.revoke(record.taskId);
    this.logger.info({ name, taskId: record.taskId, immediate: outcome.immediate }, 'Task cancellation requested');
    return toTaskStatus(await this.poll(name));
  }

  /**
   * Drop the local tracking entry. The backend record is left to expire.
   */
  forget(name: string): boolean {
    return this.tracker.forget(name);
  }

  /**
   * Revoke every active task and dispose the tracker
   */
  async shutdown(): Promise<void> {
    const active = this.tracker.active();
    const results = await Promise.allSettled(active.map((record) => this.queue.revoke(record.taskId)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn({ err: result.reason, taskId: active[index]?.taskId }, 'Failed to revoke task on shutdown');
      }
    });

    this.tracker.dispose();
    this.logger.info({ revoked: active.length }, 'Background manager shut down');
  }

  /**
   * Tracked record for `name`, refreshed from the backend unless terminal
   */
  private async poll(name: string): Promise<TaskRecord> {
    const tracked = this.tracker.get(name);
    if (!tracked) {
      throw new NotFoundError(`No task tracked for model "${name}"`);
    }
    if (isTerminalState(tracked.state)) {
      return tracked;
    }

    try {
      const fresh = await this.queue.getResult(tracked.taskId);
      this.tracker.refresh(fresh);
      return fresh;
    } catch (error) {
      // Expired or removed before its outcome was seen; the outcome is lost
      if (isModelsError(error) && error.code === 'NOT_FOUND') {
        const lost: TaskRecord = {
          ...tracked,
          state: 'failure',
          finishedAt: Date.now(),
          error: { name: 'NotFoundError', code: 'NOT_FOUND', message: error.message },
        };
        this.tracker.refresh(lost);
        this.logger.warn({ name, taskId: tracked.taskId }, 'Task record missing from backend; marked as failed');
        return lost;
      }
      throw error;
    }
  }

  private async refreshActive(name: string): Promise<void> {
    const tracked = this.tracker.get(name);
    if (tracked && !isTerminalState(tracked.state)) {
      await this.poll(name);
    }
  }
}
