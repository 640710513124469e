/**
 * Models Worker
 *
 * Consumes task messages from the broker and runs them against this
 * process's own ModelsManager. Every state change goes through the result
 * backend as a compare-and-set, so a task revoked before it starts is
 * skipped, and a finished task is never overwritten.
 *
 * The worker does not own the broker or backend connections: it connects
 * them on start (a no-op when already connected) and leaves closing them to
 * whoever created them.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { ModelsManager } from '../../core/models-manager.js';
import type { ModelsDBManager } from '../../core/models-db-manager.js';
import type { ControlMessage, TaskMessage, TaskRecord, TransitionResult } from '../../types/tasks.js';
import {
  BrokerError,
  ConfigurationError,
  ConflictError,
  toError,
  toTaskError,
} from '../../utils/errors.js';
import { isCancellation, throwIfCancelled } from '../../utils/cancellation.js';
import { createLogger } from '../../utils/logger.js';
import type { ResultBackend } from '../backend/result-backend.js';
import type { BrokerSubscription, TaskBroker } from '../broker/task-broker.js';
import { TaskPriorityQueue, type TaskQueueStats } from './task-priority-queue.js';

export enum WorkerState {
  IDLE = 'idle',
  CONNECTING = 'connecting',
  READY = 'ready',
  DRAINING = 'draining',
  STOPPED = 'stopped',
}

export interface ModelsWorkerEvents {
  stateChange: (state: WorkerState) => void;
  ready: () => void;
  stopped: () => void;
  taskStarted: (taskId: string) => void;
  taskFinished: (record: TaskRecord) => void;
}

export interface ModelsWorkerOptions {
  manager: ModelsManager;
  broker: TaskBroker;
  backend: ResultBackend;
  /** Required for `input_db` and `update_db` tasks */
  dbManager?: ModelsDBManager;
  workerId?: string;
  concurrency?: number;
  maxQueueDepth?: number;
  /** Interval for the revoke check, which also refreshes the heartbeat */
  revokePollMs?: number;
  drainTimeoutMs?: number;
  logger?: Logger;
}

interface RunningTask {
  controller: AbortController;
  done: Promise<void>;
}

export class ModelsWorker extends EventEmitter<ModelsWorkerEvents> {
  readonly workerId: string;
  private state: WorkerState = WorkerState.IDLE;
  private readonly manager: ModelsManager;
  private readonly dbManager?: ModelsDBManager;
  private readonly broker: TaskBroker;
  private readonly backend: ResultBackend;
  private readonly queue: TaskPriorityQueue;
  private readonly concurrency: number;
  private readonly revokePollMs: number;
  private readonly drainTimeoutMs: number;
  private readonly logger: Logger;
  private readonly running = new Map<string, RunningTask>();
  private taskSubscription?: BrokerSubscription;
  private controlSubscription?: BrokerSubscription;

  constructor(options: ModelsWorkerOptions) {
    super();
    this.workerId = options.workerId ?? randomUUID();
    this.manager = options.manager;
    this.dbManager = options.dbManager;
    this.broker = options.broker;
    this.backend = options.backend;
    this.concurrency = options.concurrency ?? 1;
    this.revokePollMs = options.revokePollMs ?? 1000;
    this.drainTimeoutMs = options.drainTimeoutMs ?? 30000;
    this.logger = options.logger ?? createLogger(`ModelsWorker:${this.workerId.slice(0, 8)}`);
    this.queue = new TaskPriorityQueue({ maxDepth: options.maxQueueDepth ?? 100, logger: this.logger });
  }

  /**
   * Lifecycle: IDLE → CONNECTING → READY
   *            STOPPED → CONNECTING → READY (restart)
   */
  async start(): Promise<void> {
    if (this.state !== WorkerState.IDLE && this.state !== WorkerState.STOPPED) {
      throw new ConflictError(`Worker ${this.workerId} is already ${this.state}`);
    }

    this.logger.info({ concurrency: this.concurrency }, 'Starting worker');
    this.setState(WorkerState.CONNECTING);

    try {
      await this.manager.initialize();
      await Promise.all([this.broker.connect(), this.backend.connect()]);
      this.controlSubscription = this.broker.subscribeControl((message) => this.onControl(message));
      this.taskSubscription = this.broker.consumeTasks((task) => this.accept(task));
    } catch (error) {
      this.controlSubscription?.unsubscribe();
      this.controlSubscription = undefined;
      this.setState(WorkerState.STOPPED);
      this.logger.error({ err: error }, 'Failed to start worker');
      throw new BrokerError(`Failed to start worker: ${toError(error).message}`, 'BROKER_ERROR', toError(error));
    }

    this.setState(WorkerState.READY);
    this.emit('ready');
    this.logger.info({ workerId: this.workerId }, 'Worker ready');
    this.pump();
  }

  /**
   * Lifecycle: READY → DRAINING → STOPPED
   *
   * Tasks still queued locally are failed. Running tasks get up to
   * `drainTimeoutMs` to finish and are then aborted.
   */
  async stop(): Promise<void> {
    if (this.state !== WorkerState.READY) {
      return;
    }

    this.logger.info({ running: this.running.size, queued: this.queue.getDepth() }, 'Stopping worker');
    this.setState(WorkerState.DRAINING);

    this.taskSubscription?.unsubscribe();
    this.taskSubscription = undefined;

    for (const task of this.queue.drain()) {
      await this.failUnstarted(task, 'Worker stopped before the task started');
    }

    if (!(await this.waitForRunning(this.drainTimeoutMs))) {
      this.logger.warn({ running: this.running.size }, 'Drain timeout reached, aborting running tasks');
      for (const task of this.running.values()) {
        task.controller.abort();
      }
      await Promise.allSettled([...this.running.values()].map((task) => task.done));
    }

    this.controlSubscription?.unsubscribe();
    this.controlSubscription = undefined;

    this.setState(WorkerState.STOPPED);
    this.emit('stopped');
    this.logger.info('Worker stopped');
  }

  getState(): WorkerState {
    return this.state;
  }

  getWorkerId(): string {
    return this.workerId;
  }

  runningTasks(): string[] {
    return [...this.running.keys()];
  }

  getQueueStats(): TaskQueueStats {
    return this.queue.getStats();
  }

  private async accept(task: TaskMessage): Promise<void> {
    if (this.state !== WorkerState.READY && this.state !== WorkerState.CONNECTING) {
      await this.failUnstarted(task, `Worker ${this.workerId} is ${this.state}`);
      return;
    }
    if (!this.queue.enqueue(task)) {
      await this.failUnstarted(task, `Worker ${this.workerId} queue is full`);
      return;
    }
    this.pump();
  }

  private pump(): void {
    while (this.state === WorkerState.READY && this.running.size < this.concurrency) {
      const task = this.queue.dequeue();
      if (!task) {
        return;
      }

      const controller = new AbortController();
      const done = this.execute(task, controller)
        .catch((error: unknown) => {
          this.logger.error({ err: error, taskId: task.taskId }, 'Task bookkeeping failed');
        })
        .finally(() => {
          this.running.delete(task.taskId);
          this.pump();
        });
      this.running.set(task.taskId, { controller, done });
    }
  }

  private async execute(task: TaskMessage, controller: AbortController): Promise<void> {
    const { taskId, modelName } = task;
    const startedAt = Date.now();
    const claimed = await this.backend.compareAndSet(taskId, ['not_processed'], {
      state: 'processing',
      startedAt,
      heartbeatAt: startedAt,
      workerId: this.workerId,
    });
    if (!claimed.applied) {
      this.logger.info({ taskId, state: claimed.record?.state ?? null }, 'Skipping task that is no longer queued');
      return;
    }

    this.emit('taskStarted', taskId);
    this.logger.info({ taskId, modelName, operation: task.payload.operation }, 'Task started');
    const poller = setInterval(() => {
      this.heartbeat(taskId, controller).catch((error: unknown) => {
        this.logger.warn({ err: error, taskId }, 'Heartbeat failed');
      });
    }, this.revokePollMs);

    let outcome: TransitionResult;
    try {
      const result = await this.dispatch(task, controller.signal);
      outcome = await this.backend.compareAndSet(taskId, ['processing'], {
        state: 'success',
        finishedAt: Date.now(),
        result,
      });
      this.logger.info({ taskId, modelName, durationMs: Date.now() - startedAt }, 'Task succeeded');
    } catch (error) {
      const cancelled = controller.signal.aborted && isCancellation(error);
      outcome = await this.backend.compareAndSet(
        taskId,
        ['processing'],
        cancelled
          ? { state: 'cancelled', finishedAt: Date.now() }
          : { state: 'failure', finishedAt: Date.now(), error: toTaskError(error) }
      );
      if (cancelled) {
        this.logger.info({ taskId, modelName }, 'Task cancelled');
      } else {
        this.logger.warn({ err: error, taskId, modelName }, 'Task failed');
      }
    } finally {
      clearInterval(poller);
    }

    if (outcome.record) {
      this.emit('taskFinished', outcome.record);
    }
  }

  private async heartbeat(taskId: string, controller: AbortController): Promise<void> {
    const update = await this.backend.compareAndSet(taskId, ['processing'], { heartbeatAt: Date.now() });
    if (update.record?.revokeRequested && !controller.signal.aborted) {
      this.logger.info({ taskId }, 'Revoke flag observed');
      controller.abort();
    }
  }

  private async dispatch(task: TaskMessage, signal: AbortSignal): Promise<unknown> {
    const { modelName: name, payload } = task;

    switch (payload.operation) {
      case 'input':
        return this.manager.input(name, payload.args.rows, { options: payload.args.options, signal });
      case 'output':
        return this.manager.output(name, payload.args.rows, { options: payload.args.options, signal });
      case 'update':
        throwIfCancelled(signal, 'update');
        return this.manager.update(name, payload.args.metadata);
      case 'delete':
        throwIfCancelled(signal, 'delete');
        await this.manager.delete(name);
        return { deleted: name };
      case 'input_db':
        return this.requireDb().inputDb(name, payload.args.table, { options: payload.args.options, signal });
      case 'update_db':
        return this.requireDb().updateDb(name, payload.args.inputTable, payload.args.outputTable, {
          options: payload.args.options,
          signal,
        });
    }
  }

  private onControl(message: ControlMessage): void {
    const task = this.running.get(message.taskId);
    if (task && !task.controller.signal.aborted) {
      this.logger.info({ taskId: message.taskId }, 'Revoke received');
      task.controller.abort();
    }
  }

  private async failUnstarted(task: TaskMessage, reason: string): Promise<void> {
    const error = new BrokerError(reason);
    const outcome = await this.backend.compareAndSet(task.taskId, ['not_processed'], {
      state: 'failure',
      finishedAt: Date.now(),
      workerId: this.workerId,
      error: toTaskError(error),
    });
    this.logger.warn({ taskId: task.taskId, applied: outcome.applied }, reason);
    if (outcome.record) {
      this.emit('taskFinished', outcome.record);
    }
  }

  /**
   * @returns false if tasks were still running when the timeout hit
   */
  private async waitForRunning(timeoutMs: number): Promise<boolean> {
    if (this.running.size === 0) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const settled = Promise.allSettled([...this.running.values()].map((task) => task.done)).then(() => true);
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([settled, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private requireDb(): ModelsDBManager {
    if (!this.dbManager) {
      throw new ConfigurationError(`Worker ${this.workerId} has no database configured`);
    }
    return this.dbManager;
  }

  private setState(state: WorkerState): void {
    this.state = state;
    this.emit('stateChange', state);
  }
}
