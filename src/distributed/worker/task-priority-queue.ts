/**
 * Task Priority Queue
 *
 * Bounded FIFO queue per priority level for tasks a worker has taken off
 * the broker but not started yet. Dequeue order is high, medium, low.
 */

import type { Logger } from 'pino';
import { TASK_PRIORITIES, type TaskMessage, type TaskPriority } from '../../types/tasks.js';
import { createLogger } from '../../utils/logger.js';

interface QueuedTask {
  task: TaskMessage;
  enqueuedAt: number;
}

export interface TaskQueueStats {
  totalEnqueued: number;
  totalDequeued: number;
  totalRejected: number;
  currentDepth: number;
  avgWaitTimeMs: number;
}

export interface TaskPriorityQueueOptions {
  maxDepth: number;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const queue = new TaskPriorityQueue({ maxDepth: 100 });
 * if (!queue.enqueue(message)) {
 *   // full: fail the task
 * }
 * const next = queue.dequeue();
 * ```
 */
export class TaskPriorityQueue {
  private readonly queues: Record<TaskPriority, QueuedTask[]> = { high: [], medium: [], low: [] };
  private readonly maxDepth: number;
  private readonly logger: Logger;
  private stats: TaskQueueStats = {
    totalEnqueued: 0,
    totalDequeued: 0,
    totalRejected: 0,
    currentDepth: 0,
    avgWaitTimeMs: 0,
  };
  private totalWaitTime = 0;

  constructor(options: TaskPriorityQueueOptions) {
    this.maxDepth = options.maxDepth;
    this.logger = options.logger ?? createLogger('TaskPriorityQueue');
  }

  /**
   * @returns false when the queue is full and the task was rejected
   */
  enqueue(task: TaskMessage): boolean {
    if (this.isFull()) {
      this.stats.totalRejected++;
      this.logger.warn({ taskId: task.taskId, depth: this.getDepth() }, 'Queue full, rejecting task');
      return false;
    }

    this.queues[task.priority].push({ task, enqueuedAt: Date.now() });
    this.stats.totalEnqueued++;
    this.stats.currentDepth = this.getDepth();

    this.logger.debug({ taskId: task.taskId, priority: task.priority, depth: this.getDepth() }, 'Task enqueued');
    return true;
  }

  dequeue(): TaskMessage | null {
    for (const priority of TASK_PRIORITIES) {
      const item = this.queues[priority].shift();
      if (item) {
        this.stats.totalDequeued++;
        this.stats.currentDepth = this.getDepth();

        const waitTime = Date.now() - item.enqueuedAt;
        this.totalWaitTime += waitTime;
        this.stats.avgWaitTimeMs = this.totalWaitTime / this.stats.totalDequeued;

        return item.task;
      }
    }
    return null;
  }

  getDepth(): number {
    return TASK_PRIORITIES.reduce((total, priority) => total + this.queues[priority].length, 0);
  }

  isFull(): boolean {
    return this.getDepth() >= this.maxDepth;
  }

  getStats(): TaskQueueStats {
    return { ...this.stats, currentDepth: this.getDepth() };
  }

  /**
   * Remove and return every queued task, highest priority first
   */
  drain(): TaskMessage[] {
    const tasks: TaskMessage[] = [];
    for (let next = this.dequeue(); next; next = this.dequeue()) {
      tasks.push(next);
    }
    return tasks;
  }

  /**
   * Remove a queued task, e.g. one revoked before it started
   */
  remove(taskId: string): boolean {
    for (const priority of TASK_PRIORITIES) {
      const queue = this.queues[priority];
      const index = queue.findIndex((item) => item.task.taskId === taskId);
      if (index !== -1) {
        queue.splice(index, 1);
        this.stats.currentDepth = this.getDepth();
        return true;
      }
    }
    return false;
  }
}
