/**
 * Result backend contract
 *
 * Stores one {@link TaskRecord} per task. Every write is a compare-and-set
 * on the record's state, so the orchestrator, the worker and a revoke can
 * race without a terminal state ever being overwritten.
 */

import type { TaskRecord, TaskRecordPatch, TaskState, TransitionResult } from '../../types/tasks.js';

export interface TaskUpdate extends TaskRecordPatch {
  state?: TaskState;
}

export interface ResultBackend {
  connect(): Promise<void>;
  close(): Promise<void>;

  /**
   * @throws {AlreadyExistsError} if a record with the same id exists
   */
  create(record: TaskRecord): Promise<void>;

  get(taskId: string): Promise<TaskRecord | null>;

  /**
   * Apply `update` only if the record's current state is one of `expected`.
   * Missing records are reported as `{ applied: false, record: null }`.
   */
  compareAndSet(taskId: string, expected: readonly TaskState[], update: TaskUpdate): Promise<TransitionResult>;

  delete(taskId: string): Promise<boolean>;
}
