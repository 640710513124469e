/**
 * Task records, states and operations
 */

import type { z } from 'zod';
import type { ControlMessageSchema, TaskMessageSchema, TaskPayloadSchema } from './schemas/task.js';
import type { TaskErrorPayload } from '../utils/errors.js';

export const TASK_STATES = ['not_processed', 'processing', 'success', 'failure', 'cancelled'] as const;

export type TaskState = (typeof TASK_STATES)[number];

const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>(['success', 'failure', 'cancelled']);

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Task priority levels, highest first
 */
export const TASK_PRIORITIES = ['high', 'medium', 'low'] as const;

export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export type TaskPayload = z.infer<typeof TaskPayloadSchema>;
export type TaskOperation = TaskPayload['operation'];
export type TaskArgs<Op extends TaskOperation> = Extract<TaskPayload, { operation: Op }>['args'];
export type TaskMessage = z.infer<typeof TaskMessageSchema>;
export type ControlMessage = z.infer<typeof ControlMessageSchema>;

/**
 * Tracked state of one submitted background operation, as stored in the
 * result backend. Timestamps are epoch milliseconds.
 */
export interface TaskRecord {
  taskId: string;
  modelName: string;
  operation: TaskOperation;
  priority: TaskPriority;
  state: TaskState;
  submittedAt: number;
  startedAt?: number;
  finishedAt?: number;
  heartbeatAt?: number;
  workerId?: string;
  revokeRequested: boolean;
  result?: unknown;
  error?: TaskErrorPayload;
}

/**
 * Fields a state transition may set alongside the new state
 */
export type TaskRecordPatch = Partial<
  Pick<TaskRecord, 'startedAt' | 'finishedAt' | 'heartbeatAt' | 'workerId' | 'result' | 'error' | 'revokeRequested'>
>;

export interface TransitionResult {
  /** Whether the record was in one of the expected states and got updated */
  applied: boolean;
  /** Record after the call (unchanged when not applied); null when unknown */
  record: TaskRecord | null;
}

/**
 * What `getStatus` reports to callers
 */
export interface TaskStatus {
  taskId: string;
  modelName: string;
  operation: TaskOperation;
  state: TaskState;
  submittedAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
}
