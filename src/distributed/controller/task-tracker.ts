/**
 * Task Tracker
 *
 * Per-orchestrator map from model name to its most recent task. `reserve`
 * checks and inserts without awaiting, so two submissions for one model in
 * the same process can never both pass the busy check.
 *
 * A non-terminal entry whose last sign of life (heartbeat, start or submit
 * time) is older than the lease counts as orphaned and may be replaced.
 */

import type { Logger } from 'pino';
import type { TaskRecord } from '../../types/tasks.js';
import { isTerminalState } from '../../types/tasks.js';
import { ConflictError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export interface TaskTrackerOptions {
  leaseMs: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Placeholder held while a submission is in flight
 */
export interface Reservation {
  readonly modelName: string;
  readonly reservedAt: number;
}

type Entry = { kind: 'reserved'; reservation: Reservation } | { kind: 'tracked'; record: TaskRecord };

export function lastSeenAt(record: TaskRecord): number {
  return record.heartbeatAt ?? record.startedAt ?? record.submittedAt;
}

export class TaskTracker {
  private readonly entries = new Map<string, Entry>();
  private readonly leaseMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private disposed = false;

  constructor(options: TaskTrackerOptions) {
    this.leaseMs = options.leaseMs;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('TaskTracker');
  }

  /**
   * Reserve `modelName` for a new submission
   *
   * @throws {ConflictError} if a live task or another submission holds it
   */
  reserve(modelName: string): Reservation {
    this.assertActive();
    const entry = this.entries.get(modelName);

    if (entry?.kind === 'reserved') {
      throw new ConflictError(`A task for model "${modelName}" is already being submitted`);
    }
    if (entry?.kind === 'tracked' && !isTerminalState(entry.record.state)) {
      if (!this.isOrphaned(entry.record)) {
        throw new ConflictError(
          `Model "${modelName}" already has an active task (${entry.record.taskId}, ${entry.record.state})`
        );
      }
      this.logger.warn(
        { modelName, taskId: entry.record.taskId, state: entry.record.state },
        'Reaping orphaned task record'
      );
    }

    const reservation: Reservation = { modelName, reservedAt: this.now() };
    this.entries.set(modelName, { kind: 'reserved', reservation });
    return reservation;
  }

  /**
   * Replace a reservation with the submitted record
   */
  register(reservation: Reservation, record: TaskRecord): void {
    const entry = this.entries.get(reservation.modelName);
    if (entry?.kind === 'reserved' && entry.reservation === reservation) {
      this.entries.set(reservation.modelName, { kind: 'tracked', record });
    }
  }

  /**
   * Drop a reservation whose submission failed
   */
  release(reservation: Reservation): void {
    const entry = this.entries.get(reservation.modelName);
    if (entry?.kind === 'reserved' && entry.reservation === reservation) {
      this.entries.delete(reservation.modelName);
    }
  }

  /**
   * Store a fresher copy of a tracked record
   */
  refresh(record: TaskRecord): void {
    const entry = this.entries.get(record.modelName);
    if (entry?.kind === 'tracked' && entry.record.taskId === record.taskId) {
      this.entries.set(record.modelName, { kind: 'tracked', record });
    }
  }

  get(modelName: string): TaskRecord | null {
    const entry = this.entries.get(modelName);
    return entry?.kind === 'tracked' ? entry.record : null;
  }

  forget(modelName: string): boolean {
    const entry = this.entries.get(modelName);
    if (entry?.kind !== 'tracked') {
      return false;
    }
    return this.entries.delete(modelName);
  }

  /**
   * Tracked records that have not reached a terminal state
   */
  active(): TaskRecord[] {
    const records: TaskRecord[] = [];
    for (const entry of this.entries.values()) {
      if (entry.kind === 'tracked' && !isTerminalState(entry.record.state)) {
        records.push(entry.record);
      }
    }
    return records;
  }

  isOrphaned(record: TaskRecord): boolean {
    return !isTerminalState(record.state) && this.now() - lastSeenAt(record) > this.leaseMs;
  }

  size(): number {
    return this.entries.size;
  }

  dispose(): void {
    this.entries.clear();
    this.disposed = true;
  }

  private assertActive(): void {
    if (this.disposed) {
      throw new ConflictError('Task tracker has been disposed');
    }
  }
}
