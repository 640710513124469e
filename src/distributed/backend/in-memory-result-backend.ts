/**
 * In-process result backend backed by a Map. Records are copied in and out
 * so callers never share a reference with the store.
 */

import type { TaskRecord, TaskState, TransitionResult } from '../../types/tasks.js';
import { AlreadyExistsError, ConnectionError } from '../../utils/errors.js';
import type { ResultBackend, TaskUpdate } from './result-backend.js';

export class InMemoryResultBackend implements ResultBackend {
  private readonly records = new Map<string, TaskRecord>();
  private connected = false;

  async connect(): Promise<void> {
    this.connected = true;
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  async create(record: TaskRecord): Promise<void> {
    this.requireConnected();
    if (this.records.has(record.taskId)) {
      throw new AlreadyExistsError(`Task "${record.taskId}" already exists`);
    }
    this.records.set(record.taskId, structuredClone(record));
  }

  async get(taskId: string): Promise<TaskRecord | null> {
    this.requireConnected();
    const record = this.records.get(taskId);
    return record ? structuredClone(record) : null;
  }

  async compareAndSet(taskId: string, expected: readonly TaskState[], update: TaskUpdate): Promise<TransitionResult> {
    this.requireConnected();
    const current = this.records.get(taskId);
    if (!current) {
      return { applied: false, record: null };
    }
    if (!expected.includes(current.state)) {
      return { applied: false, record: structuredClone(current) };
    }

    const next: TaskRecord = { ...current };
    for (const [key, value] of Object.entries(update)) {
      if (value !== undefined) {
        Object.assign(next, { [key]: structuredClone(value) });
      }
    }
    this.records.set(taskId, next);
    return { applied: true, record: structuredClone(next) };
  }

  async delete(taskId: string): Promise<boolean> {
    this.requireConnected();
    return this.records.delete(taskId);
  }

  size(): number {
    return this.records.size;
  }

  private requireConnected(): void {
    if (!this.connected) {
      throw new ConnectionError('In-memory result backend is not connected');
    }
  }
}
