import { describe, it, expect, beforeEach } from 'vitest';
import { TaskTracker, lastSeenAt } from '../../../../src/distributed/controller/task-tracker.js';
import { ConflictError } from '../../../../src/utils/errors.js';
import { makeTaskRecord } from '../../../helpers/task-fixtures.js';

describe('TaskTracker', () => {
  let now: number;
  let tracker: TaskTracker;

  beforeEach(() => {
    now = 1_000_000;
    tracker = new TaskTracker({ leaseMs: 1000, now: () => now });
  });

  it('refuses a second reservation while the first is pending', () => {
    tracker.reserve('m1');

    expect(() => tracker.reserve('m1')).toThrow('A task for model "m1" is already being submitted');
    expect(() => tracker.reserve('m2')).not.toThrow();
  });

  it('frees the name when a submission is released', () => {
    const reservation = tracker.reserve('m1');
    tracker.release(reservation);

    expect(() => tracker.reserve('m1')).not.toThrow();
  });

  it('refuses a new task while the tracked one is live', () => {
    const record = makeTaskRecord({ state: 'processing', submittedAt: now, startedAt: now });
    tracker.register(tracker.reserve('m1'), record);

    expect(tracker.get('m1')).toBe(record);
    expect(() => tracker.reserve('m1')).toThrow(ConflictError);
    expect(tracker.active()).toEqual([record]);
  });

  it('allows a new task once the tracked one is terminal', () => {
    const record = makeTaskRecord({ submittedAt: now });
    tracker.register(tracker.reserve('m1'), record);
    tracker.refresh({ ...record, state: 'success' });

    expect(tracker.active()).toEqual([]);
    expect(() => tracker.reserve('m1')).not.toThrow();
    expect(tracker.get('m1')).toBeNull();
  });

  it('reaps a record whose last heartbeat is older than the lease', () => {
    const record = makeTaskRecord({ state: 'processing', submittedAt: now - 5000, heartbeatAt: now - 500 });
    tracker.register(tracker.reserve('m1'), record);

    expect(tracker.isOrphaned(record)).toBe(false);
    now += 501;
    expect(tracker.isOrphaned(record)).toBe(true);
    expect(() => tracker.reserve('m1')).not.toThrow();
  });

  it('falls back from heartbeat to start to submit time', () => {
    expect(lastSeenAt(makeTaskRecord({ submittedAt: 1 }))).toBe(1);
    expect(lastSeenAt(makeTaskRecord({ submittedAt: 1, startedAt: 2 }))).toBe(2);
    expect(lastSeenAt(makeTaskRecord({ submittedAt: 1, startedAt: 2, heartbeatAt: 3 }))).toBe(3);
  });

  it('ignores refreshes for a different task id and stale reservations', () => {
    const record = makeTaskRecord({ submittedAt: now });
    const reservation = tracker.reserve('m1');
    tracker.register(reservation, record);
    tracker.refresh(makeTaskRecord({ state: 'success' }));
    tracker.register(reservation, makeTaskRecord());

    expect(tracker.get('m1')).toBe(record);
  });

  it('forgets only tracked records', () => {
    tracker.reserve('pending');
    tracker.register(tracker.reserve('m1'), makeTaskRecord({ submittedAt: now }));

    expect(tracker.forget('pending')).toBe(false);
    expect(tracker.forget('m1')).toBe(true);
    expect(tracker.size()).toBe(1);
  });

  it('refuses reservations after dispose', () => {
    tracker.reserve('m1');
    tracker.dispose();

    expect(tracker.size()).toBe(0);
    expect(() => tracker.reserve('m2')).toThrow('Task tracker has been disposed');
  });
});
