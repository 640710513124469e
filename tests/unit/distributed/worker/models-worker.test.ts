import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ModelsManager } from '../../../../src/core/models-manager.js';
import { ModelsDBManager } from '../../../../src/core/models-db-manager.js';
import { ModelRegistry } from '../../../../src/core/model-registry.js';
import { demoModel, linearModel } from '../../../../src/models/index.js';
import { InMemoryTableDatabase } from '../../../../src/database/in-memory-table-database.js';
import { InMemoryTaskBroker } from '../../../../src/distributed/broker/in-memory-task-broker.js';
import { InMemoryResultBackend } from '../../../../src/distributed/backend/in-memory-result-backend.js';
import { TaskQueue } from '../../../../src/distributed/task-queue.js';
import { ModelsDBBackgroundManager } from '../../../../src/distributed/controller/models-db-background-manager.js';
import { ModelsWorker, WorkerState, type ModelsWorkerOptions } from '../../../../src/distributed/worker/models-worker.js';
import { BrokerError, ConflictError, WorkerFailure } from '../../../../src/utils/errors.js';
import { Gate, createGatedModel } from '../../../helpers/gated-model.js';
import { waitUntil } from '../../../helpers/task-fixtures.js';
import { createTempFolder, removeTempFolder } from '../../../helpers/temp-folder.js';

describe('ModelsWorker', () => {
  let folder: string;
  let gate: Gate;
  let registry: ModelRegistry;
  let broker: InMemoryTaskBroker;
  let backend: InMemoryResultBackend;
  let database: InMemoryTableDatabase;
  let orchestrator: ModelsDBBackgroundManager;
  let worker: ModelsWorker | undefined;

  beforeEach(async () => {
    folder = await createTempFolder();
    gate = new Gate();
    registry = new ModelRegistry([demoModel, linearModel, createGatedModel(gate)]);
    broker = new InMemoryTaskBroker();
    backend = new InMemoryResultBackend();
    database = new InMemoryTableDatabase({
      readings: [
        { hours: 1, score: 52 },
        { hours: 2, score: 61 },
        { hours: 3, score: 70 },
      ],
      future: [{ hours: 4 }],
    });
    const queue = new TaskQueue({ broker, backend });
    await queue.connect();
    orchestrator = new ModelsDBBackgroundManager({
      manager: new ModelsManager({ models: registry, folder }),
      queue,
    });
  });

  afterEach(async () => {
    gate.release();
    await worker?.stop();
    worker = undefined;
    await removeTempFolder(folder);
  });

  async function startWorker(options: Partial<ModelsWorkerOptions> = {}): Promise<ModelsWorker> {
    const manager = new ModelsManager({ models: registry, folder });
    worker = new ModelsWorker({
      manager,
      dbManager: new ModelsDBManager({ manager, database }),
      broker,
      backend,
      workerId: 'w1',
      revokePollMs: 10,
      drainTimeoutMs: 1000,
      ...options,
    });
    await worker.start();
    return worker;
  }

  function startedOrder(target: ModelsWorker): string[] {
    const started: string[] = [];
    target.on('taskStarted', (taskId) => {
      started.push(taskId);
    });
    return started;
  }

  it('runs train and predict tasks against the shared folder', async () => {
    await startWorker();
    await orchestrator.create('m1', 'demo');

    await orchestrator.input('m1', [{ a: 1 }, { a: 3 }]);
    const trained = await orchestrator.wait('m1', { pollMs: 5 });
    expect(trained.state).toBe('success');
    expect(trained.startedAt).toBeInstanceOf(Date);
    expect((await orchestrator.get('m1')).trained).toBe(true);

    await orchestrator.output('m1', [{ a: 0 }]);
    await orchestrator.wait('m1', { pollMs: 5 });
    expect(await orchestrator.getResult('m1')).toEqual([{ a: 0, a_mean: 2 }]);

    const record = await backend.get((await orchestrator.getStatus('m1')).taskId);
    expect(record?.workerId).toBe('w1');
  });

  it('records an operation error as a failure', async () => {
    await startWorker();
    await orchestrator.create('m1', 'demo');

    const taskId = await orchestrator.output('m1', [{ a: 1 }]);
    expect((await orchestrator.wait('m1', { pollMs: 5 })).state).toBe('failure');

    const failure = await orchestrator.getResult('m1').catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(WorkerFailure);
    expect(failure).toMatchObject({
      taskId,
      payload: { name: 'ValidationError', code: 'VALIDATION_ERROR', message: 'Model instance "m1" has not been trained' },
    });
  });

  it('runs update and delete tasks', async () => {
    await startWorker();
    await orchestrator.create('m1', 'demo');

    await orchestrator.update('m1', { title: 'Renamed' });
    await orchestrator.wait('m1', { pollMs: 5 });
    expect((await orchestrator.get('m1')).metadata.title).toBe('Renamed');

    await orchestrator.delete('m1');
    await orchestrator.wait('m1', { pollMs: 5 });
    expect(await orchestrator.getResult('m1')).toEqual({ deleted: 'm1' });
    expect(await orchestrator.manager.has('m1')).toBe(false);
  });

  it('trains from a table and writes predictions to another', async () => {
    await startWorker();
    await orchestrator.create('scores', 'linear', { settings: { x: 'hours', y: 'score' } });

    await orchestrator.inputDb('scores', 'readings');
    expect((await orchestrator.wait('scores', { pollMs: 5 })).state).toBe('success');

    await orchestrator.updateDb('scores', 'future', 'predictions');
    await orchestrator.wait('scores', { pollMs: 5 });

    expect(await orchestrator.getResult('scores')).toEqual({ table: 'predictions', rows: 1 });
    expect(await database.readTable('predictions')).toEqual([{ hours: 4, score_predicted: 79 }]);
  });

  it('fails table tasks when the worker has no database', async () => {
    await startWorker({ dbManager: undefined });
    await orchestrator.create('m1', 'demo');

    await orchestrator.inputDb('m1', 'readings');
    await orchestrator.wait('m1', { pollMs: 5 });

    await expect(orchestrator.getResult('m1')).rejects.toMatchObject({
      payload: { code: 'CONFIGURATION_ERROR', message: 'Worker w1 has no database configured' },
    });
  });

  it('cancels a running task on revoke and leaves the model untrained', async () => {
    const running = await startWorker();
    await orchestrator.create('slow', 'gated');
    const started = startedOrder(running);

    await orchestrator.input('slow', [{ a: 1 }]);
    await waitUntil(() => started.length === 1);

    expect((await orchestrator.cancel('slow')).state).toBe('processing');
    expect((await orchestrator.wait('slow', { pollMs: 5 })).state).toBe('cancelled');
    expect((await orchestrator.get('slow')).trained).toBe(false);
  });

  it('notices a revoke flag through the heartbeat alone', async () => {
    const running = await startWorker();
    await orchestrator.create('slow', 'gated');
    const started = startedOrder(running);

    const taskId = await orchestrator.input('slow', [{ a: 1 }]);
    await waitUntil(() => started.length === 1);
    await backend.compareAndSet(taskId, ['processing'], { revokeRequested: true });

    expect((await orchestrator.wait('slow', { pollMs: 5 })).state).toBe('cancelled');
  });

  it('skips a task cancelled before it was claimed', async () => {
    await orchestrator.create('m1', 'demo');
    const taskId = await orchestrator.input('m1', [{ a: 1 }]);
    await orchestrator.cancel('m1');

    const running = await startWorker();
    const started = startedOrder(running);
    await waitUntil(() => broker.pendingTasks().length === 0);
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(started).toEqual([]);
    expect((await backend.get(taskId))?.state).toBe('cancelled');
  });

  it('starts queued tasks by priority', async () => {
    const running = await startWorker({ concurrency: 1 });
    const started = startedOrder(running);
    for (const name of ['first', 'low', 'high']) {
      await orchestrator.create(name, name === 'first' ? 'gated' : 'demo');
    }

    const first = await orchestrator.input('first', [{ a: 1 }]);
    await waitUntil(() => started.length === 1);
    const low = await orchestrator.input('low', [{ a: 1 }], { priority: 'low' });
    const high = await orchestrator.input('high', [{ a: 1 }], { priority: 'high' });
    await waitUntil(() => running.getQueueStats().currentDepth === 2);

    gate.release();
    await orchestrator.wait('low', { pollMs: 5 });

    expect(started).toEqual([first, high, low]);
  });

  it('fails tasks that arrive while the local queue is full', async () => {
    const running = await startWorker({ concurrency: 1, maxQueueDepth: 1 });
    const started = startedOrder(running);
    for (const name of ['first', 'second', 'third']) {
      await orchestrator.create(name, name === 'first' ? 'gated' : 'demo');
    }

    await orchestrator.input('first', [{ a: 1 }]);
    await waitUntil(() => started.length === 1);
    await orchestrator.input('second', [{ a: 1 }]);
    await waitUntil(() => running.getQueueStats().currentDepth === 1);
    await orchestrator.input('third', [{ a: 1 }]);

    expect((await orchestrator.wait('third', { pollMs: 5 })).state).toBe('failure');
    await expect(orchestrator.getResult('third')).rejects.toMatchObject({
      payload: { code: 'BROKER_ERROR', message: 'Worker w1 queue is full' },
    });
  });

  it('fails queued tasks and aborts running ones when the drain times out', async () => {
    const running = await startWorker({ concurrency: 1, drainTimeoutMs: 30 });
    const started = startedOrder(running);
    await orchestrator.create('first', 'gated');
    await orchestrator.create('second', 'demo');

    await orchestrator.input('first', [{ a: 1 }]);
    await waitUntil(() => started.length === 1);
    await orchestrator.input('second', [{ a: 1 }]);
    await waitUntil(() => running.getQueueStats().currentDepth === 1);

    await running.stop();

    expect(running.getState()).toBe(WorkerState.STOPPED);
    expect(running.runningTasks()).toEqual([]);
    expect((await orchestrator.getStatus('first')).state).toBe('cancelled');
    await expect(orchestrator.getResult('second')).rejects.toMatchObject({
      payload: { message: 'Worker stopped before the task started' },
    });
  });

  it('lets running tasks finish within the drain timeout', async () => {
    const running = await startWorker({ drainTimeoutMs: 1000 });
    const started = startedOrder(running);
    await orchestrator.create('first', 'gated');

    await orchestrator.input('first', [{ a: 1 }]);
    await waitUntil(() => started.length === 1);
    setTimeout(() => gate.release(), 10);
    await running.stop();

    expect((await orchestrator.getStatus('first')).state).toBe('success');
  });

  describe('lifecycle', () => {
    it('moves through connecting and ready, and refuses a second start', async () => {
      const states: WorkerState[] = [];
      const manager = new ModelsManager({ models: registry, folder });
      worker = new ModelsWorker({ manager, broker, backend });
      worker.on('stateChange', (state) => {
        states.push(state);
      });

      await worker.start();

      expect(states).toEqual([WorkerState.CONNECTING, WorkerState.READY]);
      await expect(worker.start()).rejects.toBeInstanceOf(ConflictError);
      expect(worker.getWorkerId()).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('stops on a failed connect and can be started again', async () => {
      vi.spyOn(backend, 'connect').mockRejectedValueOnce(new Error('refused'));
      const manager = new ModelsManager({ models: registry, folder });
      worker = new ModelsWorker({ manager, broker, backend });

      await expect(worker.start()).rejects.toThrow(new BrokerError('Failed to start worker: refused'));
      expect(worker.getState()).toBe(WorkerState.STOPPED);

      await worker.start();
      expect(worker.getState()).toBe(WorkerState.READY);
    });

    it('ignores stop when not running', async () => {
      const manager = new ModelsManager({ models: registry, folder });
      const idle = new ModelsWorker({ manager, broker, backend });

      await idle.stop();

      expect(idle.getState()).toBe(WorkerState.IDLE);
    });
  });
});
