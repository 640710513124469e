import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm, stat, utimes, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ModelsManager } from '../../../src/core/models-manager.js';
import { ModelsHandler } from '../../../src/core/models-handler.js';
import { ModelRegistry } from '../../../src/core/model-registry.js';
import { createDefaultRegistry, demoModel, linearModel } from '../../../src/models/index.js';
import {
  AlreadyExistsError,
  CancelledError,
  NotFoundError,
  StorageError,
  ValidationError,
} from '../../../src/utils/errors.js';
import { createTempFolder, removeTempFolder } from '../../helpers/temp-folder.js';
import { createCountingModel } from '../../helpers/counting-model.js';

describe('ModelsManager', () => {
  let folder: string;
  let manager: ModelsManager;

  beforeEach(async () => {
    folder = await createTempFolder();
    manager = new ModelsManager({ models: createDefaultRegistry(), folder });
  });

  afterEach(async () => {
    await removeTempFolder(folder);
  });

  describe('create', () => {
    it('writes an untrained artifact and sidecar without loading it', async () => {
      const snapshot = await manager.create('m1', 'demo', { metadata: { title: 'First' } });

      expect(snapshot).toMatchObject({
        name: 'm1',
        modelType: 'demo',
        file: join(folder, 'm1.model'),
        loaded: false,
        lastLoaded: null,
        trained: false,
      });
      expect(snapshot.metadata.title).toBe('First');

      const envelope: unknown = JSON.parse(await readFile(join(folder, 'm1.model'), 'utf8'));
      expect(envelope).toEqual({ format: 1, modelType: 'demo', trained: false, state: null });
      expect(await manager.has('m1')).toBe(true);
    });

    it('refuses to replace an existing model unless overwrite is set', async () => {
      await manager.create('m1', 'demo');

      await expect(manager.create('m1', 'demo')).rejects.toBeInstanceOf(AlreadyExistsError);
    });

    it('resets the trained state on overwrite', async () => {
      await manager.create('m1', 'demo');
      await manager.input('m1', [{ a: 1 }]);

      const snapshot = await manager.create('m1', 'demo', { overwrite: true });

      expect(snapshot.trained).toBe(false);
      await expect(manager.output('m1', [{ a: 1 }])).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects unsafe names and unknown model types', async () => {
      await expect(manager.create('../evil', 'demo')).rejects.toBeInstanceOf(ValidationError);
      await expect(manager.create('m.model', 'demo')).rejects.toBeInstanceOf(ValidationError);
      await expect(manager.create('m1', 'nope')).rejects.toBeInstanceOf(ValidationError);
      expect(await manager.has('m1')).toBe(false);
    });
  });

  describe('load', () => {
    it('deserializes once and serves the cached instance while the artifact is unchanged', async () => {
      const { type, deserialize } = createCountingModel();
      const writer = new ModelsManager({ models: new ModelRegistry([type]), folder });
      await writer.create('m1', 'counting');
      await writer.input('m1', [{ a: 2 }]);

      const reader = new ModelsManager({ models: new ModelRegistry([type]), folder });
      const first = await reader.load('m1');
      const second = await reader.load('m1');

      expect(second).toBe(first);
      expect(deserialize).toHaveBeenCalledTimes(1);
      expect(first.state).toEqual({ means: { a: 2 }, count: 1 });
    });

    it('reloads once the artifact is modified after the last load', async () => {
      const { type, deserialize } = createCountingModel();
      const writer = new ModelsManager({ models: new ModelRegistry([type]), folder });
      await writer.create('m1', 'counting');
      await writer.input('m1', [{ a: 2 }]);

      const reader = new ModelsManager({ models: new ModelRegistry([type]), folder });
      await reader.load('m1');

      const future = new Date(Date.now() + 60_000);
      await utimes(join(folder, 'm1.model'), future, future);
      await reader.load('m1');

      expect(deserialize).toHaveBeenCalledTimes(2);
      const snapshot = await reader.get('m1');
      const { mtimeMs } = await stat(join(folder, 'm1.model'));
      expect(snapshot.loaded).toBe(true);
      expect(snapshot.lastLoaded?.getTime()).toBeGreaterThanOrEqual(Math.floor(mtimeMs));
    });

    it('picks up training done by another manager on the same folder', async () => {
      const other = new ModelsManager({ models: createDefaultRegistry(), folder });
      await manager.create('m1', 'demo');
      await manager.load('m1');

      await other.input('m1', [{ a: 4 }, { a: 6 }]);

      expect(await manager.output('m1', [{ a: 0 }])).toEqual([{ a: 0, a_mean: 5 }]);
    });

    it('sees every rewrite made right after a load, within the same clock tick', async () => {
      const writer = new ModelsManager({ models: createDefaultRegistry(), folder });
      await manager.create('m1', 'demo');
      await writer.input('m1', [{ a: 0 }]);

      const missed: number[] = [];
      for (let round = 1; round <= 100; round++) {
        await manager.load('m1');
        await writer.input('m1', [{ a: round }]);
        const [row] = await manager.output('m1', [{ a: 0 }]);
        if (row?.a_mean !== round) {
          missed.push(round);
        }
      }

      expect(missed).toEqual([]);
    });

    it('reloads on force', async () => {
      const { type, deserialize } = createCountingModel();
      const reader = new ModelsManager({ models: new ModelRegistry([type]), folder });
      await reader.create('m1', 'counting');
      await reader.input('m1', [{ a: 1 }]);

      await reader.load('m1', { force: true });

      expect(deserialize).toHaveBeenCalledTimes(1);
    });

    it('raises NotFoundError for a model that was never created', async () => {
      await expect(manager.load('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('raises StorageError for a corrupt artifact', async () => {
      await manager.create('m1', 'demo');
      await writeFile(join(folder, 'm1.model'), 'not json');

      await expect(manager.load('m1')).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('input and output', () => {
    it('trains, reports, predicts and deletes', async () => {
      await manager.create('m1', 'demo');

      const { trainedAt } = await manager.input('m1', [{ a: 1 }]);
      expect(Number.isNaN(Date.parse(trainedAt))).toBe(false);

      const snapshot = await manager.get('m1');
      expect(snapshot.trained).toBe(true);
      expect(snapshot.loaded).toBe(true);
      expect(snapshot.metadata.trainedAt).toBe(trainedAt);

      expect(await manager.output('m1', [{ a: 1 }])).toEqual([{ a: 1, a_mean: 1 }]);

      await manager.delete('m1');
      await expect(manager.get('m1')).rejects.toBeInstanceOf(NotFoundError);
      expect(manager.cachedNames()).toEqual([]);
    });

    it('refuses to predict with an untrained model', async () => {
      await manager.create('m1', 'demo');

      await expect(manager.output('m1', [{ a: 1 }])).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects rows that are not objects', async () => {
      await manager.create('m1', 'demo');

      await expect(manager.input('m1', [1, 2])).rejects.toBeInstanceOf(ValidationError);
      await expect(manager.input('m1', 'rows')).rejects.toBeInstanceOf(ValidationError);
    });

    it('merges create-time settings under per-call options', async () => {
      await manager.create('line', 'linear', { settings: { x: 'hours', y: 'score' } });
      await manager.input('line', [
        { hours: 1, score: 52 },
        { hours: 2, score: 61 },
        { hours: 3, score: 70 },
      ]);

      expect(await manager.output('line', [{ hours: 4 }])).toEqual([{ hours: 4, score_predicted: 79 }]);

      await manager.input('line', [
        { hours: 0, score: 1, bonus: 10 },
        { hours: 1, score: 2, bonus: 20 },
      ], { options: { y: 'bonus' } });
      expect(await manager.output('line', [{ hours: 2 }])).toEqual([{ hours: 2, bonus_predicted: 30 }]);
    });

    it('leaves the model untrained when cancelled before training', async () => {
      await manager.create('m1', 'demo');
      const controller = new AbortController();
      controller.abort();

      await expect(manager.input('m1', [{ a: 1 }], { signal: controller.signal })).rejects.toBeInstanceOf(
        CancelledError
      );
      expect((await manager.get('m1')).trained).toBe(false);
    });

    it('produces identical predictions after a round trip through the artifact', async () => {
      await manager.create('line', 'linear', { settings: { x: 'x', y: 'y' } });
      await manager.input('line', [
        { x: 0, y: 1 },
        { x: 2, y: 5 },
      ]);
      const before = await manager.output('line', [{ x: 10 }]);

      const fresh = new ModelsManager({ models: createDefaultRegistry(), folder });
      expect(await fresh.output('line', [{ x: 10 }])).toEqual(before);
      expect(before).toEqual([{ x: 10, y_predicted: 21 }]);
    });
  });

  describe('update', () => {
    it('merges metadata without touching the artifact', async () => {
      await manager.create('m1', 'demo', { metadata: { title: 'Old', tags: ['a'] } });
      const before = await stat(join(folder, 'm1.model'));

      const updated = await manager.update('m1', { title: 'New' });

      expect(updated.title).toBe('New');
      expect(updated.tags).toEqual(['a']);
      const after = await stat(join(folder, 'm1.model'));
      expect(after.mtimeMs).toBe(before.mtimeMs);
      expect((await manager.get('m1')).metadata.title).toBe('New');
    });

    it('raises NotFoundError for a missing model', async () => {
      await expect(manager.update('missing', { title: 'x' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('delete', () => {
    it('is not idempotent', async () => {
      await manager.create('m1', 'demo');
      await manager.delete('m1');

      await expect(manager.delete('m1')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('list and evict', () => {
    it('lists artifacts sorted by name without loading them', async () => {
      await manager.create('b', 'demo');
      await manager.create('a', 'linear', { settings: { x: 'x', y: 'y' } });
      await writeFile(join(folder, 'notes.txt'), 'ignored');

      const snapshots = await manager.list();

      expect(snapshots.map((snapshot) => [snapshot.name, snapshot.modelType, snapshot.loaded])).toEqual([
        ['a', 'linear', false],
        ['b', 'demo', false],
      ]);
    });

    it('returns an empty list when the folder does not exist yet', async () => {
      const empty = new ModelsManager({ models: createDefaultRegistry(), folder: join(folder, 'nested') });

      expect(await empty.list()).toEqual([]);
    });

    it('drops the in-memory entry but keeps the artifact', async () => {
      await manager.create('m1', 'demo');
      await manager.input('m1', [{ a: 1 }]);

      expect(manager.evict('m1')).toBe(true);
      expect(manager.evict('m1')).toBe(false);
      expect((await manager.get('m1')).loaded).toBe(false);
      expect(await manager.output('m1', [{ a: 3 }])).toEqual([{ a: 3, a_mean: 1 }]);
    });
  });

  describe('metadata sidecar', () => {
    it('is rebuilt from the artifact header when missing', async () => {
      await manager.create('m1', 'demo');
      await manager.input('m1', [{ a: 1 }]);
      await rm(join(folder, 'm1.meta.json'));

      const snapshot = await manager.get('m1');

      expect(snapshot.modelType).toBe('demo');
      expect(snapshot.trained).toBe(true);
      expect(snapshot.metadata.settings).toEqual({});
    });
  });

  describe('disabled handler', () => {
    it('still validates names', async () => {
      const lenient = new ModelsManager({
        models: new ModelRegistry([demoModel, linearModel]),
        folder,
        handler: new ModelsHandler({ enable: false }),
      });

      await expect(lenient.create('../evil', 'demo')).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
