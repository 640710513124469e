import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ModelsManager } from '../../../src/core/models-manager.js';
import { ModelsDBManager } from '../../../src/core/models-db-manager.js';
import { InMemoryTableDatabase } from '../../../src/database/in-memory-table-database.js';
import { createDefaultRegistry } from '../../../src/models/index.js';
import { CancelledError, NotFoundError, ValidationError } from '../../../src/utils/errors.js';
import { createTempFolder, removeTempFolder } from '../../helpers/temp-folder.js';

describe('ModelsDBManager', () => {
  let folder: string;
  let database: InMemoryTableDatabase;
  let dbManager: ModelsDBManager;

  beforeEach(async () => {
    folder = await createTempFolder();
    database = new InMemoryTableDatabase({
      readings: [
        { hours: 1, score: 52 },
        { hours: 2, score: 61 },
        { hours: 3, score: 70 },
      ],
      future: [{ hours: 4 }, { hours: 5 }],
    });
    const manager = new ModelsManager({ models: createDefaultRegistry(), folder });
    dbManager = new ModelsDBManager({ manager, database });
    await manager.create('scores', 'linear', { settings: { x: 'hours', y: 'score' } });
  });

  afterEach(async () => {
    await removeTempFolder(folder);
  });

  it('trains from every row of a table', async () => {
    const result = await dbManager.inputDb('scores', 'readings');

    expect(result.table).toBe('readings');
    expect(result.rows).toBe(3);
    expect((await dbManager.manager.get('scores')).trained).toBe(true);
  });

  it('predicts from a table without writing', async () => {
    await dbManager.inputDb('scores', 'readings');
    const replaceTable = vi.spyOn(database, 'replaceTable');

    expect(await dbManager.outputDb('scores', 'future')).toEqual([
      { hours: 4, score_predicted: 79 },
      { hours: 5, score_predicted: 88 },
    ]);
    expect(replaceTable).not.toHaveBeenCalled();
  });

  it('replaces the output table with the predictions', async () => {
    await dbManager.inputDb('scores', 'readings');

    expect(await dbManager.updateDb('scores', 'future', 'predictions')).toEqual({ table: 'predictions', rows: 2 });
    expect(await database.readTable('predictions')).toEqual([
      { hours: 4, score_predicted: 79 },
      { hours: 5, score_predicted: 88 },
    ]);
  });

  it('validates the output table before predicting', async () => {
    await dbManager.inputDb('scores', 'readings');
    const readTable = vi.spyOn(database, 'readTable');

    await expect(dbManager.updateDb('scores', 'future', 'bad-name')).rejects.toBeInstanceOf(ValidationError);
    expect(readTable).not.toHaveBeenCalled();
  });

  it('raises NotFoundError for a missing input table', async () => {
    await expect(dbManager.inputDb('scores', 'missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('does not replace the table once cancelled', async () => {
    await dbManager.inputDb('scores', 'readings');
    const controller = new AbortController();
    controller.abort();

    await expect(
      dbManager.updateDb('scores', 'future', 'predictions', { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(await database.hasTable('predictions')).toBe(false);
  });
});
