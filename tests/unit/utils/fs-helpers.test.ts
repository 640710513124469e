import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ensureDirectory,
  listFiles,
  readFileOrNull,
  removeFile,
  statOrNull,
  writeFileAtomic,
} from '../../../src/utils/fs-helpers.js';
import { AlreadyExistsError } from '../../../src/utils/errors.js';
import { createTempFolder, removeTempFolder } from '../../helpers/temp-folder.js';

describe('fs-helpers', () => {
  let folder: string;

  beforeEach(async () => {
    folder = await createTempFolder();
  });

  afterEach(async () => {
    await removeTempFolder(folder);
  });

  it('replaces files atomically and leaves no temp file behind', async () => {
    const path = join(folder, 'a.model');
    await writeFileAtomic(path, 'one');
    await writeFileAtomic(path, 'two');

    expect(await readFile(path, 'utf8')).toBe('two');
    expect(await readdir(folder)).toEqual(['a.model']);
  });

  it('refuses to replace a file in exclusive mode', async () => {
    const path = join(folder, 'a.model');
    await writeFile(path, 'original');

    await expect(writeFileAtomic(path, 'new', { exclusive: true })).rejects.toBeInstanceOf(AlreadyExistsError);
    expect(await readFile(path, 'utf8')).toBe('original');
    expect(await readdir(folder)).toEqual(['a.model']);
  });

  it('maps missing files to null or false', async () => {
    const path = join(folder, 'missing');

    expect(await statOrNull(path)).toBeNull();
    expect(await readFileOrNull(path)).toBeNull();
    expect(await removeFile(path)).toBe(false);
    expect(await listFiles(path)).toEqual([]);
  });

  it('lists only files', async () => {
    await ensureDirectory(join(folder, 'sub'));
    await writeFile(join(folder, 'b.txt'), '');

    expect(await listFiles(folder)).toEqual(['b.txt']);
    expect(await removeFile(join(folder, 'b.txt'))).toBe(true);
  });
});
