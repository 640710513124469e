/**
 * Filesystem helpers for model artifacts
 *
 * Artifacts are replaced by writing a temp file next to the target and
 * renaming it over, so a reader sees either the old or the new file.
 */

import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { randomUUID } from 'node:crypto';
import { AlreadyExistsError, StorageError, hasErrorCode, toError } from './errors.js';

export interface WriteAtomicOptions {
  /** Fail with AlreadyExistsError instead of replacing an existing file */
  exclusive?: boolean;
}

function tempPathFor(path: string): string {
  return `${path}.${randomUUID().slice(0, 8)}.tmp`;
}

export async function writeFileAtomic(
  path: string,
  data: string | Uint8Array,
  options: WriteAtomicOptions = {}
): Promise<void> {
  const tempPath = tempPathFor(path);
  try {
    await fs.writeFile(tempPath, data);
    if (options.exclusive) {
      // link() refuses to replace an existing path
      await fs.link(tempPath, path);
    } else {
      await fs.rename(tempPath, path);
    }
  } catch (error) {
    if (options.exclusive && hasErrorCode(error, 'EEXIST')) {
      throw new AlreadyExistsError(`File already exists: ${path}`);
    }
    throw new StorageError(`Failed to write ${path}: ${toError(error).message}`, path, toError(error));
  } finally {
    await fs.rm(tempPath, { force: true });
  }
}

/**
 * stat() that maps a missing file to null and everything else to StorageError
 */
export async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await fs.stat(path);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw new StorageError(`Failed to stat ${path}: ${toError(error).message}`, path, toError(error));
  }
}

export async function readFileOrNull(path: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(path);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw new StorageError(`Failed to read ${path}: ${toError(error).message}`, path, toError(error));
  }
}

/**
 * Remove a file; returns false if it did not exist
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await fs.unlink(path);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return false;
    }
    throw new StorageError(`Failed to remove ${path}: ${toError(error).message}`, path, toError(error));
  }
}

export async function ensureDirectory(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
  } catch (error) {
    throw new StorageError(`Failed to create folder ${path}: ${toError(error).message}`, path, toError(error));
  }
}

export async function listFiles(path: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(path, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return [];
    }
    throw new StorageError(`Failed to list ${path}: ${toError(error).message}`, path, toError(error));
  }
}
