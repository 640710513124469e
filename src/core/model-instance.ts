/**
 * Model Instance
 *
 * One cache entry: the deserialized artifact for a named model plus the
 * stat stamp of the file it was read from. The entry is fresh only while
 * the artifact on disk still carries that stamp; `lastLoaded` is kept for
 * reporting.
 */

import type { Stats } from 'node:fs';
import type { LoadedModel } from '../types/models.js';

/** Fields of the artifact's stat that identify one written version */
export type ArtifactStamp = Pick<Stats, 'mtimeMs' | 'ino' | 'size'>;

function sameStamp(a: ArtifactStamp, b: ArtifactStamp): boolean {
  return a.mtimeMs === b.mtimeMs && a.ino === b.ino && a.size === b.size;
}

export class ModelInstance {
  private loaded: LoadedModel | null = null;
  private stamp: ArtifactStamp | null = null;
  private lastLoadedMs: number | null = null;

  constructor(
    readonly name: string,
    readonly file: string
  ) {}

  get instance(): LoadedModel | null {
    return this.loaded;
  }

  get lastLoaded(): Date | null {
    return this.lastLoadedMs === null ? null : new Date(this.lastLoadedMs);
  }

  /**
   * Whether the entry must be (re)deserialized given the artifact's current stat.
   * Atomic writes rename a new file into place, so a rewrite always changes `ino`.
   */
  isStale(current: ArtifactStamp): boolean {
    return this.loaded === null || this.stamp === null || !sameStamp(this.stamp, current);
  }

  /**
   * Record a successful load or write of the artifact version `stamp`.
   */
  markLoaded(model: LoadedModel, stamp: ArtifactStamp): void {
    this.loaded = model;
    this.stamp = { mtimeMs: stamp.mtimeMs, ino: stamp.ino, size: stamp.size };
    this.lastLoadedMs = Math.max(Date.now(), stamp.mtimeMs);
  }

  invalidate(): void {
    this.loaded = null;
    this.stamp = null;
    this.lastLoadedMs = null;
  }
}
