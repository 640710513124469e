/**
 * Models Manager
 *
 * Instance cache for file-persisted models. Each named model is one artifact
 * at `<folder>/<name>.<suffix>` plus a metadata sidecar. Artifacts are
 * deserialized lazily and re-read whenever the artifact's stat (mtime,
 * inode, size) differs from the one seen at load, which lets several
 * processes (the orchestrator and any number of workers) share one folder
 * without locking.
 */

import { join } from 'node:path';
import type { Logger } from 'pino';
import type {
  ArtifactEnvelope,
  CreateModelOptions,
  LoadedModel,
  MetadataUpdate,
  ModelMetadata,
  ModelOptions,
  ModelSnapshot,
  ModelType,
  OperationOptions,
  Row,
} from '../types/models.js';
import { ArtifactEnvelopeSchema, ModelMetadataSchema, ModelNameSchema, RowsSchema } from '../types/schemas/model.js';
import { ModelInstance } from './model-instance.js';
import { ModelsHandler } from './models-handler.js';
import type { ModelRegistry } from './model-registry.js';
import { NotFoundError, StorageError, ValidationError, isModelsError, toError } from '../utils/errors.js';
import { throwIfCancelled } from '../utils/cancellation.js';
import {
  ensureDirectory,
  listFiles,
  readFileOrNull,
  removeFile,
  statOrNull,
  writeFileAtomic,
} from '../utils/fs-helpers.js';
import { createLogger } from '../utils/logger.js';
import { lazyLog } from '../utils/logger-helpers.js';

export const DEFAULT_MODELS_FOLDER = './models';
export const DEFAULT_SUFFIX = 'model';
export const DEFAULT_METADATA_SUFFIX = '.meta.json';

export interface ModelsManagerOptions {
  /** Model types that instances may be created from */
  models: ModelRegistry;
  folder?: string;
  /** Artifact file extension, without the dot */
  suffix?: string;
  metadataSuffix?: string;
  handler?: ModelsHandler;
  logger?: Logger;
}

export interface LoadOptions {
  force?: boolean;
}

export interface InputResult {
  trainedAt: string;
}

export class ModelsManager {
  readonly folder: string;
  readonly suffix: string;
  readonly metadataSuffix: string;
  readonly models: ModelRegistry;
  readonly handler: ModelsHandler;

  private readonly instances = new Map<string, ModelInstance>();
  private readonly logger: Logger;
  private folderReady?: Promise<void>;

  constructor(options: ModelsManagerOptions) {
    this.models = options.models;
    this.folder = options.folder ?? DEFAULT_MODELS_FOLDER;
    this.suffix = options.suffix ?? DEFAULT_SUFFIX;
    this.metadataSuffix = options.metadataSuffix ?? DEFAULT_METADATA_SUFFIX;
    this.handler = options.handler ?? new ModelsHandler();
    this.logger = options.logger ?? createLogger('ModelsManager');
  }

  /**
   * Create the models folder if needed. Called implicitly by `create`.
   */
  initialize(): Promise<void> {
    this.folderReady ??= ensureDirectory(this.folder).catch((error: unknown) => {
      this.folderReady = undefined;
      throw error;
    });
    return this.folderReady;
  }

  getFile(name: string): string {
    return join(this.folder, `${name}.${this.suffix}`);
  }

  getMetadataFile(name: string): string {
    return join(this.folder, `${name}${this.metadataSuffix}`);
  }

  /**
   * Write an untrained artifact for `name`. The instance itself stays
   * unloaded until first use.
   *
   * @throws {AlreadyExistsError} if the model exists and `overwrite` is not set
   * @throws {ValidationError} for a bad name or unknown model type
   */
  async create(name: string, modelType: string, options: CreateModelOptions = {}): Promise<ModelSnapshot> {
    this.handler.handleName(name, this.suffix);
    const overwrite = options.overwrite ?? false;
    const exists = (await statOrNull(this.getFile(name))) !== null;
    this.models.get(modelType);
    this.handler.handleCreate(name, exists, overwrite);
    const userMetadata = this.handler.handleMetadata(options.metadata ?? {});

    await this.initialize();

    const envelope: ArtifactEnvelope = { format: 1, modelType, trained: false, state: null };
    await writeFileAtomic(this.getFile(name), JSON.stringify(envelope), { exclusive: !overwrite });

    const now = new Date().toISOString();
    const metadata: ModelMetadata = {
      ...userMetadata,
      name,
      modelType,
      settings: options.settings ?? {},
      createdAt: now,
      updatedAt: now,
      trainedAt: null,
    };
    await this.writeMetadata(metadata);

    this.instances.set(name, new ModelInstance(name, this.getFile(name)));
    this.logger.info({ name, modelType, overwrite }, 'Model instance created');

    return this.snapshot(name);
  }

  /**
   * Return the in-memory model for `name`, deserializing it if it has never
   * been loaded, if the artifact changed on disk since, or if `force` is set.
   *
   * @throws {NotFoundError} if no artifact exists
   */
  async load(name: string, options: LoadOptions = {}): Promise<LoadedModel> {
    this.handler.handleName(name, this.suffix);
    const entry = this.entry(name);

    const stats = await statOrNull(entry.file);
    if (!stats) {
      this.instances.delete(name);
      throw new NotFoundError(`Model instance "${name}" not found`);
    }

    const cached = entry.instance;
    if (cached && !options.force && !entry.isStale(stats)) {
      lazyLog(this.logger, 'trace', () => ({ name, mtimeMs: stats.mtimeMs, ino: stats.ino }), 'Model instance is fresh');
      return cached;
    }

    const loaded = await this.readArtifact(name, entry.file);
    entry.markLoaded(loaded, stats);
    this.logger.debug(
      { name, force: options.force ?? false, reload: cached !== null },
      'Model instance loaded'
    );
    return loaded;
  }

  /**
   * Train `name` on `rows` and persist the new state.
   *
   * Cancellation is checked after load, after training, and right before the
   * artifact is replaced; once the replace starts it runs to completion.
   */
  async input(name: string, rows: unknown, operation: OperationOptions = {}): Promise<InputResult> {
    const { signal } = operation;
    const loaded = await this.load(name);
    throwIfCancelled(signal, 'training');

    const type = this.models.get(loaded.modelType);
    const data = this.handler.handleRows(rows, type);
    const metadata = await this.readMetadata(name);
    const options = this.mergeOptions(metadata, operation.options);

    const state = await type.train(data, options, signal);
    throwIfCancelled(signal, 'serializing');

    const envelope: ArtifactEnvelope = {
      format: 1,
      modelType: loaded.modelType,
      trained: true,
      state: Buffer.from(type.serialize(state)).toString('base64'),
    };
    throwIfCancelled(signal, 'saving');

    const entry = this.entry(name);
    await writeFileAtomic(entry.file, JSON.stringify(envelope));
    const stats = await statOrNull(entry.file);
    if (stats) {
      entry.markLoaded({ modelType: loaded.modelType, trained: true, state }, stats);
    } else {
      entry.invalidate();
    }

    const trainedAt = new Date().toISOString();
    await this.writeMetadata({ ...metadata, trainedAt, updatedAt: trainedAt });

    this.logger.info({ name, modelType: loaded.modelType, rows: data.length }, 'Model instance trained');
    return { trainedAt };
  }

  /**
   * Predict with `name`. Never writes to the artifact.
   */
  async output(name: string, rows: unknown, operation: OperationOptions = {}): Promise<Row[]> {
    const { signal } = operation;
    const loaded = await this.load(name);
    this.handler.handleTrained(name, loaded.trained);
    throwIfCancelled(signal, 'prediction');

    const type = this.models.get(loaded.modelType);
    const data = this.handler.handleRows(rows, type);
    const metadata = await this.readMetadata(name);
    const options = this.mergeOptions(metadata, operation.options);

    const result = await type.predict(loaded.state, data, options, signal);
    const parsed = RowsSchema.safeParse(result);
    if (!parsed.success) {
      throw new ValidationError(`Model type "${type.name}" returned a prediction that is not a list of rows`);
    }

    this.logger.debug({ name, rows: data.length }, 'Model instance output');
    return parsed.data;
  }

  /**
   * Merge user metadata into the sidecar without touching the artifact
   */
  async update(name: string, metadata: MetadataUpdate): Promise<ModelMetadata> {
    this.handler.handleName(name, this.suffix);
    await this.requireArtifact(name);
    const changes = this.handler.handleMetadata(metadata);

    const current = await this.readMetadata(name);
    const updated: ModelMetadata = { ...current, ...changes, updatedAt: new Date().toISOString() };
    await this.writeMetadata(updated);

    this.logger.info({ name, fields: Object.keys(changes) }, 'Model metadata updated');
    return updated;
  }

  /**
   * Remove the artifact and sidecar and evict the entry. Not idempotent.
   *
   * @throws {NotFoundError} if the model does not exist
   */
  async delete(name: string): Promise<void> {
    this.handler.handleName(name, this.suffix);
    const removed = await removeFile(this.getFile(name));
    this.instances.delete(name);
    if (!removed) {
      throw new NotFoundError(`Model instance "${name}" not found`);
    }
    await removeFile(this.getMetadataFile(name));

    this.logger.info({ name }, 'Model instance deleted');
  }

  /**
   * Cache/metadata snapshot for `name`, without forcing a load
   */
  async get(name: string): Promise<ModelSnapshot> {
    this.handler.handleName(name, this.suffix);
    return this.snapshot(name);
  }

  async has(name: string): Promise<boolean> {
    if (!ModelNameSchema.safeParse(name).success) {
      return false;
    }
    return (await statOrNull(this.getFile(name))) !== null;
  }

  /**
   * Snapshots of every artifact in the folder. Nothing is deserialized.
   */
  async list(): Promise<ModelSnapshot[]> {
    const extension = `.${this.suffix}`;
    const names = (await listFiles(this.folder))
      .filter((file) => file.endsWith(extension))
      .map((file) => file.slice(0, -extension.length))
      .filter((name) => ModelNameSchema.safeParse(name).success)
      .sort();

    const snapshots: ModelSnapshot[] = [];
    for (const name of names) {
      try {
        snapshots.push(await this.snapshot(name));
      } catch (error) {
        // Deleted between readdir and stat
        if (error instanceof NotFoundError) continue;
        throw error;
      }
    }
    return snapshots;
  }

  /**
   * Drop the in-memory entry; the artifact is left alone
   */
  evict(name: string): boolean {
    return this.instances.delete(name);
  }

  /**
   * Names currently held in memory
   */
  cachedNames(): string[] {
    return [...this.instances.keys()];
  }

  private entry(name: string): ModelInstance {
    let entry = this.instances.get(name);
    if (!entry) {
      entry = new ModelInstance(name, this.getFile(name));
      this.instances.set(name, entry);
    }
    return entry;
  }

  private async requireArtifact(name: string): Promise<void> {
    const exists = (await statOrNull(this.getFile(name))) !== null;
    if (!exists) {
      this.instances.delete(name);
    }
    this.handler.handleRead(name, exists);
  }

  private async snapshot(name: string): Promise<ModelSnapshot> {
    const file = this.getFile(name);
    const stats = await statOrNull(file);
    if (!stats) {
      this.instances.delete(name);
      throw new NotFoundError(`Model instance "${name}" not found`);
    }

    const metadata = await this.readMetadata(name);
    const entry = this.instances.get(name);
    const loaded = entry !== undefined && entry.instance !== null && !entry.isStale(stats);

    return {
      name,
      modelType: metadata.modelType,
      file,
      loaded,
      lastLoaded: entry?.lastLoaded ?? null,
      trained: metadata.trainedAt !== null,
      metadata,
    };
  }

  private async readArtifact(name: string, file: string): Promise<LoadedModel> {
    const envelope = await this.readEnvelope(name, file);
    const type: ModelType = this.models.get(envelope.modelType);

    if (envelope.state === null) {
      return { modelType: envelope.modelType, trained: false, state: null };
    }

    try {
      const state = type.deserialize(Buffer.from(envelope.state, 'base64'));
      return { modelType: envelope.modelType, trained: envelope.trained, state };
    } catch (error) {
      if (isModelsError(error)) throw error;
      throw new StorageError(
        `Failed to deserialize model instance "${name}": ${toError(error).message}`,
        file,
        toError(error)
      );
    }
  }

  private async readEnvelope(name: string, file: string): Promise<ArtifactEnvelope> {
    const raw = await readFileOrNull(file);
    if (raw === null) {
      this.instances.delete(name);
      throw new NotFoundError(`Model instance "${name}" not found`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw.toString('utf8'));
    } catch (error) {
      throw new StorageError(`Model artifact "${file}" is not valid JSON`, file, toError(error));
    }

    const parsed = ArtifactEnvelopeSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`Model artifact "${file}" has an unrecognised format`, file);
    }
    return parsed.data;
  }

  /**
   * Read the sidecar, rebuilding it from the artifact header when it is
   * missing (e.g. an artifact copied in by hand).
   */
  private async readMetadata(name: string): Promise<ModelMetadata> {
    const path = this.getMetadataFile(name);
    const raw = await readFileOrNull(path);

    if (raw === null) {
      const envelope = await this.readEnvelope(name, this.getFile(name));
      const stats = await statOrNull(this.getFile(name));
      const timestamp = (stats?.mtime ?? new Date()).toISOString();
      return {
        name,
        modelType: envelope.modelType,
        settings: {},
        createdAt: timestamp,
        updatedAt: timestamp,
        trainedAt: envelope.trained ? timestamp : null,
      };
    }

    let json: unknown;
    try {
      json = JSON.parse(raw.toString('utf8'));
    } catch (error) {
      throw new StorageError(`Model metadata "${path}" is not valid JSON`, path, toError(error));
    }

    const parsed = ModelMetadataSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`Model metadata "${path}" has an unrecognised format`, path);
    }
    return parsed.data;
  }

  private async writeMetadata(metadata: ModelMetadata): Promise<void> {
    await writeFileAtomic(this.getMetadataFile(metadata.name), JSON.stringify(metadata, null, 2));
  }

  private mergeOptions(metadata: ModelMetadata, options: ModelOptions | undefined): ModelOptions {
    return { ...metadata.settings, ...(options ?? {}) };
  }
}
