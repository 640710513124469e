/**
 * Model type contract and the shapes the instance cache hands out.
 */

import type { z } from 'zod';
import type {
  ArtifactEnvelopeSchema,
  MetadataUpdateSchema,
  ModelMetadataSchema,
  ModelOptionsSchema,
  RowSchema,
} from './schemas/model.js';

export type Row = z.infer<typeof RowSchema>;
export type ModelOptions = z.infer<typeof ModelOptionsSchema>;
export type MetadataUpdate = z.infer<typeof MetadataUpdateSchema>;
export type ModelMetadata = z.infer<typeof ModelMetadataSchema>;
export type ArtifactEnvelope = z.infer<typeof ArtifactEnvelopeSchema>;

/**
 * A pluggable model type. Implementations are registered once at startup in
 * a {@link ModelRegistry}; instances only ever hold their own state.
 *
 * `signal` is aborted when the task running the operation is cancelled.
 * Long-running implementations should check it between steps.
 */
export interface ModelType<TState = unknown> {
  readonly name: string;
  readonly description?: string;
  /** Validates each input row before train/predict see it */
  readonly dataSchema?: z.ZodType<Row, z.ZodTypeDef, unknown>;

  train(rows: Row[], options: ModelOptions, signal?: AbortSignal): Promise<TState> | TState;
  predict(state: TState, rows: Row[], options: ModelOptions, signal?: AbortSignal): Promise<Row[]> | Row[];
  serialize(state: TState): Uint8Array;
  deserialize(bytes: Uint8Array): TState;
}

/**
 * Deserialized artifact held by a cache entry
 */
export interface LoadedModel {
  modelType: string;
  trained: boolean;
  state: unknown;
}

/**
 * Cache/metadata view of one model, returned without forcing a load
 */
export interface ModelSnapshot {
  name: string;
  modelType: string;
  file: string;
  loaded: boolean;
  lastLoaded: Date | null;
  trained: boolean;
  metadata: ModelMetadata;
}

export interface CreateModelOptions {
  overwrite?: boolean;
  /** Default train/predict options, merged under per-call options */
  settings?: ModelOptions;
  metadata?: MetadataUpdate;
}

export interface OperationOptions {
  options?: ModelOptions;
  signal?: AbortSignal;
}

export interface ModelTypeInfo {
  name: string;
  description?: string;
}
