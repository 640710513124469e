/**
 * Model-level schemas: names, data rows and sidecar metadata.
 *
 * @module schemas/model
 */

import { z } from 'zod';

/**
 * Instance names double as file names, so they are restricted to a safe set
 * of characters and may not start with a dot.
 */
export const ModelNameSchema = z
  .string()
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/,
    'Model name must be 1-128 characters of letters, digits, "_", "." or "-", starting with a letter or digit'
  );

export const RowSchema = z.record(z.string(), z.unknown());

export const RowsSchema = z.array(RowSchema);

export const ModelOptionsSchema = z.record(z.string(), z.unknown());

/**
 * User-editable metadata fields. Everything else in the sidecar is managed.
 */
export const MetadataUpdateSchema = z
  .object({
    title: z.string().max(256).optional(),
    description: z.string().max(4096).optional(),
    tags: z.array(z.string().max(64)).max(64).optional(),
    source: z.string().max(1024).optional(),
  })
  .strict();

export const ModelMetadataSchema = MetadataUpdateSchema.extend({
  name: ModelNameSchema,
  modelType: z.string(),
  settings: ModelOptionsSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  trainedAt: z.string().nullable(),
});

/**
 * On-disk artifact envelope
 */
export const ArtifactEnvelopeSchema = z.object({
  format: z.literal(1),
  modelType: z.string(),
  trained: z.boolean(),
  state: z.string().nullable(),
});
