/**
 * Models Handler
 *
 * Validation consulted before the instance cache touches disk. Kept separate
 * from the manager so callers can swap in stricter rules, or disable the
 * checks entirely when the caller has already validated.
 */

import { MetadataUpdateSchema, ModelNameSchema, RowsSchema } from '../types/schemas/model.js';
import type { MetadataUpdate, ModelType, Row } from '../types/models.js';
import { AlreadyExistsError, NotFoundError, ValidationError, fromZodError } from '../utils/errors.js';

export interface ModelsHandlerOptions {
  enable?: boolean;
}

export class ModelsHandler {
  readonly enable: boolean;

  constructor(options: ModelsHandlerOptions = {}) {
    this.enable = options.enable ?? true;
  }

  /**
   * Names become file names, so this check runs even when the handler is
   * disabled.
   */
  handleName(name: string, suffix: string): void {
    const result = ModelNameSchema.safeParse(name);
    if (!result.success) {
      throw fromZodError(result.error, `Invalid model name "${name}"`);
    }
    if (name.endsWith(`.${suffix}`)) {
      throw new ValidationError(`Model name "${name}" must not end with ".${suffix}"`, [
        { path: 'name', message: 'reserved suffix' },
      ]);
    }
  }

  handleCreate(name: string, exists: boolean, overwrite: boolean): void {
    if (!this.enable) return;

    if (exists && !overwrite) {
      throw new AlreadyExistsError(`Model instance "${name}" already exists`);
    }
  }

  handleRead(name: string, exists: boolean): void {
    if (!this.enable) return;

    if (!exists) {
      throw new NotFoundError(`Model instance "${name}" not found`);
    }
  }

  /**
   * Validate and return the rows handed to train/predict
   */
  handleRows(rows: unknown, type: ModelType): Row[] {
    const parsed = RowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw fromZodError(parsed.error, 'Invalid data rows');
    }

    const schema = type.dataSchema;
    if (!this.enable || !schema) {
      return parsed.data;
    }

    return parsed.data.map((row, index) => {
      const result = schema.safeParse(row);
      if (!result.success) {
        throw fromZodError(result.error, `Invalid row ${index} for model type "${type.name}"`);
      }
      return result.data;
    });
  }

  handleMetadata(metadata: unknown): MetadataUpdate {
    const result = MetadataUpdateSchema.safeParse(metadata);
    if (!result.success) {
      throw fromZodError(result.error, 'Invalid metadata');
    }
    return result.data;
  }

  handleTrained(name: string, trained: boolean): void {
    if (!this.enable) return;

    if (!trained) {
      throw new ValidationError(`Model instance "${name}" has not been trained`, [
        { path: 'name', message: 'run input before output' },
      ]);
    }
  }
}
