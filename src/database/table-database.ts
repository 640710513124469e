/**
 * Narrow database contract consumed by the DB-backed managers: read a whole
 * table, or replace a whole table atomically.
 */

import type { Row } from '../types/models.js';
import { TableNameSchema } from '../types/schemas/task.js';
import { fromZodError } from '../utils/errors.js';

export interface TableDatabase {
  /**
   * @throws {NotFoundError} if the table does not exist
   */
  readTable(name: string): Promise<Row[]>;

  /**
   * Replace the table's contents in one transaction; readers see either the
   * previous rows or the new ones, never a mix.
   */
  replaceTable(name: string, rows: Row[]): Promise<void>;

  hasTable(name: string): Promise<boolean>;

  close?(): Promise<void>;
}

/**
 * @throws {ValidationError} if `name` is not a plain SQL identifier
 */
export function validateTableName(name: string): string {
  const result = TableNameSchema.safeParse(name);
  if (!result.success) {
    throw fromZodError(result.error, `Invalid table name "${name}"`);
  }
  return result.data;
}
