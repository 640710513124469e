/**
 * Models DB Manager
 *
 * Table-backed variants of `input` and `output`. Training data is the full
 * contents of a table; predictions replace the contents of another table.
 */

import type { Logger } from 'pino';
import type { OperationOptions, Row } from '../types/models.js';
import type { TableDatabase } from '../database/table-database.js';
import { validateTableName } from '../database/table-database.js';
import { throwIfCancelled } from '../utils/cancellation.js';
import { createLogger } from '../utils/logger.js';
import type { InputResult, ModelsManager } from './models-manager.js';

export interface ModelsDBManagerOptions {
  manager: ModelsManager;
  database: TableDatabase;
  logger?: Logger;
}

export interface InputDbResult extends InputResult {
  table: string;
  rows: number;
}

export interface UpdateDbResult {
  table: string;
  rows: number;
}

export class ModelsDBManager {
  readonly manager: ModelsManager;
  readonly database: TableDatabase;
  private readonly logger: Logger;

  constructor(options: ModelsDBManagerOptions) {
    this.manager = options.manager;
    this.database = options.database;
    this.logger = options.logger ?? createLogger('ModelsDBManager');
  }

  /**
   * Train `name` on every row of `table`
   */
  async inputDb(name: string, table: string, operation: OperationOptions = {}): Promise<InputDbResult> {
    const rows = await this.database.readTable(validateTableName(table));
    throwIfCancelled(operation.signal, 'training');

    const result = await this.manager.input(name, rows, operation);
    this.logger.info({ name, table, rows: rows.length }, 'Model instance trained from table');
    return { ...result, table, rows: rows.length };
  }

  /**
   * Predict from `table` without writing anything back
   */
  async outputDb(name: string, table: string, operation: OperationOptions = {}): Promise<Row[]> {
    const rows = await this.database.readTable(validateTableName(table));
    return this.manager.output(name, rows, operation);
  }

  /**
   * Predict from `inputTable` and replace `outputTable` with the result.
   * The replace is the last step and is not interrupted by cancellation.
   */
  async updateDb(
    name: string,
    inputTable: string,
    outputTable: string,
    operation: OperationOptions = {}
  ): Promise<UpdateDbResult> {
    const target = validateTableName(outputTable);
    const predictions = await this.outputDb(name, inputTable, operation);
    throwIfCancelled(operation.signal, 'replacing table');

    await this.database.replaceTable(target, predictions);
    this.logger.info({ name, inputTable, outputTable: target, rows: predictions.length }, 'Output table replaced');
    return { table: target, rows: predictions.length };
  }
}
