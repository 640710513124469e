/**
 * Table-backed background operations. The worker that picks these up needs a
 * database; see `ModelsWorker`'s `dbManager` option.
 */

import type { ModelOptions } from '../../types/models.js';
import { validateTableName } from '../../database/table-database.js';
import { createLogger } from '../../utils/logger.js';
import {
  ModelsBackgroundManager,
  type BackgroundOperationOptions,
  type ModelsBackgroundManagerOptions,
} from './models-background-manager.js';

export class ModelsDBBackgroundManager extends ModelsBackgroundManager {
  constructor(options: ModelsBackgroundManagerOptions) {
    super({ ...options, logger: options.logger ?? createLogger('ModelsDBBackgroundManager') });
  }

  /**
   * Train `name` on the contents of `table` in the background
   */
  async inputDb(name: string, table: string, options: BackgroundOperationOptions = {}): Promise<string> {
    return this.start(name, 'input_db', { table: validateTableName(table), options: options.options }, options);
  }

  /**
   * Predict from `inputTable` and replace `outputTable` in the background.
   * The task result is `{ table, rows }`.
   */
  async updateDb(
    name: string,
    inputTable: string,
    outputTable: string,
    options: BackgroundOperationOptions = {}
  ): Promise<string> {
    const args: { inputTable: string; outputTable: string; options?: ModelOptions } = {
      inputTable: validateTableName(inputTable),
      outputTable: validateTableName(outputTable),
      options: options.options,
    };
    return this.start(name, 'update_db', args, options);
  }
}
