/**
 * In-process table database. Each replace swaps the whole array, so a
 * concurrent reader holds either the old array or the new one.
 */

import type { Row } from '../types/models.js';
import { NotFoundError } from '../utils/errors.js';
import { validateTableName, type TableDatabase } from './table-database.js';

export class InMemoryTableDatabase implements TableDatabase {
  private readonly tables = new Map<string, readonly Row[]>();

  constructor(initial: Record<string, Row[]> = {}) {
    for (const [name, rows] of Object.entries(initial)) {
      this.tables.set(validateTableName(name), rows.map((row) => ({ ...row })));
    }
  }

  async readTable(name: string): Promise<Row[]> {
    const rows = this.tables.get(validateTableName(name));
    if (!rows) {
      throw new NotFoundError(`Table "${name}" not found`);
    }
    return rows.map((row) => ({ ...row }));
  }

  async replaceTable(name: string, rows: Row[]): Promise<void> {
    this.tables.set(
      validateTableName(name),
      rows.map((row) => ({ ...row }))
    );
  }

  async hasTable(name: string): Promise<boolean> {
    return this.tables.has(validateTableName(name));
  }
}
