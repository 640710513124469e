/**
 * Postgres-backed table database.
 *
 * `replaceTable` drops and recreates the table inside one transaction on a
 * single pooled client, so concurrent readers keep seeing the previous
 * contents until COMMIT. Column types are inferred from the rows.
 */

import type { Pool } from 'pg';
import type { Logger } from 'pino';
import type { Row } from '../types/models.js';
import { NotFoundError, StorageError, ValidationError, isModelsError, toError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { validateTableName, type TableDatabase } from './table-database.js';

export interface SqlQueryResult {
  rows: Row[];
}

export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<SqlQueryResult>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

/**
 * The subset of a connection pool this module needs. `pg.Pool` is adapted
 * with {@link fromPgPool}; tests pass an in-process Postgres.
 */
export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
  end?(): Promise<void>;
}

type ColumnType = 'BOOLEAN' | 'DOUBLE PRECISION' | 'TEXT' | 'JSONB';

interface ColumnSpec {
  name: string;
  type: ColumnType;
}

/** Keep each INSERT well under Postgres' 65535 bind-parameter limit */
const MAX_PARAMS_PER_INSERT = 10000;

export function fromPgPool(pool: Pool): SqlPool {
  return {
    query: async (text, params) => {
      const result = await pool.query(text, params);
      return { rows: result.rows };
    },
    connect: async () => {
      const client = await pool.connect();
      return {
        query: async (text, params) => {
          const result = await client.query(text, params);
          return { rows: result.rows };
        },
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

export function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

function inferColumnType(values: unknown[]): ColumnType {
  const present = values.filter((value) => value !== null && value !== undefined);
  if (present.length === 0) return 'TEXT';
  if (present.every((value) => typeof value === 'boolean')) return 'BOOLEAN';
  if (present.every((value) => typeof value === 'number' && Number.isFinite(value))) return 'DOUBLE PRECISION';
  if (present.every((value) => typeof value === 'string')) return 'TEXT';
  return 'JSONB';
}

/**
 * Column list in first-seen order across all rows
 */
export function inferColumns(rows: Row[]): ColumnSpec[] {
  const names: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        names.push(key);
      }
    }
  }

  return names.map((name) => {
    if (name.length === 0 || name.length > 63) {
      throw new ValidationError(`Column name "${name}" must be 1-63 characters`, [
        { path: 'columns', message: name },
      ]);
    }
    return { name, type: inferColumnType(rows.map((row) => row[name])) };
  });
}

function toParam(value: unknown, type: ColumnType): unknown {
  if (value === undefined || value === null) return null;
  return type === 'JSONB' ? JSON.stringify(value) : value;
}

export interface PostgresTableDatabaseOptions {
  logger?: Logger;
}

export class PostgresTableDatabase implements TableDatabase {
  private readonly logger: Logger;

  constructor(
    private readonly pool: SqlPool,
    options: PostgresTableDatabaseOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('PostgresTableDatabase');
  }

  async hasTable(name: string): Promise<boolean> {
    const table = validateTableName(name);
    const result = await this.run(
      this.pool,
      `SELECT 1 AS present FROM information_schema.tables WHERE table_schema = current_schema() AND table_name = $1`,
      [table]
    );
    return result.rows.length > 0;
  }

  async readTable(name: string): Promise<Row[]> {
    const table = validateTableName(name);
    if (!(await this.hasTable(table))) {
      throw new NotFoundError(`Table "${table}" not found`);
    }
    const result = await this.run(this.pool, `SELECT * FROM ${quoteIdentifier(table)}`);
    this.logger.debug({ table, rows: result.rows.length }, 'Table read');
    return result.rows;
  }

  async replaceTable(name: string, rows: Row[]): Promise<void> {
    const table = validateTableName(name);
    const columns = inferColumns(rows);
    const client = await this.pool.connect();

    try {
      await this.run(client, 'BEGIN');
      await this.run(client, `DROP TABLE IF EXISTS ${quoteIdentifier(table)}`);
      await this.run(
        client,
        `CREATE TABLE ${quoteIdentifier(table)} (${columns
          .map((column) => `${quoteIdentifier(column.name)} ${column.type}`)
          .join(', ')})`
      );
      await this.insertRows(client, table, columns, rows);
      await this.run(client, 'COMMIT');
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.error({ err: rollbackError, table }, 'Rollback failed');
      }
      throw error;
    } finally {
      client.release();
    }

    this.logger.info({ table, rows: rows.length, columns: columns.length }, 'Table replaced');
  }

  async close(): Promise<void> {
    await this.pool.end?.();
  }

  private async insertRows(client: SqlClient, table: string, columns: ColumnSpec[], rows: Row[]): Promise<void> {
    if (columns.length === 0 || rows.length === 0) {
      return;
    }

    const columnList = columns.map((column) => quoteIdentifier(column.name)).join(', ');
    const rowsPerInsert = Math.max(1, Math.floor(MAX_PARAMS_PER_INSERT / columns.length));

    for (let offset = 0; offset < rows.length; offset += rowsPerInsert) {
      const batch = rows.slice(offset, offset + rowsPerInsert);
      const params: unknown[] = [];
      const tuples = batch.map((row) => {
        const placeholders = columns.map((column) => {
          params.push(toParam(row[column.name], column.type));
          return column.type === 'JSONB' ? `$${params.length}::jsonb` : `$${params.length}`;
        });
        return `(${placeholders.join(', ')})`;
      });

      await this.run(client, `INSERT INTO ${quoteIdentifier(table)} (${columnList}) VALUES ${tuples.join(', ')}`, params);
    }
  }

  private async run(client: SqlClient, text: string, params?: unknown[]): Promise<SqlQueryResult> {
    try {
      return await client.query(text, params);
    } catch (error) {
      if (isModelsError(error)) throw error;
      throw new StorageError(`Database query failed: ${toError(error).message}`, undefined, toError(error));
    }
  }
}
