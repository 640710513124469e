/**
 * Column-mean baseline.
 *
 * Training records the mean of every numeric column; prediction echoes each
 * input row with a `<column>_mean` field per trained column.
 */

import type { ModelType, ModelOptions, Row } from '../types/models.js';
import { throwIfCancelled } from '../utils/cancellation.js';
import { ValidationError } from '../utils/errors.js';

export interface DemoModelState {
  means: Record<string, number>;
  count: number;
}

function numericColumns(rows: Row[], options: ModelOptions): string[] {
  const requested = options.columns;
  if (Array.isArray(requested)) {
    return requested.filter((column): column is string => typeof column === 'string');
  }

  const columns = new Set<string>();
  for (const row of rows) {
    for (const [key, value] of Object.entries(row)) {
      if (typeof value === 'number' && Number.isFinite(value)) {
        columns.add(key);
      }
    }
  }
  return [...columns].sort();
}

export const demoModel: ModelType<DemoModelState> = {
  name: 'demo',
  description: 'Column-mean baseline: predicts the training mean of every numeric column',

  train(rows, options, signal) {
    if (rows.length === 0) {
      throw new ValidationError('Cannot train on an empty dataset');
    }

    const means: Record<string, number> = {};
    for (const column of numericColumns(rows, options)) {
      throwIfCancelled(signal, `column ${column}`);
      let sum = 0;
      let count = 0;
      for (const row of rows) {
        const value = row[column];
        if (typeof value === 'number' && Number.isFinite(value)) {
          sum += value;
          count++;
        }
      }
      if (count > 0) {
        means[column] = sum / count;
      }
    }

    return { means, count: rows.length };
  },

  predict(state, rows) {
    const columns = Object.keys(state.means).sort();
    return rows.map((row) => {
      const output: Row = { ...row };
      for (const column of columns) {
        output[`${column}_mean`] = state.means[column];
      }
      return output;
    });
  },

  serialize(state) {
    return Buffer.from(JSON.stringify(state), 'utf8');
  },

  deserialize(bytes) {
    const parsed: unknown = JSON.parse(Buffer.from(bytes).toString('utf8'));
    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      !('means' in parsed) ||
      !('count' in parsed) ||
      typeof parsed.count !== 'number' ||
      typeof parsed.means !== 'object' ||
      parsed.means === null
    ) {
      throw new Error('Invalid demo model state');
    }

    const means: Record<string, number> = {};
    for (const [key, value] of Object.entries(parsed.means)) {
      if (typeof value === 'number') {
        means[key] = value;
      }
    }
    return { means, count: parsed.count };
  },
};
