/**
 * Single-feature least-squares regression.
 *
 * Options: `x` (feature column) and `y` (target column). Prediction adds a
 * `<y>_predicted` field to every row.
 */

import { z } from 'zod';
import type { ModelOptions, ModelType, Row } from '../types/models.js';
import { ValidationError, fromZodError } from '../utils/errors.js';
import { throwIfCancelled } from '../utils/cancellation.js';

const LinearOptionsSchema = z.object({
  x: z.string().min(1),
  y: z.string().min(1),
});

const LinearStateSchema = z.object({
  x: z.string(),
  y: z.string(),
  slope: z.number(),
  intercept: z.number(),
  samples: z.number().int().nonnegative(),
});

export type LinearModelState = z.infer<typeof LinearStateSchema>;

function parseOptions(options: ModelOptions): z.infer<typeof LinearOptionsSchema> {
  const result = LinearOptionsSchema.safeParse(options);
  if (!result.success) {
    throw fromZodError(result.error, 'Linear model needs string options "x" and "y"');
  }
  return result.data;
}

function readNumber(row: Row, column: string): number | null {
  const value = row[column];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export const linearModel: ModelType<LinearModelState> = {
  name: 'linear',
  description: 'Ordinary least squares on one feature column',

  train(rows, options, signal) {
    const { x, y } = parseOptions(options);

    const pairs: Array<[number, number]> = [];
    for (const row of rows) {
      const xv = readNumber(row, x);
      const yv = readNumber(row, y);
      if (xv !== null && yv !== null) {
        pairs.push([xv, yv]);
      }
    }
    if (pairs.length < 2) {
      throw new ValidationError(`Linear model needs at least 2 rows with numeric "${x}" and "${y}"`);
    }

    const meanX = pairs.reduce((sum, [xv]) => sum + xv, 0) / pairs.length;
    const meanY = pairs.reduce((sum, [, yv]) => sum + yv, 0) / pairs.length;
    throwIfCancelled(signal, 'fitting');

    let covariance = 0;
    let variance = 0;
    for (const [xv, yv] of pairs) {
      covariance += (xv - meanX) * (yv - meanY);
      variance += (xv - meanX) ** 2;
    }

    const slope = variance === 0 ? 0 : covariance / variance;
    return { x, y, slope, intercept: meanY - slope * meanX, samples: pairs.length };
  },

  predict(state, rows) {
    return rows.map((row) => {
      const xv = readNumber(row, state.x);
      return {
        ...row,
        [`${state.y}_predicted`]: xv === null ? null : state.intercept + state.slope * xv,
      };
    });
  },

  serialize(state) {
    return Buffer.from(JSON.stringify(state), 'utf8');
  },

  deserialize(bytes) {
    return LinearStateSchema.parse(JSON.parse(Buffer.from(bytes).toString('utf8')));
  },
};
