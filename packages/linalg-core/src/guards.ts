import { z } from 'zod';
import type { IntegerWidth, Matrix, Vector } from 'core-types';
import { boundsFor, DEFAULT_WIDTH } from './constants';
import { isRepresentable } from './checked';

// Shape-level guards for values arriving from JSON or other untyped sources.
// Range checks against a width are left to the operations themselves.

export function isInteger(x: unknown): x is number {
  return typeof x === 'number' && Number.isInteger(x);
}

export function isVector(x: unknown): x is Vector {
  return Array.isArray(x) && x.every(isInteger);
}

export function isMatrix(x: unknown): x is Matrix {
  return Array.isArray(x) && x.every(isVector);
}

export function vectorSchema(width: IntegerWidth = DEFAULT_WIDTH) {
  const bounds = boundsFor(width);
  return z.array(
    z.number().refine((n) => isRepresentable(n, bounds), {
      message: `expected an integer in the ${width} range`,
    }),
  );
}

export function matrixSchema(width: IntegerWidth = DEFAULT_WIDTH) {
  return z.array(vectorSchema(width)).superRefine((rows, ctx) => {
    const cols = rows.length > 0 ? rows[0].length : 0;
    rows.forEach((row, i) => {
      if (row.length !== cols) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i],
          message: `row ${i} has length ${row.length}, expected ${cols}`,
        });
      }
    });
  });
}

/**
 * Parse an untyped value into a vector of in-range integers.
 * Throws a ZodError describing every offending element.
 */
export function parseVector(input: unknown, width: IntegerWidth = DEFAULT_WIDTH): Vector {
  return vectorSchema(width).parse(input);
}

/** Like {@link parseVector}, and also rejects ragged matrices. */
export function parseMatrix(input: unknown, width: IntegerWidth = DEFAULT_WIDTH): Matrix {
  return matrixSchema(width).parse(input);
}
