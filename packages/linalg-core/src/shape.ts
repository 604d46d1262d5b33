import type { InvalidElement, Matrix, MatrixLayout, OpName, Operand, ShapeMismatch, Vector } from 'core-types';
import type { IntegerBounds } from './constants';
import { isRepresentable } from './checked';
import { invalidElement, lengthMismatch, raggedMatrix } from './errors';

export interface MatrixShape {
  rows: number;
  cols: number;
}

export function checkSameLength(op: OpName, a: Vector, b: Vector): ShapeMismatch | null {
  return a.length === b.length ? null : lengthMismatch(op, a.length, b.length);
}

/**
 * Rows and columns of `m`, or the first stored vector whose length differs
 * from the first one. An empty matrix is 0 x 0 in either layout.
 */
export function matrixShape(
  op: OpName,
  m: Matrix,
  layout: MatrixLayout,
): { ok: true; shape: MatrixShape } | { ok: false; error: ShapeMismatch } {
  const width = m.length > 0 ? m[0].length : 0;
  for (let i = 1; i < m.length; i++) {
    if (m[i].length !== width) {
      return { ok: false, error: raggedMatrix(op, i, width, m[i].length) };
    }
  }
  const shape = layout === 'rows'
    ? { rows: m.length, cols: width }
    : { rows: width, cols: m.length };
  return { ok: true, shape };
}

export function checkVectorElements(
  op: OpName,
  operand: Operand,
  v: Vector,
  bounds: IntegerBounds,
): InvalidElement | null {
  for (let i = 0; i < v.length; i++) {
    if (!isRepresentable(v[i], bounds)) {
      return invalidElement(op, operand, [i], v[i]);
    }
  }
  return null;
}

export function checkMatrixElements(op: OpName, m: Matrix, bounds: IntegerBounds): InvalidElement | null {
  for (let i = 0; i < m.length; i++) {
    const row = m[i];
    for (let j = 0; j < row.length; j++) {
      if (!isRepresentable(row[j], bounds)) {
        return invalidElement(op, 'm', [i, j], row[j]);
      }
    }
  }
  return null;
}

export function checkScalar(op: OpName, k: number, bounds: IntegerBounds): InvalidElement | null {
  return isRepresentable(k, bounds) ? null : invalidElement(op, 'k', [], k);
}
