import { fail, ok, type ArithmeticOptions, type Matrix, type Result, type Vector } from 'core-types';
import { boundsFor, DEFAULT_LAYOUT, DEFAULT_WIDTH } from './constants';
import { innerMismatch } from './errors';
import { checkMatrixElements, checkVectorElements, matrixShape } from './shape';
import { accumulate } from './vector';

function rowOf(m: Matrix, i: number, options: ArithmeticOptions): Vector {
  return (options.layout ?? DEFAULT_LAYOUT) === 'rows' ? m[i] : m.map((col) => col[i]);
}

/**
 * Matrix-vector product: result[i] = Σ_j m[i][j] * v[j].
 *
 * With `layout: 'columns'` the stored vectors of `m` are its columns, so
 * result[i] = Σ_j m[j][i] * v[j]. A matrix with no rows gives [] for any `v`.
 */
export function matVecMul(m: Matrix, v: Vector, options: ArithmeticOptions = {}): Result<Vector> {
  const layout = options.layout ?? DEFAULT_LAYOUT;
  const bounds = boundsFor(options.width ?? DEFAULT_WIDTH);

  const measured = matrixShape('matVecMul', m, layout);
  if (!measured.ok) return fail(measured.error);
  const { rows, cols } = measured.shape;
  if (rows === 0) return ok([]);
  if (cols !== v.length) return fail(innerMismatch('matVecMul', cols, v.length));

  const elementError = checkMatrixElements('matVecMul', m, bounds) ?? checkVectorElements('matVecMul', 'v', v, bounds);
  if (elementError) return fail(elementError);

  const out: number[] = new Array(rows);
  for (let i = 0; i < rows; i++) {
    const r = accumulate('matVecMul', rowOf(m, i, options), v, i, options);
    if (!r.ok) return r;
    out[i] = r.value;
  }
  return ok(out);
}
