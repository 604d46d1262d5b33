/**
 * Checked vector arithmetic over integer vectors.
 * Every function validates shapes, then elements, then computes; failures are
 * returned as error values and inputs are never modified.
 */

import { fail, ok, type ArithmeticOptions, type OpName, type Result, type Vector } from 'core-types';
import { boundsFor, DEFAULT_WIDTH } from './constants';
import { inRange } from './checked';
import { overflow } from './errors';
import { checkSameLength, checkScalar, checkVectorElements } from './shape';

function elementwise(
  op: OpName,
  fn: (x: number, y: number) => number,
  a: Vector,
  b: Vector,
  options: ArithmeticOptions,
): Result<Vector> {
  const width = options.width ?? DEFAULT_WIDTH;
  const bounds = boundsFor(width);

  const shapeError = checkSameLength(op, a, b);
  if (shapeError) return fail(shapeError);
  const elementError = checkVectorElements(op, 'a', a, bounds) ?? checkVectorElements(op, 'b', b, bounds);
  if (elementError) return fail(elementError);

  const out: number[] = new Array(a.length);
  for (let i = 0; i < a.length; i++) {
    const raw = fn(a[i], b[i]);
    const r = inRange(raw, bounds);
    if (r === null) return fail(overflow(op, width, i, raw));
    out[i] = r;
  }
  return ok(out);
}

export function add(a: Vector, b: Vector, options: ArithmeticOptions = {}): Result<Vector> {
  return elementwise('add', (x, y) => x + y, a, b, options);
}

export function sub(a: Vector, b: Vector, options: ArithmeticOptions = {}): Result<Vector> {
  return elementwise('sub', (x, y) => x - y, a, b, options);
}

export function scale(a: Vector, k: number, options: ArithmeticOptions = {}): Result<Vector> {
  const width = options.width ?? DEFAULT_WIDTH;
  const bounds = boundsFor(width);

  const elementError = checkVectorElements('scale', 'a', a, bounds) ?? checkScalar('scale', k, bounds);
  if (elementError) return fail(elementError);

  const out: number[] = new Array(a.length);
  for (let i = 0; i < a.length; i++) {
    const raw = a[i] * k;
    const r = inRange(raw, bounds);
    if (r === null) return fail(overflow('scale', width, i, raw));
    out[i] = r;
  }
  return ok(out);
}

/**
 * Checked dot product. Every product and every partial sum must stay in
 * range; an overflow reports index 0 since the result is a single value.
 */
export function dot(a: Vector, b: Vector, options: ArithmeticOptions = {}): Result<number> {
  const bounds = boundsFor(options.width ?? DEFAULT_WIDTH);

  const shapeError = checkSameLength('dot', a, b);
  if (shapeError) return fail(shapeError);
  const elementError = checkVectorElements('dot', 'a', a, bounds) ?? checkVectorElements('dot', 'b', b, bounds);
  if (elementError) return fail(elementError);

  return accumulate('dot', a, b, 0, options);
}

/**
 * Checked sum of products without shape or element validation; matVecMul
 * validates up front and calls this per result slot. `index` is the slot
 * reported on overflow.
 */
export function accumulate(
  op: OpName,
  a: Vector,
  b: Vector,
  index: number,
  options: ArithmeticOptions,
): Result<number> {
  const width = options.width ?? DEFAULT_WIDTH;
  const bounds = boundsFor(width);
  let sum = 0;
  for (let j = 0; j < a.length; j++) {
    const rawProduct = a[j] * b[j];
    const product = inRange(rawProduct, bounds);
    if (product === null) return fail(overflow(op, width, index, rawProduct));
    const rawSum = sum + product;
    const next = inRange(rawSum, bounds);
    if (next === null) return fail(overflow(op, width, index, rawSum));
    sum = next;
  }
  return ok(sum);
}
