import type { ArithmeticOptions, Matrix, Result, Vector } from 'core-types';
import { matVecMul } from './matrix';
import { add, dot, scale, sub } from './vector';

export type Linalg = {
  options: Readonly<ArithmeticOptions>;
  add: (a: Vector, b: Vector) => Result<Vector>;
  sub: (a: Vector, b: Vector) => Result<Vector>;
  scale: (a: Vector, k: number) => Result<Vector>;
  dot: (a: Vector, b: Vector) => Result<number>;
  matVecMul: (m: Matrix, v: Vector) => Result<Vector>;
};

/**
 * Bind arithmetic options once, e.g. `withOptions(optionsFromConfig(loadConfig()))`.
 */
export function withOptions(options: ArithmeticOptions = {}): Linalg {
  const opts = Object.freeze({ ...options });
  return {
    options: opts,
    add: (a, b) => add(a, b, opts),
    sub: (a, b) => sub(a, b, opts),
    scale: (a, k) => scale(a, k, opts),
    dot: (a, b) => dot(a, b, opts),
    matVecMul: (m, v) => matVecMul(m, v, opts),
  };
}
