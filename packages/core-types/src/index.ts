export type Vector = readonly number[];
export type Matrix = readonly Vector[];
export type Scalar = number;

export type IntegerWidth = 'int32' | 'int53';
export type MatrixLayout = 'rows' | 'columns';

export interface ArithmeticOptions {
  /** Integer range every operand and intermediate must stay inside. Default: int32 */
  width?: IntegerWidth;
  /** How matVecMul reads the stored vectors of a matrix. Default: rows */
  layout?: MatrixLayout;
}

export type OpName = 'add' | 'sub' | 'scale' | 'dot' | 'matVecMul';
export type Operand = 'a' | 'b' | 'k' | 'm' | 'v';

export interface ShapeMismatch {
  kind: 'ShapeMismatch';
  op: OpName;
  reason: 'length' | 'ragged' | 'inner';
  expected: number;
  actual: number;
  index?: number; // stored vector that broke rectangularity
  message: string;
}

export interface Overflow {
  kind: 'Overflow';
  op: OpName;
  width: IntegerWidth;
  index: number;
  value: number;
  message: string;
}

export interface InvalidElement {
  kind: 'InvalidElement';
  op: OpName;
  operand: Operand;
  index: number[]; // [] for the scalar, [i] for a vector, [i, j] for a matrix
  value: number;
  message: string;
}

export type LinalgError = ShapeMismatch | Overflow | InvalidElement;

export type Result<T, E = LinalgError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Wrap a successful result.
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Wrap a failed result.
 */
export function fail<E = LinalgError>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function isOk<T, E>(r: Result<T, E>): r is { ok: true; value: T } {
  return r.ok;
}

export function isFail<T, E>(r: Result<T, E>): r is { ok: false; error: E } {
  return !r.ok;
}
