import type {
  IntegerWidth,
  InvalidElement,
  LinalgError,
  OpName,
  Operand,
  Overflow,
  Result,
  ShapeMismatch,
} from 'core-types';

export function lengthMismatch(op: OpName, expected: number, actual: number): ShapeMismatch {
  return {
    kind: 'ShapeMismatch',
    op,
    reason: 'length',
    expected,
    actual,
    message: `${op}: dimension mismatch ${expected} vs ${actual}`,
  };
}

export function raggedMatrix(op: OpName, index: number, expected: number, actual: number): ShapeMismatch {
  return {
    kind: 'ShapeMismatch',
    op,
    reason: 'ragged',
    expected,
    actual,
    index,
    message: `${op}: matrix is not rectangular, vector ${index} has length ${actual}, expected ${expected}`,
  };
}

export function innerMismatch(op: OpName, columns: number, length: number): ShapeMismatch {
  return {
    kind: 'ShapeMismatch',
    op,
    reason: 'inner',
    expected: columns,
    actual: length,
    message: `${op}: matrix has ${columns} columns but vector has length ${length}`,
  };
}

export function overflow(op: OpName, width: IntegerWidth, index: number, value: number): Overflow {
  return {
    kind: 'Overflow',
    op,
    width,
    index,
    value,
    message: `${op}: ${value} at index ${index} is outside the ${width} range`,
  };
}

export function invalidElement(op: OpName, operand: Operand, index: number[], value: number): InvalidElement {
  const at = index.length > 0 ? `${operand}[${index.join('][')}]` : operand;
  return {
    kind: 'InvalidElement',
    op,
    operand,
    index,
    value,
    message: `${op}: ${at} = ${value} is not a representable integer`,
  };
}

/** Thrown by {@link unwrap}; `detail` is the error value that was returned. */
export class LinalgOpError extends Error {
  readonly detail: LinalgError;

  constructor(detail: LinalgError) {
    super(detail.message);
    this.name = detail.kind;
    this.detail = detail;
  }
}

export function unwrap<T>(r: Result<T>): T {
  if (r.ok) return r.value;
  throw new LinalgOpError(r.error);
}
