import type { IntegerWidth, MatrixLayout } from 'core-types';

export interface IntegerBounds {
  min: number;
  max: number;
}

export const INT32_BOUNDS: IntegerBounds = { min: -2147483648, max: 2147483647 };
export const INT53_BOUNDS: IntegerBounds = {
  min: Number.MIN_SAFE_INTEGER,
  max: Number.MAX_SAFE_INTEGER,
};

export const DEFAULT_WIDTH: IntegerWidth = 'int32';
export const DEFAULT_LAYOUT: MatrixLayout = 'rows';

export function boundsFor(width: IntegerWidth): IntegerBounds {
  return width === 'int53' ? INT53_BOUNDS : INT32_BOUNDS;
}
