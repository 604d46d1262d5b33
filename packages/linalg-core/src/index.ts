export { add, sub, scale, dot } from './vector';
export { matVecMul } from './matrix';
export { withOptions } from './bound';
export type { Linalg } from './bound';
export { unwrap, LinalgOpError } from './errors';
export { matrixShape } from './shape';
export type { MatrixShape } from './shape';
export { isVector, isMatrix, isInteger, parseVector, parseMatrix, vectorSchema, matrixSchema } from './guards';
export { loadConfig, resetConfigCache, optionsFromConfig, DEFAULT_CONFIG_PATH, LinalgConfigSchema } from './config';
export type { LinalgConfig } from './config';
export { INT32_BOUNDS, INT53_BOUNDS, DEFAULT_WIDTH, DEFAULT_LAYOUT, boundsFor } from './constants';
export type { IntegerBounds } from './constants';
export type {
  ArithmeticOptions,
  IntegerWidth,
  InvalidElement,
  LinalgError,
  Matrix,
  MatrixLayout,
  Overflow,
  Result,
  Scalar,
  ShapeMismatch,
  Vector,
} from 'core-types';
export { ok, fail, isOk, isFail } from 'core-types';
