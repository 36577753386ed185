/**
 * Exact Math - Exact Arithmetic Building Blocks
 *
 * Numeric capability sets, small matrices with determinants, and exact
 * fractions reduced by Euclid's algorithm. Nothing here rounds.
 *
 * @packageDocumentation
 */

export {
  // Capability set instances
  BigIntNumeric,
  IntegerNumeric,
  // Derived operations
  isZero,
  lte,
  sign,
  abs,
  min,
  max,
} from './Numeric.js';

export type { Numeric, Sign } from './Numeric.js';

export { Matrix2x2, Matrix3x3 } from './Matrix.js';

export { Fraction, gcd } from './Fraction.js';
