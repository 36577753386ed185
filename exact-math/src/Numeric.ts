/**
 * Numeric Capability Set
 *
 * Describes what the geometry code needs from a number type: ring arithmetic,
 * integral division with remainder, equality and ordering. Any exact type can
 * plug in by providing a `Numeric<T>` instance.
 *
 * @example
 * ```typescript
 * import { BigIntNumeric, sign } from 'exact-math';
 *
 * const n = BigIntNumeric;
 * const area = n.sub(n.mul(3n, 4n), n.mul(2n, 5n)); // 2n
 * sign(n, area); // 1
 * ```
 */

/** Sign of a value: -1, 0 or 1 */
export type Sign = -1 | 0 | 1;

/**
 * Operations a coordinate type must support.
 *
 * `div` is the integral quotient and `mod` the matching remainder, with
 * whatever sign convention the underlying type has.
 */
export interface Numeric<T> {
  readonly zero: T;
  readonly one: T;

  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  mul(a: T, b: T): T;
  div(a: T, b: T): T;
  mod(a: T, b: T): T;
  neg(a: T): T;

  eq(a: T, b: T): boolean;
  lt(a: T, b: T): boolean;

  /** Approximate conversion, for display only */
  toNumber(a: T): number;
  /** Display text */
  format(a: T): string;
}

// ============ Instances ============

/**
 * Arbitrary-precision integers. `/` and `%` truncate toward zero.
 */
export const BigIntNumeric: Numeric<bigint> = {
  zero: 0n,
  one: 1n,

  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  mod: (a, b) => a % b,
  neg: (a) => -a,

  eq: (a, b) => a === b,
  lt: (a, b) => a < b,

  toNumber: (a) => Number(a),
  format: (a) => a.toString(),
};

/**
 * Integers carried in `number`. Every operand and result must be a safe
 * integer (`Number.isSafeInteger`); anything else, including the overflow of
 * a product past 2^53, NaN and Infinity, throws `RangeError`. Determinants of
 * 3x3 matrices multiply three coordinates, so keep coordinates well below
 * 2^17 in magnitude, or use `BigIntNumeric`.
 */
export const IntegerNumeric: Numeric<number> = {
  zero: 0,
  one: 1,

  add: (a, b) => checked('add', a + b, a, b),
  sub: (a, b) => checked('sub', a - b, a, b),
  mul: (a, b) => checked('mul', a * b, a, b),
  div: (a, b) => checked('div', Math.trunc(a / b), a, b),
  mod: (a, b) => checked('mod', a % b, a, b),
  neg: (a) => checked('neg', -a, a),

  eq: (a, b) => a === b,
  lt: (a, b) => a < b,

  toNumber: (a) => a,
  format: (a) => String(a),
};

function checked(op: string, result: number, ...operands: number[]): number {
  for (const value of [...operands, result]) {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(
        `IntegerNumeric.${op}(${operands.join(', ')}) left the safe integer range: ${value}`
      );
    }
  }
  // `+ 0` turns -0 into 0
  return result + 0;
}

// ============ Derived Operations ============

export function isZero<T>(numeric: Numeric<T>, a: T): boolean {
  return numeric.eq(a, numeric.zero);
}

export function lte<T>(numeric: Numeric<T>, a: T, b: T): boolean {
  return numeric.lt(a, b) || numeric.eq(a, b);
}

export function sign<T>(numeric: Numeric<T>, a: T): Sign {
  if (numeric.lt(numeric.zero, a)) return 1;
  if (numeric.lt(a, numeric.zero)) return -1;
  return 0;
}

export function abs<T>(numeric: Numeric<T>, a: T): T {
  return numeric.lt(a, numeric.zero) ? numeric.neg(a) : a;
}

export function min<T>(numeric: Numeric<T>, a: T, b: T): T {
  return numeric.lt(b, a) ? b : a;
}

export function max<T>(numeric: Numeric<T>, a: T, b: T): T {
  return numeric.lt(a, b) ? b : a;
}
