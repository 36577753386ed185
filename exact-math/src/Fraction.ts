import { abs, isZero, type Numeric } from './Numeric.js';

/**
 * Greatest common divisor by Euclid's algorithm: replace `(a, b)` with
 * `(b, a mod b)` until `b` is zero.
 *
 * The remainder keeps the host type's sign convention, so the loop may end on
 * a negative value; the result is returned as its absolute value.
 * `gcd(0, 0)` is zero.
 */
export function gcd<T>(numeric: Numeric<T>, a: T, b: T): T {
  let x = a;
  let y = b;
  while (!isZero(numeric, y)) {
    const r = numeric.mod(x, y);
    x = y;
    y = r;
  }
  return abs(numeric, x);
}

/**
 * Exact rational number `numerator / denominator` over any `Numeric<T>`.
 *
 * The denominator can never be zero. Reduction divides both terms by their
 * gcd and moves the sign onto the numerator.
 *
 * @example
 * ```typescript
 * const half = new Fraction(BigIntNumeric, -4n, -8n).reduced();
 * half.toString(); // "1/2"
 * half.toNumber(); // 0.5
 * ```
 */
export class Fraction<T> {
  private num: T;
  private den: T;

  /**
   * @throws RangeError when `denominator` is zero
   */
  constructor(
    private readonly numeric: Numeric<T>,
    numerator: T,
    denominator: T
  ) {
    if (isZero(numeric, denominator)) {
      throw new RangeError(
        `Division by zero: ${numeric.format(numerator)}/${numeric.format(denominator)}`
      );
    }
    this.num = numerator;
    this.den = denominator;
  }

  get numerator(): T {
    return this.num;
  }

  get denominator(): T {
    return this.den;
  }

  /**
   * Approximate real value. Never used by the exact predicates.
   */
  toNumber(): number {
    return this.numeric.toNumber(this.num) / this.numeric.toNumber(this.den);
  }

  /**
   * Return an equivalent fraction in lowest terms with a positive denominator
   */
  reduced(): Fraction<T> {
    const [num, den] = lowestTerms(this.numeric, this.num, this.den);
    return new Fraction(this.numeric, num, den);
  }

  /**
   * Reduce this fraction in place
   * @returns this (for chaining)
   */
  reduce(): this {
    [this.num, this.den] = lowestTerms(this.numeric, this.num, this.den);
    return this;
  }

  /**
   * Exact equality of the represented rationals (a/b = c/d ⇔ a·d = c·b)
   */
  equals(other: Fraction<T>): boolean {
    const n = this.numeric;
    return n.eq(n.mul(this.num, other.den), n.mul(other.num, this.den));
  }

  /**
   * Render as numerator, separator, denominator
   */
  format(separator: string = '/'): string {
    return `${this.numeric.format(this.num)}${separator}${this.numeric.format(this.den)}`;
  }

  toString(): string {
    return this.format();
  }
}

function lowestTerms<T>(numeric: Numeric<T>, num: T, den: T): [T, T] {
  const divisor = gcd(numeric, num, den);
  let n = numeric.div(num, divisor);
  let d = numeric.div(den, divisor);
  if (numeric.lt(d, numeric.zero)) {
    n = numeric.neg(n);
    d = numeric.neg(d);
  }
  return [n, d];
}
