import type { Numeric } from './Numeric.js';

/**
 * Small fixed-size matrices used as scratch space for determinants.
 *
 * Values are given row by row and addressed as `(column, row)`.
 *
 * @example
 * ```typescript
 * const m = new Matrix2x2([1n, 2n, 3n, 4n]);
 * m.at(1, 0); // 2n
 * m.determinant(BigIntNumeric); // -2n
 * ```
 */
export class Matrix2x2<T> {
  static readonly SIZE = 2;

  private readonly values: readonly T[];

  constructor(values: readonly T[]) {
    if (values.length !== Matrix2x2.SIZE * Matrix2x2.SIZE) {
      throw new Error(
        `Matrix2x2 expects ${Matrix2x2.SIZE * Matrix2x2.SIZE} values, got ${values.length}`
      );
    }
    this.values = [...values];
  }

  /**
   * Get the value at the given column and row
   */
  at(column: number, row: number): T {
    return cell(this.values, Matrix2x2.SIZE, column, row);
  }

  /**
   * a·d − b·c
   */
  determinant(numeric: Numeric<T>): T {
    const m = (column: number, row: number): T => this.at(column, row);
    return numeric.sub(
      numeric.mul(m(0, 0), m(1, 1)),
      numeric.mul(m(1, 0), m(0, 1))
    );
  }
}

export class Matrix3x3<T> {
  static readonly SIZE = 3;

  private readonly values: readonly T[];

  constructor(values: readonly T[]) {
    if (values.length !== Matrix3x3.SIZE * Matrix3x3.SIZE) {
      throw new Error(
        `Matrix3x3 expects ${Matrix3x3.SIZE * Matrix3x3.SIZE} values, got ${values.length}`
      );
    }
    this.values = [...values];
  }

  /**
   * Get the value at the given column and row
   */
  at(column: number, row: number): T {
    return cell(this.values, Matrix3x3.SIZE, column, row);
  }

  /**
   * Six-term rule (Sarrus)
   */
  determinant(numeric: Numeric<T>): T {
    const m = (column: number, row: number): T => this.at(column, row);
    const product = (a: T, b: T, c: T): T => numeric.mul(numeric.mul(a, b), c);

    const positive = numeric.add(
      numeric.add(
        product(m(0, 0), m(1, 1), m(2, 2)),
        product(m(0, 1), m(1, 2), m(2, 0))
      ),
      product(m(0, 2), m(1, 0), m(2, 1))
    );
    const negative = numeric.add(
      numeric.add(
        product(m(2, 0), m(1, 1), m(0, 2)),
        product(m(2, 1), m(1, 2), m(0, 0))
      ),
      product(m(2, 2), m(1, 0), m(0, 1))
    );

    return numeric.sub(positive, negative);
  }
}

function cell<T>(values: readonly T[], size: number, column: number, row: number): T {
  const inRange = (i: number): boolean => Number.isInteger(i) && i >= 0 && i < size;
  if (!inRange(column) || !inRange(row)) {
    throw new RangeError(`Matrix index (${column}, ${row}) out of bounds for ${size}x${size}`);
  }
  return values[row * size + column];
}
