import { Fraction, Matrix2x2, isZero, type Numeric } from 'exact-math';
import type { FractionPoint, Segment } from './types/index.js';

/**
 * Exact intersection point of the lines through two segments.
 *
 * Cramer's rule on the determinant form of the two lines. The result is the
 * intersection of the infinite lines and is not clamped to the segments, so
 * check `segIntersects` first when a point on both segments is required.
 *
 * @returns The point with both coordinates reduced, or `null` when the lines
 * are parallel or coincident (including overlapping collinear segments)
 */
export function segIntersection<T>(
  numeric: Numeric<T>,
  seg1: Segment<T>,
  seg2: Segment<T>
): FractionPoint<T> | null {
  const n = numeric;
  const dx1 = n.sub(seg1.first.x, seg1.second.x);
  const dy1 = n.sub(seg1.first.y, seg1.second.y);
  const dx2 = n.sub(seg2.first.x, seg2.second.x);
  const dy2 = n.sub(seg2.first.y, seg2.second.y);

  // Cross product of the two direction vectors
  const denominator = new Matrix2x2([dx1, dy1, dx2, dy2]).determinant(n);

  if (isZero(n, denominator)) {
    return null;
  }

  const det1 = new Matrix2x2([
    seg1.first.x, seg1.first.y,
    seg1.second.x, seg1.second.y,
  ]).determinant(n);
  const det2 = new Matrix2x2([
    seg2.first.x, seg2.first.y,
    seg2.second.x, seg2.second.y,
  ]).determinant(n);

  const xNumerator = new Matrix2x2([det1, dx1, det2, dx2]).determinant(n);
  const yNumerator = new Matrix2x2([det1, dy1, det2, dy2]).determinant(n);

  return {
    x: new Fraction(n, xNumerator, denominator).reduce(),
    y: new Fraction(n, yNumerator, denominator).reduce(),
  };
}
