import { BigIntNumeric, Fraction, IntegerNumeric, type Numeric } from 'exact-math';
import { segIntersection } from './intersection.js';
import { sameSide, segContains, segIntersects, side } from './predicates.js';
import type { FractionPoint, Point, Segment, Side } from './types/index.js';
import { point, segment } from './values.js';

/**
 * ExactGeometry - segment predicates bound to one coordinate type
 *
 * @example
 * ```typescript
 * const geo = new ExactGeometry(BigIntNumeric);
 * const a = geo.segment(geo.point(0n, 0n), geo.point(4n, 4n));
 * const b = geo.segment(geo.point(0n, 4n), geo.point(4n, 0n));
 *
 * if (geo.segIntersects(a, b)) {
 *   const hit = geo.segIntersection(a, b); // (2/1;2/1)
 * }
 * ```
 */
export class ExactGeometry<T> {
  constructor(readonly numeric: Numeric<T>) {}

  // ============ Values ============

  point(x: T, y: T): Point<T> {
    return point(x, y);
  }

  segment(first: Point<T>, second: Point<T>): Segment<T> {
    return segment(first, second);
  }

  /**
   * @throws RangeError when `denominator` is zero
   */
  fraction(numerator: T, denominator: T): Fraction<T> {
    return new Fraction(this.numeric, numerator, denominator);
  }

  // ============ Predicates ============

  side(seg: Segment<T>, p: Point<T>): Side {
    return side(this.numeric, seg, p);
  }

  sameSide(seg: Segment<T>, p1: Point<T>, p2: Point<T>): boolean {
    return sameSide(this.numeric, seg, p1, p2);
  }

  segContains(seg: Segment<T>, p: Point<T>): boolean {
    return segContains(this.numeric, seg, p);
  }

  segIntersects(seg1: Segment<T>, seg2: Segment<T>): boolean {
    return segIntersects(this.numeric, seg1, seg2);
  }

  // ============ Construction ============

  segIntersection(seg1: Segment<T>, seg2: Segment<T>): FractionPoint<T> | null {
    return segIntersection(this.numeric, seg1, seg2);
  }
}

/** Geometry over arbitrary-precision integers */
export const bigGeometry = new ExactGeometry(BigIntNumeric);

/** Geometry over safe integers carried in `number` */
export const integerGeometry = new ExactGeometry(IntegerNumeric);
