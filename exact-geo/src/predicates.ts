/**
 * Orientation, containment and intersection predicates.
 *
 * Every predicate reduces to the sign of a determinant computed in the
 * coordinate type itself, so the answers are exact for exact types.
 */

import { Matrix3x3, lte, max, min, sign, type Numeric } from 'exact-math';
import type { Point, Segment, Side } from './types/index.js';

/**
 * Which side of the directed line `seg.first → seg.second` a point lies on.
 *
 * Sign of det [A.x A.y 1; B.x B.y 1; P.x P.y 1]:
 * - `-1` left
 * - `0` collinear
 * - `1` right
 *
 * Left and right are as seen with the y axis pointing down; with y pointing
 * up the labels swap, the sign does not.
 */
export function side<T>(numeric: Numeric<T>, seg: Segment<T>, p: Point<T>): Side {
  const { first: a, second: b } = seg;
  const one = numeric.one;
  const matrix = new Matrix3x3([
    a.x, a.y, one,
    b.x, b.y, one,
    p.x, p.y, one,
  ]);
  return sign(numeric, matrix.determinant(numeric));
}

/**
 * Whether two points are on the same side of the line through `seg`.
 * Two points that are both on the line count as the same side.
 */
export function sameSide<T>(
  numeric: Numeric<T>,
  seg: Segment<T>,
  p1: Point<T>,
  p2: Point<T>
): boolean {
  return side(numeric, seg, p1) === side(numeric, seg, p2);
}

/**
 * Whether `p` lies on the closed segment: collinear with it and inside the
 * bounding box of its endpoints on both axes.
 */
export function segContains<T>(numeric: Numeric<T>, seg: Segment<T>, p: Point<T>): boolean {
  if (side(numeric, seg, p) !== 0) {
    return false;
  }

  const { first: a, second: b } = seg;
  const within = (lo: T, value: T, hi: T): boolean =>
    lte(numeric, lo, value) && lte(numeric, value, hi);

  return (
    within(min(numeric, a.x, b.x), p.x, max(numeric, a.x, b.x)) &&
    within(min(numeric, a.y, b.y), p.y, max(numeric, a.y, b.y))
  );
}

/**
 * Whether two closed segments share at least one point.
 *
 * A proper crossing has each segment's endpoints straddling the other's
 * line. Touching endpoints, T-junctions and collinear overlaps are caught by
 * the containment checks.
 */
export function segIntersects<T>(numeric: Numeric<T>, seg1: Segment<T>, seg2: Segment<T>): boolean {
  const straddles =
    !sameSide(numeric, seg1, seg2.first, seg2.second) &&
    !sameSide(numeric, seg2, seg1.first, seg1.second);

  return (
    straddles ||
    segContains(numeric, seg1, seg2.first) ||
    segContains(numeric, seg1, seg2.second) ||
    segContains(numeric, seg2, seg1.first) ||
    segContains(numeric, seg2, seg1.second)
  );
}
