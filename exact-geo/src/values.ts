import type { Numeric } from 'exact-math';
import type { Point, Segment } from './types/index.js';

/** Create a point */
export function point<T>(x: T, y: T): Point<T> {
  return { x, y };
}

/** Create a segment directed from `first` to `second` */
export function segment<T>(first: Point<T>, second: Point<T>): Segment<T> {
  return { first, second };
}

/** Same segment, opposite direction */
export function reverseSegment<T>(seg: Segment<T>): Segment<T> {
  return { first: seg.second, second: seg.first };
}

export function pointsEqual<T>(numeric: Numeric<T>, a: Point<T>, b: Point<T>): boolean {
  return numeric.eq(a.x, b.x) && numeric.eq(a.y, b.y);
}
