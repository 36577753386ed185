/**
 * Exact Geo - Exact Segment Predicates
 *
 * Orientation, containment and intersection tests for line segments over an
 * exact coordinate type, plus the exact rational intersection point of two
 * non-parallel segments.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { bigGeometry as geo, formatFractionPoint } from 'exact-geo';
 *
 * const a = geo.segment(geo.point(0n, 0n), geo.point(3n, 1n));
 * const b = geo.segment(geo.point(0n, 1n), geo.point(1n, 0n));
 *
 * geo.segIntersects(a, b); // true
 *
 * const hit = geo.segIntersection(a, b);
 * if (hit) console.log(formatFractionPoint(hit)); // (3/4;1/4)
 * ```
 *
 * Any exact number type works once it is described by a `Numeric<T>`
 * from exact-math; the free functions take it as their first argument.
 *
 * @packageDocumentation
 */

// ============================================
// Bound API
// ============================================

export { ExactGeometry, bigGeometry, integerGeometry } from './ExactGeometry.js';

// ============================================
// Predicates
// ============================================

export { side, sameSide, segContains, segIntersects } from './predicates.js';
export { segIntersection } from './intersection.js';

// ============================================
// Values
// ============================================

export { point, segment, reverseSegment, pointsEqual } from './values.js';

// ============================================
// Display
// ============================================

export { formatPoint, formatFraction, formatFractionPoint, createPrinter } from './format.js';
export type { Printer } from './format.js';

// ============================================
// Configuration
// ============================================

export { DEFAULT_FORMAT_CONFIG } from './config/defaults.js';
export { validateFormatConfig } from './config/validation.js';

// ============================================
// Types
// ============================================

export type {
  Point,
  Segment,
  FractionPoint,
  Pos,
  Seg,
  Frac,
  Side,
  OutputSink,
  FormatConfig,
} from './types/index.js';
