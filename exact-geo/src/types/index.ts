/**
 * Exact Geo Types
 */

import type { Fraction } from 'exact-math';

// ============================================
// Value Types
// ============================================

/** Immutable 2D point */
export interface Point<T> {
  readonly x: T;
  readonly y: T;
}

/**
 * Segment from `first` to `second`.
 * Swapping the endpoints describes the same set of points but flips the
 * orientation sign of `side`.
 */
export interface Segment<T> {
  readonly first: Point<T>;
  readonly second: Point<T>;
}

/** Point with exact rational coordinates */
export type FractionPoint<T> = Point<Fraction<T>>;

// Short aliases
export type Pos<T> = Point<T>;
export type Seg<T> = Segment<T>;
export type Frac<T> = Fraction<T>;

/**
 * Orientation of a point relative to a directed line:
 * -1 left, 0 collinear, 1 right
 */
export type Side = -1 | 0 | 1;

// ============================================
// Configuration
// ============================================

/** Receives one rendered line of output */
export type OutputSink = (line: string) => void;

/**
 * Display settings for points and fractions
 */
export interface FormatConfig {
  /** Text before the coordinates (default: '(') */
  pointOpen: string;
  /** Text after the coordinates (default: ')') */
  pointClose: string;
  /** Between x and y (default: ';') */
  coordinateSeparator: string;
  /** Between numerator and denominator (default: '/') */
  fractionSeparator: string;
  /** Where printed lines go (default: console.log) */
  sink: OutputSink;
}
