/**
 * Debug rendering of points and fractions.
 *
 * Display only: the text is not meant to be parsed back.
 *
 * @example
 * ```typescript
 * formatPoint(BigIntNumeric, point(2n, -1n)); // "(2;-1)"
 *
 * const print = createPrinter();
 * print.fractionPoint(hit, 'Hit'); // logs "[Hit] (5/2;1/1)"
 * ```
 */

import type { Fraction, Numeric } from 'exact-math';
import { validateFormatConfig } from './config/validation.js';
import { DEFAULT_FORMAT_CONFIG } from './config/defaults.js';
import type { FormatConfig, FractionPoint, Point } from './types/index.js';

function renderPoint(config: FormatConfig, x: string, y: string): string {
  return `${config.pointOpen}${x}${config.coordinateSeparator}${y}${config.pointClose}`;
}

function renderFraction<T>(config: FormatConfig, f: Fraction<T>): string {
  return f.format(config.fractionSeparator);
}

/** `(x;y)` */
export function formatPoint<T>(numeric: Numeric<T>, p: Point<T>): string {
  return renderPoint(DEFAULT_FORMAT_CONFIG, numeric.format(p.x), numeric.format(p.y));
}

/** `num/den` */
export function formatFraction<T>(f: Fraction<T>): string {
  return renderFraction(DEFAULT_FORMAT_CONFIG, f);
}

/** `(a/b;c/d)` */
export function formatFractionPoint<T>(p: FractionPoint<T>): string {
  return renderPoint(
    DEFAULT_FORMAT_CONFIG,
    renderFraction(DEFAULT_FORMAT_CONFIG, p.x),
    renderFraction(DEFAULT_FORMAT_CONFIG, p.y)
  );
}

/**
 * Printer bound to a display configuration
 */
export interface Printer {
  /** Render and write a point */
  point<T>(numeric: Numeric<T>, p: Point<T>, label?: string): string;
  /** Render and write a fraction */
  fraction<T>(f: Fraction<T>, label?: string): string;
  /** Render and write a point with fractional coordinates */
  fractionPoint<T>(p: FractionPoint<T>, label?: string): string;
  /** Write an already rendered line */
  line(text: string, label?: string): string;
}

/**
 * Create a printer that renders with `userConfig` and writes each line to
 * its sink. Every method returns the line it wrote.
 * @throws Error when the configuration is invalid
 */
export function createPrinter(userConfig: Partial<FormatConfig> = {}): Printer {
  const config = validateFormatConfig(userConfig);

  const write = (text: string, label?: string): string => {
    const line = label ? `[${label}] ${text}` : text;
    config.sink(line);
    return line;
  };

  return {
    point: <T>(numeric: Numeric<T>, p: Point<T>, label?: string) =>
      write(renderPoint(config, numeric.format(p.x), numeric.format(p.y)), label),
    fraction: <T>(f: Fraction<T>, label?: string) => write(renderFraction(config, f), label),
    fractionPoint: <T>(p: FractionPoint<T>, label?: string) =>
      write(renderPoint(config, renderFraction(config, p.x), renderFraction(config, p.y)), label),
    line: write,
  };
}
