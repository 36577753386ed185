import type { FormatConfig } from '../types/index.js';

/**
 * Default display configuration: points as `(x;y)`, fractions as `num/den`
 */
export const DEFAULT_FORMAT_CONFIG: FormatConfig = {
  pointOpen: '(',
  pointClose: ')',
  coordinateSeparator: ';',
  fractionSeparator: '/',
  sink: (line) => console.log(line),
};
