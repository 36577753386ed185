import type { FormatConfig } from '../types/index.js';
import { DEFAULT_FORMAT_CONFIG } from './defaults.js';

const DELIMITER_KEYS = [
  'pointOpen',
  'pointClose',
  'coordinateSeparator',
  'fractionSeparator',
] as const;

/**
 * Validates and merges user display configuration with defaults
 * @param userConfig - Partial user configuration
 * @returns Complete validated configuration
 */
export function validateFormatConfig(
  userConfig: Partial<FormatConfig> = {}
): FormatConfig {
  const config: FormatConfig = {
    ...DEFAULT_FORMAT_CONFIG,
    ...userConfig,
  };

  for (const key of DELIMITER_KEYS) {
    if (config[key].length === 0) {
      throw new Error(`Invalid ${key}: must be a non-empty string.`);
    }
  }

  // A shared separator would make "(1/2/3)" ambiguous
  if (config.coordinateSeparator === config.fractionSeparator) {
    throw new Error(
      `coordinateSeparator and fractionSeparator must differ (both are '${config.fractionSeparator}')`
    );
  }

  if (typeof config.sink !== 'function') {
    throw new Error('sink must be a function');
  }

  return config;
}
