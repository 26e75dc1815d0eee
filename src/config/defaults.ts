/**
 * Default configuration values
 */

import { DEFAULT_GENERATE_OPTIONS } from '../api/generate.js';
import type { ConverterConfig } from './types.js';

export const DEFAULT_CONFIG: ConverterConfig = {
  ...DEFAULT_GENERATE_OPTIONS,
  includeTimestamp: false,
};

/**
 * Get a fresh copy of the defaults
 */
export function getDefaultConfig(): ConverterConfig {
  return { ...DEFAULT_CONFIG };
}
