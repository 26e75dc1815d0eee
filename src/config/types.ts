/**
 * Configuration types for the converter CLI
 */

import { z } from 'zod';

const PYTHON_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const converterConfigSchema = z
  .object({
    /** Prefix of generated variable names */
    variablePrefix: z.string().regex(PYTHON_IDENTIFIER, 'must be a valid Python identifier'),
    /** Name of the generated entry-point function */
    entryFunction: z.string().regex(PYTHON_IDENTIFIER, 'must be a valid Python identifier'),
    /** Spaces per indentation level */
    indent: z.number().int().min(1).max(8),
    /** `random_state` for sample tools */
    sampleSeed: z.number().int().nonnegative(),
    /** Rows printed by browse tools */
    previewRows: z.number().int().positive(),
    /** Stamp the generation time into the script header */
    includeTimestamp: z.boolean(),
  })
  .strict();

export const partialConverterConfigSchema = converterConfigSchema.partial();

/**
 * Complete converter configuration
 */
export type ConverterConfig = z.infer<typeof converterConfigSchema>;

export type PartialConverterConfig = z.infer<typeof partialConverterConfigSchema>;

/**
 * CLI argument overrides
 */
export interface CliConfigOverrides {
  prefix?: string;
  entry?: string;
  indent?: number;
  timestamp?: boolean;
}
