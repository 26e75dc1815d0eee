/**
 * Configuration loader
 *
 * Loads configuration from files, environment variables, and CLI arguments,
 * merging them in order of precedence.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'js-yaml';
import type { ZodError } from 'zod';
import type { GenerateOptions } from '../api/generate.js';
import { ConfigError, getErrorMessage } from '../utils/error-utils.js';
import { getDefaultConfig } from './defaults.js';
import {
  partialConverterConfigSchema,
  type CliConfigOverrides,
  type ConverterConfig,
  type PartialConverterConfig,
} from './types.js';

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = ['yxmd2pandas.config.yaml', 'yxmd2pandas.config.yml'];

/**
 * Environment variable prefix
 */
export const ENV_PREFIX = 'Y2P_';

const ENV_KEYS = {
  VARIABLE_PREFIX: 'variablePrefix',
  ENTRY_FUNCTION: 'entryFunction',
  INDENT: 'indent',
  SAMPLE_SEED: 'sampleSeed',
  PREVIEW_ROWS: 'previewRows',
  TIMESTAMP: 'includeTimestamp',
} as const satisfies Record<string, keyof ConverterConfig>;

const NUMERIC_KEYS: ReadonlySet<keyof ConverterConfig> = new Set([
  'indent',
  'sampleSeed',
  'previewRows',
]);

export interface LoadConfigOptions {
  /** Explicit config file; it is an error if it does not exist */
  configPath?: string;
  /** Directory searched for a config file @default process.cwd() */
  cwd?: string;
  /** @default process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration with the following precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 *
 * @throws {ConfigError} If any layer holds an invalid value
 */
export async function loadConfig(
  cliOverrides?: CliConfigOverrides,
  options: LoadConfigOptions = {}
): Promise<ConverterConfig> {
  let config = getDefaultConfig();

  const fileConfig = await loadConfigFile(options.configPath, options.cwd ?? process.cwd());
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig(options.env ?? process.env));

  if (cliOverrides) {
    config = mergeConfig(config, convertCliOverrides(cliOverrides));
  }

  return config;
}

/**
 * Load configuration from file
 */
async function loadConfigFile(
  configPath: string | undefined,
  cwd: string
): Promise<PartialConverterConfig | null> {
  if (configPath) {
    const absolutePath = path.resolve(cwd, configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    return loadConfigFromPath(absolutePath);
  }

  for (const fileName of CONFIG_FILE_NAMES) {
    const configFilePath = path.join(cwd, fileName);
    if (fs.existsSync(configFilePath)) {
      return loadConfigFromPath(configFilePath);
    }
  }

  return null;
}

/**
 * Load configuration from a specific YAML file
 */
async function loadConfigFromPath(filePath: string): Promise<PartialConverterConfig | null> {
  let raw: unknown;
  try {
    const content = await fs.promises.readFile(filePath, 'utf8');
    raw = YAML.load(content);
  } catch (error) {
    throw new ConfigError(`Could not read config file ${filePath}: ${getErrorMessage(error)}`);
  }
  // An empty file loads as undefined
  if (raw === undefined || raw === null) {
    return null;
  }
  return validatePartial(raw, `config file ${filePath}`);
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv): PartialConverterConfig {
  const raw: Record<string, unknown> = {};

  for (const [suffix, key] of Object.entries(ENV_KEYS)) {
    const value = env[`${ENV_PREFIX}${suffix}`];
    if (value === undefined || value === '') continue;
    if (NUMERIC_KEYS.has(key)) {
      raw[key] = Number(value);
    } else if (key === 'includeTimestamp') {
      raw[key] = parseBoolean(value);
    } else {
      raw[key] = value;
    }
  }

  return validatePartial(raw, 'environment');
}

function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  // Left as a string so validation reports it
  return value;
}

/**
 * Convert CLI overrides to partial config
 */
function convertCliOverrides(overrides: CliConfigOverrides): PartialConverterConfig {
  const raw: Record<string, unknown> = {};
  if (overrides.prefix !== undefined) raw.variablePrefix = overrides.prefix;
  if (overrides.entry !== undefined) raw.entryFunction = overrides.entry;
  if (overrides.indent !== undefined) raw.indent = overrides.indent;
  if (overrides.timestamp !== undefined) raw.includeTimestamp = overrides.timestamp;
  return validatePartial(raw, 'command line');
}

function validatePartial(raw: unknown, source: string): PartialConverterConfig {
  const result = partialConverterConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}`, formatIssues(result.error));
  }
  return result.data;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const at = issue.path.join('.');
    return at ? `${at}: ${issue.message}` : issue.message;
  });
}

/**
 * Merge a partial layer over a complete configuration; undefined keys keep
 * the base value.
 */
function mergeConfig(base: ConverterConfig, override: PartialConverterConfig): ConverterConfig {
  return {
    variablePrefix: override.variablePrefix ?? base.variablePrefix,
    entryFunction: override.entryFunction ?? base.entryFunction,
    indent: override.indent ?? base.indent,
    sampleSeed: override.sampleSeed ?? base.sampleSeed,
    previewRows: override.previewRows ?? base.previewRows,
    includeTimestamp: override.includeTimestamp ?? base.includeTimestamp,
  };
}

/**
 * Options for the script generator. `now` is only used when the timestamp
 * is enabled.
 */
export function toGenerateOptions(config: ConverterConfig, now: Date = new Date()): GenerateOptions {
  const options: GenerateOptions = {
    variablePrefix: config.variablePrefix,
    entryFunction: config.entryFunction,
    indent: config.indent,
    sampleSeed: config.sampleSeed,
    previewRows: config.previewRows,
  };
  if (config.includeTimestamp) {
    options.timestamp = now;
  }
  return options;
}
