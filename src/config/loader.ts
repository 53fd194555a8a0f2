/**
 * Configuration Loader
 *
 * Loads configuration from multiple sources with precedence:
 * 1. Command-line overrides (highest priority)
 * 2. Environment variables (GLOBTAIL_*)
 * 3. YAML config file (--config, GLOBTAIL_CONFIG, or ./.globtail.yml)
 * 4. Built-in defaults (lowest priority)
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { TailConfigSchema, type LoggingConfig, type OutputConfig, type ScanConfig, type TailConfig, type TailSettings } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigurationError } from './errors.js';

/**
 * Untyped configuration tree, validated by TailConfigSchema
 */
export type ConfigRecord = Record<string, unknown>;

/**
 * Partial configuration supplied by the caller (usually the CLI)
 */
export interface ConfigOverrides {
  scan?: Partial<ScanConfig>;
  tail?: Partial<TailSettings>;
  output?: Partial<OutputConfig>;
  exclude?: string[];
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist */
  configPath?: string;
  /** Highest-priority values */
  overrides?: ConfigOverrides;
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory searched for .globtail.yml (default: process.cwd()) */
  cwd?: string;
}

/** Looked up in the working directory when no file is named */
export const PROJECT_CONFIG_FILE = '.globtail.yml';

/**
 * Load, merge and validate configuration.
 *
 * @throws ConfigurationError if a named file is missing, YAML is malformed,
 *   or the merged result fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): TailConfig {
  const env = options.env ?? process.env;
  let config: ConfigRecord = deepMerge({}, DEFAULT_CONFIG);

  const filePath = resolveConfigFile(options.configPath, env, options.cwd ?? process.cwd());
  if (filePath) {
    const fileConfig = loadConfigFile(filePath);
    if (fileConfig) {
      config = deepMerge(config, fileConfig);
    }
  }

  const envConfig = loadEnvironmentConfig(env);
  if (envConfig) {
    config = deepMerge(config, envConfig);
  }

  if (options.overrides) {
    config = deepMerge(config, options.overrides);
  }

  return validateConfig(config);
}

/**
 * Pick the config file to read, if any
 */
export function resolveConfigFile(
  configPath: string | undefined,
  env: NodeJS.ProcessEnv,
  cwd: string,
): string | undefined {
  const named = configPath ?? env.GLOBTAIL_CONFIG;
  if (named) {
    const resolved = path.resolve(cwd, named);
    if (!fs.existsSync(resolved)) {
      throw new ConfigurationError(`Config file does not exist: ${named}`, 'config', 'Check the --config path');
    }
    return resolved;
  }

  const projectFile = path.join(cwd, PROJECT_CONFIG_FILE);
  return fs.existsSync(projectFile) ? projectFile : undefined;
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Parsed configuration tree, or null if the file is missing or empty
 * @throws ConfigurationError if the YAML is malformed or not a mapping
 */
export function loadConfigFile(filePath: string): ConfigRecord | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new ConfigurationError(
        `YAML parsing error in ${filePath}:\n  ${error.message}`,
        'config',
      );
    }
    throw error;
  }

  if (parsed === null || parsed === undefined) {
    return null;
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Invalid configuration file: ${filePath} - expected a mapping`, 'config');
  }

  return parsed;
}

/**
 * Load configuration from environment variables:
 * - GLOBTAIL_CHECK_INTERVAL (seconds)
 * - GLOBTAIL_POLL_INTERVAL (milliseconds)
 * - GLOBTAIL_LOG_LEVEL
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): ConfigRecord | null {
  const config: ConfigRecord = {};

  if (env.GLOBTAIL_CHECK_INTERVAL) {
    config.scan = { checkInterval: parseFloat(env.GLOBTAIL_CHECK_INTERVAL) };
  }

  if (env.GLOBTAIL_POLL_INTERVAL) {
    config.tail = { pollInterval: parseInt(env.GLOBTAIL_POLL_INTERVAL, 10) };
  }

  if (env.GLOBTAIL_LOG_LEVEL) {
    config.logging = { level: env.GLOBTAIL_LOG_LEVEL };
  }

  return Object.keys(config).length > 0 ? config : null;
}

/**
 * Validate a merged configuration tree
 *
 * @throws ConfigurationError listing every issue
 */
export function validateConfig(config: unknown): TailConfig {
  try {
    return TailConfigSchema.parse(config);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(formatValidationErrors(error));
    }
    throw error;
  }
}

/**
 * Deep merge two objects, with source overriding target.
 *
 * - Nested objects are merged recursively
 * - Arrays are replaced entirely (not merged)
 * - Undefined source values are skipped
 */
export function deepMerge(target: object, source: object): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = result[key];
    if (isRecord(sourceValue)) {
      result[key] = deepMerge(isRecord(targetValue) ? targetValue : {}, sourceValue);
    } else if (Array.isArray(sourceValue)) {
      result[key] = [...sourceValue];
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Format Zod validation errors into a human-readable message.
 */
export function formatValidationErrors(error: ZodError): string {
  const errors = error.issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`);
  return `Configuration validation failed:\n${errors.join('\n')}`;
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
