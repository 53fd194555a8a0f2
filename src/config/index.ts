/**
 * Configuration Management Module
 *
 * @example
 * ```typescript
 * import { loadConfig } from './config/index.js';
 *
 * const config = loadConfig({ overrides: { scan: { checkInterval: 1 } } });
 * console.log(config.tail.startPosition);
 * ```
 */

export {
  MAX_TIMER_MS,
  type ScanConfig,
  type TailSettings,
  type OutputConfig,
  type LoggingConfig,
  type TailConfig,
  ScanConfigSchema,
  TailSettingsSchema,
  OutputConfigSchema,
  LoggingConfigSchema,
  TailConfigSchema,
} from './schema.js';

export { DEFAULT_CONFIG } from './defaults.js';

export {
  loadConfig,
  loadConfigFile,
  loadEnvironmentConfig,
  resolveConfigFile,
  validateConfig,
  deepMerge,
  formatValidationErrors,
  PROJECT_CONFIG_FILE,
  type ConfigRecord,
  type ConfigOverrides,
  type LoadConfigOptions,
} from './loader.js';

export { ConfigurationError } from './errors.js';
