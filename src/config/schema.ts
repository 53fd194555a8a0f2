/**
 * Configuration Schema Definition
 *
 * Defines TypeScript interfaces and Zod schemas for runtime validation
 * of globtail settings.
 */

import { z } from 'zod';

/** Longest delay Node timers accept (ms); larger values fire after 1 ms */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Scan Configuration
 *
 * Controls how often glob patterns are re-evaluated.
 */
export interface ScanConfig {
  /**
   * Seconds between rescans of each pattern. Fractions are allowed.
   *
   * @default 5
   * @example 0.5
   */
  checkInterval: number;
}

/**
 * Tail Configuration
 *
 * Controls how each discovered file is read.
 */
export interface TailSettings {
  /**
   * Where files matched by the first scan start.
   *
   * - "end": only bytes appended after globtail started
   * - "beginning": the whole file
   *
   * Files that appear on later scans are always read from the beginning.
   *
   * @default "end"
   */
  startPosition: 'end' | 'beginning';

  /**
   * Milliseconds between growth checks of each tailed file.
   *
   * @default 250
   */
  pollInterval: number;

  /**
   * Longest line (bytes) kept while waiting for its line feed. Longer
   * fragments are discarded and reported.
   *
   * @default 1048576
   */
  maxLineLength: number;

  /**
   * Stop tailing a file once it no longer matches any pattern.
   *
   * @default true
   */
  stopOnRemove: boolean;
}

/**
 * Output Configuration
 */
export interface OutputConfig {
  /**
   * Prefix each line with "<path>: ".
   *
   * @default true
   */
  withFilenames: boolean;
}

/**
 * Logging Configuration
 */
export interface LoggingConfig {
  /**
   * Diagnostic log level. Diagnostics go to stderr.
   *
   * @default "warn"
   */
  level: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * Complete globtail configuration
 */
export interface TailConfig {
  scan: ScanConfig;
  tail: TailSettings;
  output: OutputConfig;
  /**
   * Wildcard exclude rules (`*` one or more characters, `?` exactly one).
   *
   * @default []
   * @example ["*.gz", "debug?.log"]
   */
  exclude: string[];
  logging: LoggingConfig;
}

// ============================================================================
// Zod Schemas
// ============================================================================

export const ScanConfigSchema = z.object({
  checkInterval: z
    .number()
    .finite()
    .positive({ message: 'checkInterval must be a positive number of seconds' })
    .max(MAX_TIMER_MS / 1000, { message: `checkInterval must be at most ${MAX_TIMER_MS / 1000} seconds` }),
});

export const TailSettingsSchema = z.object({
  startPosition: z.enum(['end', 'beginning']),
  pollInterval: z
    .number()
    .int()
    .positive({ message: 'pollInterval must be a positive integer (milliseconds)' })
    .max(MAX_TIMER_MS, { message: `pollInterval must be at most ${MAX_TIMER_MS} milliseconds` }),
  maxLineLength: z.number().int().positive({
    message: 'maxLineLength must be a positive integer (bytes)',
  }),
  stopOnRemove: z.boolean(),
});

export const OutputConfigSchema = z.object({
  withFilenames: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
});

export const TailConfigSchema = z.object({
  scan: ScanConfigSchema,
  tail: TailSettingsSchema,
  output: OutputConfigSchema,
  exclude: z.array(z.string()),
  logging: LoggingConfigSchema,
});
