/**
 * Option Parsing and Validation
 *
 * Provides utilities for parsing, validating, and normalizing CLI options:
 * - Positive numbers (intervals, sizes)
 * - Repeatable options
 * - Path resolution and validation
 * - Environment variable overrides
 */

import path from 'path';
import fs from 'fs-extra';
import { ConfigurationError } from '../config/errors.js';

/**
 * Validate a positive number
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @returns Validated number
 * @throws ConfigurationError if not a positive number
 */
export function validatePositiveNumber(value: unknown, field: string): number {
  if (typeof value === 'string' && value.trim() === '') {
    throw new ConfigurationError(`${field} must be a positive number, got: "${value}"`, field);
  }

  const num = typeof value === 'string' ? Number(value.trim()) : Number(value);

  if (!Number.isFinite(num) || num <= 0) {
    throw new ConfigurationError(
      `${field} must be a positive number, got: "${value}"`,
      field,
      'Provide a positive number like 1, 2.5, etc.',
    );
  }

  return num;
}

/**
 * Validate a positive integer
 *
 * @throws ConfigurationError if not a positive integer
 */
export function validatePositiveInteger(value: unknown, field: string): number {
  const num = validatePositiveNumber(value, field);

  if (!Number.isInteger(num)) {
    throw new ConfigurationError(`${field} must be a whole number, got: "${value}"`, field, 'Drop the fraction');
  }

  return num;
}

/**
 * Commander reducer for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Resolve and validate a file path
 *
 * @param filePath - Path to resolve (can be relative or absolute)
 * @param mustExist - Whether the path must exist
 * @returns Absolute path
 * @throws ConfigurationError if the path doesn't exist when required
 */
export function resolvePath(filePath: string, mustExist = false): string {
  const resolved = path.resolve(filePath.trim());

  if (mustExist && !fs.pathExistsSync(resolved)) {
    throw new ConfigurationError(`Path does not exist: "${filePath}"`, 'path', 'Provide a valid file path');
  }

  return resolved;
}

/**
 * Check if verbose mode is enabled
 *
 * Checks both --verbose flag and GLOBTAIL_VERBOSE environment variable
 */
export function isVerboseEnabled(verboseFlag?: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  if (verboseFlag !== undefined) {
    return verboseFlag;
  }

  const envVerbose = env.GLOBTAIL_VERBOSE;
  return envVerbose === 'true' || envVerbose === '1';
}
