/**
 * Default Configuration Values
 */

import type { TailConfig } from './schema.js';

/**
 * Defaults: rescan every 5 seconds, tail from the end of files that already
 * exist, prefix lines with their path, log warnings and errors only.
 */
export const DEFAULT_CONFIG: TailConfig = {
  scan: {
    checkInterval: 5,
  },
  tail: {
    startPosition: 'end',
    pollInterval: 250,
    maxLineLength: 1024 * 1024,
    stopOnRemove: true,
  },
  output: {
    withFilenames: true,
  },
  exclude: [],
  logging: {
    level: 'warn',
  },
};
