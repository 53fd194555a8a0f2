/**
 * CLI Logging Infrastructure
 *
 * Provides configurable logging using Winston with support for:
 * - Multiple log levels (error, warn, info, debug)
 * - Colored level names (unless --no-color is specified)
 * - All output on stderr, keeping stdout for tailed lines
 */

import winston from 'winston';
import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
  level?: LogLevel;
  noColor?: boolean;
  verbose?: boolean;
}

const ALL_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Custom formatter for console output with chalk colors
 */
export const consoleFormat = (noColor: boolean) =>
  winston.format.printf(({ level, message, timestamp }) => {
    if (noColor) {
      return `[${timestamp}] ${level.toUpperCase()}: ${message}`;
    }

    const colorMap: Record<string, (text: string) => string> = {
      error: chalk.red,
      warn: chalk.yellow,
      info: chalk.blue,
      debug: chalk.gray,
    };

    const colorFn = colorMap[level] || ((text: string) => text);
    const levelText = colorFn(level.toUpperCase());
    const timeText = chalk.gray(`[${timestamp}]`);

    return `${timeText} ${levelText}: ${message}`;
  });

/**
 * Create a configured logger instance
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const { level = 'warn', noColor = false, verbose = false } = options;

  return winston.createLogger({
    level: verbose ? 'debug' : level,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.errors({ stack: true }),
    ),
    transports: [
      new winston.transports.Console({
        format: consoleFormat(noColor),
        stderrLevels: ALL_LEVELS,
      }),
    ],
  });
}
