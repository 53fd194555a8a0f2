/**
 * globtail Command
 *
 * Builds the commander program, turns its options into a validated
 * configuration and wires the orchestrator to the terminal.
 */

import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import chalk from 'chalk';
import type winston from 'winston';
import { createLogger } from './logger.js';
import { LineConsumer } from './line-consumer.js';
import { collect, isVerboseEnabled, resolvePath, validatePositiveInteger, validatePositiveNumber } from './options.js';
import { loadConfig, type ConfigOverrides, type TailConfig } from '../config/index.js';
import { SessionOrchestrator } from '../monitoring/session-orchestrator.js';
import { createLoggerSink } from '../monitoring/events.js';
import type { GlobExpander } from '../monitoring/glob-scanner.js';
import { createFileTailOpener, type OpenTail } from '../tail/tail-reader.js';
import { AcquisitionError } from '../tail/errors.js';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Raw commander option values
 */
export type CliOptions = {
  filename: boolean;
  checkInterval?: string;
  exclude: string[];
  fromBeginning?: boolean;
  maxLineLength?: string;
  pollInterval?: string;
  config?: string;
  verbose?: boolean;
  color: boolean;
};

/**
 * Everything needed to start tailing
 */
export interface TailRequest {
  paths: string[];
  config: TailConfig;
  verbose: boolean;
  noColor: boolean;
}

/**
 * Collaborators replaced in tests
 */
export interface TailDependencies {
  output?: NodeJS.WritableStream;
  errorOutput?: NodeJS.WritableStream;
  logger?: winston.Logger;
  openTail?: OpenTail;
  expand?: GlobExpander;
}

/**
 * A running tail
 */
export interface TailRuntime {
  orchestrator: SessionOrchestrator;
  consumer: LineConsumer;
  logger: winston.Logger;
}

export interface ProgramOptions {
  /** Called with the resolved request */
  run: (request: TailRequest) => void | Promise<void>;
  /** Environment used for configuration (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Request Resolution
// ============================================================================

/**
 * Translate explicitly given CLI options into config overrides
 *
 * @throws ConfigurationError for malformed numbers
 */
export function buildOverrides(options: CliOptions, command: Command): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  if (options.checkInterval !== undefined) {
    overrides.scan = { checkInterval: validatePositiveNumber(options.checkInterval, 'check-interval') };
  }

  const tail: NonNullable<ConfigOverrides['tail']> = {};
  if (options.fromBeginning) {
    tail.startPosition = 'beginning';
  }
  if (options.pollInterval !== undefined) {
    tail.pollInterval = validatePositiveInteger(options.pollInterval, 'poll-interval');
  }
  if (options.maxLineLength !== undefined) {
    tail.maxLineLength = validatePositiveInteger(options.maxLineLength, 'max-line-length');
  }
  if (Object.keys(tail).length > 0) {
    overrides.tail = tail;
  }

  // --no-filename defaults to true; only an explicit flag overrides the file
  if (command.getOptionValueSource('filename') === 'cli') {
    overrides.output = { withFilenames: options.filename };
  }

  if (options.exclude.length > 0) {
    overrides.exclude = options.exclude;
  }

  if (options.verbose) {
    overrides.logging = { level: 'debug' };
  }

  return overrides;
}

/**
 * Resolve positional paths and options into a validated request
 *
 * @throws ConfigurationError if any source holds an invalid value
 */
export function resolveTailRequest(
  paths: string[],
  options: CliOptions,
  command: Command,
  env: NodeJS.ProcessEnv = process.env,
): TailRequest {
  const config = loadConfig({
    configPath: options.config ? resolvePath(options.config, true) : undefined,
    overrides: buildOverrides(options, command),
    env,
  });

  return {
    paths,
    config,
    verbose: isVerboseEnabled(options.verbose, env),
    noColor: !options.color,
  };
}

// ============================================================================
// Running
// ============================================================================

/**
 * Error line printed for a file that could not be tailed
 */
export function formatFileError(error: Error, filePath: string, noColor = false): string {
  const text =
    error instanceof AcquisitionError ? error.message : `${error.name} while tailing ${filePath}: ${error.message}`;
  return noColor ? text : chalk.red(text);
}

/**
 * Start watching every requested pattern
 */
export function startTail(request: TailRequest, deps: TailDependencies = {}): TailRuntime {
  const { config } = request;
  const logger =
    deps.logger ??
    createLogger({ level: config.logging.level, noColor: request.noColor, verbose: request.verbose });
  const sink = createLoggerSink(logger);
  const errorOutput = deps.errorOutput ?? process.stderr;

  const consumer = new LineConsumer({
    withFilenames: config.output.withFilenames,
    output: deps.output,
  });

  const orchestrator = new SessionOrchestrator({
    patterns: request.paths.map((pattern) => ({ pattern, interval: config.scan.checkInterval })),
    exclude: config.exclude,
    onLine: consumer.onLine,
    onError: (error, filePath) => {
      errorOutput.write(`${formatFileError(error, filePath, request.noColor)}\n`);
    },
    sink,
    initialOffset: config.tail.startPosition === 'beginning' ? 0 : -1,
    discoveredOffset: 0,
    stopOnRemove: config.tail.stopOnRemove,
    maxLineLength: config.tail.maxLineLength,
    openTail: deps.openTail ?? createFileTailOpener({ pollInterval: config.tail.pollInterval, sink }),
    expand: deps.expand,
  });

  logger.debug(`Watching ${request.paths.join(', ')} every ${config.scan.checkInterval}s`);
  orchestrator.start();

  return { orchestrator, consumer, logger };
}

// ============================================================================
// Program
// ============================================================================

/**
 * Version from the nearest package.json above this module
 */
export function readPackageVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));

  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}

/**
 * Create and configure the CLI program
 */
export function createProgram(options: ProgramOptions): Command {
  const program = new Command();

  program
    .name('globtail')
    .description('Tail every file matching one or more globs, picking up new files as they appear')
    .version(readPackageVersion(), '-V, --version', 'Output the current version')
    .argument('[paths...]', 'Paths or globs to tail (quote globs so the shell leaves them alone)')
    .option('-n, --no-filename', 'Do not prefix lines with the file they came from')
    .option('-i, --check-interval <seconds>', 'Seconds between glob rescans')
    .option('-x, --exclude <pattern>', 'Skip paths matching this wildcard (repeatable)', collect, [])
    .option('-b, --from-beginning', 'Read files that already exist from their first byte')
    .option('--max-line-length <bytes>', 'Longest unterminated line kept in memory')
    .option('--poll-interval <ms>', 'Milliseconds between growth checks of each file')
    .option('-c, --config <path>', 'Path to a YAML configuration file')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output')
    .action(async (paths: string[], _options: unknown, command: Command) => {
      if (paths.length === 0) {
        command.help({ error: true });
      }

      const request = resolveTailRequest(paths, command.opts<CliOptions>(), command, options.env);
      await options.run(request);
    })
    .addHelpText(
      'after',
      `
Examples:
  $ globtail '/var/log/*.log'                   # Tail all logs, new ones included
  $ globtail -n -i 1 '/var/log/app/*.log'       # No filename prefix, rescan every second
  $ globtail -x '*.gz' -x 'debug?.log' '/var/log/**/*'

Exclude patterns:
  *   one or more characters
  ?   exactly one character

Environment Variables:
  GLOBTAIL_CONFIG          Path to a YAML configuration file
  GLOBTAIL_CHECK_INTERVAL  Seconds between glob rescans
  GLOBTAIL_POLL_INTERVAL   Milliseconds between growth checks
  GLOBTAIL_LOG_LEVEL       Diagnostic log level (error, warn, info, debug)
  GLOBTAIL_VERBOSE         Enable verbose mode (true/false)
`,
    );

  return program;
}
