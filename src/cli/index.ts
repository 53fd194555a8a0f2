#!/usr/bin/env node

/**
 * globtail CLI Entry Point
 *
 * Usage: globtail [options] <paths...>
 *
 * Lines are written to stdout; diagnostics and per-file errors go to stderr.
 * Exit codes:
 * - 0  stopped by SIGINT/SIGTERM
 * - 1  usage error or unexpected failure
 * - 2  invalid configuration
 */

import chalk from 'chalk';
import { createProgram, startTail, type TailRuntime } from './program.js';
import { ConfigurationError } from '../config/errors.js';

/**
 * Stop every session before exiting on SIGINT/SIGTERM
 */
function setupShutdownHandlers(runtime: TailRuntime): void {
  let stopping = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    runtime.logger.debug(`Received ${signal}, shutting down...`);

    try {
      await runtime.orchestrator.stop();
    } catch (error) {
      runtime.logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

/**
 * Global error handler for unhandled errors
 */
function setupErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    console.error(chalk.red('Unhandled promise rejection:'));
    console.error(reason);
    process.exit(1);
  });

  process.on('uncaughtException', (error: Error) => {
    console.error(chalk.red('Uncaught exception:'));
    console.error(error);
    process.exit(1);
  });
}

/**
 * Main CLI execution
 */
async function main(): Promise<void> {
  try {
    setupErrorHandlers();

    const program = createProgram({
      run: (request) => {
        const runtime = startTail(request);
        setupShutdownHandlers(runtime);
      },
    });

    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(chalk.red('Error:'), error.message);
      if (error.suggestion) {
        console.error(chalk.gray(`  ${error.suggestion}`));
      }
      process.exit(2);
    }

    if (error instanceof Error) {
      console.error(chalk.red('Error:'), error.message);
    } else {
      console.error(chalk.red('Unknown error:'), error);
    }
    process.exit(1);
  }
}

void main();
