/**
 * globtail
 *
 * Follow every file matching a set of globs, including files that appear
 * after startup.
 *
 * @example
 * ```typescript
 * import { SessionOrchestrator } from 'globtail';
 *
 * const orchestrator = new SessionOrchestrator({
 *   patterns: [{ pattern: '/var/log/*.log', interval: 5 }],
 *   onLine: (path, line) => console.log(`${path}: ${line}`),
 * });
 * orchestrator.start();
 * ```
 */

export * from './tail/index.js';
export * from './monitoring/index.js';
export * from './config/index.js';
export { LineConsumer, type LineConsumerOptions } from './cli/line-consumer.js';
export { createLogger, type LoggerOptions, type LogLevel } from './cli/logger.js';
export { startTail, type TailRequest, type TailRuntime, type TailDependencies } from './cli/program.js';
