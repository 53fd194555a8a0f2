/**
 * Monitoring Module
 *
 * Exports glob discovery, exclude rules, session orchestration and watch events.
 */

export {
  compileExcludeRule,
  compileExcludeRules,
  findExcludeRule,
  wildcardToRegexSource,
  type ExcludeRule,
} from './exclude-rules.js';
export {
  GlobScanner,
  ScannerState,
  expandGlob,
  intervalToMs,
  type WatchedPattern,
  type ScanContext,
  type ScanListener,
  type ScanResult,
  type GlobExpander,
  type GlobScannerConfig,
  type ScannerStatus,
} from './glob-scanner.js';
export {
  SessionOrchestrator,
  OrchestratorState,
  type OrchestratorConfig,
  type OrchestratorStatus,
  type FileErrorHandler,
} from './session-orchestrator.js';
export {
  createLoggerSink,
  describeEvent,
  nullSink,
  type WatchEvent,
  type WatchEventLevel,
  type WatchEventSink,
  type WatchEventType,
} from './events.js';
