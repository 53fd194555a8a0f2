/**
 * Session Orchestrator
 *
 * Owns one GlobScanner per watched pattern and one TailSession per accepted
 * path:
 * - Discovered paths are checked against the exclude rules first
 * - At most one live session per path, even across overlapping patterns
 * - Files present at a scanner's first scan start at `initialOffset`;
 *   files appearing later start at `discoveredOffset`
 * - Removed paths stop their session once no scanner still matches them
 * - Acquisition and read failures are isolated to their session
 */

import { TailSession, type LineHandler, type SessionStatus } from '../tail/tail-session.js';
import type { OpenTail } from '../tail/tail-reader.js';
import { toError } from '../tail/errors.js';
import { compileExcludeRules, findExcludeRule, type ExcludeRule } from './exclude-rules.js';
import {
  GlobScanner,
  type GlobExpander,
  type ScanContext,
  type ScannerStatus,
  type WatchedPattern,
} from './glob-scanner.js';
import { nullSink, type WatchEventSink } from './events.js';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * IDLE until start(); STOPPED is final
 */
export enum OrchestratorState {
  IDLE = 'IDLE',
  RUNNING = 'RUNNING',
  STOPPED = 'STOPPED',
}

/**
 * Receives per-file failures
 */
export type FileErrorHandler = (error: Error, path: string) => void;

/**
 * Orchestrator configuration
 */
export interface OrchestratorConfig {
  /** Patterns to watch */
  patterns: readonly WatchedPattern[];
  /** Line consumer shared by every session */
  onLine: LineHandler;
  /** Wildcard exclude rules */
  exclude?: readonly string[];
  /** Error observer (acquisition, read and consumer failures) */
  onError?: FileErrorHandler;
  /** Observability sink */
  sink?: WatchEventSink;
  /** Offset for files matched by a scanner's first scan (default: -1, end of file) */
  initialOffset?: number;
  /** Offset for files that appear on later scans (default: 0) */
  discoveredOffset?: number;
  /** Stop a session when its path stops matching (default: true) */
  stopOnRemove?: boolean;
  /** Largest unterminated line buffered per session (bytes) */
  maxLineLength?: number;
  /** Reader factory handed to every session */
  openTail?: OpenTail;
  /** Pattern expansion handed to every scanner */
  expand?: GlobExpander;
}

/**
 * Orchestrator status
 */
export interface OrchestratorStatus {
  state: OrchestratorState;
  scanners: ScannerStatus[];
  sessions: SessionStatus[];
}

// ============================================================================
// SessionOrchestrator Class
// ============================================================================

export class SessionOrchestrator {
  private readonly config: OrchestratorConfig;
  private readonly rules: ExcludeRule[];
  private readonly sink: WatchEventSink;
  private readonly scanners: GlobScanner[];
  private readonly sessions = new Map<string, TailSession>();
  private readonly initialOffset: number;
  private readonly discoveredOffset: number;
  private readonly stopOnRemove: boolean;
  private readonly pending = new Set<Promise<void>>();
  private state: OrchestratorState = OrchestratorState.IDLE;

  /**
   * @throws ConfigurationError if a pattern interval is invalid
   */
  constructor(config: OrchestratorConfig) {
    this.config = config;
    this.rules = compileExcludeRules(config.exclude ?? []);
    this.sink = config.sink ?? nullSink;
    this.initialOffset = config.initialOffset ?? -1;
    this.discoveredOffset = config.discoveredOffset ?? 0;
    this.stopOnRemove = config.stopOnRemove ?? true;

    this.scanners = config.patterns.map(
      (watched) =>
        new GlobScanner(
          { pattern: watched.pattern, interval: watched.interval, expand: config.expand, sink: this.sink },
          {
            onFound: (path, context) => this.handleFound(path, context),
            onDeleted: (path, context) => this.handleDeleted(path, context),
          },
        ),
    );
  }

  // ==========================================================================
  // Lifecycle Management
  // ==========================================================================

  /**
   * Start every scanner
   *
   * @throws Error if the orchestrator was stopped
   */
  start(): void {
    if (this.state === OrchestratorState.RUNNING) {
      return;
    }
    if (this.state === OrchestratorState.STOPPED) {
      throw new Error('SessionOrchestrator cannot be restarted after stop(); create a new one');
    }
    this.state = OrchestratorState.RUNNING;

    for (const scanner of this.scanners) {
      scanner.start();
    }
  }

  /**
   * Cancel every scan timer and release every session's file
   */
  async stop(): Promise<void> {
    this.state = OrchestratorState.STOPPED;

    for (const scanner of this.scanners) {
      scanner.stop();
    }

    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(sessions.map((session) => session.stop()));
    await Promise.all([...this.pending]);
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getScanners(): readonly GlobScanner[] {
    return this.scanners;
  }

  getSession(path: string): TailSession | undefined {
    return this.sessions.get(path);
  }

  getStatus(): OrchestratorStatus {
    return {
      state: this.state,
      scanners: this.scanners.map((scanner) => scanner.getStatus()),
      sessions: [...this.sessions.values()].map((session) => session.getStatus()),
    };
  }

  /**
   * Resolves once every session started so far has finished acquiring its file
   */
  async settled(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  // ==========================================================================
  // Scanner Notifications
  // ==========================================================================

  private handleFound(path: string, context: ScanContext): void {
    if (this.state !== OrchestratorState.RUNNING) {
      return;
    }

    this.sink.record('debug', { type: 'file-found', pattern: context.pattern, path });

    const rule = findExcludeRule(this.rules, path);
    if (rule) {
      this.sink.record('info', { type: 'file-excluded', path, rule: rule.source });
      return;
    }

    const existing = this.sessions.get(path);
    if (existing?.isLive()) {
      this.sink.record('debug', { type: 'session-skipped', path, sessionId: existing.id });
      return;
    }

    const session = new TailSession({
      path,
      startOffset: context.scanNumber === 1 ? this.initialOffset : this.discoveredOffset,
      onLine: this.config.onLine,
      onError: (error) => this.reportError(error, path),
      openTail: this.config.openTail,
      maxLineLength: this.config.maxLineLength,
      sink: this.sink,
    });
    this.sessions.set(path, session);

    const starting = session
      .start()
      .catch((error: unknown) => this.reportError(toError(error), path))
      .finally(() => {
        this.pending.delete(starting);
      });
    this.pending.add(starting);
  }

  private handleDeleted(path: string, context: ScanContext): void {
    this.sink.record('info', { type: 'file-removed', pattern: context.pattern, path });

    if (!this.stopOnRemove || this.scanners.some((scanner) => scanner.has(path))) {
      return;
    }

    const session = this.sessions.get(path);
    if (!session) {
      return;
    }

    this.sessions.delete(path);
    const stopping = session
      .stop()
      .catch((error: unknown) => this.reportError(toError(error), path))
      .finally(() => {
        this.pending.delete(stopping);
      });
    this.pending.add(stopping);
  }

  private reportError(error: Error, path: string): void {
    if (!this.config.onError) {
      return;
    }

    try {
      this.config.onError(error, path);
    } catch (handlerError) {
      this.sink.record('error', {
        type: 'session-error',
        path,
        sessionId: this.sessions.get(path)?.id ?? 'unknown',
        error: `error handler failed: ${toError(handlerError).message}`,
      });
    }
  }
}
