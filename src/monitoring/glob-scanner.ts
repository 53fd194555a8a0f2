/**
 * Glob Scanner
 *
 * Periodically expands one glob pattern and reports which paths appeared
 * and disappeared since the previous scan:
 * - First scan on the next event-loop turn, then every `interval` seconds
 * - Synchronous expansion with fast-glob, so a scan never overlaps another
 * - Added paths are reported (sorted) before removed paths (sorted)
 * - Expansion failures are recorded and the timer keeps running
 */

import fg from 'fast-glob';
import { ConfigurationError } from '../config/errors.js';
import { MAX_TIMER_MS } from '../config/schema.js';
import { toError } from '../tail/errors.js';
import { nullSink, type WatchEventSink } from './events.js';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Scanner state
 */
export enum ScannerState {
  IDLE = 'IDLE',
  SCANNING = 'SCANNING',
  STOPPED = 'STOPPED',
}

/**
 * Pattern plus rescan interval
 */
export interface WatchedPattern {
  /** Wildcard path, e.g. /var/log/*.log */
  readonly pattern: string;
  /** Seconds between scans (fractional allowed) */
  readonly interval: number;
}

/**
 * Passed with every notification
 */
export interface ScanContext {
  pattern: string;
  /** 1 for the first scan */
  scanNumber: number;
}

/**
 * Receives discovery notifications
 */
export interface ScanListener {
  onFound(path: string, context: ScanContext): void;
  onDeleted(path: string, context: ScanContext): void;
}

/**
 * Expands a pattern to the paths currently matching it
 */
export type GlobExpander = (pattern: string) => string[];

/**
 * Outcome of one scan
 */
export interface ScanResult {
  scanNumber: number;
  added: string[];
  removed: string[];
  /** Size of the known set after the scan */
  known: number;
}

/**
 * Scanner configuration
 */
export interface GlobScannerConfig extends WatchedPattern {
  /** Pattern expansion (default: fast-glob) */
  expand?: GlobExpander;
  /** Observability sink */
  sink?: WatchEventSink;
}

/**
 * Scanner status
 */
export interface ScannerStatus {
  state: ScannerState;
  pattern: string;
  interval: number;
  scanCount: number;
  knownFilesCount: number;
  lastScanAt?: Date;
  lastError?: {
    message: string;
    timestamp: Date;
  };
}

/**
 * POSIX-style glob: files and directories, no dotfiles, unreadable
 * directories skipped
 */
export const expandGlob: GlobExpander = (pattern) =>
  fg.sync(pattern, {
    onlyFiles: false,
    dot: false,
    unique: true,
    followSymbolicLinks: true,
    suppressErrors: true,
  });

/**
 * Validate an interval in seconds and convert it to milliseconds
 *
 * @throws ConfigurationError unless 0 < interval <= MAX_TIMER_MS / 1000
 */
export function intervalToMs(interval: number): number {
  if (!Number.isFinite(interval) || interval <= 0) {
    throw new ConfigurationError(
      `Scan interval must be a positive number of seconds, got: ${interval}`,
      'interval',
      'Use a value like 1, 0.5 or 60',
    );
  }
  const ms = Math.max(1, Math.round(interval * 1000));
  if (ms > MAX_TIMER_MS) {
    throw new ConfigurationError(
      `Scan interval must be at most ${MAX_TIMER_MS / 1000} seconds, got: ${interval}`,
      'interval',
      'Node timers cannot wait longer than about 24.8 days',
    );
  }
  return ms;
}

// ============================================================================
// GlobScanner Class
// ============================================================================

export class GlobScanner {
  readonly pattern: string;
  readonly interval: number;

  private readonly intervalMs: number;
  private readonly expand: GlobExpander;
  private readonly sink: WatchEventSink;
  private readonly listener: ScanListener;
  private known = new Set<string>();
  private state: ScannerState = ScannerState.IDLE;
  private scanCount = 0;
  private started = false;
  private firstScan?: NodeJS.Immediate;
  private timer?: NodeJS.Timeout;
  private lastScanAt?: Date;
  private lastError?: { message: string; timestamp: Date };

  /**
   * @throws ConfigurationError if the interval is not a positive number
   */
  constructor(config: GlobScannerConfig, listener: ScanListener) {
    this.pattern = config.pattern;
    this.interval = config.interval;
    this.intervalMs = intervalToMs(config.interval);
    this.expand = config.expand ?? expandGlob;
    this.sink = config.sink ?? nullSink;
    this.listener = listener;
  }

  // ==========================================================================
  // Lifecycle Management
  // ==========================================================================

  /**
   * Schedule the first scan for the next turn and the periodic rescans
   */
  start(): void {
    if (this.started || this.state === ScannerState.STOPPED) {
      return;
    }
    this.started = true;

    this.firstScan = setImmediate(() => {
      this.firstScan = undefined;
      this.tick();
      this.timer = setInterval(() => this.tick(), this.intervalMs);
    });
  }

  /**
   * Cancel pending scans. The known set is kept for inspection.
   */
  stop(): void {
    if (this.firstScan) {
      clearImmediate(this.firstScan);
      this.firstScan = undefined;
    }
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.state = ScannerState.STOPPED;
  }

  // ==========================================================================
  // Scanning
  // ==========================================================================

  /**
   * Run one scan now.
   *
   * @returns The diff, or undefined when the scanner is stopped, already
   *   scanning (re-entrant call from a listener) or the expansion failed
   */
  tick(): ScanResult | undefined {
    if (this.state !== ScannerState.IDLE) {
      return undefined;
    }

    this.state = ScannerState.SCANNING;
    const scanNumber = ++this.scanCount;
    const context: ScanContext = { pattern: this.pattern, scanNumber };

    try {
      let current: Set<string>;
      try {
        current = new Set(this.expand(this.pattern));
      } catch (error) {
        const message = toError(error).message;
        this.lastError = { message, timestamp: new Date() };
        this.sink.record('error', { type: 'scan-failed', pattern: this.pattern, scanNumber, error: message });
        return undefined;
      }

      const added = [...current].filter((path) => !this.known.has(path)).sort();
      const removed = [...this.known].filter((path) => !current.has(path)).sort();
      this.known = current;
      this.lastScanAt = new Date();

      for (const path of added) {
        this.notify(() => this.listener.onFound(path, context), path);
      }
      for (const path of removed) {
        this.notify(() => this.listener.onDeleted(path, context), path);
      }

      this.sink.record('debug', {
        type: 'scan-completed',
        pattern: this.pattern,
        scanNumber,
        matched: current.size,
        added: added.length,
        removed: removed.length,
      });

      return { scanNumber, added, removed, known: current.size };
    } finally {
      if (this.state === ScannerState.SCANNING) {
        this.state = ScannerState.IDLE;
      }
    }
  }

  private notify(callback: () => void, path: string): void {
    try {
      callback();
    } catch (error) {
      const message = toError(error).message;
      this.lastError = { message, timestamp: new Date() };
      this.sink.record('error', {
        type: 'scan-failed',
        pattern: this.pattern,
        scanNumber: this.scanCount,
        error: `listener failed for ${path}: ${message}`,
      });
    }
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  has(path: string): boolean {
    return this.known.has(path);
  }

  getKnownFiles(): string[] {
    return [...this.known].sort();
  }

  getState(): ScannerState {
    return this.state;
  }

  getStatus(): ScannerStatus {
    return {
      state: this.state,
      pattern: this.pattern,
      interval: this.interval,
      scanCount: this.scanCount,
      knownFilesCount: this.known.size,
      lastScanAt: this.lastScanAt,
      lastError: this.lastError,
    };
  }
}
