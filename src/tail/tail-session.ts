/**
 * Tail Session
 *
 * One live tail of one discovered file. Bridges the reader's chunk delivery
 * to a LineAssembler and forwards each completed line, with its path, to the
 * consumer. Failures are reported through the error callback and never
 * escape to sibling sessions.
 */

import { v4 as uuidv4 } from 'uuid';
import { LineAssembler } from './line-assembler.js';
import { createFileTailOpener, type OpenTail, type TailHandle } from './tail-reader.js';
import { toAcquisitionError, toError } from './errors.js';
import { nullSink, type WatchEventSink } from '../monitoring/events.js';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Session lifecycle
 */
export enum SessionState {
  PENDING = 'PENDING',
  ACTIVE = 'ACTIVE',
  FAILED = 'FAILED',
  STOPPED = 'STOPPED',
}

/**
 * Receives every completed line
 */
export type LineHandler = (path: string, line: string) => void;

/**
 * Receives session failures
 */
export type SessionErrorHandler = (error: Error, session: TailSession) => void;

/**
 * Session configuration
 */
export interface TailSessionConfig {
  /** File to tail */
  path: string;
  /** -1 for end of file, otherwise an absolute byte offset */
  startOffset: number;
  /** Line consumer */
  onLine: LineHandler;
  /** Error observer */
  onError?: SessionErrorHandler;
  /** Reader factory (default: FileTailReader) */
  openTail?: OpenTail;
  /** Largest unterminated line buffered (bytes) */
  maxLineLength?: number;
  /** Observability sink */
  sink?: WatchEventSink;
}

/**
 * Session snapshot
 */
export interface SessionStatus {
  id: string;
  path: string;
  state: SessionState;
  startOffset: number;
  linesEmitted: number;
  bufferedBytes: number;
  startedAt?: Date;
  lastError?: {
    message: string;
    timestamp: Date;
  };
}

// ============================================================================
// TailSession Class
// ============================================================================

export class TailSession {
  readonly id = uuidv4();
  readonly path: string;
  readonly startOffset: number;

  private readonly onLine: LineHandler;
  private readonly onError: SessionErrorHandler;
  private readonly openTail: OpenTail;
  private readonly sink: WatchEventSink;
  private readonly assembler: LineAssembler;
  private state: SessionState = SessionState.PENDING;
  private handle?: TailHandle;
  private startedAt?: Date;
  private lastError?: { message: string; timestamp: Date };

  constructor(config: TailSessionConfig) {
    this.path = config.path;
    this.startOffset = config.startOffset;
    this.onLine = config.onLine;
    this.onError = config.onError ?? (() => {});
    this.sink = config.sink ?? nullSink;
    this.openTail = config.openTail ?? createFileTailOpener({ sink: this.sink });
    this.assembler = new LineAssembler({ maxBufferedBytes: config.maxLineLength });
  }

  /**
   * Acquire the file and begin delivering lines.
   *
   * Resolves in every case; an acquisition failure moves the session to
   * FAILED and is passed to the error handler.
   */
  async start(): Promise<void> {
    if (this.state !== SessionState.PENDING) {
      return;
    }

    let handle: TailHandle;
    try {
      handle = await this.openTail(this.path, this.startOffset, {
        onChunk: (chunk) => this.handleChunk(chunk),
        onError: (error) => this.report(error),
      });
    } catch (error) {
      if (this.getState() === SessionState.PENDING) {
        this.state = SessionState.FAILED;
        this.report(toAcquisitionError(this.path, error));
      }
      return;
    }

    // stop() was called while the file was being opened
    if (this.getState() === SessionState.STOPPED) {
      await handle.close();
      return;
    }

    this.handle = handle;
    this.state = SessionState.ACTIVE;
    this.startedAt = new Date();
    this.sink.record('info', {
      type: 'session-started',
      path: this.path,
      sessionId: this.id,
      startOffset: this.startOffset,
    });
  }

  /**
   * Release the reader. Safe to call more than once.
   */
  async stop(): Promise<void> {
    if (this.state === SessionState.STOPPED) {
      return;
    }

    const wasLive = this.isLive();
    this.state = SessionState.STOPPED;

    if (this.handle) {
      const handle = this.handle;
      this.handle = undefined;
      await handle.close();
    }

    if (wasLive) {
      this.sink.record('debug', { type: 'session-stopped', path: this.path, sessionId: this.id });
    }
  }

  /**
   * Pending or active
   */
  isLive(): boolean {
    return this.state === SessionState.PENDING || this.state === SessionState.ACTIVE;
  }

  getState(): SessionState {
    return this.state;
  }

  getStatus(): SessionStatus {
    const stats = this.assembler.getStats();
    return {
      id: this.id,
      path: this.path,
      state: this.state,
      startOffset: this.startOffset,
      linesEmitted: stats.linesEmitted,
      bufferedBytes: stats.bufferedBytes,
      startedAt: this.startedAt,
      lastError: this.lastError,
    };
  }

  // ==========================================================================
  // Chunk Handling
  // ==========================================================================

  private handleChunk(chunk: Buffer): void {
    if (this.state === SessionState.STOPPED) {
      return;
    }

    try {
      for (const line of this.assembler.feed(chunk)) {
        this.deliver(line);
      }
    } catch (error) {
      // LineOverflowError; the assembler has already dropped the fragment
      this.report(toError(error));
    }
  }

  private deliver(line: string): void {
    try {
      this.onLine(this.path, line);
    } catch (error) {
      this.report(toError(error));
    }
  }

  private report(error: unknown): void {
    const normalized = toError(error);
    this.lastError = { message: normalized.message, timestamp: new Date() };
    this.sink.record('error', {
      type: 'session-error',
      path: this.path,
      sessionId: this.id,
      error: normalized.message,
    });
    this.onError(normalized, this);
  }
}
