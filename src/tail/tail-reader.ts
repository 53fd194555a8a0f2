/**
 * File Tail Reader
 *
 * Byte-level `tail -f` primitive for one path:
 * - Opens the file at its end (startOffset -1) or at an absolute offset
 * - Polls for growth with chokidar (polling mode, no fs events)
 * - Serializes reads and delivers non-empty chunks in file order
 * - Restarts at byte 0 after truncation or when the path is replaced
 */

import * as chokidar from 'chokidar';
import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import type { Stats } from 'fs';
import { AcquisitionError, AcquisitionErrorKind, isErrnoException, toAcquisitionError, toError } from './errors.js';
import { nullSink, type WatchEventSink } from '../monitoring/events.js';
import { MAX_TIMER_MS } from '../config/schema.js';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Callbacks a reader delivers to
 */
export interface TailCallbacks {
  /** New bytes, never empty */
  onChunk(chunk: Buffer): void;
  /** Read or watch failure after the file was acquired */
  onError(error: Error): void;
}

/**
 * Open tail on one file
 */
export interface TailHandle {
  readonly path: string;
  /** Next byte offset to be read */
  readonly position: number;
  close(): Promise<void>;
}

/**
 * Reader configuration
 */
export interface TailReaderOptions {
  /** Growth poll interval (ms, default: 250, capped at MAX_TIMER_MS) */
  pollInterval?: number;
  /** Largest chunk handed to onChunk (bytes, default: 64 KiB) */
  chunkSize?: number;
  /** Observability sink */
  sink?: WatchEventSink;
}

/**
 * Opens a tail; rejects with AcquisitionError
 */
export type OpenTail = (
  path: string,
  startOffset: number,
  callbacks: TailCallbacks,
) => Promise<TailHandle>;

// ============================================================================
// FileTailReader Class
// ============================================================================

export class FileTailReader implements TailHandle {
  private readonly pollInterval: number;
  private readonly chunkSize: number;
  private readonly sink: WatchEventSink;
  private watcher?: chokidar.FSWatcher;
  private inFlight?: Promise<void>;
  private rerun = false;
  private closed = false;

  private constructor(
    public readonly path: string,
    private file: FileHandle,
    private inode: number,
    private offset: number,
    private readonly callbacks: TailCallbacks,
    options: TailReaderOptions,
  ) {
    this.pollInterval = Math.min(options.pollInterval ?? 250, MAX_TIMER_MS);
    this.chunkSize = options.chunkSize ?? 64 * 1024;
    this.sink = options.sink ?? nullSink;
  }

  /**
   * Open a path for tailing
   *
   * @param path - File to tail
   * @param startOffset - -1 for end of file, otherwise an absolute byte offset
   * @throws AcquisitionError if the path cannot be opened or is a directory
   */
  static async open(
    path: string,
    startOffset: number,
    callbacks: TailCallbacks,
    options: TailReaderOptions = {},
  ): Promise<FileTailReader> {
    let file: FileHandle;
    try {
      file = await fs.open(path, 'r');
    } catch (error) {
      throw toAcquisitionError(path, error);
    }

    try {
      const stats = await file.stat();
      if (stats.isDirectory()) {
        throw new AcquisitionError(path, AcquisitionErrorKind.IS_A_DIRECTORY);
      }

      // An offset past the end starts at the current end
      const offset = startOffset < 0 ? stats.size : Math.min(startOffset, stats.size);
      const reader = new FileTailReader(path, file, stats.ino, offset, callbacks, options);
      reader.watch();

      // Pre-existing bytes from an explicit offset are delivered right away
      if (startOffset >= 0) {
        reader.schedule();
      }

      return reader;
    } catch (error) {
      await file.close();
      throw toAcquisitionError(path, error);
    }
  }

  get position(): number {
    return this.offset;
  }

  /**
   * Stop polling, wait for an in-flight read and release the descriptor
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = undefined;
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    await this.file.close();
  }

  // ==========================================================================
  // Change Detection
  // ==========================================================================

  private watch(): void {
    this.watcher = chokidar.watch(this.path, {
      persistent: true,
      ignoreInitial: true,
      usePolling: true,
      interval: this.pollInterval,
      binaryInterval: this.pollInterval,
      alwaysStat: false,
    });

    this.watcher.on('change', () => this.schedule());
    this.watcher.on('add', () => this.schedule());
    // Bytes appended between open() and the first poll baseline
    this.watcher.on('ready', () => this.schedule());
    this.watcher.on('error', (error: Error) => this.callbacks.onError(error));
  }

  /**
   * Run a drain now, or once the current one finishes
   */
  private schedule(): void {
    if (this.closed) {
      return;
    }

    if (this.inFlight) {
      this.rerun = true;
      return;
    }

    this.inFlight = this.pump().finally(() => {
      this.inFlight = undefined;
    });
  }

  private async pump(): Promise<void> {
    try {
      do {
        this.rerun = false;
        await this.drain();
      } while (this.rerun && !this.closed);
    } catch (error) {
      this.callbacks.onError(toError(error));
    }
  }

  // ==========================================================================
  // Reading
  // ==========================================================================

  private async drain(): Promise<void> {
    await this.followReplacement();

    const stats = await this.file.stat();
    if (stats.size < this.offset) {
      this.offset = 0;
      this.sink.record('warn', { type: 'file-truncated', path: this.path, size: stats.size });
    }

    await this.readToEnd();
  }

  /**
   * If the path now names another file, finish the old one and switch over
   */
  private async followReplacement(): Promise<void> {
    let inode: number;
    try {
      inode = (await fs.stat(this.path)).ino;
    } catch (error) {
      // Deleted: keep reading what the open descriptor still sees
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return;
      }
      throw error;
    }

    if (inode === this.inode || this.closed) {
      return;
    }

    await this.readToEnd();

    const next = await fs.open(this.path, 'r');
    let stats: Stats;
    try {
      stats = await next.stat();
    } catch (error) {
      await next.close();
      throw error;
    }
    await this.file.close();

    this.file = next;
    this.inode = stats.ino;
    this.offset = 0;
    this.sink.record('info', { type: 'file-rotated', path: this.path });
  }

  private async readToEnd(): Promise<void> {
    const buffer = Buffer.alloc(this.chunkSize);

    while (!this.closed) {
      const { bytesRead } = await this.file.read(buffer, 0, buffer.length, this.offset);
      if (bytesRead === 0) {
        return;
      }

      this.offset += bytesRead;
      this.callbacks.onChunk(Buffer.from(buffer.subarray(0, bytesRead)));
    }
  }
}

/**
 * OpenTail backed by FileTailReader
 */
export function createFileTailOpener(options: TailReaderOptions = {}): OpenTail {
  return (path, startOffset, callbacks) => FileTailReader.open(path, startOffset, callbacks, options);
}
