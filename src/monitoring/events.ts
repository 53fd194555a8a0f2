/**
 * Watch Events
 *
 * Leveled observability events emitted by scanners, readers, sessions and
 * the orchestrator. Components receive a WatchEventSink at construction
 * instead of reaching for a process-wide logger.
 */

import type winston from 'winston';

// ============================================================================
// Types and Interfaces
// ============================================================================

export type WatchEventLevel = 'error' | 'warn' | 'info' | 'debug';

export type WatchEvent =
  | { type: 'scan-completed'; pattern: string; scanNumber: number; matched: number; added: number; removed: number }
  | { type: 'scan-failed'; pattern: string; scanNumber: number; error: string }
  | { type: 'file-found'; pattern: string; path: string }
  | { type: 'file-excluded'; path: string; rule: string }
  | { type: 'file-removed'; pattern: string; path: string }
  | { type: 'session-started'; path: string; sessionId: string; startOffset: number }
  | { type: 'session-skipped'; path: string; sessionId: string }
  | { type: 'session-stopped'; path: string; sessionId: string }
  | { type: 'session-error'; path: string; sessionId: string; error: string }
  | { type: 'file-truncated'; path: string; size: number }
  | { type: 'file-rotated'; path: string };

export type WatchEventType = WatchEvent['type'];

/**
 * Receives watch events
 */
export interface WatchEventSink {
  record(level: WatchEventLevel, event: WatchEvent): void;
}

/**
 * Sink that drops everything
 */
export const nullSink: WatchEventSink = {
  record: () => {},
};

// ============================================================================
// Formatting
// ============================================================================

/**
 * One-line human description of an event
 */
export function describeEvent(event: WatchEvent): string {
  switch (event.type) {
    case 'scan-completed':
      return `Scan #${event.scanNumber} of ${event.pattern}: ${event.matched} matched, ${event.added} added, ${event.removed} removed`;
    case 'scan-failed':
      return `Scan #${event.scanNumber} of ${event.pattern} failed: ${event.error}`;
    case 'file-found':
      return `Found ${event.path} (${event.pattern})`;
    case 'file-excluded':
      return `Skipping ${event.path} due to exclude rule ${event.rule}`;
    case 'file-removed':
      return `${event.path} no longer matches ${event.pattern}`;
    case 'session-started':
      return `Tailing ${event.path} from ${event.startOffset < 0 ? 'end of file' : `byte ${event.startOffset}`}`;
    case 'session-skipped':
      return `Already tailing ${event.path} (session ${event.sessionId})`;
    case 'session-stopped':
      return `Stopped tailing ${event.path}`;
    case 'session-error':
      return `Error tailing ${event.path}: ${event.error}`;
    case 'file-truncated':
      return `${event.path} was truncated to ${event.size} bytes; reading from the start`;
    case 'file-rotated':
      return `${event.path} was replaced; reading the new file from the start`;
  }
}

/**
 * Sink writing through a winston logger
 */
export function createLoggerSink(logger: winston.Logger): WatchEventSink {
  return {
    record(level, event) {
      logger.log(level, describeEvent(event), { event: event.type });
    },
  };
}
