import { describe, it, expect, vi } from 'vitest';
import winston from 'winston';
import { createLoggerSink, describeEvent, nullSink } from '../../src/monitoring/events.js';

describe('Watch events', () => {
  describe('describeEvent', () => {
    it('describes exclusions with the rule that matched', () => {
      expect(describeEvent({ type: 'file-excluded', path: '/logs/app1.log', rule: 'app*.log' })).toBe(
        'Skipping /logs/app1.log due to exclude rule app*.log',
      );
    });

    it('describes where a session starts', () => {
      expect(describeEvent({ type: 'session-started', path: '/logs/a.log', sessionId: 's1', startOffset: -1 })).toBe(
        'Tailing /logs/a.log from end of file',
      );
      expect(describeEvent({ type: 'session-started', path: '/logs/a.log', sessionId: 's1', startOffset: 0 })).toBe(
        'Tailing /logs/a.log from byte 0',
      );
    });

    it('describes scan results', () => {
      expect(
        describeEvent({ type: 'scan-completed', pattern: '/logs/*', scanNumber: 3, matched: 4, added: 1, removed: 2 }),
      ).toBe('Scan #3 of /logs/*: 4 matched, 1 added, 2 removed');
      expect(describeEvent({ type: 'scan-failed', pattern: '/logs/*', scanNumber: 2, error: 'EMFILE' })).toBe(
        'Scan #2 of /logs/* failed: EMFILE',
      );
    });

    it('describes session errors', () => {
      expect(
        describeEvent({ type: 'session-error', path: '/logs/a.log', sessionId: 's1', error: 'read failed' }),
      ).toBe('Error tailing /logs/a.log: read failed');
    });

    it('describes truncation and replacement', () => {
      expect(describeEvent({ type: 'file-truncated', path: '/logs/a.log', size: 0 })).toBe(
        '/logs/a.log was truncated to 0 bytes; reading from the start',
      );
      expect(describeEvent({ type: 'file-rotated', path: '/logs/a.log' })).toBe(
        '/logs/a.log was replaced; reading the new file from the start',
      );
    });
  });

  describe('createLoggerSink', () => {
    it('logs the description at the event level', () => {
      const logger = winston.createLogger({ silent: true });
      const log = vi.spyOn(logger, 'log');

      createLoggerSink(logger).record('warn', { type: 'file-truncated', path: '/logs/a.log', size: 2 });

      expect(log).toHaveBeenCalledWith('warn', '/logs/a.log was truncated to 2 bytes; reading from the start', {
        event: 'file-truncated',
      });
    });
  });

  it('nullSink accepts events', () => {
    expect(() => nullSink.record('error', { type: 'file-rotated', path: '/logs/a.log' })).not.toThrow();
  });
});
