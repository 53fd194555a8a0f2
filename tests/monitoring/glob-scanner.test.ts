import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import {
  GlobScanner,
  ScannerState,
  expandGlob,
  intervalToMs,
  type ScanContext,
  type ScanListener,
} from '../../src/monitoring/glob-scanner.js';
import { ConfigurationError } from '../../src/config/errors.js';
import { MAX_TIMER_MS } from '../../src/config/schema.js';
import type { WatchEvent } from '../../src/monitoring/events.js';

function recordingListener() {
  const calls: string[] = [];
  const contexts: ScanContext[] = [];
  const listener: ScanListener = {
    onFound: (filePath, context) => {
      calls.push(`found ${filePath}`);
      contexts.push(context);
    },
    onDeleted: (filePath, context) => {
      calls.push(`deleted ${filePath}`);
      contexts.push(context);
    },
  };
  return { calls, contexts, listener };
}

describe('GlobScanner', () => {
  describe('tick', () => {
    it('reports every match as found on the first scan', () => {
      const { calls, contexts, listener } = recordingListener();
      const scanner = new GlobScanner({ pattern: '/logs/*', interval: 1, expand: () => ['/logs/b', '/logs/a'] }, listener);

      const result = scanner.tick();

      expect(result).toEqual({ scanNumber: 1, added: ['/logs/a', '/logs/b'], removed: [], known: 2 });
      expect(calls).toEqual(['found /logs/a', 'found /logs/b']);
      expect(contexts[0]).toEqual({ pattern: '/logs/*', scanNumber: 1 });
    });

    it('reports additions before removals', () => {
      const results = [['A', 'B'], ['B', 'C']];
      const { calls, listener } = recordingListener();
      const scanner = new GlobScanner({ pattern: '*', interval: 1, expand: () => results.shift() ?? [] }, listener);

      scanner.tick();
      calls.length = 0;
      const second = scanner.tick();

      expect(second).toEqual({ scanNumber: 2, added: ['C'], removed: ['A'], known: 2 });
      expect(calls).toEqual(['found C', 'deleted A']);
      expect(scanner.getKnownFiles()).toEqual(['B', 'C']);
    });

    it('reports nothing when the match set is unchanged', () => {
      const { calls, listener } = recordingListener();
      const scanner = new GlobScanner({ pattern: '*', interval: 1, expand: () => ['A'] }, listener);

      scanner.tick();
      const second = scanner.tick();

      expect(second).toEqual({ scanNumber: 2, added: [], removed: [], known: 1 });
      expect(calls).toEqual(['found A']);
    });

    it('keeps the known set when expansion fails', () => {
      let fail = false;
      const events: WatchEvent[] = [];
      const { calls, listener } = recordingListener();
      const scanner = new GlobScanner(
        {
          pattern: '*',
          interval: 1,
          expand: () => {
            if (fail) {
              throw new Error('EMFILE');
            }
            return ['A'];
          },
          sink: { record: (_level, event) => events.push(event) },
        },
        listener,
      );

      scanner.tick();
      fail = true;

      expect(scanner.tick()).toBeUndefined();
      expect(scanner.getKnownFiles()).toEqual(['A']);
      expect(scanner.getState()).toBe(ScannerState.IDLE);
      expect(scanner.getStatus().lastError?.message).toBe('EMFILE');
      expect(events).toContainEqual({ type: 'scan-failed', pattern: '*', scanNumber: 2, error: 'EMFILE' });
      expect(calls).toEqual(['found A']);
    });

    it('ignores re-entrant scans from a listener', () => {
      let nested: unknown = 'not called';
      const scanner: GlobScanner = new GlobScanner(
        { pattern: '*', interval: 1, expand: () => ['A'] },
        {
          onFound: () => {
            nested = scanner.tick();
          },
          onDeleted: () => {},
        },
      );

      scanner.tick();

      expect(nested).toBeUndefined();
      expect(scanner.getStatus().scanCount).toBe(1);
    });

    it('continues notifying after a listener throws', () => {
      const found: string[] = [];
      const events: WatchEvent[] = [];
      const scanner = new GlobScanner(
        {
          pattern: '*',
          interval: 1,
          expand: () => ['A', 'B'],
          sink: { record: (_level, event) => events.push(event) },
        },
        {
          onFound: (filePath) => {
            found.push(filePath);
            if (filePath === 'A') {
              throw new Error('listener broke');
            }
          },
          onDeleted: () => {},
        },
      );

      scanner.tick();

      expect(found).toEqual(['A', 'B']);
      expect(events).toContainEqual({
        type: 'scan-failed',
        pattern: '*',
        scanNumber: 1,
        error: 'listener failed for A: listener broke',
      });
    });

    it('does nothing once stopped', () => {
      const expand = vi.fn(() => ['A']);
      const scanner = new GlobScanner({ pattern: '*', interval: 1, expand }, recordingListener().listener);

      scanner.stop();

      expect(scanner.tick()).toBeUndefined();
      expect(expand).not.toHaveBeenCalled();
      expect(scanner.getState()).toBe(ScannerState.STOPPED);
    });
  });

  describe('scheduling', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('scans on the next turn and then every interval', () => {
      const expand = vi.fn(() => ['A']);
      const scanner = new GlobScanner({ pattern: '*', interval: 0.5, expand }, recordingListener().listener);

      scanner.start();
      expect(expand).not.toHaveBeenCalled();

      vi.advanceTimersByTime(0);
      expect(expand).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(500);
      expect(expand).toHaveBeenCalledTimes(2);

      vi.advanceTimersByTime(1000);
      expect(expand).toHaveBeenCalledTimes(4);

      scanner.stop();
      vi.advanceTimersByTime(5000);
      expect(expand).toHaveBeenCalledTimes(4);
    });

    it('cancels the first scan when stopped before it runs', () => {
      const expand = vi.fn(() => ['A']);
      const scanner = new GlobScanner({ pattern: '*', interval: 1, expand }, recordingListener().listener);

      scanner.start();
      scanner.stop();
      vi.advanceTimersByTime(3000);

      expect(expand).not.toHaveBeenCalled();
    });

    it('ignores a second start', () => {
      const expand = vi.fn(() => ['A']);
      const scanner = new GlobScanner({ pattern: '*', interval: 1, expand }, recordingListener().listener);

      scanner.start();
      scanner.start();
      vi.advanceTimersByTime(1000);
      scanner.stop();

      expect(expand).toHaveBeenCalledTimes(2);
    });
  });

  describe('long intervals', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('rejects an oversized interval at construction', () => {
      const expand = vi.fn(() => []);

      expect(
        () => new GlobScanner({ pattern: '*', interval: 3_000_000, expand }, recordingListener().listener),
      ).toThrow(ConfigurationError);
    });

    it('waits a full day between scans of a one-day interval', () => {
      const expand = vi.fn((): string[] => []);
      const scanner = new GlobScanner({ pattern: '*', interval: 86_400, expand }, recordingListener().listener);

      scanner.start();
      vi.advanceTimersByTime(200);
      expect(expand).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(86_400_000);
      scanner.stop();
      expect(expand).toHaveBeenCalledTimes(2);
    });
  });

  describe('intervalToMs', () => {
    it('converts seconds to milliseconds', () => {
      expect(intervalToMs(5)).toBe(5000);
      expect(intervalToMs(0.25)).toBe(250);
      expect(intervalToMs(0.0001)).toBe(1);
    });

    it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects %s', (value) => {
      expect(() => intervalToMs(value)).toThrow(ConfigurationError);
    });

    it('accepts the longest interval a timer can wait', () => {
      expect(intervalToMs(MAX_TIMER_MS / 1000)).toBe(MAX_TIMER_MS);
    });

    it('rejects intervals longer than a timer can wait', () => {
      expect(() => intervalToMs(3_000_000)).toThrow(ConfigurationError);
      expect(() => intervalToMs(3_000_000)).toThrow('Scan interval must be at most 2147483.647 seconds, got: 3000000');
    });

    it('is checked when a scanner is constructed', () => {
      expect(() => new GlobScanner({ pattern: '*', interval: 0 }, recordingListener().listener)).toThrow(
        ConfigurationError,
      );
    });
  });

  describe('expandGlob', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'glob-scanner-'));
    });

    afterEach(() => {
      fs.rmSync(testDir, { recursive: true, force: true });
    });

    it('matches files and directories but not dotfiles', () => {
      fs.writeFileSync(path.join(testDir, 'a.log'), '');
      fs.writeFileSync(path.join(testDir, 'b.txt'), '');
      fs.writeFileSync(path.join(testDir, '.hidden.log'), '');
      fs.mkdirSync(path.join(testDir, 'dir.log'));

      const matches = expandGlob(path.join(testDir, '*.log')).sort();

      expect(matches).toEqual([path.join(testDir, 'a.log'), path.join(testDir, 'dir.log')]);
    });

    it('returns nothing for a missing directory', () => {
      expect(expandGlob(path.join(testDir, 'missing', '*.log'))).toEqual([]);
    });
  });
});
