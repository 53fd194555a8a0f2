import { describe, it, expect } from 'vitest';
import { TailConfigSchema, ScanConfigSchema, TailSettingsSchema, MAX_TIMER_MS } from '../../src/config/schema.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { validateConfig, formatValidationErrors } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/config/errors.js';

describe('Configuration Schema', () => {
  it('accepts the defaults', () => {
    expect(TailConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('accepts fractional check intervals', () => {
    expect(ScanConfigSchema.parse({ checkInterval: 0.25 })).toEqual({ checkInterval: 0.25 });
  });

  it.each([0, -1, Number.POSITIVE_INFINITY])('rejects a check interval of %s', (checkInterval) => {
    expect(ScanConfigSchema.safeParse({ checkInterval }).success).toBe(false);
  });

  it('rejects intervals longer than a timer can wait', () => {
    expect(ScanConfigSchema.safeParse({ checkInterval: 3_000_000 }).success).toBe(false);
    expect(TailSettingsSchema.safeParse({ ...DEFAULT_CONFIG.tail, pollInterval: MAX_TIMER_MS + 1 }).success).toBe(false);
    expect(TailSettingsSchema.safeParse({ ...DEFAULT_CONFIG.tail, pollInterval: MAX_TIMER_MS }).success).toBe(true);
  });

  it('requires whole milliseconds for the poll interval', () => {
    expect(TailSettingsSchema.safeParse({ ...DEFAULT_CONFIG.tail, pollInterval: 2.5 }).success).toBe(false);
  });

  it('rejects an unknown start position', () => {
    expect(TailSettingsSchema.safeParse({ ...DEFAULT_CONFIG.tail, startPosition: 'middle' }).success).toBe(false);
  });

  describe('validateConfig', () => {
    it('lists every failing field', () => {
      let caught: unknown;
      try {
        validateConfig({
          ...DEFAULT_CONFIG,
          scan: { checkInterval: -1 },
          tail: { ...DEFAULT_CONFIG.tail, maxLineLength: 0 },
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught).toMatchObject({
        message: [
          'Configuration validation failed:',
          '  • scan.checkInterval: checkInterval must be a positive number of seconds',
          '  • tail.maxLineLength: maxLineLength must be a positive integer (bytes)',
        ].join('\n'),
      });
    });
  });

  describe('formatValidationErrors', () => {
    it('formats issue paths', () => {
      const result = TailConfigSchema.safeParse({ ...DEFAULT_CONFIG, exclude: [1] });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatValidationErrors(result.error)).toBe(
          'Configuration validation failed:\n  • exclude.0: Expected string, received number',
        );
      }
    });
  });
});
