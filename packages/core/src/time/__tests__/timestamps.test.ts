/**
 * Tests for timestamp resolution
 */

import { describe, it, expect } from 'vitest';
import { calculateSinceForLimit, resolveOptionalTimestamp, resolveTimestamp } from '../timestamps.js';
import { ConfigError, FormatError } from '../../errors/index.js';

const JAN_1_2024 = 1704067200;
const JAN_15_2024 = JAN_1_2024 + 14 * 86400;

describe('resolveTimestamp', () => {
  it('should pass epoch seconds through', () => {
    expect(resolveTimestamp(JAN_1_2024)).toBe(JAN_1_2024);
  });

  it('should truncate fractional seconds', () => {
    expect(resolveTimestamp(JAN_1_2024 + 0.9)).toBe(JAN_1_2024);
  });

  it('should convert Date objects', () => {
    expect(resolveTimestamp(new Date('2024-01-01T00:00:00Z'))).toBe(JAN_1_2024);
  });

  it('should read digit-only strings as epoch seconds', () => {
    expect(resolveTimestamp('1704067200')).toBe(JAN_1_2024);
  });

  describe('ISO-8601', () => {
    it('should read a bare date as UTC midnight', () => {
      expect(resolveTimestamp('2024-01-01')).toBe(JAN_1_2024);
    });

    it('should read a UTC date-time', () => {
      expect(resolveTimestamp('2024-01-01T12:30:00Z')).toBe(JAN_1_2024 + 45000);
    });

    it('should apply an explicit offset', () => {
      expect(resolveTimestamp('2024-01-01T02:00:00+02:00')).toBe(JAN_1_2024);
    });

    it('should accept a space separator', () => {
      expect(resolveTimestamp('2024-01-15 08:00:00')).toBe(JAN_15_2024 + 28800);
    });
  });

  describe('date patterns', () => {
    it.each([
      ['2024/01/15', JAN_15_2024],
      ['15/01/2024', JAN_15_2024],
      ['01/15/2024', JAN_15_2024],
      ['15-01-2024', JAN_15_2024],
      ['2024.01.15', JAN_15_2024],
      ['15.01.2024', JAN_15_2024],
      ['15/01/2024 08:00:00', JAN_15_2024 + 28800],
      ['2024/01/15 08:00:00', JAN_15_2024 + 28800],
    ])('should parse %s', (input, expected) => {
      expect(resolveTimestamp(input)).toBe(expected);
    });

    it('should prefer day-first for ambiguous dates', () => {
      expect(resolveTimestamp('01/02/2024')).toBe(JAN_1_2024 + 31 * 86400);
    });
  });

  describe('errors', () => {
    it('should reject unrecognized text', () => {
      expect(() => resolveTimestamp('yesterday')).toThrow(FormatError);
    });

    it('should reject impossible calendar dates', () => {
      expect(() => resolveTimestamp('2024-02-30')).toThrow(FormatError);
    });

    it('should reject non-finite numbers', () => {
      expect(() => resolveTimestamp(Number.NaN)).toThrow(FormatError);
    });

    it('should reject invalid Date objects', () => {
      expect(() => resolveTimestamp(new Date('not a date'))).toThrow('Invalid Date object');
    });
  });
});

describe('resolveOptionalTimestamp', () => {
  it('should pass undefined through', () => {
    expect(resolveOptionalTimestamp(undefined)).toBeUndefined();
  });

  it('should resolve defined values', () => {
    expect(resolveOptionalTimestamp('2024-01-01')).toBe(JAN_1_2024);
  });
});

describe('calculateSinceForLimit', () => {
  it('should step back limit points of the resolution', () => {
    expect(calculateSinceForLimit('1h', 10, 1_000_000)).toBe(964_000);
  });

  it('should approximate months as 30 days', () => {
    expect(calculateSinceForLimit('1month', 1, 10_000_000)).toBe(10_000_000 - 2_592_000);
  });

  it('should count unknown resolutions as daily', () => {
    expect(calculateSinceForLimit('3d', 2, 1_000_000)).toBe(827_200);
  });

  it('should reject non-positive limits', () => {
    expect(() => calculateSinceForLimit('24h', 0)).toThrow(ConfigError);
    expect(() => calculateSinceForLimit('24h', 1.5)).toThrow('Limit must be a positive integer');
  });
});
