/**
 * Tests for single-series payload decoding and reshaping
 */

import { describe, it, expect } from 'vitest';
import { columnNameFromPath, decodeSingleSeries, singleSeriesToTable } from '../single-series.js';
import { FormatError } from '../../errors/index.js';
import { MemoryLogger } from '../../observability/logger.js';

describe('columnNameFromPath', () => {
  it('should use the last path segment', () => {
    expect(columnNameFromPath('market/price_usd_close')).toBe('price_usd_close');
  });

  it('should ignore leading and trailing slashes', () => {
    expect(columnNameFromPath('/market/price_usd_close/')).toBe('price_usd_close');
  });

  it('should fall back to value without a separator', () => {
    expect(columnNameFromPath('price_usd_close')).toBe('value');
  });
});

describe('decodeSingleSeries', () => {
  it.each([[null], [undefined], [''], ['   '], [[]]])('should decode %j as empty', (payload) => {
    expect(decodeSingleSeries(payload)).toEqual({ kind: 'empty' });
  });

  it('should recognize text', () => {
    expect(decodeSingleSeries('t,v\n1,2')).toEqual({ kind: 'text', text: 't,v\n1,2' });
  });

  it('should recognize value points', () => {
    expect(decodeSingleSeries([{ t: 1, v: 2 }]).kind).toBe('values');
  });

  it('should recognize object points', () => {
    expect(decodeSingleSeries([{ t: 1, o: { a: 1 } }]).kind).toBe('objects');
  });

  it('should reject items without a timestamp', () => {
    expect(() => decodeSingleSeries([{ x: 1 }])).toThrow(FormatError);
  });

  it('should reject items with neither v nor o', () => {
    expect(() => decodeSingleSeries([{ t: 1, q: 2 }])).toThrow(FormatError);
  });

  it('should reject an object payload', () => {
    expect(() => decodeSingleSeries({ data: [] })).toThrow('Unexpected payload type for a single series: object');
  });
});

describe('singleSeriesToTable', () => {
  describe('value points', () => {
    it('should name the value column after the metric', () => {
      const table = singleSeriesToTable(
        [
          { t: 100, v: 5.0 },
          { t: 200, v: 6.0 },
        ],
        'market/price_usd_close'
      );

      expect(table).toEqual({
        index: [100, 200],
        columns: ['price_usd_close'],
        values: [[5.0], [6.0]],
      });
    });

    it('should sort the index', () => {
      const table = singleSeriesToTable(
        [
          { t: 200, v: 1 },
          { t: 100, v: 2 },
        ],
        'price'
      );

      expect(table).toEqual({ index: [100, 200], columns: ['value'], values: [[2], [1]] });
    });

    it('should keep null values', () => {
      const table = singleSeriesToTable([{ t: 1, v: null }], 'market/price_usd_close');

      expect(table.values).toEqual([[null]]);
    });

    it('should reject items missing v', () => {
      expect(() => singleSeriesToTable([{ t: 1, v: 1 }, { t: 2 }], 'market/price_usd_close')).toThrow(
        "Inconsistent JSON format: some items missing 'v' key"
      );
    });
  });

  describe('object points', () => {
    it('should turn object keys into columns', () => {
      const table = singleSeriesToTable(
        [
          { t: 1, o: { p0: 1, p1: 2 } },
          { t: 2, o: { p1: 3, p2: 4 } },
        ],
        'indicators/hodl_waves'
      );

      expect(table).toEqual({
        index: [1, 2],
        columns: ['p0', 'p1', 'p2'],
        values: [
          [1, 2, null],
          [null, 3, 4],
        ],
      });
    });

    it('should skip items of another shape with a warning', () => {
      const logger = new MemoryLogger();
      const table = singleSeriesToTable([{ t: 1, o: { p0: 1 } }, { t: 3 }], 'x/y', { logger });

      expect(table).toEqual({ index: [1], columns: ['p0'], values: [[1]] });
      expect(logger.messages('warn')).toEqual(['Skipping item with unexpected structure in nested JSON']);
    });
  });

  describe('text', () => {
    it('should parse a single value column with ISO timestamps', () => {
      const csv = 'timestamp,value\n2024-01-01T00:00:00Z,42.5\n2024-01-02T00:00:00Z,43\n';

      expect(singleSeriesToTable(csv, 'market/price_usd_close')).toEqual({
        index: [1704067200, 1704153600],
        columns: ['price_usd_close'],
        values: [[42.5], [43]],
      });
    });

    it('should keep every column of a multi-column export', () => {
      const csv = 't,10y,1y\n1704067200,0.5,0.25\n';

      expect(singleSeriesToTable(csv, 'supply/hodl_waves')).toEqual({
        index: [1704067200],
        columns: ['10y', '1y'],
        values: [[0.5, 0.25]],
      });
    });

    it('should map empty cells to null and keep text cells', () => {
      const csv = 't,label,value\n1,abc,\n';

      expect(singleSeriesToTable(csv, 'x/y').values).toEqual([['abc', null]]);
    });

    it('should require a timestamp column', () => {
      expect(() => singleSeriesToTable('date,value\n2024-01-01,1\n', 'x/y')).toThrow(FormatError);
    });

    it('should require at least one data column', () => {
      expect(() => singleSeriesToTable('t\n1\n', 'x/y')).toThrow(
        'CSV data has a timestamp column but no data columns'
      );
    });

    it('should reject unparseable timestamps', () => {
      expect(() => singleSeriesToTable('t,value\nsoon,1\n', 'x/y')).toThrow("Failed to parse timestamp 'soon'");
    });
  });

  it('should return an empty table for empty input', () => {
    expect(singleSeriesToTable([], 'market/price_usd_close')).toEqual({ index: [], columns: [], values: [] });
  });
});
