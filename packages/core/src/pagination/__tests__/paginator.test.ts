/**
 * Tests for the bulk Paginator
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Paginator, nextBackwardWindow, nextForwardWindow, type PageSource, type QueryParams } from '../paginator.js';
import { ConfigError, DecodeError, TransportError } from '../../errors/index.js';
import { MemoryLogger } from '../../observability/logger.js';

const DAY = 86400;
const WINDOW_24H = 31 * DAY;

/**
 * Returns scripted pages in order, then empty pages forever
 */
class ScriptedPageSource implements PageSource {
  readonly calls: Array<{ path: string; params: QueryParams }> = [];

  constructor(private readonly pages: unknown[]) {}

  async getPage(path: string, params: QueryParams): Promise<unknown> {
    this.calls.push({ path, params });
    const next = this.pages.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? { data: [] };
  }
}

function page(...entries: Array<[number, Array<Record<string, unknown>>]>): { data: unknown[] } {
  return { data: entries.map(([t, bulk]) => ({ t, bulk })) };
}

describe('Paginator', () => {
  let logger: MemoryLogger;

  beforeEach(() => {
    logger = new MemoryLogger();
  });

  describe('window arithmetic', () => {
    it('should advance forward windows one second past the previous until', () => {
      expect(nextForwardWindow({ since: 0, until: 100 }, 100, 500)).toEqual({ since: 101, until: 201 });
    });

    it('should clamp the forward window to the target', () => {
      expect(nextForwardWindow({ since: 0, until: 100 }, 100, 150)).toEqual({ since: 101, until: 150 });
    });

    it('should stop forward once the target is covered', () => {
      expect(nextForwardWindow({ since: 101, until: 150 }, 100, 150)).toBeNull();
    });

    it('should move backward windows one second before the previous since', () => {
      expect(nextBackwardWindow({ since: 1000, until: 1100 }, 100)).toEqual({ since: 899, until: 999 });
    });

    it('should not go below the epoch', () => {
      expect(nextBackwardWindow({ since: 50, until: 150 }, 100)).toEqual({ since: 0, until: 49 });
      expect(nextBackwardWindow({ since: 0, until: 49 }, 100)).toBeNull();
    });
  });

  describe('fetchRange forward', () => {
    it('should request consecutive windows until the target is reached', async () => {
      const since = 1_000_000;
      const until = since + 2 * WINDOW_24H + 10;
      const source = new ScriptedPageSource([
        page([since, [{ a: 'BTC', v: 1 }]]),
        page([since + WINDOW_24H + 1, [{ a: 'BTC', v: 2 }]]),
        page([until, [{ a: 'BTC', v: 3 }]]),
      ]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'metrics/market/price_usd_close/bulk',
        params: { i: '24h', a: ['BTC'] },
        since,
        until,
        resolution: '24h',
      });

      expect(source.calls.map((call) => [call.params.s, call.params.u])).toEqual([
        [since, since + WINDOW_24H],
        [since + WINDOW_24H + 1, since + 2 * WINDOW_24H + 1],
        [since + 2 * WINDOW_24H + 2, until],
      ]);
      expect(source.calls[0].params.i).toBe('24h');
      expect(source.calls[0].params.a).toEqual(['BTC']);
      expect(source.calls[0].path).toBe('metrics/market/price_usd_close/bulk');
      expect(result.data.map((entry) => entry.t)).toEqual([since, since + WINDOW_24H + 1, until]);
      expect(result.stoppedBy).toBe('range-exhausted');
      expect(result.pagesFetched).toBe(3);
    });

    it('should use a single window when the range fits', async () => {
      const source = new ScriptedPageSource([page([100, [{ v: 1 }]])]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'p',
        since: 100,
        until: 200,
        resolution: '1h',
      });

      expect(source.calls).toHaveLength(1);
      expect(source.calls[0].params).toEqual({ s: 100, u: 200 });
      expect(result.data).toEqual([{ t: 100, bulk: [{ v: 1 }] }]);
    });

    it('should merge records of an overlapping timestamp, keeping the later value', async () => {
      const source = new ScriptedPageSource([
        page([100, [{ a: 'BTC', v: 1 }]]),
        page([100, [{ a: 'BTC', v: 2 }, { a: 'ETH', v: 3 }]]),
      ]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'p',
        since: 0,
        until: WINDOW_24H + 5,
        resolution: '24h',
      });

      expect(result.data).toEqual([
        { t: 100, bulk: [{ a: 'BTC', v: 2 }, { a: 'ETH', v: 3 }] },
      ]);
    });

    it('should keep records that differ only in secondary tags', async () => {
      const source = new ScriptedPageSource([
        page([100, [{ a: 'BTC', e: 'binance', v: 1 }]]),
        page([100, [{ a: 'BTC', e: 'coinbase', v: 2 }]]),
      ]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'p',
        since: 0,
        until: WINDOW_24H + 5,
        resolution: '24h',
      });

      expect(result.data).toEqual([
        {
          t: 100,
          bulk: [
            { a: 'BTC', e: 'binance', v: 1 },
            { a: 'BTC', e: 'coinbase', v: 2 },
          ],
        },
      ]);
    });
  });

  describe('fetchRange backward', () => {
    it('should issue N+2 requests for N non-empty pages and stay ascending', async () => {
      const until = 100 * WINDOW_24H;
      const source = new ScriptedPageSource([
        page([until - 20, [{ a: 'BTC', v: 5 }]], [until - 10, [{ a: 'BTC', v: 6 }]]),
        page([until - WINDOW_24H - 20, [{ a: 'BTC', v: 3 }]], [until - WINDOW_24H - 10, [{ a: 'BTC', v: 4 }]]),
        page([until - 2 * WINDOW_24H - 20, [{ a: 'BTC', v: 1 }]], [until - 2 * WINDOW_24H - 10, [{ a: 'BTC', v: 2 }]]),
      ]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'p',
        until,
        resolution: '24h',
      });

      expect(source.calls).toHaveLength(5);
      expect(result.stoppedBy).toBe('empty-pages');

      const times = result.data.map((entry) => entry.t);
      expect(times).toEqual([
        until - 2 * WINDOW_24H - 20,
        until - 2 * WINDOW_24H - 10,
        until - WINDOW_24H - 20,
        until - WINDOW_24H - 10,
        until - 20,
        until - 10,
      ]);
      expect(new Set(times).size).toBe(times.length);
      expect(result.data.map((entry) => entry.bulk[0]?.v)).toEqual([1, 2, 3, 4, 5, 6]);
    });

    it('should start one window before until and stop at the epoch', async () => {
      const until = 2 * WINDOW_24H;
      const source = new ScriptedPageSource([
        page([until - 1, [{ v: 2 }]]),
        page([10, [{ v: 1 }]]),
      ]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'p',
        until,
        resolution: '24h',
      });

      expect(source.calls.map((call) => [call.params.s, call.params.u])).toEqual([
        [WINDOW_24H, until],
        [0, WINDOW_24H - 1],
      ]);
      expect(result.data.map((entry) => entry.t)).toEqual([10, until - 1]);
      expect(result.stoppedBy).toBe('range-exhausted');
    });
  });

  describe('empty pages', () => {
    it('should reset the empty counter on a non-empty page', async () => {
      const until = 100 * WINDOW_24H;
      const source = new ScriptedPageSource([
        page([until - 10, [{ v: 3 }]]),
        { data: [] },
        page([until - 2 * WINDOW_24H - 10, [{ v: 1 }]]),
      ]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'p',
        until,
        resolution: '24h',
      });

      expect(source.calls).toHaveLength(5);
      expect(result.data.map((entry) => entry.t)).toEqual([until - 2 * WINDOW_24H - 10, until - 10]);
    });

    it('should treat missing payloads, missing data and non-list data as empty', async () => {
      const source = new ScriptedPageSource([null, { unit: 'USD' }, { data: 'nope' }]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'p',
        until: 100 * WINDOW_24H,
        resolution: '24h',
      });

      expect(source.calls).toHaveLength(2);
      expect(result.data).toEqual([]);
      expect(result.meta).toEqual({});
    });
  });

  describe('metadata', () => {
    it('should copy non-data keys from the first non-empty page only', async () => {
      const source = new ScriptedPageSource([
        { data: [], unit: 'ignored' },
        { ...page([200, [{ v: 1 }]]), unit: 'USD', resolution: '24h' },
        { ...page([100, [{ v: 0 }]]), unit: 'EUR' },
      ]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'p',
        until: 100 * WINDOW_24H,
        resolution: '24h',
      });

      expect(result.meta).toEqual({ unit: 'USD', resolution: '24h' });
    });
  });

  describe('errors', () => {
    it('should fail fast on an unknown resolution without requesting', async () => {
      const source = new ScriptedPageSource([]);

      await expect(
        new Paginator(source, logger).fetchRange({ path: 'p', until: 1000, resolution: '5m' })
      ).rejects.toThrow(ConfigError);
      expect(source.calls).toHaveLength(0);
    });

    it('should return accumulated data when a page request fails', async () => {
      const source = new ScriptedPageSource([
        page([100, [{ a: 'BTC', v: 1 }]]),
        new TransportError('Request failed with status code 502', 502),
      ]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'p',
        since: 0,
        until: 10 * WINDOW_24H,
        resolution: '24h',
      });

      expect(source.calls).toHaveLength(2);
      expect(result.stoppedBy).toBe('error');
      expect(result.data).toEqual([{ t: 100, bulk: [{ a: 'BTC', v: 1 }] }]);
      expect(logger.messages('error')).toEqual(['Page request failed, stopping pagination']);
    });

    it('should stop on a decode failure too', async () => {
      const source = new ScriptedPageSource([new DecodeError('Invalid JSON response')]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'p',
        since: 0,
        until: 10 * WINDOW_24H,
        resolution: '24h',
      });

      expect(result.stoppedBy).toBe('error');
      expect(result.data).toEqual([]);
    });

    it('should propagate errors that are not page failures', async () => {
      const source = new ScriptedPageSource([new RangeError('boom')]);

      await expect(
        new Paginator(source, logger).fetchRange({ path: 'p', since: 0, until: 10, resolution: '24h' })
      ).rejects.toThrow('boom');
    });

    it('should skip malformed entries and records with a warning', async () => {
      const source = new ScriptedPageSource([
        { data: [{ t: 'soon', bulk: [] }, { t: 100, bulk: [{ a: 'BTC' }, { a: 'ETH', v: 2 }] }] },
      ]);

      const result = await new Paginator(source, logger).fetchRange({
        path: 'p',
        since: 0,
        until: 10,
        resolution: '24h',
      });

      expect(result.data).toEqual([{ t: 100, bulk: [{ a: 'ETH', v: 2 }] }]);
      expect(logger.messages('warn')).toEqual([
        'Skipping malformed bulk entry',
        'Skipping malformed bulk record',
      ]);
    });
  });
});
