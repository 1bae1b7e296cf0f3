/**
 * Bulk Paginator
 *
 * Walks a time range in windows no wider than the resolution allows,
 * requests one page per window and stitches the pages into one
 * chronologically ordered result.
 *
 * With `since` the walk runs forward to `until`; without it the walk runs
 * backward from `until` until two consecutive pages come back empty or the
 * epoch is reached.
 */

import { isPageFailure } from '../errors/index.js';
import {
  BulkEntrySchema,
  SeriesRecordSchema,
  isRecordObject,
  type BulkEntry,
  type CombinedResult,
  type SeriesRecord,
  type StopReason,
  type TimePoint,
} from '../models/index.js';
import { createLogger, type ILogger } from '../observability/logger.js';
import { windowSeconds } from '../time/resolution.js';
import { BulkAccumulator, type PageDirection } from './bulk-accumulator.js';

export type QueryValue = string | number | string[];

export type QueryParams = Record<string, QueryValue>;

/**
 * Source of raw pages: the transport, or a scripted stand-in in tests
 */
export interface PageSource {
  getPage(path: string, params: QueryParams): Promise<unknown>;
}

export interface FetchRangeRequest {
  /** Endpoint path passed to the page source */
  path: string;
  /** Query parameters sent with every page; `s` and `u` are set per window */
  params?: QueryParams;
  /** Start of the range; omit to walk backward from `until` */
  since?: TimePoint;
  /** End of the range */
  until: TimePoint;
  resolution: string;
}

export interface TimeWindow {
  since: TimePoint;
  until: TimePoint;
}

/** Consecutive empty pages that end a walk */
const EMPTY_PAGE_LIMIT = 2;

export class Paginator {
  private readonly logger: ILogger;

  constructor(
    private readonly source: PageSource,
    logger?: ILogger
  ) {
    this.logger = logger ?? createLogger('paginator');
  }

  /**
   * Fetch every page covering the range and combine them.
   *
   * A transport or decode failure ends the walk; whatever was stitched
   * before it is returned with `stoppedBy: 'error'`.
   *
   * @throws {ConfigError} For an unsupported resolution, before any request
   */
  async fetchRange(request: FetchRangeRequest): Promise<CombinedResult> {
    const width = windowSeconds(request.resolution);
    const direction: PageDirection = request.since !== undefined ? 'forward' : 'backward';
    const target = request.until;

    const accumulator = new BulkAccumulator();
    let meta: Record<string, unknown> | null = null;
    let emptyPages = 0;
    let pagesFetched = 0;
    let stoppedBy: StopReason = 'range-exhausted';

    let window: TimeWindow | null = request.since !== undefined
      ? { since: request.since, until: Math.min(request.since + width, target) }
      : { since: target - width, until: target };

    this.logger.debug('Starting paginated fetch', {
      path: request.path,
      direction,
      since: request.since,
      until: target,
      windowSeconds: width,
    });

    while (window) {
      let page: unknown;
      try {
        page = await this.source.getPage(request.path, {
          ...request.params,
          s: window.since,
          u: window.until,
        });
      } catch (error) {
        if (!isPageFailure(error)) {
          throw error;
        }
        this.logger.error('Page request failed, stopping pagination', {
          path: request.path,
          since: window.since,
          until: window.until,
          error: error.message,
        });
        stoppedBy = 'error';
        break;
      }
      pagesFetched++;

      const data = pageData(page);
      if (data === null) {
        emptyPages++;
        if (emptyPages >= EMPTY_PAGE_LIMIT) {
          stoppedBy = 'empty-pages';
          break;
        }
      } else {
        emptyPages = 0;
        if (meta === null && isRecordObject(page)) {
          meta = pageMeta(page);
        }
        accumulator.merge(this.parseEntries(data, window), direction);
      }

      window = direction === 'forward'
        ? nextForwardWindow(window, width, target)
        : nextBackwardWindow(window, width);
    }

    this.logger.info('Paginated fetch finished', {
      path: request.path,
      pagesFetched,
      entries: accumulator.size,
      stoppedBy,
    });

    return {
      data: accumulator.toEntries(),
      meta: meta ?? {},
      stoppedBy,
      pagesFetched,
    };
  }

  private parseEntries(data: unknown[], window: TimeWindow): BulkEntry[] {
    const entries: BulkEntry[] = [];

    for (const item of data) {
      const parsed = BulkEntrySchema.safeParse(item);
      if (!parsed.success) {
        this.logger.warn('Skipping malformed bulk entry', { ...window, entry: item });
        continue;
      }

      const records: SeriesRecord[] = [];
      for (const raw of parsed.data.bulk) {
        const record = SeriesRecordSchema.safeParse(raw);
        if (record.success) {
          records.push(record.data);
        } else {
          this.logger.warn('Skipping malformed bulk record', { t: parsed.data.t, record: raw });
        }
      }
      entries.push({ t: parsed.data.t, bulk: records });
    }

    return entries;
  }
}

// =============================================================================
// Window Arithmetic
// =============================================================================

/**
 * Next forward window, or null once the target has been covered
 */
export function nextForwardWindow(
  current: TimeWindow,
  width: number,
  target: TimePoint
): TimeWindow | null {
  if (current.until >= target) {
    return null;
  }
  const since = current.until + 1;
  return { since, until: Math.min(since + width, target) };
}

/**
 * Next backward window, or null once the epoch has been reached
 */
export function nextBackwardWindow(current: TimeWindow, width: number): TimeWindow | null {
  if (current.since <= 0) {
    return null;
  }
  const until = current.since - 1;
  return { since: Math.max(until - width, 0), until };
}

// =============================================================================
// Page Inspection
// =============================================================================

/**
 * The page's data sequence, or null for an empty page
 */
function pageData(page: unknown): unknown[] | null {
  if (!isRecordObject(page)) {
    return null;
  }
  const data = page.data;
  if (!Array.isArray(data) || data.length === 0) {
    return null;
  }
  return data;
}

function pageMeta(page: Record<string, unknown>): Record<string, unknown> {
  const meta: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(page)) {
    if (key !== 'data') {
      meta[key] = value;
    }
  }
  return meta;
}
