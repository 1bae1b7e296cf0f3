/**
 * Metric Payload Models
 *
 * Zod schemas and types for single-series and bulk metric payloads, the
 * stitched result of a paginated fetch and the tables built from them.
 */

import { z } from 'zod';

// =============================================================================
// Time
// =============================================================================

/**
 * Unix epoch seconds identifying one observation instant
 */
export const TimePointSchema = z.number().int();

export type TimePoint = z.infer<typeof TimePointSchema>;

// =============================================================================
// Bulk Payloads
// =============================================================================

/**
 * One observation of one series. `v` carries the value, `a` the asset and
 * every other key is a secondary tag of the series.
 */
export const SeriesRecordSchema = z
  .object({
    v: z.number().nullable(),
    a: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

export type SeriesRecord = z.infer<typeof SeriesRecordSchema>;

/**
 * A timestamp and the records observed at it. Records are validated one by
 * one so a single bad record does not drop the whole entry.
 */
export const BulkEntrySchema = z.object({
  t: TimePointSchema,
  bulk: z.array(z.unknown()),
});

export type RawBulkEntry = z.infer<typeof BulkEntrySchema>;

export interface BulkEntry {
  t: TimePoint;
  bulk: SeriesRecord[];
}

/**
 * Bulk endpoint response: `data` plus any number of metadata keys
 */
export const BulkPayloadSchema = z
  .object({
    data: z.array(z.unknown()).nullable().optional(),
  })
  .passthrough();

export type BulkPayload = z.infer<typeof BulkPayloadSchema>;

/**
 * Why a paginated fetch stopped
 */
export type StopReason = 'range-exhausted' | 'empty-pages' | 'error';

/**
 * Stitched result of a paginated bulk fetch. `data` is ascending by `t`
 * with unique timestamps; `meta` holds the non-data keys of the first
 * non-empty page.
 */
export interface CombinedResult {
  data: BulkEntry[];
  meta: Record<string, unknown>;
  stoppedBy: StopReason;
  pagesFetched: number;
}

// =============================================================================
// Single-Series Payloads
// =============================================================================

export const ValuePointSchema = z.object({
  t: z.union([TimePointSchema, z.string()]),
  v: z.unknown(),
});

export type ValuePoint = z.infer<typeof ValuePointSchema>;

export const ObjectPointSchema = z.object({
  t: z.union([TimePointSchema, z.string()]),
  o: z.record(z.unknown()),
});

export type ObjectPoint = z.infer<typeof ObjectPointSchema>;

// =============================================================================
// Tables
// =============================================================================

export type Cell = number | string | boolean | null;

/**
 * Rectangular table indexed by time. `values[row][column]`; `null` marks a
 * missing value.
 */
export interface Table {
  index: TimePoint[];
  columns: string[];
  values: Cell[][];
}

export const BULK_LAYOUTS = ['wide', 'by-asset', 'by-series-key'] as const;

export const BulkLayoutSchema = z.enum(BULK_LAYOUTS);

export type BulkLayout = z.infer<typeof BulkLayoutSchema>;

export type BulkTableResult = Table | Record<string, Table>;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Identity of a record's series: its non-value tags, sorted by tag name
 */
export function tagSetKey(record: SeriesRecord): string {
  const tags = Object.keys(record)
    .filter((key) => key !== 'v')
    .sort()
    .map((key) => [key, record[key]]);
  return JSON.stringify(tags);
}

export function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
