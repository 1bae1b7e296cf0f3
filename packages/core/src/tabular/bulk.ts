/**
 * Bulk Reshaping
 *
 * A bulk payload nests one record per series under every timestamp. It is
 * flattened once into (time, asset, series key, value) rows and then
 * grouped into one of three layouts:
 *
 * - `wide`: a single Table with one column per (asset, series key) pair
 * - `by-asset`: one Table per asset, columns are series keys
 * - `by-series-key`: one Table per series key, columns are assets
 *
 * Both grouped layouts reindex every sub-table to the same columns and the
 * same index, leaving `null` where a combination has no value.
 */

import { ConfigError, FormatError } from '../errors/index.js';
import {
  BULK_LAYOUTS,
  BulkEntrySchema,
  BulkLayoutSchema,
  SeriesRecordSchema,
  isRecordObject,
  type BulkLayout,
  type BulkTableResult,
  type Table,
  type TimePoint,
} from '../models/index.js';
import { createLogger, type ILogger } from '../observability/logger.js';
import type { ReshapeOptions } from './single-series.js';
import { TableBuilder, emptyTable } from './table.js';

/** Label of the null asset in grouped layouts */
export const NULL_ASSET_LABEL = 'None';

/** Series key of a record with neither secondary tags nor an asset */
export const DEFAULT_SERIES_KEY = 'value';

export interface FlatRecord {
  t: TimePoint;
  asset: string | null;
  /** Secondary tags as `tag_value` joined by `_`, or the asset/`value` when there are none */
  seriesKey: string;
  /** Whether the record carried secondary tags besides the asset */
  tagged: boolean;
  value: number | null;
}

// =============================================================================
// Flattening
// =============================================================================

/**
 * Derive the series key from a record's tags
 */
export function deriveSeriesKey(tags: Record<string, string>, asset: string | null): string {
  const parts = Object.keys(tags)
    .filter((key) => key !== 'a' && key !== 'v')
    .sort()
    .map((key) => `${key}_${tags[key]}`);

  if (parts.length > 0) {
    return parts.join('_');
  }
  return asset ? asset : DEFAULT_SERIES_KEY;
}

/**
 * Flatten bulk entries into one row per series record. Malformed entries
 * and records are skipped with a warning.
 */
export function flattenBulk(data: readonly unknown[], logger: ILogger): FlatRecord[] {
  const flat: FlatRecord[] = [];

  for (const item of data) {
    const entry = BulkEntrySchema.safeParse(item);
    if (!entry.success) {
      logger.warn('Skipping invalid timestamp entry', { entry: item });
      continue;
    }

    const { t, bulk } = entry.data;
    for (const raw of bulk) {
      const parsed = SeriesRecordSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn('Skipping invalid item within bulk list', { t, item: raw });
        continue;
      }

      const tags: Record<string, string> = {};
      for (const [key, value] of Object.entries(parsed.data)) {
        if (key !== 'v') {
          tags[key] = String(value);
        }
      }

      const asset = tags.a ?? null;
      const seriesKey = deriveSeriesKey(tags, asset);
      flat.push({
        t,
        asset,
        seriesKey,
        tagged: Object.keys(tags).some((key) => key !== 'a'),
        value: parsed.data.v,
      });
    }
  }

  return flat;
}

// =============================================================================
// Pivoting
// =============================================================================

/**
 * Column name in the wide layout. The asset prefix is dropped for records
 * without an asset and for untagged records whose key already is the asset.
 */
export function wideColumnName(record: Pick<FlatRecord, 'asset' | 'seriesKey'>): string {
  if (record.asset === null || record.seriesKey === record.asset) {
    return record.seriesKey;
  }
  return `${record.asset}_${record.seriesKey}`;
}

export function assetLabel(asset: string | null): string {
  return asset ?? NULL_ASSET_LABEL;
}

/**
 * Series dimension in the grouped layouts. Untagged records are all the
 * same series (`value`) of different assets.
 */
function seriesDimension(record: FlatRecord): string {
  return record.tagged ? record.seriesKey : DEFAULT_SERIES_KEY;
}

function pivotWide(flat: readonly FlatRecord[]): Table {
  const builder = new TableBuilder();
  for (const record of flat) {
    builder.set(record.t, wideColumnName(record), record.value);
  }
  const table = builder.build();
  const columns = [...table.columns].sort();
  return builder.build({ columns, index: table.index });
}

function pivotGrouped(
  flat: readonly FlatRecord[],
  groupOf: (record: FlatRecord) => string,
  columnOf: (record: FlatRecord) => string
): Record<string, Table> {
  const index = [...new Set(flat.map((record) => record.t))].sort((a, b) => a - b);
  const columns = [...new Set(flat.map(columnOf))].sort();

  const groups = new Map<string, TableBuilder>();
  for (const record of flat) {
    const group = groupOf(record);
    let builder = groups.get(group);
    if (!builder) {
      builder = new TableBuilder();
      groups.set(group, builder);
    }
    builder.set(record.t, columnOf(record), record.value);
  }

  const result: Record<string, Table> = {};
  for (const group of [...groups.keys()].sort()) {
    const builder = groups.get(group);
    if (builder) {
      result[group] = builder.build({ columns, index });
    }
  }
  return result;
}

// =============================================================================
// Entry Point
// =============================================================================

export function parseLayout(layout: string): BulkLayout {
  const parsed = BulkLayoutSchema.safeParse(layout);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid layout '${layout}'. Must be one of: ${BULK_LAYOUTS.join(', ')}`,
      { layout }
    );
  }
  return parsed.data;
}

/**
 * Convert a bulk payload (a single page or a paginated result) to tables
 *
 * @param payload - Object whose `data` holds the bulk entries
 * @param layout - Output layout
 * @throws {ConfigError} For an unknown layout
 * @throws {FormatError} If the payload is not an object or `data` is not a list
 */
export function bulkToTable(payload: unknown, layout: 'wide', options?: ReshapeOptions): Table;
export function bulkToTable(
  payload: unknown,
  layout: 'by-asset' | 'by-series-key',
  options?: ReshapeOptions
): Record<string, Table>;
export function bulkToTable(payload: unknown, layout: string, options?: ReshapeOptions): BulkTableResult;
export function bulkToTable(
  payload: unknown,
  layout: string,
  options: ReshapeOptions = {}
): BulkTableResult {
  const effectiveLayout = parseLayout(layout);

  if (!isRecordObject(payload)) {
    throw new FormatError("Bulk payload must be an object with a 'data' key containing the bulk list");
  }

  const data = payload.data ?? [];
  if (!Array.isArray(data)) {
    throw new FormatError("The 'data' key must contain a list", { data });
  }

  const flat = flattenBulk(data, options.logger ?? createLogger('reshaper'));

  switch (effectiveLayout) {
    case 'wide':
      return flat.length > 0 ? pivotWide(flat) : emptyTable();
    case 'by-asset':
      return pivotGrouped(flat, (record) => assetLabel(record.asset), seriesDimension);
    case 'by-series-key':
      return pivotGrouped(flat, seriesDimension, (record) => assetLabel(record.asset));
  }
}
