/**
 * @chainmetrics/core
 *
 * Pagination, stitching and tabular reshaping of time-series metric payloads.
 *
 * @example
 * ```typescript
 * import { Paginator, bulkToTable } from '@chainmetrics/core';
 *
 * const paginator = new Paginator(transport);
 * const combined = await paginator.fetchRange({
 *   path: 'metrics/market/price_usd_close/bulk',
 *   params: { a: ['BTC', 'ETH'], i: '24h' },
 *   since: 1704067200,
 *   until: 1711929600,
 *   resolution: '24h',
 * });
 *
 * const byAsset = bulkToTable(combined, 'by-asset');
 * ```
 */

// Errors
export {
  MetricsError,
  TransportError,
  DecodeError,
  FormatError,
  ConfigError,
  isPageFailure,
} from './errors/index.js';

// Logging
export {
  StructuredLogger,
  MemoryLogger,
  createLogger,
  redact,
  type ILogger,
  type LogEntry,
  type LogLevel,
  type StructuredLoggerOptions,
} from './observability/logger.js';

// Models
export {
  TimePointSchema,
  SeriesRecordSchema,
  BulkEntrySchema,
  BulkPayloadSchema,
  ValuePointSchema,
  ObjectPointSchema,
  BulkLayoutSchema,
  BULK_LAYOUTS,
  tagSetKey,
  isRecordObject,
  type TimePoint,
  type SeriesRecord,
  type RawBulkEntry,
  type BulkEntry,
  type BulkPayload,
  type StopReason,
  type CombinedResult,
  type ValuePoint,
  type ObjectPoint,
  type Cell,
  type Table,
  type BulkLayout,
  type BulkTableResult,
} from './models/index.js';

// Time
export {
  BULK_MAX_DAYS,
  RESOLUTION_SECONDS,
  SECONDS_PER_DAY,
  isBulkResolution,
  maxDays,
  windowSeconds,
  type BulkResolution,
} from './time/resolution.js';
export {
  resolveTimestamp,
  resolveOptionalTimestamp,
  calculateSinceForLimit,
  nowSeconds,
  type DateInput,
} from './time/timestamps.js';

// Pagination
export {
  Paginator,
  nextForwardWindow,
  nextBackwardWindow,
  type PageSource,
  type QueryParams,
  type QueryValue,
  type FetchRangeRequest,
  type TimeWindow,
} from './pagination/paginator.js';
export { BulkAccumulator, type PageDirection } from './pagination/bulk-accumulator.js';

// Tabular
export {
  TableBuilder,
  emptyTable,
  columnValues,
  tableToRecords,
  isTable,
} from './tabular/table.js';
export {
  singleSeriesToTable,
  decodeSingleSeries,
  columnNameFromPath,
  type SingleSeriesPayload,
  type ReshapeOptions,
} from './tabular/single-series.js';
export {
  bulkToTable,
  flattenBulk,
  deriveSeriesKey,
  wideColumnName,
  assetLabel,
  parseLayout,
  NULL_ASSET_LABEL,
  DEFAULT_SERIES_KEY,
  type FlatRecord,
} from './tabular/bulk.js';
