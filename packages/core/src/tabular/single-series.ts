/**
 * Single-Series Reshaping
 *
 * Metric endpoints answer either with JSON (`[{t, v}]` or `[{t, o: {...}}]`)
 * or with CSV text. The payload is decoded once into a tagged union and each
 * variant is turned into a Table indexed by epoch seconds.
 */

import { parse } from 'csv-parse/sync';
import { FormatError, MetricsError } from '../errors/index.js';
import {
  ObjectPointSchema,
  ValuePointSchema,
  isRecordObject,
  type Cell,
  type Table,
} from '../models/index.js';
import { createLogger, type ILogger } from '../observability/logger.js';
import { resolveTimestamp } from '../time/timestamps.js';
import { TableBuilder, emptyTable } from './table.js';

export type SingleSeriesPayload =
  | { kind: 'empty' }
  | { kind: 'text'; text: string }
  | { kind: 'values'; points: unknown[] }
  | { kind: 'objects'; points: unknown[] };

export interface ReshapeOptions {
  logger?: ILogger;
}

const TIME_COLUMNS = ['t', 'timestamp'] as const;

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// =============================================================================
// Decoding
// =============================================================================

/**
 * Classify a raw single-series payload
 *
 * @throws {FormatError} If the payload matches none of the known shapes
 */
export function decodeSingleSeries(payload: unknown): SingleSeriesPayload {
  if (payload === null || payload === undefined) {
    return { kind: 'empty' };
  }

  if (typeof payload === 'string') {
    return payload.trim() === '' ? { kind: 'empty' } : { kind: 'text', text: payload };
  }

  if (!Array.isArray(payload)) {
    throw new FormatError(`Unexpected payload type for a single series: ${describe(payload)}`);
  }

  if (payload.length === 0) {
    return { kind: 'empty' };
  }

  const first: unknown = payload[0];
  if (!isRecordObject(first) || !('t' in first)) {
    throw new FormatError("JSON list items must be objects with a 't' timestamp key", {
      item: first,
    });
  }

  if ('v' in first) {
    return { kind: 'values', points: payload };
  }
  if (isRecordObject(first.o)) {
    return { kind: 'objects', points: payload };
  }

  throw new FormatError(
    "JSON data does not match expected formats: [{'t':..., 'v':...}] or [{'t':..., 'o':{...}}]",
    { item: first }
  );
}

// =============================================================================
// Reshaping
// =============================================================================

/**
 * Convert a single-series payload to a Table
 *
 * @param payload - Decoded JSON array or CSV text
 * @param path - Metric path; its last segment names a lone value column
 * @throws {FormatError} If the payload shape is not recognized
 */
export function singleSeriesToTable(
  payload: unknown,
  path: string,
  options: ReshapeOptions = {}
): Table {
  const decoded = decodeSingleSeries(payload);

  switch (decoded.kind) {
    case 'empty':
      return emptyTable();
    case 'text':
      return tableFromText(decoded.text, path);
    case 'values':
      return tableFromValues(decoded.points, path);
    case 'objects':
      return tableFromObjects(decoded.points, options.logger ?? createLogger('reshaper'));
  }
}

/**
 * Column name for a lone value column: the last path segment, or `value`
 */
export function columnNameFromPath(path: string): string {
  if (!path.includes('/')) {
    return 'value';
  }
  const segments = path.replace(/^\/+|\/+$/g, '').split('/');
  return segments[segments.length - 1] || 'value';
}

function tableFromValues(points: unknown[], path: string): Table {
  const column = columnNameFromPath(path);
  const builder = new TableBuilder();
  builder.addColumn(column);

  points.forEach((point, position) => {
    const parsed = ValuePointSchema.safeParse(point);
    if (!parsed.success || !isRecordObject(point) || !('v' in point)) {
      throw new FormatError("Inconsistent JSON format: some items missing 'v' key", {
        position,
        item: point,
      });
    }
    builder.set(toTime(parsed.data.t), column, toCell(parsed.data.v));
  });

  return builder.build();
}

function tableFromObjects(points: unknown[], logger: ILogger): Table {
  const builder = new TableBuilder();

  for (const point of points) {
    const parsed = ObjectPointSchema.safeParse(point);
    if (!parsed.success) {
      logger.warn('Skipping item with unexpected structure in nested JSON', { item: point });
      continue;
    }
    const t = toTime(parsed.data.t);
    builder.addIndex(t);
    for (const [column, value] of Object.entries(parsed.data.o)) {
      builder.set(t, column, toCell(value));
    }
  }

  return builder.build();
}

function tableFromText(text: string, path: string): Table {
  let grid: string[][];
  try {
    grid = parse(text, { skip_empty_lines: true, trim: true, relax_column_count: true });
  } catch (error) {
    throw new FormatError(
      `Failed to parse CSV data: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const [header, ...rows] = grid;
  if (!header) {
    return emptyTable();
  }

  const timeColumn = TIME_COLUMNS.find((name) => header.includes(name));
  if (timeColumn === undefined) {
    throw new FormatError("CSV data missing expected timestamp column 't' or 'timestamp'", {
      header,
    });
  }

  const timePosition = header.indexOf(timeColumn);
  const dataColumns = header
    .map((name, position) => ({ name, position }))
    .filter(({ position }) => position !== timePosition);

  if (dataColumns.length === 0) {
    throw new FormatError('CSV data has a timestamp column but no data columns');
  }

  // A lone value column takes the metric's name; several keep their headers
  const names = dataColumns.length === 1
    ? [columnNameFromPath(path)]
    : dataColumns.map(({ name }) => name);

  const builder = new TableBuilder();
  names.forEach((name) => builder.addColumn(name));

  for (const row of rows) {
    const t = toTime(row[timePosition] ?? '');
    builder.addIndex(t);
    dataColumns.forEach(({ position }, i) => {
      builder.set(t, names[i], castText(row[position]));
    });
  }

  return builder.build();
}

// =============================================================================
// Cells
// =============================================================================

function toTime(value: number | string): number {
  try {
    return resolveTimestamp(value);
  } catch (error) {
    if (error instanceof MetricsError) {
      throw new FormatError(`Failed to parse timestamp '${value}'`, { value });
    }
    throw error;
  }
}

function toCell(value: unknown): Cell {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

function castText(value: string | undefined): Cell {
  if (value === undefined || value === '') {
    return null;
  }
  return NUMERIC.test(value) ? Number(value) : value;
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return typeof value;
}
