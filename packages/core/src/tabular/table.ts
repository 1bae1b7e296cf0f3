import type { Cell, Table, TimePoint } from '../models/index.js';

export function emptyTable(): Table {
  return { index: [], columns: [], values: [] };
}

/**
 * Accumulates (time, column, value) cells and materializes them as a Table
 * with an ascending, unique index. Setting a cell twice keeps the last value.
 */
export class TableBuilder {
  private readonly rows = new Map<TimePoint, Map<string, Cell>>();
  private readonly columnOrder: string[] = [];
  private readonly knownColumns = new Set<string>();

  set(t: TimePoint, column: string, value: Cell): void {
    this.addColumn(column);
    this.row(t).set(column, value);
  }

  /**
   * Register a timestamp even if it carries no cells
   */
  addIndex(t: TimePoint): void {
    this.row(t);
  }

  addColumn(column: string): void {
    if (!this.knownColumns.has(column)) {
      this.knownColumns.add(column);
      this.columnOrder.push(column);
    }
  }

  /**
   * @param columns - Explicit column order; defaults to first-seen order
   * @param index - Explicit index; defaults to every timestamp seen, ascending
   */
  build(options: { columns?: readonly string[]; index?: readonly TimePoint[] } = {}): Table {
    const columns = [...(options.columns ?? this.columnOrder)];
    const index = options.index
      ? [...options.index]
      : [...this.rows.keys()].sort((a, b) => a - b);

    const values = index.map((t) => {
      const row = this.rows.get(t);
      return columns.map((column) => row?.get(column) ?? null);
    });

    return { index, columns, values };
  }

  private row(t: TimePoint): Map<string, Cell> {
    let row = this.rows.get(t);
    if (!row) {
      row = new Map();
      this.rows.set(t, row);
    }
    return row;
  }
}

/**
 * Values of one column, aligned with the index
 *
 * @returns undefined if the table has no such column
 */
export function columnValues(table: Table, column: string): Cell[] | undefined {
  const position = table.columns.indexOf(column);
  if (position === -1) {
    return undefined;
  }
  return table.values.map((row) => row[position] ?? null);
}

/**
 * Row-oriented view, one object per timestamp keyed by column name
 */
export function tableToRecords(table: Table, timeColumn: string = 't'): Array<Record<string, Cell>> {
  return table.index.map((t, i) => {
    const record: Record<string, Cell> = { [timeColumn]: t };
    table.columns.forEach((column, j) => {
      record[column] = table.values[i]?.[j] ?? null;
    });
    return record;
  });
}

export function isTable(value: unknown): value is Table {
  return (
    typeof value === 'object' &&
    value !== null &&
    'index' in value &&
    'columns' in value &&
    'values' in value &&
    Array.isArray(value.index) &&
    Array.isArray(value.columns) &&
    Array.isArray(value.values)
  );
}
