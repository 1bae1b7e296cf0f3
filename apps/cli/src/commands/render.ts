/**
 * Table rendering for terminal and JSON output
 */

import { isTable, tableToRecords, type Cell, type Table } from '@chainmetrics/core';

export type MetricsTables = Table | Record<string, Table>;

export function formatTime(t: number): string {
  return new Date(t * 1000).toISOString().replace('.000Z', 'Z');
}

export function formatCell(cell: Cell): string {
  return cell === null ? '' : String(cell);
}

/**
 * Render a table as aligned text, one line per timestamp
 */
export function renderTable(table: Table): string {
  const header = ['t', ...table.columns];
  const rows = table.index.map((t, i) => [
    formatTime(t),
    ...table.columns.map((_, j) => formatCell(table.values[i]?.[j] ?? null)),
  ]);

  const widths = header.map((name, j) =>
    Math.max(name.length, ...rows.map((row) => row[j]?.length ?? 0))
  );

  return [header, ...rows]
    .map((row) => row.map((cell, j) => cell.padEnd(widths[j] ?? 0)).join('  ').trimEnd())
    .join('\n');
}

/**
 * JSON form of a table or of a set of tables: one record per timestamp
 */
export function tablesToJson(tables: MetricsTables): unknown {
  if (isTable(tables)) {
    return tableToRecords(tables);
  }
  const result: Record<string, unknown> = {};
  for (const [key, table] of Object.entries(tables)) {
    result[key] = tableToRecords(table);
  }
  return result;
}
