import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { MetricsApiClient } from '@chainmetrics/client';
import { StructuredLogger, isTable } from '@chainmetrics/core';
import { renderTable, tablesToJson, type MetricsTables } from './render.js';

/**
 * The client operations the commands use
 */
export type MetricsClient = Pick<
  MetricsApiClient,
  'getAssets' | 'getMetrics' | 'getMetricMetadata' | 'getAssetMetrics' | 'fetchMetric' | 'fetchBulkMetric'
>;

export interface GlobalOptions {
  verbose?: boolean;
}

/**
 * Client configured from the environment. Logs go to stderr so stdout
 * carries only command output.
 */
export function createClient(options: GlobalOptions = {}): MetricsClient {
  const logger = new StructuredLogger(
    { component: 'cli' },
    {
      minLevel: options.verbose ? 'debug' : undefined,
      sink: (line) => console.error(line),
    }
  );
  return MetricsApiClient.fromEnv({ logger });
}

/**
 * Split a comma-separated option value
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got '${value}'.`);
  }
  return parsed;
}

export function printTables(tables: MetricsTables, json: boolean | undefined): void {
  if (json) {
    console.log(JSON.stringify(tablesToJson(tables), null, 2));
    return;
  }

  if (isTable(tables)) {
    if (tables.index.length === 0) {
      console.log(chalk.yellow('No data returned.'));
      return;
    }
    console.log(renderTable(tables));
    return;
  }

  const groups = Object.entries(tables);
  if (groups.length === 0) {
    console.log(chalk.yellow('No data returned.'));
    return;
  }
  for (const [key, table] of groups) {
    console.log(chalk.bold(`\n${key}`));
    console.log(renderTable(table));
  }
}
