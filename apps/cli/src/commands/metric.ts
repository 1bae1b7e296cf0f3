/**
 * Metric Command
 *
 * Fetches one metric series for one asset and prints it as a table.
 */

import ora from 'ora';
import { printTables, type MetricsClient } from './shared.js';

export interface MetricOptions {
  asset: string;
  since?: string;
  until?: string;
  interval?: string;
  currency?: string;
  limit?: number;
  csv?: boolean;
  json?: boolean;
}

export async function metricCommand(
  path: string,
  options: MetricOptions,
  client: MetricsClient
): Promise<void> {
  const spinner = ora({ isSilent: options.json });
  spinner.start(`Fetching ${path} for ${options.asset}...`);

  const table = await client.fetchMetric(path, options.asset, {
    since: options.since,
    until: options.until,
    interval: options.interval,
    currency: options.currency,
    limit: options.limit,
    format: options.csv ? 'csv' : 'json',
    returnFormat: 'table',
  });
  spinner.succeed(`Fetched ${table.index.length} points`);

  printTables(table, options.json);
}
