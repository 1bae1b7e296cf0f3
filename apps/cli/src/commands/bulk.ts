/**
 * Bulk Command
 *
 * Fetches a metric for several assets through its bulk endpoint and prints
 * it in one of the three table layouts.
 */

import ora from 'ora';
import { parseLayout } from '@chainmetrics/core';
import { printTables, type MetricsClient } from './shared.js';

export interface BulkOptions {
  assets?: string[];
  since?: string;
  until?: string;
  interval?: string;
  currency?: string;
  limit?: number;
  paginate?: boolean;
  layout?: string;
  json?: boolean;
}

export async function bulkCommand(
  path: string,
  options: BulkOptions,
  client: MetricsClient
): Promise<void> {
  const layout = parseLayout(options.layout ?? 'wide');

  const spinner = ora({ isSilent: options.json });
  spinner.start(options.paginate ? `Fetching ${path} page by page...` : `Fetching ${path}...`);

  const tables = await client.fetchBulkMetric(path, {
    assets: options.assets,
    since: options.since,
    until: options.until,
    interval: options.interval,
    currency: options.currency,
    limit: options.limit,
    paginate: options.paginate,
    returnFormat: 'table',
    layout,
  });
  spinner.succeed('Fetched bulk data');

  printTables(tables, options.json);
}
