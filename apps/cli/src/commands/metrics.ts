/**
 * Metrics Command
 *
 * Lists metric paths, optionally narrowed to those containing a substring.
 */

import ora from 'ora';
import type { MetricsClient } from './shared.js';

export interface MetricsOptions {
  json?: boolean;
  filter?: string;
}

export async function metricsCommand(options: MetricsOptions, client: MetricsClient): Promise<void> {
  const spinner = ora({ isSilent: options.json });
  spinner.start('Fetching metrics...');

  const all = await client.getMetrics();
  const metrics = options.filter ? all.filter((path) => path.includes(options.filter ?? '')) : all;
  spinner.succeed(`Found ${metrics.length} metrics`);

  if (options.json) {
    console.log(JSON.stringify(metrics, null, 2));
    return;
  }

  for (const path of metrics) {
    console.log(path);
  }
}
