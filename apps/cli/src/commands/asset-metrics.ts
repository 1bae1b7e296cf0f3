/**
 * Asset Metrics Command
 *
 * Lists the metrics available for one asset. The first run builds the
 * asset to metric map, which takes one request per metric.
 */

import chalk from 'chalk';
import ora from 'ora';
import type { MetricsClient } from './shared.js';

export interface AssetMetricsCommandOptions {
  json?: boolean;
  /** Rebuild the map instead of reading the cache file */
  refresh?: boolean;
  cacheFile?: string;
}

export async function assetMetricsCommand(
  asset: string,
  options: AssetMetricsCommandOptions,
  client: MetricsClient
): Promise<void> {
  const spinner = ora({ isSilent: options.json });
  spinner.start(`Resolving metrics for ${asset}...`);

  const metrics = await client.getAssetMetrics(asset, {
    useCache: !options.refresh,
    cacheFile: options.cacheFile,
  });
  spinner.succeed(`Found ${metrics.length} metrics for ${asset}`);

  if (options.json) {
    console.log(JSON.stringify(metrics, null, 2));
    return;
  }

  if (metrics.length === 0) {
    console.log(chalk.yellow(`No metrics found for asset '${asset}'.`));
    return;
  }
  for (const path of metrics) {
    console.log(path);
  }
}
