/**
 * Assets Command
 *
 * Lists the assets the API supports.
 */

import chalk from 'chalk';
import ora from 'ora';
import type { AssetInfo } from '@chainmetrics/client';
import type { MetricsClient } from './shared.js';

export interface AssetsOptions {
  json?: boolean;
}

function assetLine(asset: AssetInfo): string {
  const symbol = typeof asset.symbol === 'string' ? asset.symbol : JSON.stringify(asset);
  return typeof asset.name === 'string' ? `${chalk.bold(symbol)}  ${asset.name}` : chalk.bold(symbol);
}

export async function assetsCommand(options: AssetsOptions, client: MetricsClient): Promise<void> {
  const spinner = ora({ isSilent: options.json });
  spinner.start('Fetching assets...');

  const assets = await client.getAssets();
  spinner.succeed(`Found ${assets.length} assets`);

  if (options.json) {
    console.log(JSON.stringify(assets, null, 2));
    return;
  }

  for (const asset of assets) {
    console.log(assetLine(asset));
  }
}
