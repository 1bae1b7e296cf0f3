#!/usr/bin/env node

/**
 * chainmetrics CLI
 *
 * Commands:
 *   chainmetrics assets                  List supported assets
 *   chainmetrics metrics                 List metric paths
 *   chainmetrics metadata <path>         Show a metric's metadata
 *   chainmetrics asset-metrics <asset>   List metrics available for an asset
 *   chainmetrics metric <path>           Fetch one series as a table
 *   chainmetrics bulk <path>             Fetch several assets through the bulk endpoint
 *
 * Requires GLASSNODE_API_KEY.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { BULK_LAYOUTS } from '@chainmetrics/core';
import { assetsCommand } from './commands/assets.js';
import { metricsCommand } from './commands/metrics.js';
import { metadataCommand } from './commands/metadata.js';
import { assetMetricsCommand } from './commands/asset-metrics.js';
import { metricCommand } from './commands/metric.js';
import { bulkCommand } from './commands/bulk.js';
import { createClient, parseInteger, parseList, type GlobalOptions } from './commands/shared.js';

const program = new Command();

program
  .name('chainmetrics')
  .description('Fetch on-chain metrics and print them as tables')
  .version('0.1.0')
  .option('-v, --verbose', 'Log requests and pagination to stderr');

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
}

function client() {
  return createClient(program.opts<GlobalOptions>());
}

// =============================================================================
// Metadata Commands
// =============================================================================

program
  .command('assets')
  .description('List supported assets')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    try {
      await assetsCommand(options, client());
    } catch (error) {
      fail(error);
    }
  });

program
  .command('metrics')
  .description('List available metric paths')
  .option('-f, --filter <text>', 'Only paths containing this text')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    try {
      await metricsCommand(options, client());
    } catch (error) {
      fail(error);
    }
  });

program
  .command('metadata <path>')
  .description('Show the metadata of a metric')
  .option('-a, --asset <asset>', 'Asset-specific metadata')
  .action(async (path: string, options) => {
    try {
      await metadataCommand(path, options, client());
    } catch (error) {
      fail(error);
    }
  });

program
  .command('asset-metrics <asset>')
  .description('List the metrics available for an asset')
  .option('--refresh', 'Rebuild the asset to metric map instead of reading the cache')
  .option('--cache-file <file>', 'Cache file (default: GLASSNODE_CACHE_FILE or asset_metrics_cache.json)')
  .option('--json', 'Output as JSON')
  .action(async (asset: string, options) => {
    try {
      await assetMetricsCommand(asset, options, client());
    } catch (error) {
      fail(error);
    }
  });

// =============================================================================
// Data Commands
// =============================================================================

program
  .command('metric <path>')
  .description('Fetch one metric series for one asset')
  .option('-a, --asset <asset>', 'Asset symbol', 'BTC')
  .option('-s, --since <date>', 'Start (epoch seconds or date)')
  .option('-u, --until <date>', 'End (epoch seconds or date)')
  .option('-i, --interval <resolution>', 'Resolution', '24h')
  .option('-c, --currency <currency>', 'Currency, e.g. native or USD')
  .option('-n, --limit <n>', 'Fetch the latest n points', parseInteger)
  .option('--csv', 'Request CSV from the API')
  .option('--json', 'Output as JSON')
  .action(async (path: string, options) => {
    try {
      await metricCommand(path, options, client());
    } catch (error) {
      fail(error);
    }
  });

program
  .command('bulk <path>')
  .description('Fetch a metric for several assets through the bulk endpoint')
  .option('-a, --assets <list>', 'Comma-separated asset symbols', parseList)
  .option('-s, --since <date>', 'Start (epoch seconds or date)')
  .option('-u, --until <date>', 'End (epoch seconds or date, default: now)')
  .option('-i, --interval <resolution>', 'Resolution', '24h')
  .option('-c, --currency <currency>', 'Currency', 'native')
  .option('-n, --limit <n>', 'Fetch the latest n points in one request', parseInteger)
  .option('-p, --paginate', 'Walk the whole range in windows')
  .option('-l, --layout <layout>', `Table layout (${BULK_LAYOUTS.join(', ')})`, 'wide')
  .option('--json', 'Output as JSON')
  .action(async (path: string, options) => {
    try {
      await bulkCommand(path, options, client());
    } catch (error) {
      fail(error);
    }
  });

program.addHelpText('after', `
Examples:
  chainmetrics metric market/price_usd_close --asset BTC --limit 30
  chainmetrics bulk market/price_usd_close --assets BTC,ETH --since 2024-01-01 --paginate --layout by-asset

Environment:
  GLASSNODE_API_KEY        API key (required)
  GLASSNODE_API_URL        API root (default: https://api.glassnode.com/v1)
  GLASSNODE_TIMEOUT_MS     Request timeout in milliseconds
  GLASSNODE_CACHE_FILE     Asset to metric cache file
  CHAINMETRICS_LOG_LEVEL   Minimum level of logs written to stderr (default: info)
`);

// Parse and execute
program.parseAsync().catch(fail);
