/**
 * @chainmetrics/client
 *
 * HTTP client for the on-chain metrics REST API.
 *
 * @example
 * ```typescript
 * import { MetricsApiClient } from '@chainmetrics/client';
 *
 * const client = MetricsApiClient.fromEnv();
 * const prices = await client.fetchBulkMetric('market/price_usd_close', {
 *   assets: ['BTC', 'ETH'],
 *   since: '2024-01-01',
 *   paginate: true,
 *   returnFormat: 'table',
 *   layout: 'by-asset',
 * });
 * ```
 */

export {
  MetricsApiClient,
  AssetInfoSchema,
  MetricMetadataSchema,
  type AssetInfo,
  type MetricMetadata,
  type MetricsClientOptions,
  type FetchMetricOptions,
  type FetchBulkMetricOptions,
  type AssetMetricsOptions,
} from './client.js';

export {
  ClientConfigSchema,
  ReturnFormatSchema,
  RETURN_FORMATS,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_CACHE_FILE,
  parseClientConfig,
  configFromEnv,
  type ClientConfig,
  type ClientConfigInput,
  type ReturnFormat,
} from './config.js';

export {
  AssetMetricsMapSchema,
  loadAssetMetricsCache,
  saveAssetMetricsCache,
  type AssetMetricsMap,
} from './cache.js';
