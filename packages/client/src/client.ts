import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import {
  ConfigError,
  DecodeError,
  FormatError,
  MetricsError,
  Paginator,
  TransportError,
  bulkToTable,
  calculateSinceForLimit,
  createLogger,
  isRecordObject,
  nowSeconds,
  parseLayout,
  resolveOptionalTimestamp,
  resolveTimestamp,
  singleSeriesToTable,
  windowSeconds,
  type BulkLayout,
  type BulkTableResult,
  type DateInput,
  type ILogger,
  type PageSource,
  type QueryParams,
  type Table,
} from '@chainmetrics/core';
import { loadAssetMetricsCache, saveAssetMetricsCache, type AssetMetricsMap } from './cache.js';
import {
  configFromEnv,
  parseClientConfig,
  type ClientConfig,
  type ClientConfigInput,
  type ReturnFormat,
} from './config.js';

// =============================================================================
// Response Schemas
// =============================================================================

export const AssetInfoSchema = z.record(z.unknown());

export type AssetInfo = z.infer<typeof AssetInfoSchema>;

export const MetricMetadataSchema = z
  .object({
    path: z.string().optional(),
    bulk_supported: z.boolean().optional(),
    parameters: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type MetricMetadata = z.infer<typeof MetricMetadataSchema>;

// =============================================================================
// Options
// =============================================================================

export interface MetricsClientOptions {
  logger?: ILogger;
  /** Replaces the HTTP adapter; tests answer requests in process with it */
  adapter?: AxiosAdapter;
}

export interface FetchMetricOptions {
  since?: DateInput;
  until?: DateInput;
  /** Resolution, `24h` unless given */
  interval?: string;
  /** Wire format requested from the API */
  format?: 'json' | 'csv';
  currency?: string;
  /** Fetch the latest `limit` points; overrides `since` and `until` */
  limit?: number;
  returnFormat?: ReturnFormat;
  /** Extra query parameters */
  params?: QueryParams;
}

export interface FetchBulkMetricOptions {
  assets?: string[];
  since?: DateInput;
  until?: DateInput;
  interval?: string;
  currency?: string;
  /** Walk the range in windows instead of clamping it to one request */
  paginate?: boolean;
  returnFormat?: ReturnFormat;
  layout?: BulkLayout;
  /** Fetch the latest `limit` points in a single request */
  limit?: number;
  params?: QueryParams;
}

export interface AssetMetricsOptions {
  useCache?: boolean;
  cacheFile?: string;
}

function stripSlashes(path: string): string {
  return path.replace(/^\/+|\/+$/g, '');
}

function truncate(text: string, length: number = 200): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

// =============================================================================
// Client
// =============================================================================

/**
 * Metrics REST API Client
 *
 * Handles:
 * - API key authentication
 * - JSON and CSV response bodies
 * - Error mapping to TransportError/DecodeError
 * - Paginated bulk fetches
 */
export class MetricsApiClient implements PageSource {
  /** Return format used when a call does not name one */
  defaultReturnFormat: ReturnFormat;

  private readonly config: ClientConfig;
  private readonly http: AxiosInstance;
  private readonly logger: ILogger;
  private readonly paginator: Paginator;

  constructor(config: ClientConfigInput, options: MetricsClientOptions = {}) {
    this.config = parseClientConfig(config);
    this.defaultReturnFormat = this.config.defaultReturnFormat;
    this.logger = options.logger ?? createLogger('client');
    this.paginator = new Paginator(this, this.logger.child({ component: 'paginator' }));

    this.http = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeoutMs,
      headers: {
        'X-Api-Key': this.config.apiKey,
        'Accept': 'application/json, text/csv',
      },
      // a=BTC&a=ETH rather than a[]=BTC&a[]=ETH
      paramsSerializer: { indexes: null },
      // Bodies are decoded by getPage so CSV text survives untouched
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      adapter: options.adapter,
    });

    this.http.interceptors.response.use(
      (response) => response,
      (error: unknown) => this.handleError(error)
    );
  }

  /**
   * Create a client from GLASSNODE_* environment variables
   */
  static fromEnv(options: MetricsClientOptions = {}): MetricsApiClient {
    return new MetricsApiClient(configFromEnv(), options);
  }

  /**
   * Get configuration with the API key redacted
   */
  getConfig(): ClientConfig {
    return {
      ...this.config,
      apiKey: '***REDACTED***',
    };
  }

  /**
   * Map axios failures to TransportError
   */
  private async handleError(error: unknown): Promise<never> {
    if (!axios.isAxiosError(error)) {
      throw error;
    }

    if (!error.response) {
      throw new TransportError(`Network error: ${error.message}`, undefined, {
        code: error.code,
        url: error.config?.url,
      });
    }

    const { status, data } = error.response;
    const detail = responseMessage(data) ?? error.message;
    throw new TransportError(`API request failed with status ${status}: ${detail}`, status, {
      url: error.config?.url,
    });
  }

  // ============================================================================
  // Transport
  // ============================================================================

  /**
   * GET one endpoint and decode its body
   *
   * @returns Decoded JSON, or the raw text of a CSV response
   * @throws {TransportError} On network failures and non-2xx responses
   * @throws {DecodeError} If the body is neither JSON nor CSV
   */
  async getPage(path: string, params: QueryParams = {}): Promise<unknown> {
    const endpoint = stripSlashes(path);
    this.logger.debug('GET request', { endpoint, params });

    const response = await this.http.get<unknown>(endpoint, { params });
    return decodeBody(response);
  }

  // ============================================================================
  // Metadata Operations
  // ============================================================================

  /**
   * List all supported assets
   */
  async getAssets(): Promise<AssetInfo[]> {
    return this.getValidated('metadata/assets', {}, z.array(AssetInfoSchema));
  }

  /**
   * List the paths of all available metrics
   */
  async getMetrics(): Promise<string[]> {
    return this.getValidated('metadata/metrics', {}, z.array(z.string()));
  }

  /**
   * Metadata of one metric, optionally for one asset
   */
  async getMetricMetadata(path: string, asset?: string): Promise<MetricMetadata> {
    const params: QueryParams = { path };
    if (asset) {
      params.a = asset;
    }
    return this.getValidated('metadata/metric', params, MetricMetadataSchema);
  }

  /**
   * Metric paths available for an asset
   *
   * The asset to metric map is read from the cache file when `useCache` is
   * set and the file is valid; otherwise it is rebuilt from the metadata
   * endpoints and written back.
   *
   * @returns An empty list for an unknown asset
   */
  async getAssetMetrics(asset: string, options: AssetMetricsOptions = {}): Promise<string[]> {
    const useCache = options.useCache ?? true;
    const cacheFile = options.cacheFile ?? this.config.cacheFile;

    let map: AssetMetricsMap | null = null;
    if (useCache) {
      map = await loadAssetMetricsCache(cacheFile, this.logger);
    }

    if (map === null) {
      map = await this.buildAssetMetricsMap();
      await saveAssetMetricsCache(map, cacheFile, this.logger);
    }

    return map[asset] ?? [];
  }

  private async buildAssetMetricsMap(): Promise<AssetMetricsMap> {
    const metrics = await this.getMetrics();
    this.logger.info('Building asset metrics map', { metrics: metrics.length });

    const map: AssetMetricsMap = {};
    for (const path of metrics) {
      let metadata: MetricMetadata;
      try {
        metadata = await this.getMetricMetadata(path);
      } catch (error) {
        if (!(error instanceof MetricsError)) {
          throw error;
        }
        this.logger.warn('Failed to fetch metadata for metric, skipping', {
          path,
          error: error.message,
        });
        continue;
      }

      for (const asset of supportedAssets(metadata)) {
        const paths = map[asset] ?? (map[asset] = []);
        if (!paths.includes(path)) {
          paths.push(path);
        }
      }
    }

    this.logger.info('Built asset metrics map', { assets: Object.keys(map).length });
    return map;
  }

  // ============================================================================
  // Data Operations
  // ============================================================================

  /**
   * Fetch a single metric series for one asset
   *
   * @throws {FormatError} If a table is requested and the payload shape is unknown
   */
  async fetchMetric(
    path: string,
    asset: string,
    options: FetchMetricOptions & { returnFormat: 'table' }
  ): Promise<Table>;
  async fetchMetric(path: string, asset: string, options?: FetchMetricOptions): Promise<unknown>;
  async fetchMetric(path: string, asset: string, options: FetchMetricOptions = {}): Promise<unknown> {
    const returnFormat = options.returnFormat ?? this.defaultReturnFormat;
    const interval = options.interval ?? '24h';
    const metricPath = stripSlashes(path);

    let since = options.since;
    let until = options.until;
    if (options.limit !== undefined) {
      until = nowSeconds();
      since = calculateSinceForLimit(interval, options.limit, until);
    }

    const params: QueryParams = { a: asset, f: options.format ?? 'json', ...options.params };
    if (since !== undefined) {
      params.s = resolveTimestamp(since);
    }
    if (until !== undefined) {
      params.u = resolveTimestamp(until);
    }
    params.i = interval;
    if (options.currency !== undefined) {
      params.c = options.currency;
    }

    const raw = await this.getPage(`metrics/${metricPath}`, params);

    if (returnFormat === 'table') {
      return singleSeriesToTable(raw, metricPath, { logger: this.logger });
    }
    return raw;
  }

  /**
   * Fetch a metric for several assets through its bulk endpoint
   *
   * Without pagination one request is made; a range wider than the
   * resolution allows is clamped to its most recent part. With pagination
   * the range is walked in windows and stitched.
   *
   * @throws {ConfigError} For an unknown resolution or layout, or a metric without bulk support
   */
  async fetchBulkMetric(
    path: string,
    options: FetchBulkMetricOptions & { returnFormat: 'table'; layout?: 'wide' }
  ): Promise<Table>;
  async fetchBulkMetric(
    path: string,
    options: FetchBulkMetricOptions & { returnFormat: 'table'; layout: 'by-asset' | 'by-series-key' }
  ): Promise<Record<string, Table>>;
  async fetchBulkMetric(
    path: string,
    options: FetchBulkMetricOptions & { returnFormat: 'table' }
  ): Promise<BulkTableResult>;
  async fetchBulkMetric(path: string, options?: FetchBulkMetricOptions): Promise<unknown>;
  async fetchBulkMetric(path: string, options: FetchBulkMetricOptions = {}): Promise<unknown> {
    const returnFormat = options.returnFormat ?? this.defaultReturnFormat;
    const layout = parseLayout(options.layout ?? 'wide');
    const interval = options.interval ?? '24h';
    const width = windowSeconds(interval);
    const metricPath = stripSlashes(path);

    const metadata = await this.getMetricMetadata(metricPath);
    if (!metadata.bulk_supported) {
      throw new ConfigError(`Metric '${metricPath}' does not support bulk operations`, {
        path: metricPath,
      });
    }

    const bulkPath = `metrics/${metricPath}/bulk`;
    const params: QueryParams = { i: interval, ...options.params };
    if (options.assets && options.assets.length > 0) {
      params.a = options.assets;
    }
    const currency = options.currency ?? 'native';
    if (currency) {
      params.c = currency;
    }

    let since = resolveOptionalTimestamp(options.since);
    let until: number;
    let paginate = options.paginate ?? false;
    if (options.limit !== undefined) {
      until = nowSeconds();
      since = calculateSinceForLimit(interval, options.limit, until);
      paginate = false;
    } else {
      until = options.until !== undefined ? resolveTimestamp(options.until) : nowSeconds();
    }

    let raw: unknown;
    if (paginate) {
      raw = await this.paginator.fetchRange({
        path: bulkPath,
        params,
        since,
        until,
        resolution: interval,
      });
    } else {
      if (since === undefined) {
        since = until - width;
      } else if (until - since > width) {
        this.logger.warn('Requested range exceeds the bulk limit for this interval, adjusting since', {
          interval,
          requestedSince: since,
          since: until - width,
        });
        since = until - width;
      }
      raw = await this.getPage(bulkPath, { ...params, s: since, u: until });
    }

    if (returnFormat === 'table') {
      return bulkToTable(raw, layout, { logger: this.logger });
    }
    return raw;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async getValidated<T>(
    path: string,
    params: QueryParams,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const payload = await this.getPage(path, params);
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new FormatError(`Unexpected response from ${path}`, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data;
  }
}

// =============================================================================
// Body Decoding
// =============================================================================

function contentType(response: AxiosResponse): string {
  return String(response.headers['content-type'] ?? '');
}

type JsonParseResult = { ok: true; value: unknown } | { ok: false };

function parseJson(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function decodeBody(response: AxiosResponse<unknown>): unknown {
  const body = response.data;
  if (typeof body !== 'string') {
    return body;
  }

  const json = parseJson(body);
  if (json.ok) {
    return json.value;
  }
  if (contentType(response).includes('text/csv')) {
    return body;
  }
  throw new DecodeError(`Invalid JSON response: ${truncate(body)}`, {
    url: response.config.url,
  });
}

/**
 * Error text of an API error body: its `message` or `error` field, or the body itself
 */
function responseMessage(data: unknown): string | undefined {
  if (typeof data !== 'string' || data.trim() === '') {
    return undefined;
  }
  const json = parseJson(data);
  if (json.ok && isRecordObject(json.value)) {
    const message = json.value.message ?? json.value.error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return truncate(data.trim());
}

function supportedAssets(metadata: MetricMetadata): string[] {
  const assets = metadata.parameters?.a;
  if (!Array.isArray(assets)) {
    return [];
  }
  return assets.filter((asset): asset is string => typeof asset === 'string');
}
