/**
 * Resolution Tables
 *
 * Bulk endpoints cap the time range of one request by resolution; callers
 * that fetch without pagination need these limits too.
 */

import { ConfigError } from '../errors/index.js';

export const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * Maximum days one bulk request may cover, by resolution
 */
export const BULK_MAX_DAYS = {
  '10m': 10,
  '1h': 10,
  '24h': 31,
  '1w': 93,
  '1month': 93,
} as const;

export type BulkResolution = keyof typeof BULK_MAX_DAYS;

/**
 * Seconds per data point, used to turn a point count into a time range.
 * `1month` is approximated as 30 days.
 */
export const RESOLUTION_SECONDS: Readonly<Record<string, number>> = {
  '10m': 10 * 60,
  '1h': 60 * 60,
  '24h': SECONDS_PER_DAY,
  '1d': SECONDS_PER_DAY,
  '1w': 7 * SECONDS_PER_DAY,
  '1month': 30 * SECONDS_PER_DAY,
};

export function isBulkResolution(resolution: string): resolution is BulkResolution {
  return Object.prototype.hasOwnProperty.call(BULK_MAX_DAYS, resolution);
}

/**
 * Maximum days per bulk request for a resolution
 *
 * @throws {ConfigError} For a resolution the bulk endpoints do not support
 */
export function maxDays(resolution: string): number {
  if (!isBulkResolution(resolution)) {
    throw new ConfigError(
      `Unsupported resolution '${resolution}'. Expected one of: ${Object.keys(BULK_MAX_DAYS).join(', ')}`,
      { resolution }
    );
  }
  return BULK_MAX_DAYS[resolution];
}

/**
 * Width of one pagination window in seconds
 */
export function windowSeconds(resolution: string): number {
  return maxDays(resolution) * SECONDS_PER_DAY;
}
