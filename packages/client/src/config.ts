/**
 * Client Configuration
 */

import { z } from 'zod';
import { ConfigError } from '@chainmetrics/core';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_BASE_URL = 'https://api.glassnode.com/v1';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_CACHE_FILE = 'asset_metrics_cache.json';

// =============================================================================
// Schemas
// =============================================================================

export const RETURN_FORMATS = ['raw', 'table'] as const;

/**
 * `raw` returns payloads as decoded; `table` reshapes them into Tables
 */
export const ReturnFormatSchema = z.enum(RETURN_FORMATS);

export type ReturnFormat = z.infer<typeof ReturnFormatSchema>;

export const ClientConfigSchema = z.object({
  /** Sent in the X-Api-Key header of every request */
  apiKey: z.string().min(1),
  /** API root; endpoint paths are appended to it */
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  /** Per-request timeout in milliseconds */
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  defaultReturnFormat: ReturnFormatSchema.default('raw'),
  /** JSON file holding the asset to metric map */
  cacheFile: z.string().min(1).default(DEFAULT_CACHE_FILE),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

// =============================================================================
// Loading
// =============================================================================

/**
 * Validate a configuration object, filling in defaults
 *
 * @throws {ConfigError} If a field is missing or invalid
 */
export function parseClientConfig(input: unknown): ClientConfig {
  const parsed = ClientConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid client configuration: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/**
 * Read the configuration from environment variables
 *
 * @throws {ConfigError} If GLASSNODE_API_KEY is not set
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const apiKey = env.GLASSNODE_API_KEY;
  if (!apiKey) {
    throw new ConfigError('Missing API key. Set the GLASSNODE_API_KEY environment variable.');
  }

  return parseClientConfig({
    apiKey,
    baseUrl: env.GLASSNODE_API_URL || undefined,
    timeoutMs: env.GLASSNODE_TIMEOUT_MS ? parseInt(env.GLASSNODE_TIMEOUT_MS, 10) : undefined,
    defaultReturnFormat: env.GLASSNODE_RETURN_FORMAT || undefined,
    cacheFile: env.GLASSNODE_CACHE_FILE || undefined,
  });
}
