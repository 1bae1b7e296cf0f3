/**
 * Asset to metric map cache
 *
 * The map is expensive to build (one metadata request per metric), so it is
 * kept in a JSON file between runs.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ILogger } from '@chainmetrics/core';

export const AssetMetricsMapSchema = z.record(z.array(z.string()));

/** Asset symbol to the metric paths available for it */
export type AssetMetricsMap = z.infer<typeof AssetMetricsMapSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load the cached map
 *
 * @returns null when the file is missing, unreadable or not a valid map
 */
export async function loadAssetMetricsCache(
  file: string,
  logger: ILogger
): Promise<AssetMetricsMap | null> {
  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug('Asset metrics cache not found', { file });
    } else {
      logger.warn('Failed to read asset metrics cache', {
        file,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    logger.warn('Asset metrics cache is not valid JSON, rebuilding', { file });
    return null;
  }

  const parsed = AssetMetricsMapSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn('Asset metrics cache has an unexpected structure, rebuilding', { file });
    return null;
  }

  logger.debug('Loaded asset metrics cache', { file, assets: Object.keys(parsed.data).length });
  return parsed.data;
}

/**
 * Write the map to the cache file. A failed write is logged and otherwise ignored.
 */
export async function saveAssetMetricsCache(
  map: AssetMetricsMap,
  file: string,
  logger: ILogger
): Promise<void> {
  try {
    await writeFile(file, JSON.stringify(map, null, 2), 'utf-8');
    logger.info('Saved asset metrics cache', { file, assets: Object.keys(map).length });
  } catch (error) {
    logger.warn('Failed to write asset metrics cache', {
      file,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
