import type { MetricsClient } from './shared.js';

export interface MetadataOptions {
  asset?: string;
}

/**
 * Print the metadata of one metric as JSON
 */
export async function metadataCommand(
  path: string,
  options: MetadataOptions,
  client: MetricsClient
): Promise<void> {
  const metadata = await client.getMetricMetadata(path, options.asset);
  console.log(JSON.stringify(metadata, null, 2));
}
