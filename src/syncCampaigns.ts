import { fetchCampaigns } from './api/campaignClient';
import type { CampaignClientOptions } from './api/campaignClient';
import type { RequestHeaders } from './types';
import { logger } from './utils/logger';

export type RecordWriter = (line: string) => void;

const STREAM = 'campaign';

/**
 * Sync the campaign stream: one RECORD message per campaign on stdout.
 */
export async function syncCampaigns(
  headers: RequestHeaders,
  options: CampaignClientOptions,
  write: RecordWriter = (line) => process.stdout.write(`${line}\n`)
): Promise<number> {
  const startTime = Date.now();
  logger.info(`${STREAM}: Starting sync`);

  const campaigns = await fetchCampaigns(headers, options);
  for (const record of campaigns) {
    write(JSON.stringify({ type: 'RECORD', stream: STREAM, record }));
  }

  const seconds = ((Date.now() - startTime) / 1000).toFixed(1);
  logger.info(`${STREAM}: Completed sync (${campaigns.length} rows) in ${seconds} seconds`);
  return campaigns.length;
}
