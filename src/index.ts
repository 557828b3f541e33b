import { authenticate } from './auth';
import { loadConfig } from './config';
import { closePool } from './database/pool';
import { syncCampaigns } from './syncCampaigns';
import { logger } from './utils/logger';
import { epochSecondsNow } from './utils/time';

async function main(): Promise<number> {
  logger.info('Starting Search Ads sync...');

  try {
    const config = loadConfig();
    // One notion of "now" for every auth stage in this run
    const headers = await authenticate(config, epochSecondsNow());

    await syncCampaigns(headers, {
      apiUrl: config.apiUrl,
      pageLimit: config.sync.pageLimit,
      ...config.http,
    });

    logger.info('✓ Done syncing.');
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`✗ Sync failed: ${message}`, error);
    if (error instanceof Error && error.stack && process.env.NODE_ENV === 'development') {
      logger.debug(`Stack trace: ${error.stack}`);
    }
    return 1;
  } finally {
    await closePool();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Failed to shut down cleanly', error);
    process.exitCode = 1;
  }
);
