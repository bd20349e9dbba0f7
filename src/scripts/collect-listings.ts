import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from '../config';
import { createListingSource } from '../sources';
import { ListingStore } from '../services/listing-store';
import { DetailCache } from '../services/detail-cache';
import { DetailFetcher } from '../services/detail-fetcher';
import { DetailCacheFiller } from '../services/cache-filler';
import { TrendAnalyzer } from '../services/trend-analyzer';
import { logger, setLogLevel } from '../utils/logger';

/**
 * Collects listings for every configured keyword and writes the summary
 */
async function collect() {
  const startTime = Date.now();

  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    logger.info('Listing collection started', {
      keywords: config.keywords,
      maxAgeDays: config.maxAgeDays,
      maxPages: config.maxPages,
      collectSkills: config.skills.enabled,
    });

    const cache = new DetailCache(config.detailCacheDir);
    const filler = new DetailCacheFiller(cache, new DetailFetcher(config.detail), {
      delayMs: config.detail.delayMs,
    });
    const analyzer = new TrendAnalyzer(
      createListingSource(config),
      new ListingStore(config.dataDir),
      cache,
      config,
      filler
    );

    const summary = await analyzer.run();
    console.log(JSON.stringify(summary, null, 2));

    logger.info('Listing collection completed', { duration: `${Date.now() - startTime}ms` });
    process.exit(0);
  } catch (error) {
    logger.error('Listing collection failed', error, { duration: `${Date.now() - startTime}ms` });
    process.exit(1);
  }
}

void collect();
