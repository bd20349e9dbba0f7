import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from '../config';
import { ListingStore } from '../services/listing-store';
import { DetailCache } from '../services/detail-cache';
import { DetailFetcher } from '../services/detail-fetcher';
import { DetailCacheFiller } from '../services/cache-filler';
import { logger, setLogLevel } from '../utils/logger';

/**
 * Caches descriptions for every listing in the configured listing file.
 * Re-running resumes: cached ids are skipped.
 */
async function cacheDetails() {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const store = new ListingStore(config.dataDir);
    const listings = await store.readListings(config.detail.listingKeyword);

    const filler = new DetailCacheFiller(
      new DetailCache(config.detailCacheDir),
      new DetailFetcher(config.detail),
      { delayMs: config.detail.delayMs }
    );
    const stats = await filler.fill(listings.map(listing => listing.jobId));

    if (stats.failed > 0) {
      logger.warn(`${stats.failed} descriptions could not be fetched; re-run to retry them`);
    }
    process.exit(0);
  } catch (error) {
    logger.error('Detail caching failed', error);
    process.exit(1);
  }
}

void cacheDetails();
