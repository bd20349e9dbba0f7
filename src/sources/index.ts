import { ListingSource } from './base';
import { SeekSource, SeekSourceOptions } from './seek';
import { Config } from '../config';
import { logger } from '../utils/logger';

/**
 * Factory for the configured listing source
 */
export function createListingSource(config: Config, options: SeekSourceOptions = {}): ListingSource {
  if (!config.search.sessionCookie) {
    logger.warn('SEEK_SESSION_COOKIE is not set; the search API may reject anonymous requests');
  }
  return new SeekSource(config.search, options);
}
