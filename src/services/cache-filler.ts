import { DetailCache, isValidJobId } from './detail-cache';
import { DetailFetcher } from './detail-fetcher';
import { Sleep, delay } from '../utils/delay';
import { logger } from '../utils/logger';

export interface CacheFillStats {
  total: number;
  alreadyCached: number;
  fetched: number;
  failed: number;
}

export interface CacheFillerOptions {
  // Pause after each successful fetch
  delayMs: number;
  sleep?: Sleep;
  progressEvery?: number;
}

/**
 * Ensures every listing id has a cached description.
 * Safe to re-run: ids with a cache file are skipped, so a run resumes
 * where the previous one stopped.
 */
export class DetailCacheFiller {
  private readonly sleep: Sleep;
  private readonly progressEvery: number;

  constructor(
    private readonly cache: DetailCache,
    private readonly fetcher: DetailFetcher,
    private readonly options: CacheFillerOptions
  ) {
    this.sleep = options.sleep ?? delay;
    this.progressEvery = options.progressEvery ?? 20;
  }

  async fill(jobIds: string[]): Promise<CacheFillStats> {
    const ids = Array.from(new Set(jobIds));
    const stats: CacheFillStats = { total: ids.length, alreadyCached: 0, fetched: 0, failed: 0 };

    const remaining = ids.filter(id => isValidJobId(id) && !this.cache.has(id)).length;
    logger.info(`${remaining} job descriptions to fetch`, { total: ids.length, cacheDir: this.cache.dir });

    for (const [index, jobId] of ids.entries()) {
      const label = `[${index + 1}/${ids.length}]`;

      if (!isValidJobId(jobId)) {
        logger.warn(`${label} skipping invalid job id`, { jobId });
        stats.failed++;
        continue;
      }

      if (this.cache.has(jobId)) {
        stats.alreadyCached++;
        continue;
      }

      const result = await this.fetcher.fetch(jobId, label);
      if (!result.ok) {
        stats.failed++;
        continue;
      }

      const stored = await this.cache.store(jobId, result.body);
      if (stored) {
        stats.fetched++;
      } else {
        stats.alreadyCached++;
      }

      if ((index + 1) % this.progressEvery === 0) {
        logger.info(`${label} cached ${jobId}`);
      }
      await this.sleep(this.options.delayMs);
    }

    logger.info('Detail cache fill complete', { ...stats });
    return stats;
  }
}
