import { ListingSource } from '../sources/base';
import { AnalysisSummary, KeywordAnalysis, ListingRecord } from '../types/listing';
import { Config, qualifiesForSkills } from '../config';
import { ListingStore, SKILLS_FILE, SUMMARY_FILE } from './listing-store';
import { DetailCache, isValidJobId } from './detail-cache';
import { DetailCacheFiller } from './cache-filler';
import { summarizeWeeklyCounts } from '../analysis/weekly';
import { countSkillFrequencies } from '../analysis/skills';
import { logger } from '../utils/logger';

/**
 * Attaches cached description text to each record that has a cache entry
 */
export async function loadDescriptions(cache: DetailCache, records: ListingRecord[]): Promise<number> {
  let loaded = 0;
  for (const record of records) {
    if (!isValidJobId(record.jobId)) continue;
    const text = await cache.read(record.jobId);
    if (text !== undefined) {
      record.descriptionText = text;
      loaded++;
    }
  }
  return loaded;
}

export function buildKeywordAnalysis(keyword: string, records: ListingRecord[]): KeywordAnalysis {
  return {
    keyword,
    total_postings: records.length,
    weekly_counts: summarizeWeeklyCounts(records),
  };
}

/**
 * Collects listings per keyword and writes the listing files, the summary
 * and, when skill collection is on, the skills file.
 */
export class TrendAnalyzer {
  constructor(
    private readonly source: ListingSource,
    private readonly store: ListingStore,
    private readonly cache: DetailCache,
    private readonly config: Config,
    private readonly filler?: DetailCacheFiller
  ) {}

  async run(keywords: string[] = this.config.keywords): Promise<AnalysisSummary> {
    const summary: AnalysisSummary = {};
    // Distinct listings across every skill-qualifying keyword
    const skillCorpus = new Map<string, string | undefined>();

    for (const keyword of keywords) {
      logger.info(`Fetching listings for keyword: "${keyword}"`);
      const records = await this.source.fetchListings(keyword, {
        maxAgeDays: this.config.maxAgeDays,
        maxPages: this.config.maxPages,
      });
      logger.info(`Collected ${records.length} recent postings`, { keyword });

      await this.store.writeListings(keyword, records);
      const entry = buildKeywordAnalysis(keyword, records);

      if (qualifiesForSkills(this.config, keyword) && records.length > 0) {
        await this.attachDescriptions(keyword, records);
        entry.skill_frequencies = countSkillFrequencies(records.map(record => record.descriptionText));
        for (const record of records) {
          skillCorpus.set(record.jobId, record.descriptionText);
        }
      }

      summary[keyword] = entry;
    }

    const summaryPath = await this.store.writeJson(SUMMARY_FILE, summary);
    logger.info('Wrote summary', { path: summaryPath, keywords: keywords.length });

    if (skillCorpus.size > 0) {
      const skillsPath = await this.store.writeJson(SKILLS_FILE, countSkillFrequencies(skillCorpus.values()));
      logger.info('Wrote skill frequencies', { path: skillsPath, listings: skillCorpus.size });
    }

    return summary;
  }

  private async attachDescriptions(keyword: string, records: ListingRecord[]): Promise<void> {
    logger.info('Loading job descriptions for skill analysis', { keyword });
    if (this.filler && this.config.skills.fetchMissingDetails) {
      await this.filler.fill(records.map(record => record.jobId));
    }
    const loaded = await loadDescriptions(this.cache, records);
    logger.info(`Loaded ${loaded}/${records.length} cached descriptions`, { keyword });
  }
}
