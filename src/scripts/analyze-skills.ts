import dotenv from 'dotenv';
dotenv.config();

import { loadConfig, matchesSkillTerms } from '../config';
import { ListingStore, SKILLS_FILE } from '../services/listing-store';
import { DetailCache } from '../services/detail-cache';
import { loadDescriptions } from '../services/trend-analyzer';
import { countSkillFrequencies } from '../analysis/skills';
import { ListingRecord } from '../types/listing';
import { logger, setLogLevel } from '../utils/logger';

/**
 * Recomputes skill frequencies from existing listing files and the detail
 * cache, without touching the network
 */
async function analyzeSkills() {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const matching = config.keywords.filter(keyword => matchesSkillTerms(config, keyword));
    const keywords = matching.length > 0 ? matching : [config.detail.listingKeyword];

    const store = new ListingStore(config.dataDir);
    const cache = new DetailCache(config.detailCacheDir);
    const listings = new Map<string, ListingRecord>();

    for (const keyword of keywords) {
      for (const record of await store.readListings(keyword)) {
        listings.set(record.jobId, record);
      }
    }

    const records = Array.from(listings.values());
    const loaded = await loadDescriptions(cache, records);
    logger.info(`Loaded ${loaded}/${records.length} cached descriptions`, { keywords });

    const skills = countSkillFrequencies(records.map(record => record.descriptionText));
    const path = await store.writeJson(SKILLS_FILE, skills);
    logger.info('Wrote skill frequencies', { path });

    console.log(JSON.stringify(skills, null, 2));
    process.exit(0);
  } catch (error) {
    logger.error('Skill analysis failed', error);
    process.exit(1);
  }
}

void analyzeSkills();
