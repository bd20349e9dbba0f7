/**
 * Normalized listing schema
 * Every search result is normalized to this structure before it is stored
 */
export interface ListingRecord {
  jobId: string;
  title: string;
  listingDate: Date;
  location?: string;
  employer?: string;
  workType?: string;
  // Attached in memory from the detail cache, never written to the listing file
  descriptionText?: string;
}

/**
 * On-disk listing file row
 */
export interface StoredListing {
  job_id: string;
  title: string;
  listing_date: string;
  location: string | null;
  employer: string | null;
  work_type: string | null;
}

/**
 * Week start (YYYY-MM-DD, Monday UTC) -> listings in that week
 */
export type WeeklyBucketMap = Record<string, number>;

/**
 * Skill label -> number of distinct listings mentioning it
 */
export type SkillFrequencyMap = Record<string, number>;

export interface KeywordAnalysis {
  keyword: string;
  total_postings: number;
  weekly_counts: WeeklyBucketMap;
  skill_frequencies?: SkillFrequencyMap;
}

export type AnalysisSummary = Record<string, KeywordAnalysis>;
