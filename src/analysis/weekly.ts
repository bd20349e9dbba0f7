import { ListingRecord, WeeklyBucketMap } from '../types/listing';
import { toIsoDate, weekStart } from '../utils/dates';

/**
 * Listings per ISO week (keyed by the Monday), ascending, empty weeks omitted
 */
export function summarizeWeeklyCounts(records: Iterable<Pick<ListingRecord, 'listingDate'>>): WeeklyBucketMap {
  const buckets = new Map<string, number>();
  for (const record of records) {
    const key = toIsoDate(weekStart(record.listingDate));
    buckets.set(key, (buckets.get(key) ?? 0) + 1);
  }
  const keys = Array.from(buckets.keys()).sort();
  return Object.fromEntries(keys.map(key => [key, buckets.get(key) ?? 0]));
}
