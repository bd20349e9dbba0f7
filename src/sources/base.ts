import { ListingRecord } from '../types/listing';

export interface CollectOptions {
  // Listings older than now - maxAgeDays end the collection
  maxAgeDays: number;
  maxPages: number;
}

/**
 * Base interface for listing sources
 * A source paginates one keyword search and returns normalized listings
 */
export interface ListingSource {
  /**
   * Unique identifier for the source
   */
  readonly name: string;

  /**
   * Fetches listings for a keyword, newest first, deduplicated by id
   */
  fetchListings(keyword: string, options: CollectOptions): Promise<ListingRecord[]>;
}
