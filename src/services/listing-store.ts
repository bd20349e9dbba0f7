import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { ListingRecord, StoredListing } from '../types/listing';
import { ListingFileError } from '../utils/errors';
import { parseTimestamp, toIsoWithOffset } from '../utils/dates';
import { logger } from '../utils/logger';

export const SUMMARY_FILE = 'seek_job_summary.json';
export const SKILLS_FILE = 'seek_skills.json';

const storedListingSchema = z.object({
  job_id: z.string().min(1),
  title: z.string(),
  listing_date: z.string().refine(value => parseTimestamp(value) !== undefined, 'not an ISO-8601 timestamp'),
  location: z.string().nullable(),
  employer: z.string().nullable(),
  work_type: z.string().nullable(),
});

const listingFileSchema = z.array(storedListingSchema);

export function listingFileName(keyword: string): string {
  return `seek_${keyword.replace(/ /g, '_')}_jobs.json`;
}

export function toStoredListing(record: ListingRecord): StoredListing {
  return {
    job_id: record.jobId,
    title: record.title,
    listing_date: toIsoWithOffset(record.listingDate),
    location: record.location ?? null,
    employer: record.employer ?? null,
    work_type: record.workType ?? null,
  };
}

export function fromStoredListing(stored: StoredListing): ListingRecord {
  const listingDate = parseTimestamp(stored.listing_date);
  if (!listingDate) {
    throw new Error(`Invalid listing_date for ${stored.job_id}: ${stored.listing_date}`);
  }
  return {
    jobId: stored.job_id,
    title: stored.title,
    listingDate,
    location: stored.location ?? undefined,
    employer: stored.employer ?? undefined,
    workType: stored.work_type ?? undefined,
  };
}

/**
 * Flat JSON files under the data directory
 */
export class ListingStore {
  constructor(readonly dataDir: string) {}

  listingPath(keyword: string): string {
    return join(this.dataDir, listingFileName(keyword));
  }

  async writeListings(keyword: string, records: ListingRecord[]): Promise<string> {
    const path = await this.writeJson(listingFileName(keyword), records.map(toStoredListing));
    logger.info(`Wrote ${records.length} listings`, { keyword, path });
    return path;
  }

  async readListings(keyword: string): Promise<ListingRecord[]> {
    return this.readListingFile(this.listingPath(keyword));
  }

  async readListingFile(path: string): Promise<ListingRecord[]> {
    if (!existsSync(path)) {
      throw new ListingFileError('missing', path);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new ListingFileError('malformed', path, error instanceof Error ? error.message : undefined);
    }

    const parsed = listingFileSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ListingFileError('malformed', path, issue ? `${issue.path.join('.')}: ${issue.message}` : undefined);
    }
    return parsed.data.map(fromStoredListing);
  }

  async writeJson(fileName: string, value: unknown): Promise<string> {
    await mkdir(this.dataDir, { recursive: true });
    const path = join(this.dataDir, fileName);
    await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    return path;
  }
}
