import { z } from 'zod';
import { ListingSource, CollectOptions } from './base';
import { ListingRecord } from '../types/listing';
import { SearchConfig } from '../config';
import { HttpClient, buildUrl, defaultHttpClient } from '../utils/http';
import { HttpStatusError } from '../utils/errors';
import { Sleep, delay } from '../utils/delay';
import { parseTimestamp, subtractDays } from '../utils/dates';
import { logger } from '../utils/logger';

// A field of the wrong shape reads as absent; only a missing id or date
// drops the listing
const optionalString = z.string().nullish().catch(undefined);

const rawListingSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish().catch(undefined),
  title: optionalString,
  listingDate: optionalString,
  locations: z.array(z.object({ label: optionalString }).nullish().catch(undefined)).nullish().catch(undefined),
  companyName: optionalString,
  advertiser: z.object({ description: optionalString }).nullish().catch(undefined),
  workTypes: z.array(z.string().nullish().catch(undefined)).nullish().catch(undefined),
});

type RawListing = z.infer<typeof rawListingSchema>;

const searchPageSchema = z.object({
  data: z.array(z.unknown()).nullish(),
});

export interface SeekSourceOptions {
  http?: HttpClient;
  sleep?: Sleep;
  now?: () => Date;
}

function joinLabels(values: Array<string | null | undefined>): string | undefined {
  const joined = values
    .filter((value): value is string => typeof value === 'string' && value.length > 0)
    .join(', ');
  return joined || undefined;
}

/**
 * SEEK job search adapter
 * Results are requested in ListedDate order, so the first listing older than
 * the cutoff means no later page can hold anything newer.
 */
export class SeekSource implements ListingSource {
  readonly name = 'seek';
  private readonly http: HttpClient;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(
    private readonly config: SearchConfig,
    options: SeekSourceOptions = {}
  ) {
    this.http = options.http ?? defaultHttpClient;
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? (() => new Date());
  }

  async fetchListings(keyword: string, options: CollectOptions): Promise<ListingRecord[]> {
    const cutoff = subtractDays(this.now(), options.maxAgeDays);
    const listings: ListingRecord[] = [];
    const seenIds = new Set<string>();
    let skippedIncomplete = 0;
    let skippedDuplicate = 0;
    let reachedCutoff = false;
    let pagesFetched = 0;

    try {
      logger.info(`Fetching listings from ${this.name}`, {
        keyword,
        cutoff: cutoff.toISOString(),
        maxPages: options.maxPages,
      });

      for (let page = 1; page <= options.maxPages; page++) {
        const items = await this.fetchPage(keyword, page);
        pagesFetched = page;

        if (items.length === 0) {
          logger.info(`No more listings on page ${page}, done.`, { keyword });
          break;
        }

        for (const item of items) {
          const parsed = rawListingSchema.safeParse(item);
          if (!parsed.success) {
            skippedIncomplete++;
            continue;
          }

          const raw = parsed.data;
          const jobId = raw.id == null ? '' : String(raw.id).trim();
          if (!jobId) {
            skippedIncomplete++;
            continue;
          }
          if (seenIds.has(jobId)) {
            skippedDuplicate++;
            continue;
          }

          const listingDate = raw.listingDate ? parseTimestamp(raw.listingDate) : undefined;
          if (!listingDate) {
            skippedIncomplete++;
            continue;
          }

          if (listingDate.getTime() < cutoff.getTime()) {
            reachedCutoff = true;
            break;
          }

          seenIds.add(jobId);
          listings.push(this.normalize(jobId, listingDate, raw));
        }

        logger.debug(`Page ${page}: ${items.length} fetched, ${listings.length} kept`, { keyword });

        if (reachedCutoff) {
          logger.info(`Reached cutoff on page ${page}, stopping.`, { keyword });
          break;
        }

        await this.sleep(this.config.requestDelayMs);
      }

      logger.info(`Fetched ${listings.length} listings from ${this.name}`, {
        keyword,
        pagesFetched,
        skippedIncomplete,
        skippedDuplicate,
        reachedCutoff,
      });
      return listings;
    } catch (error) {
      logger.error(`Error fetching listings from ${this.name}`, error, { keyword, page: pagesFetched + 1 });
      throw error;
    }
  }

  private async fetchPage(keyword: string, page: number): Promise<unknown[]> {
    const url = buildUrl(this.config.url, {
      ...this.config.params,
      keywords: keyword,
      page,
    });

    const headers: Record<string, string> = { ...this.config.headers };
    if (this.config.sessionCookie) {
      headers.cookie = this.config.sessionCookie;
    }

    const response = await this.http(url, { headers, timeout: this.config.timeoutMs });
    if (!response.ok) {
      throw new HttpStatusError(response.status, url);
    }

    const payload: unknown = await response.json();
    const parsed = searchPageSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`Search response for page ${page} is not a listing page: ${parsed.error.message}`);
    }
    return parsed.data.data ?? [];
  }

  private normalize(jobId: string, listingDate: Date, raw: RawListing): ListingRecord {
    return {
      jobId,
      title: raw.title ?? '',
      listingDate,
      location: joinLabels((raw.locations ?? []).map(location => location?.label)),
      employer: raw.companyName || raw.advertiser?.description || undefined,
      workType: joinLabels(raw.workTypes ?? []),
    };
  }
}
