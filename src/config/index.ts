/**
 * Configuration management
 * All behavior is driven by environment variables
 */
import { join } from 'path';
import { LogLevel, parseLogLevel } from '../utils/logger';

export interface SearchConfig {
  url: string;
  // Fixed query parameters sent with every page request
  params: Record<string, string>;
  headers: Record<string, string>;
  // Opaque browser session cookie, forwarded as-is
  sessionCookie?: string;
  requestDelayMs: number;
  timeoutMs: number;
}

export interface DetailConfig {
  // `{jobId}` is replaced with the listing identifier
  urlTemplate: string;
  listingKeyword: string;
  timeoutMs: number;
  maxAttempts: number;
  backoffMs: number;
  delayMs: number;
}

export interface SkillsConfig {
  enabled: boolean;
  // A keyword qualifies for skill analysis when it contains one of these
  keywordTerms: string[];
  fetchMissingDetails: boolean;
}

export interface Config {
  // Storage
  dataDir: string;
  detailCacheDir: string;

  // Collection
  keywords: string[];
  maxAgeDays: number;
  maxPages: number;

  search: SearchConfig;
  detail: DetailConfig;
  skills: SkillsConfig;

  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

export const SEARCH_URL = 'https://www.seek.com.au/api/jobsearch/v5/search';
export const DETAIL_URL_TEMPLATE = 'https://r.jina.ai/https://www.seek.com.au/job/{jobId}';

const SEARCH_HEADERS: Record<string, string> = {
  accept: 'application/json, text/plain, */*',
  'accept-language': 'en-AU,en;q=0.9',
  referer: 'https://www.seek.com.au/',
  'sec-fetch-dest': 'empty',
  'sec-fetch-mode': 'cors',
  'sec-fetch-site': 'same-origin',
  'seek-request-brand': 'seek',
  'seek-request-country': 'AU',
  'user-agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/141.0.0.0 Safari/537.36',
  'x-seek-site': 'Chalice',
};

function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  const items = value.split(',').map(s => s.trim()).filter(s => s.length > 0);
  return items.length > 0 ? items : defaultValue;
}

function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function requirePositive(name: string, value: number): number {
  if (value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function requireNonNegative(name: string, value: number): number {
  if (value < 0) {
    throw new Error(`Environment variable ${name} must not be negative, got ${value}`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  const dataDir = env.DATA_DIR || 'data';
  const sessionCookie = env.SEEK_SESSION_COOKIE?.trim();

  return {
    dataDir,
    detailCacheDir: env.DETAIL_CACHE_DIR || join(dataDir, 'job_details'),
    keywords: parseStringArray(env.SEARCH_KEYWORDS, ['ai engineer', 'python engineer']),
    maxAgeDays: requirePositive('MAX_AGE_DAYS', parseNumber(env.MAX_AGE_DAYS, 90)),
    maxPages: requirePositive('MAX_PAGES', parseNumber(env.MAX_PAGES, 160)),
    search: {
      url: env.SEARCH_URL || SEARCH_URL,
      params: {
        siteKey: 'AU-Main',
        sourcesystem: 'houston',
        where: env.SEARCH_WHERE || 'All Australia',
        pageSize: String(requirePositive('SEARCH_PAGE_SIZE', parseNumber(env.SEARCH_PAGE_SIZE, 22))),
        locale: 'en-AU',
        include: 'seodata',
        sortmode: 'ListedDate',
      },
      headers: { ...SEARCH_HEADERS },
      sessionCookie: sessionCookie ? sessionCookie : undefined,
      requestDelayMs: requireNonNegative('SEARCH_REQUEST_DELAY_MS', parseNumber(env.SEARCH_REQUEST_DELAY_MS, 350)),
      timeoutMs: requirePositive('SEARCH_TIMEOUT_MS', parseNumber(env.SEARCH_TIMEOUT_MS, 30000)),
    },
    detail: {
      urlTemplate: env.DETAIL_URL_TEMPLATE || DETAIL_URL_TEMPLATE,
      listingKeyword: env.DETAIL_LISTING_KEYWORD || 'ai engineer',
      timeoutMs: requirePositive('DETAIL_TIMEOUT_MS', parseNumber(env.DETAIL_TIMEOUT_MS, 25000)),
      maxAttempts: requirePositive('DETAIL_MAX_ATTEMPTS', parseNumber(env.DETAIL_MAX_ATTEMPTS, 4)),
      backoffMs: requireNonNegative('DETAIL_BACKOFF_MS', parseNumber(env.DETAIL_BACKOFF_MS, 30000)),
      delayMs: requireNonNegative('DETAIL_DELAY_MS', parseNumber(env.DETAIL_DELAY_MS, 600)),
    },
    skills: {
      enabled: parseBoolean(env.COLLECT_SKILLS, false),
      keywordTerms: parseStringArray(env.SKILL_KEYWORD_TERMS, ['ai']).map(term => term.toLowerCase()),
      fetchMissingDetails: parseBoolean(env.FETCH_MISSING_DETAILS, true),
    },
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

export function matchesSkillTerms(config: Config, keyword: string): boolean {
  const lower = keyword.toLowerCase();
  return config.skills.keywordTerms.some(term => lower.includes(term));
}

/**
 * Whether the collector should compute skill frequencies for a keyword
 */
export function qualifiesForSkills(config: Config, keyword: string): boolean {
  return config.skills.enabled && matchesSkillTerms(config, keyword);
}
