import { describe, it, expect } from 'vitest';
import { RequestInit, Response } from 'node-fetch';
import { SeekSource } from './seek';
import { SearchConfig } from '../config';
import { HttpClient } from '../utils/http';
import { HttpStatusError } from '../utils/errors';

const NOW = new Date('2024-03-01T00:00:00Z');
const RECENT = '2024-02-20T10:00:00Z';
const OLD = '2024-01-10T10:00:00Z';

const searchConfig: SearchConfig = {
  url: 'https://search.test/api/jobsearch',
  params: { pageSize: '22', sortmode: 'ListedDate' },
  headers: { accept: 'application/json' },
  sessionCookie: 'session=test-cookie',
  requestDelayMs: 350,
  timeoutMs: 1000,
};

function listing(id: string | number, listingDate: string, extra: Record<string, unknown> = {}) {
  return { id, title: `Role ${id}`, listingDate, companyName: 'Acme', ...extra };
}

function pagedServer(pages: unknown[][]) {
  const calls: Array<{ url: string; init?: RequestInit }> = [];
  const http: HttpClient = async (url, init) => {
    calls.push({ url, init });
    const page = Number(new URL(url).searchParams.get('page'));
    return new Response(JSON.stringify({ data: pages[page - 1] ?? [] }), {
      status: 200,
      headers: { 'content-type': 'application/json' },
    });
  };
  return { http, calls };
}

function createSource(http: HttpClient) {
  const sleeps: number[] = [];
  const source = new SeekSource(searchConfig, {
    http,
    sleep: async ms => {
      sleeps.push(ms);
    },
    now: () => NOW,
  });
  return { source, sleeps };
}

const options = { maxAgeDays: 30, maxPages: 160 };

describe('SeekSource', () => {
  it('stops after the first page that reaches the cutoff', async () => {
    const recent = Array.from({ length: 22 }, (_, i) => listing(String(i + 1), RECENT));
    const old = Array.from({ length: 5 }, (_, i) => listing(String(100 + i), OLD));
    const { http, calls } = pagedServer([recent, old, [listing('999', RECENT)]]);
    const { source, sleeps } = createSource(http);

    const records = await source.fetchListings('x', options);

    expect(records).toHaveLength(22);
    expect(calls).toHaveLength(2);
    expect(sleeps).toEqual([350]);
  });

  it('skips the rest of a page once an old listing is seen', async () => {
    const { http, calls } = pagedServer([
      [listing('1', RECENT), listing('2', OLD), listing('3', RECENT)],
      [listing('4', RECENT)],
    ]);
    const { source } = createSource(http);

    const records = await source.fetchListings('x', options);

    expect(records.map(r => r.jobId)).toEqual(['1']);
    expect(calls).toHaveLength(1);
  });

  it('drops repeated ids', async () => {
    const { http, calls } = pagedServer([
      [listing('a', RECENT), listing('b', RECENT), listing('a', RECENT)],
      [listing('b', RECENT), listing('c', RECENT)],
    ]);
    const { source } = createSource(http);

    const records = await source.fetchListings('x', options);

    expect(records.map(r => r.jobId)).toEqual(['a', 'b', 'c']);
    expect(calls).toHaveLength(3);
  });

  it('skips listings without an id or a usable date', async () => {
    const { http } = pagedServer([
      [
        { title: 'No id', listingDate: RECENT },
        { id: 'no-date', title: 'No date' },
        { id: 'bad-date', listingDate: 'yesterday' },
        'not an object',
        listing('ok', RECENT),
      ],
    ]);
    const { source } = createSource(http);

    const records = await source.fetchListings('x', options);

    expect(records.map(r => r.jobId)).toEqual(['ok']);
  });

  it('keeps a listing whose optional fields have unexpected shapes', async () => {
    const { http } = pagedServer([
      [
        {
          id: '9',
          title: 42,
          listingDate: RECENT,
          workTypes: 'Full time',
          locations: [{ label: 7 }, { label: 'Perth WA' }, null],
          companyName: ['Acme'],
          advertiser: 'Recruiter',
        },
      ],
    ]);
    const { source } = createSource(http);

    const records = await source.fetchListings('x', options);

    expect(records).toEqual([
      {
        jobId: '9',
        title: '',
        listingDate: new Date(RECENT),
        location: 'Perth WA',
        employer: undefined,
        workType: undefined,
      },
    ]);
  });

  it('stops at an old listing even when its optional fields are malformed', async () => {
    const { http, calls } = pagedServer([
      [listing('1', RECENT), { id: '2', title: 42, listingDate: OLD, workTypes: 'Full time' }],
      [listing('3', RECENT)],
    ]);
    const { source, sleeps } = createSource(http);

    const records = await source.fetchListings('x', options);

    expect(records.map(r => r.jobId)).toEqual(['1']);
    expect(calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it('honours the page limit', async () => {
    const pages = Array.from({ length: 10 }, (_, p) => [listing(`p${p + 1}`, RECENT)]);
    const { http, calls } = pagedServer(pages);
    const { source, sleeps } = createSource(http);

    const records = await source.fetchListings('x', { maxAgeDays: 30, maxPages: 3 });

    expect(records.map(r => r.jobId)).toEqual(['p1', 'p2', 'p3']);
    expect(calls).toHaveLength(3);
    expect(sleeps).toEqual([350, 350, 350]);
  });

  it('normalizes listing fields', async () => {
    const { http } = pagedServer([
      [
        listing(123, RECENT, {
          locations: [{ label: 'Sydney NSW' }, { label: 'Melbourne VIC' }],
          workTypes: ['Full time', 'Contract/Temp'],
        }),
        {
          id: '456',
          listingDate: RECENT,
          advertiser: { description: 'Recruiter Pty Ltd' },
          locations: [],
          workTypes: [],
        },
      ],
    ]);
    const { source } = createSource(http);

    const [first, second] = await source.fetchListings('x', options);

    expect(first).toEqual({
      jobId: '123',
      title: 'Role 123',
      listingDate: new Date(RECENT),
      location: 'Sydney NSW, Melbourne VIC',
      employer: 'Acme',
      workType: 'Full time, Contract/Temp',
    });
    expect(second).toEqual({
      jobId: '456',
      title: '',
      listingDate: new Date(RECENT),
      location: undefined,
      employer: 'Recruiter Pty Ltd',
      workType: undefined,
    });
  });

  it('sends the keyword, page, fixed parameters and session cookie', async () => {
    const { http, calls } = pagedServer([]);
    const { source } = createSource(http);

    await source.fetchListings('ai engineer', options);

    const url = new URL(calls[0].url);
    expect(url.searchParams.get('keywords')).toBe('ai engineer');
    expect(url.searchParams.get('page')).toBe('1');
    expect(url.searchParams.get('sortmode')).toBe('ListedDate');
    expect(calls[0].init?.headers).toEqual({ accept: 'application/json', cookie: 'session=test-cookie' });
    expect(calls[0].init?.timeout).toBe(1000);
  });

  it('fails the keyword on a non-2xx response', async () => {
    const http: HttpClient = async () => new Response('blocked', { status: 403 });
    const { source } = createSource(http);

    const result = source.fetchListings('x', options);

    await expect(result).rejects.toBeInstanceOf(HttpStatusError);
    await expect(result).rejects.toMatchObject({ status: 403 });
  });

  it('fails the keyword on a transport error', async () => {
    const http: HttpClient = async () => {
      throw new Error('socket hang up');
    };
    const { source } = createSource(http);

    await expect(source.fetchListings('x', options)).rejects.toThrow('socket hang up');
  });
});
