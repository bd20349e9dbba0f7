import { describe, it, expect } from 'vitest';
import { Response } from 'node-fetch';
import { DetailFetcher, detailUrl } from './detail-fetcher';
import { DetailConfig } from '../config';
import { HttpClient } from '../utils/http';

const detailConfig: DetailConfig = {
  urlTemplate: 'https://proxy.test/job/{jobId}',
  listingKeyword: 'ai engineer',
  timeoutMs: 1000,
  maxAttempts: 4,
  backoffMs: 30000,
  delayMs: 600,
};

type Reply = { status: number; body?: string } | Error;

function scriptedProxy(replies: Reply[]) {
  const urls: string[] = [];
  const http: HttpClient = async url => {
    urls.push(url);
    const reply = replies[Math.min(urls.length, replies.length) - 1];
    if (reply instanceof Error) throw reply;
    return new Response(reply.body ?? '', { status: reply.status });
  };
  return { http, urls };
}

function createFetcher(http: HttpClient) {
  const sleeps: number[] = [];
  const fetcher = new DetailFetcher(detailConfig, {
    http,
    sleep: async ms => {
      sleeps.push(ms);
    },
  });
  return { fetcher, sleeps };
}

describe('detailUrl', () => {
  it('substitutes the job id', () => {
    expect(detailUrl('https://r.jina.ai/https://www.seek.com.au/job/{jobId}', '456')).toBe(
      'https://r.jina.ai/https://www.seek.com.au/job/456'
    );
  });
});

describe('DetailFetcher', () => {
  it('returns the body of a 200 response', async () => {
    const { http, urls } = scriptedProxy([{ status: 200, body: '# Senior Engineer\n\nPython' }]);
    const { fetcher, sleeps } = createFetcher(http);

    const result = await fetcher.fetch('456');

    expect(result).toEqual({ ok: true, body: '# Senior Engineer\n\nPython', attempts: 1 });
    expect(urls).toEqual(['https://proxy.test/job/456']);
    expect(sleeps).toEqual([]);
  });

  it('backs off and retries on 429', async () => {
    const { http, urls } = scriptedProxy([{ status: 429 }, { status: 429 }, { status: 200, body: 'done' }]);
    const { fetcher, sleeps } = createFetcher(http);

    const result = await fetcher.fetch('456');

    expect(result).toEqual({ ok: true, body: 'done', attempts: 3 });
    expect(urls).toHaveLength(3);
    expect(sleeps).toEqual([30000, 30000]);
  });

  it('backs off and retries on transport errors', async () => {
    const { http } = scriptedProxy([new Error('ETIMEDOUT'), { status: 200, body: 'done' }]);
    const { fetcher, sleeps } = createFetcher(http);

    const result = await fetcher.fetch('456');

    expect(result).toEqual({ ok: true, body: 'done', attempts: 2 });
    expect(sleeps).toEqual([30000]);
  });

  it('gives up after the attempt ceiling', async () => {
    const { http, urls } = scriptedProxy([{ status: 429 }]);
    const { fetcher, sleeps } = createFetcher(http);

    const result = await fetcher.fetch('456');

    expect(result).toEqual({ ok: false, reason: 'rate-limited', attempts: 4, status: 429 });
    expect(urls).toHaveLength(4);
    expect(sleeps).toEqual([30000, 30000, 30000]);
  });

  it('does not retry other statuses', async () => {
    const { http, urls } = scriptedProxy([{ status: 404 }, { status: 200, body: 'never' }]);
    const { fetcher, sleeps } = createFetcher(http);

    const result = await fetcher.fetch('456');

    expect(result).toEqual({ ok: false, reason: 'unexpected-status', attempts: 1, status: 404 });
    expect(urls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it('treats a blank 200 body as a miss', async () => {
    const { http, urls } = scriptedProxy([{ status: 200, body: '  \n ' }, { status: 200, body: 'never' }]);
    const { fetcher } = createFetcher(http);

    const result = await fetcher.fetch('456');

    expect(result).toEqual({ ok: false, reason: 'empty-body', attempts: 1, status: 200 });
    expect(urls).toHaveLength(1);
  });
});
