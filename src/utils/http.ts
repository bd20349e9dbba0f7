import fetch, { RequestInit, Response } from 'node-fetch';

/**
 * Minimal fetch signature the sources depend on.
 * Production code passes node-fetch; tests pass an in-process stub.
 */
export type HttpClient = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultHttpClient: HttpClient = (url, init) => fetch(url, init);

export function buildUrl(base: string, params: Record<string, string | number>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}
