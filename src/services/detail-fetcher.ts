import { DetailConfig } from '../config';
import { HttpClient, defaultHttpClient } from '../utils/http';
import { Sleep, delay } from '../utils/delay';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type DetailFailureReason = 'transport' | 'rate-limited' | 'unexpected-status' | 'empty-body';

export type DetailFetchResult =
  | { ok: true; body: string; attempts: number }
  | { ok: false; reason: DetailFailureReason; attempts: number; status?: number };

type ProxyReply = { status: number; body: string } | { error: unknown };

export interface DetailFetcherOptions {
  http?: HttpClient;
  sleep?: Sleep;
}

export function detailUrl(template: string, jobId: string): string {
  return template.split('{jobId}').join(encodeURIComponent(jobId));
}

/**
 * Fetches one listing description through the markdown-extraction proxy.
 *
 * Transport errors and HTTP 429 are retried after a fixed backoff until
 * `maxAttempts` is used up. Any other non-200 status, or a blank 200 body,
 * ends the attempts for that id.
 */
export class DetailFetcher {
  private readonly http: HttpClient;
  private readonly sleep: Sleep;

  constructor(
    private readonly config: DetailConfig,
    options: DetailFetcherOptions = {}
  ) {
    this.http = options.http ?? defaultHttpClient;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * @param label - progress prefix used in log lines, e.g. "[3/40]"
   */
  async fetch(jobId: string, label: string = ''): Promise<DetailFetchResult> {
    const url = detailUrl(this.config.urlTemplate, jobId);
    const prefix = label ? `${label} ${jobId}` : jobId;
    let lastFailure: DetailFetchResult = { ok: false, reason: 'transport', attempts: 0 };

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      const reply = await this.request(url);
      if ('error' in reply) {
        logger.warn(`${prefix}: attempt ${attempt} failed (${errorMessage(reply.error)})`, { jobId, attempt });
        lastFailure = { ok: false, reason: 'transport', attempts: attempt };
        await this.backoff(attempt);
        continue;
      }

      const { status, body } = reply;
      if (status === 200 && body.trim().length > 0) {
        return { ok: true, body, attempts: attempt };
      }

      if (status === 429) {
        logger.warn(`${prefix}: 429 rate limited (attempt ${attempt}), backing off`, { jobId, attempt });
        lastFailure = { ok: false, reason: 'rate-limited', attempts: attempt, status };
        await this.backoff(attempt);
        continue;
      }

      if (status === 200) {
        logger.warn(`${prefix}: empty body`, { jobId, attempt });
        return { ok: false, reason: 'empty-body', attempts: attempt, status };
      }

      logger.warn(`${prefix}: unexpected status ${status}`, { jobId, attempt, status });
      return { ok: false, reason: 'unexpected-status', attempts: attempt, status };
    }

    logger.warn(`${prefix}: giving up after ${this.config.maxAttempts} attempts`, { jobId });
    return lastFailure;
  }

  private async request(url: string): Promise<ProxyReply> {
    try {
      const response = await this.http(url, { timeout: this.config.timeoutMs });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      return { error };
    }
  }

  private async backoff(attempt: number): Promise<void> {
    if (attempt < this.config.maxAttempts) {
      await this.sleep(this.config.backoffMs);
    }
  }
}
