import { ensureCrawlerError, type CrawlerError } from '../../errors.js';
import { fetchPage, isRetryableFetchError, type FetchPageOptions } from './fetchPage.js';

export type FetchOutcome =
  | { ok: true; url: string; status: number; contentType?: string; body: string }
  | { ok: false; url: string; status: number | null; failureReason: string; error?: CrawlerError };

export interface RetryPolicy {
  retries: number;
  backoffMs: number;
}

const DEFAULT_RETRY_POLICY: RetryPolicy = { retries: 1, backoffMs: 100 };

/**
 * Fetches `url`, retrying transient network failures with linear backoff.
 * Non-2xx responses are returned as failures straight away.
 */
export async function fetchPageWithRetry(
  url: string,
  options: FetchPageOptions,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<FetchOutcome> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      const document = await fetchPage(url, options);
      if (!document.ok) {
        return { ok: false, url: document.url, status: document.status, failureReason: `HTTP ${document.status}` };
      }
      return {
        ok: true,
        url: document.url,
        status: document.status,
        contentType: document.contentType,
        body: document.body,
      };
    } catch (error) {
      if (attempt > policy.retries || !isRetryableFetchError(error)) {
        const crawlerError = ensureCrawlerError(error, { kind: 'fetch' });
        return { ok: false, url, status: null, failureReason: crawlerError.message, error: crawlerError };
      }
      await new Promise((resolve) => setTimeout(resolve, policy.backoffMs * attempt));
    }
  }
}
