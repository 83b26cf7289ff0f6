import { DEFAULT_CRAWL_OPTIONS } from '../../config.js';
import { componentLogger } from '../../logger.js';
import type { FailureEvent, PageFetchOptions, PageFetcher, PageRecord } from '../../types.js';
import { toPageRecord } from '../pageRecord.js';
import { FailureTracker } from '../state/failures.js';
import { DiscoveryFrontier } from '../state/queue.js';
import { normalizeUrl } from '../url/normalizeUrl.js';

export interface LinkDiscoveryOptions {
  maxDiscoveredUrls?: number;
  fetchOptions?: PageFetchOptions;
  onPage?: (page: PageRecord) => void;
  onFailure?: (event: FailureEvent) => void;
}

export interface DiscoveryResult {
  discovered: string[];
  pages: PageRecord[];
  failures: FailureEvent[];
}

/**
 * Breadth-first walk over internal links for sites without a sitemap. Pages
 * are fetched one at a time in frontier order and returned alongside the
 * discovered URLs so callers never fetch them twice.
 */
export class LinkDiscoveryCrawler {
  private readonly maxDiscoveredUrls: number;

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly options: LinkDiscoveryOptions = {},
  ) {
    this.maxDiscoveredUrls = options.maxDiscoveredUrls ?? DEFAULT_CRAWL_OPTIONS.maxDiscoveredUrls;
  }

  async discover(startUrl: string): Promise<DiscoveryResult> {
    const log = componentLogger('discovery');
    // Links arrive normalized, so the seed must be too or the start page is fetched twice.
    const frontier = new DiscoveryFrontier(normalizeUrl(startUrl) ?? startUrl);
    const failures = new FailureTracker(this.options.onFailure);
    const discovered = new Set<string>();
    const pages: PageRecord[] = [];

    while (frontier.pending > 0 && discovered.size < this.maxDiscoveredUrls) {
      const current = frontier.dequeue();
      if (current === undefined || frontier.hasVisited(current)) {
        continue;
      }

      log.info({ url: current, discovered: discovered.size }, 'crawling');

      try {
        const result = await this.fetcher.fetch(current, this.options.fetchOptions ?? {});
        if (!result.success) {
          frontier.markFailed(current);
          failures.record(current, 'discovery', result.reason);
          continue;
        }

        frontier.markVisited(current);
        const finalUrl = normalizeUrl(result.url) ?? result.url;
        if (finalUrl !== current) {
          if (frontier.hasVisited(finalUrl)) {
            log.debug({ url: current, finalUrl }, 'redirected to a visited page');
            continue;
          }
          frontier.markVisited(finalUrl);
        }
        discovered.add(current);

        for (const link of result.internalLinks) {
          frontier.enqueueIfNew(link.href);
        }

        const page = toPageRecord(result);
        pages.push(page);
        this.options.onPage?.(page);
      } catch (error) {
        frontier.markFailed(current);
        failures.record(current, 'discovery', error);
      }
    }

    log.info(
      { discovered: discovered.size, pending: frontier.pending, failed: failures.size },
      'discovery finished',
    );

    return { discovered: [...discovered], pages, failures: failures.list() };
  }
}
