import { DEFAULT_CRAWL_OPTIONS } from '../../config.js';
import { componentLogger } from '../../logger.js';
import { FailureTracker } from '../state/failures.js';
import type { FailureEvent } from '../../types.js';
import { fetchPage } from '../network/fetchPage.js';
import {
  isPlainTextSitemap,
  isSitemapIndex,
  parseTextSitemap,
  parseXmlSitemap,
  type ParsedSitemap,
  type SitemapKind,
} from './parseSitemap.js';

export const SITEMAP_CANDIDATES = ['sitemap.xml', 'sitemap_index.xml', 'sitemap.txt'] as const;

export type SitemapResolution =
  | { found: true; sitemapUrl: string; kind: SitemapKind; urls: string[] }
  | { found: false; failures: FailureEvent[] };

export interface SitemapResolverOptions {
  timeoutMs?: number;
}

export function sitemapCandidates(baseUrl: string): string[] {
  const base = baseUrl.replace(/\/+$/, '');
  return SITEMAP_CANDIDATES.map((name) => `${base}/${name}`);
}

/**
 * Looks for a sitemap next to `baseUrl`. Every candidate failure (HTTP error,
 * network error, malformed XML, empty listing) moves on to the next candidate;
 * running out of candidates is reported as `found: false`, not thrown.
 */
export class SitemapResolver {
  private readonly timeoutMs: number;

  constructor(options: SitemapResolverOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CRAWL_OPTIONS.sitemapTimeoutMs;
  }

  async resolve(baseUrl: string): Promise<SitemapResolution> {
    const log = componentLogger('sitemap');
    const failures = new FailureTracker();

    for (const candidate of sitemapCandidates(baseUrl)) {
      try {
        const document = await fetchPage(candidate, {
          timeoutMs: this.timeoutMs,
          accept: 'application/xml,text/xml,text/plain;q=0.9,*/*;q=0.8',
        });

        if (document.status !== 200) {
          failures.record(candidate, 'sitemap', `HTTP ${document.status}`);
          continue;
        }

        const parsed = parseCandidate(document.body, document.contentType);
        const urls = unique(parsed.urls);
        if (urls.length === 0) {
          failures.record(candidate, 'sitemap', 'Sitemap lists no URLs');
          continue;
        }

        log.info({ sitemapUrl: candidate, kind: parsed.kind, urls: urls.length }, 'sitemap found');
        return { found: true, sitemapUrl: candidate, kind: parsed.kind, urls };
      } catch (error) {
        failures.record(candidate, 'sitemap', error);
      }
    }

    log.info({ baseUrl }, 'no sitemap found');
    return { found: false, failures: failures.list() };
  }
}

function parseCandidate(body: string, contentType: string | undefined): ParsedSitemap {
  if (isSitemapIndex(body)) {
    return parseXmlSitemap(body);
  }

  if (isPlainTextSitemap(contentType)) {
    return parseTextSitemap(body);
  }

  return parseXmlSitemap(body);
}

function unique(urls: readonly string[]): string[] {
  return [...new Set(urls)];
}
