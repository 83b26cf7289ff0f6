import { resolveCrawlOptions } from '../config.js';
import { createEmptyResultError, createExtractionError, ensureCrawlerError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type {
  CrawlHandlers,
  CrawlOptions,
  CrawlOutcome,
  CrawlResult,
  ExtractionResult,
  FailureEvent,
  PageFetcher,
  PageRecord,
  SitemapSource,
  StructuredExtractor,
} from '../types.js';
import { LinkDiscoveryCrawler } from './discovery/linkDiscovery.js';
import { LlmExtractionCrawler } from './extraction/llmExtraction.js';
import { dedupeByUrl } from './pageRecord.js';
import { FetchScheduler } from './scheduler/fetchScheduler.js';
import { SitemapResolver, type SitemapResolution } from './sitemap/sitemapResolver.js';
import { normalizeUrl } from './url/normalizeUrl.js';

export interface SitemapLookup {
  resolve(baseUrl: string): Promise<SitemapResolution>;
}

export interface CrawlOrchestratorConfig {
  fetcher: PageFetcher;
  options?: Partial<CrawlOptions>;
  handlers?: CrawlHandlers;
  sitemap?: SitemapLookup;
}

export type CrawlRequest =
  | { mode: 'markdown'; url: string; deepCrawl: boolean }
  | { mode: 'llm'; url: string; extractor: StructuredExtractor };

export const NO_PAGES_MESSAGE = 'No pages found for the given URL.';

interface PageCollection {
  source: SitemapSource;
  pages: PageRecord[];
  failures: FailureEvent[];
}

/**
 * Chooses how a site is crawled: a single base page, the URLs of its sitemap,
 * a breadth-first discovery when there is no sitemap, or an LLM extraction of
 * one page.
 */
export class CrawlOrchestrator {
  private readonly fetcher: PageFetcher;
  private readonly options: CrawlOptions;
  private readonly handlers: CrawlHandlers;
  private readonly sitemap: SitemapLookup;

  constructor(config: CrawlOrchestratorConfig) {
    this.fetcher = config.fetcher;
    this.options = resolveCrawlOptions(config.options);
    this.handlers = config.handlers ?? {};
    this.sitemap =
      config.sitemap ?? new SitemapResolver({ timeoutMs: this.options.sitemapTimeoutMs });
  }

  /**
   * Runs a crawl and returns the outcome variant for its mode. Markdown crawls
   * that end with no pages and every LLM failure are raised as errors.
   */
  async crawl(request: CrawlRequest): Promise<CrawlOutcome> {
    if (request.mode === 'llm') {
      try {
        return { kind: 'extraction', result: await this.extract(request.url, request.extractor) };
      } catch (error) {
        const cause = ensureCrawlerError(error, { kind: 'extraction' });
        throw createExtractionError(
          `LLM crawl failed: ${cause.message}`,
          { url: request.url },
          { cause },
        );
      }
    }

    const result = await this.crawlPages(request.url, request.deepCrawl);
    if (result.totalPages === 0) {
      throw createEmptyResultError(NO_PAGES_MESSAGE, {
        url: request.url,
        sitemapSource: result.sitemapSource,
        failures: result.failures.length,
      });
    }

    return { kind: 'pages', result };
  }

  async crawlPages(url: string, deepCrawl: boolean): Promise<CrawlResult> {
    const startTime = Date.now();
    const collection = deepCrawl
      ? await this.collectDeep(url)
      : await this.collectBase(url);

    const pages = dedupeByUrl(collection.pages);
    return {
      baseUrl: url,
      pages,
      totalPages: pages.length,
      sitemapSource: collection.source,
      failures: collection.failures,
      durationMs: Date.now() - startTime,
    };
  }

  async extract(url: string, extractor: StructuredExtractor): Promise<ExtractionResult> {
    const crawler = new LlmExtractionCrawler(this.fetcher, extractor, {
      fetchOptions: this.options.fetchOptions,
      chunkSize: this.options.extractionChunkSize,
      overlapRate: this.options.extractionOverlapRate,
    });
    return crawler.extract(url);
  }

  private async collectBase(url: string): Promise<PageCollection> {
    this.enterStage('base', url);
    const { pages, failures } = await this.createScheduler().fetchAll([url]);
    return { source: 'base', pages, failures };
  }

  private async collectDeep(url: string): Promise<PageCollection> {
    const resolution = await this.sitemap.resolve(url);

    if (resolution.found && !isOnlyUrl(resolution.urls, url)) {
      this.enterStage('sitemap', url, { sitemapUrl: resolution.sitemapUrl, urls: resolution.urls.length });
      const { pages, failures } = await this.createScheduler().fetchAll(resolution.urls);
      return { source: 'sitemap', pages, failures };
    }

    this.enterStage('generated', url);
    const discovery = await new LinkDiscoveryCrawler(this.fetcher, {
      maxDiscoveredUrls: this.options.maxDiscoveredUrls,
      fetchOptions: this.options.fetchOptions,
      onPage: this.handlers.onPage,
      onFailure: this.handlers.onFailure,
    }).discover(url);

    if (discovery.discovered.length > 0) {
      return { source: 'generated', pages: discovery.pages, failures: discovery.failures };
    }

    this.enterStage('fallback', url);
    const { pages, failures } = await this.createScheduler().fetchAll([url]);
    return { source: 'fallback', pages, failures: [...discovery.failures, ...failures] };
  }

  private createScheduler(): FetchScheduler {
    return new FetchScheduler(this.fetcher, {
      concurrency: this.options.concurrency,
      fetchOptions: this.options.fetchOptions,
      onPage: this.handlers.onPage,
      onFailure: this.handlers.onFailure,
    });
  }

  private enterStage(source: SitemapSource, url: string, details: Record<string, unknown> = {}): void {
    componentLogger('crawl').info({ url, source, ...details }, 'crawl stage');
    this.handlers.onStage?.(source);
  }
}

function isOnlyUrl(urls: readonly string[], url: string): boolean {
  if (urls.length !== 1) {
    return false;
  }
  const [only] = urls;
  return (normalizeUrl(only) ?? only) === (normalizeUrl(url) ?? url);
}
