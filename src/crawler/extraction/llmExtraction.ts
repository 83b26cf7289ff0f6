import { DEFAULT_CRAWL_OPTIONS, DEFAULT_EXTRACTION_INSTRUCTION } from '../../config.js';
import { createExtractionError, ensureCrawlerError } from '../../errors.js';
import { componentLogger } from '../../logger.js';
import type {
  ExtractionRecord,
  ExtractionResponse,
  ExtractionResult,
  PageFetchOptions,
  PageFetchResult,
  PageFetcher,
  StructuredExtractor,
} from '../../types.js';
import { splitIntoWindows } from '../../util/textWindows.js';
import { parseExtractionPayload } from './parseExtraction.js';
import { UsageTracker } from './usage.js';

export interface LlmExtractionOptions {
  fetchOptions?: PageFetchOptions;
  chunkSize?: number;
  overlapRate?: number;
  instruction?: string;
}

/**
 * Single-page crawl where the page markdown is handed to a structured
 * extractor window by window. Any failure aborts the whole extraction: there
 * is only one page, so there is nothing partial worth returning.
 */
export class LlmExtractionCrawler {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly extractor: StructuredExtractor,
    private readonly options: LlmExtractionOptions = {},
  ) {}

  async extract(url: string): Promise<ExtractionResult> {
    const log = componentLogger('llm-extraction');
    const startTime = Date.now();
    const fetchOptions = this.options.fetchOptions ?? DEFAULT_CRAWL_OPTIONS.fetchOptions;

    let page: PageFetchResult;
    try {
      page = await this.fetcher.fetch(url, fetchOptions);
    } catch (error) {
      throw ensureCrawlerError(error, { kind: 'extraction', message: 'Crawl failed' });
    }

    if (!page.success) {
      throw createExtractionError(`Crawl failed: ${page.reason}`, { url });
    }

    const chunkSize = this.options.chunkSize ?? DEFAULT_CRAWL_OPTIONS.extractionChunkSize;
    const overlapRate = this.options.overlapRate ?? DEFAULT_CRAWL_OPTIONS.extractionOverlapRate;
    const windows = splitIntoWindows(page.markdown, chunkSize, Math.floor(chunkSize * overlapRate));
    const contents = windows.length > 0 ? windows.map((window) => window.text) : [''];

    const usage = new UsageTracker();
    const records: ExtractionRecord[] = [];
    const instruction = this.options.instruction ?? DEFAULT_EXTRACTION_INSTRUCTION;

    for (const [index, content] of contents.entries()) {
      log.info({ url: page.url, request: index + 1, total: contents.length }, 'extracting');

      let response: ExtractionResponse;
      try {
        response = await this.extractor.extract({ url: page.url, content, instruction });
      } catch (error) {
        throw ensureCrawlerError(error, { kind: 'extraction', message: 'Extraction request failed' });
      }

      usage.record(response.usage);
      records.push(...parseExtractionPayload(response.structuredContent));
    }

    return {
      url: page.url,
      records,
      html: page.html,
      images: page.images,
      internalLinks: page.internalLinks,
      usage: usage.summary(),
      usageHistory: usage.entries(),
      durationMs: Date.now() - startTime,
    };
  }
}
