import { load } from 'cheerio';

import { DEFAULT_CRAWL_OPTIONS } from '../../config.js';
import { reportCrawlerError } from '../../util/errorHandler.js';
import type { PageFetchOptions, PageFetchResult, PageFetcher } from '../../types.js';
import { parseImages } from '../parsing/parseImages.js';
import { parseInternalLinks } from '../parsing/parseLinks.js';
import { htmlToMarkdown } from '../parsing/toMarkdown.js';
import { fetchPageWithRetry } from './fetchPageWithRetry.js';

/**
 * Page fetcher over plain HTTP. Pages are not rendered, so rendering hints such
 * as `scanFullPage` and `waitForImages` are accepted and ignored;
 * `removeOverlayElements` strips dialog and banner markup before conversion.
 */
export class HttpPageFetcher implements PageFetcher {
  async fetch(url: string, options: PageFetchOptions): Promise<PageFetchResult> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_CRAWL_OPTIONS.timeoutMs;
    const outcome = await fetchPageWithRetry(url, { timeoutMs });

    if (!outcome.ok) {
      if (outcome.error) {
        reportCrawlerError(outcome.error, { stage: 'fetch', url }, { throwOnFatal: false });
      }
      return { success: false, url: outcome.url, reason: outcome.failureReason };
    }

    const contentType = outcome.contentType?.toLowerCase() ?? '';
    const html = outcome.body;

    if (contentType && !contentType.includes('html')) {
      if (!contentType.startsWith('text/') && !contentType.includes('xml')) {
        return { success: false, url: outcome.url, reason: `Unsupported content type: ${contentType}` };
      }
      return { success: true, url: outcome.url, markdown: html, html, images: [], internalLinks: [] };
    }

    const $ = load(html);

    return {
      success: true,
      url: outcome.url,
      markdown: htmlToMarkdown(html, { removeOverlayElements: options.removeOverlayElements }),
      html,
      images: parseImages($, outcome.url),
      internalLinks: parseInternalLinks($, outcome.url),
    };
  }
}
