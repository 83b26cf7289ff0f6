import { load, type CheerioAPI } from 'cheerio';

import { createParseError } from '../../errors.js';
import type { LinkDescriptor } from '../../types.js';
import { normalizeUrl, sameHost } from '../url/normalizeUrl.js';

/**
 * Collects same-host links in document order, normalized and de-duplicated.
 * The first anchor text seen for a URL is the one kept.
 */
export function parseInternalLinks(html: string | CheerioAPI, pageUrl: string): LinkDescriptor[] {
  try {
    const $ = typeof html === 'string' ? load(html) : html;
    const links = new Map<string, LinkDescriptor>();

    $('a[href]').each((_idx, element) => {
      const href = $(element).attr('href')?.trim();
      if (!href) {
        return;
      }

      const normalized = normalizeUrl(href, pageUrl);
      if (!normalized || !sameHost(normalized, pageUrl) || links.has(normalized)) {
        return;
      }

      const text = $(element).text().replace(/\s+/g, ' ').trim();
      links.set(normalized, text ? { href: normalized, text } : { href: normalized });
    });

    return [...links.values()];
  } catch (error) {
    throw createParseError('Failed to parse links from HTML', { url: pageUrl }, { cause: error });
  }
}
