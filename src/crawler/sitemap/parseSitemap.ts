import { XMLParser, XMLValidator } from 'fast-xml-parser';

import { createParseError } from '../../errors.js';

export type SitemapKind = 'index' | 'urlset' | 'text';

export interface ParsedSitemap {
  kind: SitemapKind;
  urls: string[];
}

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
});

export function isSitemapIndex(content: string): boolean {
  return content.toLowerCase().includes('sitemapindex');
}

export function isPlainTextSitemap(contentType: string | undefined): boolean {
  return contentType?.toLowerCase().includes('text/plain') ?? false;
}

/**
 * Returns every `<loc>` value in document order. Throws a parse error when the
 * document is not well-formed XML.
 */
export function parseXmlSitemap(content: string): ParsedSitemap {
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    throw createParseError(`Malformed sitemap XML: ${validation.err.msg}`, {
      line: validation.err.line,
    });
  }

  const document: unknown = parser.parse(content);
  const urls: string[] = [];
  collectLocations(document, urls);

  return { kind: isSitemapIndex(content) ? 'index' : 'urlset', urls };
}

export function parseTextSitemap(content: string): ParsedSitemap {
  const urls = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  return { kind: 'text', urls };
}

function collectLocations(node: unknown, into: string[]): void {
  if (Array.isArray(node)) {
    for (const item of node) {
      collectLocations(item, into);
    }
    return;
  }

  if (node === null || typeof node !== 'object') {
    return;
  }

  for (const [key, value] of Object.entries(node)) {
    if (key === 'loc') {
      pushLocations(value, into);
    } else {
      collectLocations(value, into);
    }
  }
}

function pushLocations(value: unknown, into: string[]): void {
  const values = Array.isArray(value) ? value : [value];
  for (const entry of values) {
    if (typeof entry === 'string' && entry.trim().length > 0) {
      into.push(entry.trim());
    }
  }
}
