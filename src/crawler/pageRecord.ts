import type { PageFetchResult, PageRecord } from '../types.js';

type SuccessfulFetch = Extract<PageFetchResult, { success: true }>;

export function toPageRecord(result: SuccessfulFetch): PageRecord {
  return Object.freeze({
    url: result.url,
    content: result.markdown,
    html: result.html,
    images: Object.freeze([...result.images]),
    internalLinks: Object.freeze([...result.internalLinks]),
  });
}

/** Keeps the first record for each URL, preserving order. */
export function dedupeByUrl(pages: readonly PageRecord[]): PageRecord[] {
  const seen = new Set<string>();
  const unique: PageRecord[] = [];

  for (const page of pages) {
    if (seen.has(page.url)) {
      continue;
    }
    seen.add(page.url);
    unique.push(page);
  }

  return unique;
}
