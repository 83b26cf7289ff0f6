import type { CrawlOutcome, ExtractionRecord, PageRecord } from '../types.js';

export function combinePages(pages: readonly PageRecord[]): string {
  return pages.map((page) => `# ${page.url}\n\n${page.content}\n\n`).join('');
}

export function combineHtml(pages: readonly PageRecord[]): string {
  return pages.map((page) => `<h1>${page.url}</h1>\n\n${page.html}\n\n`).join('');
}

export function combineExtractions(records: readonly ExtractionRecord[]): string {
  return records
    .filter((record) => !record.error)
    .map((record) => `# **${record.tag}**\n${record.contentLines.join('\n')}\n\n`)
    .join('');
}

/** The markdown text a crawl contributes to retrieval. */
export function buildCorpus(outcome: CrawlOutcome): string {
  return outcome.kind === 'pages'
    ? combinePages(outcome.result.pages)
    : combineExtractions(outcome.result.records);
}

/** Raw HTML of the crawl, one `<h1>` per page; an extraction keeps its page's HTML. */
export function buildHtmlCorpus(outcome: CrawlOutcome): string {
  return outcome.kind === 'pages' ? combineHtml(outcome.result.pages) : outcome.result.html;
}
