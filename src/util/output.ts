import type { SummaryRow } from '../crawler/reporting/summary.js';
import type { CrawlOutcome, FailureEvent, PageRecord, SitemapSource } from '../types.js';

const STAGE_MESSAGES: Record<SitemapSource, string> = {
  base: 'Resorting to base crawling...',
  sitemap: 'Sitemap detected, prioritizing structured crawl...',
  generated: 'No sitemap found, crawling through link discovery...',
  fallback: 'Link discovery found nothing, falling back to the base URL...',
};

let quietMode = false;

export function setOutputConfig(config: { quiet: boolean }): void {
  quietMode = config.quiet;
}

export function writeStage(source: SitemapSource): void {
  if (quietMode) {
    return;
  }
  process.stdout.write(`${STAGE_MESSAGES[source]}\n`);
}

export function writePage(page: PageRecord): void {
  if (quietMode) {
    return;
  }
  process.stdout.write(renderPage(page));
}

export function writeFailure(event: FailureEvent): void {
  logError(`[${event.stage}] ${event.url}: ${event.reason}`);
}

export function writeSummary(title: string, rows: readonly SummaryRow[]): void {
  if (rows.length === 0) {
    return;
  }
  process.stdout.write(renderSummary(title, rows));
}

export function writeExtraction(outcome: CrawlOutcome): void {
  if (outcome.kind !== 'extraction' || quietMode) {
    return;
  }

  for (const record of outcome.result.records) {
    const marker = record.error ? ' (error)' : '';
    process.stdout.write(`BLOCK: ${record.tag}${marker} [${record.contentLines.length} lines]\n`);
  }
}

export function writeAnswer(answer: string): void {
  process.stdout.write(`${answer.trimEnd()}\n`);
}

export function logError(message: string): void {
  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export function renderPage(page: PageRecord): string {
  return `VISITED: ${page.url} (images: ${page.images.length}, links: ${page.internalLinks.length})\n`;
}

export function renderSummary(title: string, rows: readonly SummaryRow[]): string {
  const width = Math.max(...rows.map((row) => row.metric.length));
  const lines = ['', `--- ${title} ---`, ...rows.map((row) => `${row.metric.padEnd(width)}  ${row.value}`)];
  return `${lines.join('\n')}\n`;
}
