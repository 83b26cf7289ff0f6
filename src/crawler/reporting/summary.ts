import type { CrawlOutcome } from '../../types.js';

export interface SummaryRow {
  metric: string;
  value: string | number;
}

export function buildCrawlSummary(outcome: CrawlOutcome): SummaryRow[] {
  if (outcome.kind === 'pages') {
    const { pages, totalPages, durationMs } = outcome.result;
    return [
      { metric: 'Total Pages', value: totalPages },
      { metric: 'Total Images', value: pages.reduce((sum, page) => sum + page.images.length, 0) },
      { metric: 'Total Links', value: pages.reduce((sum, page) => sum + page.internalLinks.length, 0) },
      { metric: 'Time Taken', value: formatSeconds(durationMs) },
    ];
  }

  const { records, images, internalLinks, durationMs } = outcome.result;
  return [
    { metric: 'Total Extractions', value: records.length },
    { metric: 'Total Images', value: images.length },
    { metric: 'Total Links', value: internalLinks.length },
    { metric: 'Time Taken', value: formatSeconds(durationMs) },
  ];
}

export interface PageStatsRow {
  url: string;
  images: number;
  links: number;
}

export function buildPageStats(outcome: CrawlOutcome): PageStatsRow[] {
  if (outcome.kind === 'pages') {
    return outcome.result.pages.map((page) => ({
      url: page.url,
      images: page.images.length,
      links: page.internalLinks.length,
    }));
  }

  const { url, images, internalLinks } = outcome.result;
  return [{ url, images: images.length, links: internalLinks.length }];
}

export function buildUsageSummary(outcome: CrawlOutcome): SummaryRow[] {
  if (outcome.kind !== 'extraction') {
    return [];
  }

  const { usage } = outcome.result;
  return [
    { metric: 'Completion', value: usage.completionTokens },
    { metric: 'Prompt', value: usage.promptTokens },
    { metric: 'Total', value: usage.totalTokens },
  ];
}

export function formatSeconds(durationMs: number): string {
  const seconds = Number.isFinite(durationMs) && durationMs > 0 ? durationMs / 1_000 : 0;
  return `${Number(seconds.toFixed(2))}s`;
}
