import { load } from 'cheerio';
import TurndownService from 'turndown';

const NOISE_SELECTORS = ['script', 'style', 'noscript', 'template', 'svg', 'iframe'];
const OVERLAY_SELECTORS = [
  '[role="dialog"]',
  '[aria-modal="true"]',
  '.modal',
  '.popup',
  '.cookie-banner',
  '#cookie-banner',
];

let turndown: TurndownService | undefined;

function getTurndown(): TurndownService {
  turndown ??= new TurndownService({
    headingStyle: 'atx',
    hr: '---',
    bulletListMarker: '-',
    codeBlockStyle: 'fenced',
    fence: '```',
    emDelimiter: '_',
    strongDelimiter: '**',
    linkStyle: 'inlined',
  });
  return turndown;
}

export interface MarkdownOptions {
  removeOverlayElements?: boolean;
}

export function htmlToMarkdown(html: string, options: MarkdownOptions = {}): string {
  const $ = load(html);
  const selectors = options.removeOverlayElements
    ? [...NOISE_SELECTORS, ...OVERLAY_SELECTORS]
    : NOISE_SELECTORS;

  for (const selector of selectors) {
    $(selector).remove();
  }

  const body = $('body').html() ?? $.html();
  return cleanMarkdown(getTurndown().turndown(body));
}

function cleanMarkdown(markdown: string): string {
  return markdown
    .replace(/\n{4,}/g, '\n\n\n')
    .replace(/ +\n/g, '\n')
    .trim();
}
