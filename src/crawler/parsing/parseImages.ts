import { load, type CheerioAPI } from 'cheerio';

import type { ImageDescriptor } from '../../types.js';

export function parseImages(html: string | CheerioAPI, pageUrl: string): ImageDescriptor[] {
  const $ = typeof html === 'string' ? load(html) : html;
  const images: ImageDescriptor[] = [];
  const seen = new Set<string>();

  $('img').each((_idx, element) => {
    const raw = $(element).attr('src') ?? $(element).attr('data-src');
    if (!raw || raw.startsWith('data:')) {
      return;
    }

    let src: string;
    try {
      src = new URL(raw.trim(), pageUrl).toString();
    } catch {
      return;
    }

    if (seen.has(src)) {
      return;
    }
    seen.add(src);

    const alt = $(element).attr('alt')?.trim();
    images.push(alt ? { src, alt } : { src });
  });

  return images;
}
