import { resolveChunkerOptions } from '../config.js';
import { createInputError, createParseError } from '../errors.js';
import type { Chunk, ChunkerOptions, HeaderEntry } from '../types.js';
import { splitIntoWindows } from '../util/textWindows.js';

export interface Segment {
  text: string;
  headerPath: HeaderEntry[];
  offset: number;
}

const HEADER_LINE = /^(#{1,3})[ \t]+(.+?)(?:[ \t]+#+)?\s*$/;
const FENCE_LINE = /^\s*(```|~~~)/;

/**
 * Two-stage markdown splitter: sections under level 1-3 headers first, then
 * fixed-size windows with overlap inside each section. Header lines are not
 * part of chunk text; they travel as each chunk's `headerPath`.
 */
export class DocumentChunker {
  readonly options: ChunkerOptions;

  constructor(options: Partial<ChunkerOptions> = {}) {
    this.options = resolveChunkerOptions(options);
  }

  chunk(markdown: string): Chunk[] {
    if (markdown.trim().length === 0) {
      throw createInputError('No markdown content provided');
    }

    let segments = splitByHeaders(markdown);
    if (segments.length === 0) {
      const leading = markdown.length - markdown.trimStart().length;
      segments = [{ text: markdown.trim(), headerPath: [], offset: leading }];
    }

    const chunks: Chunk[] = [];
    for (const segment of segments) {
      for (const window of splitIntoWindows(segment.text, this.options.chunkSize, this.options.chunkOverlap)) {
        chunks.push(
          Object.freeze({
            text: window.text,
            headerPath: Object.freeze([...segment.headerPath]),
            sourceOffset: segment.offset + window.start,
          }),
        );
      }
    }

    if (chunks.length === 0) {
      throw createParseError('No chunks created from markdown content', {}, { severity: 'fatal' });
    }

    return chunks;
  }
}

export function splitByHeaders(markdown: string): Segment[] {
  const segments: Segment[] = [];
  let path: HeaderEntry[] = [];
  let bodyStart = 0;
  let offset = 0;
  let fence: string | undefined;

  const flush = (end: number): void => {
    const raw = markdown.slice(bodyStart, end);
    const text = raw.trim();
    if (text.length > 0) {
      segments.push({ text, headerPath: path, offset: bodyStart + (raw.length - raw.trimStart().length) });
    }
  };

  for (const line of markdown.split('\n')) {
    const lineStart = offset;
    offset = Math.min(offset + line.length + 1, markdown.length);

    const fenceMatch = FENCE_LINE.exec(line);
    if (fenceMatch) {
      if (fence === undefined) {
        fence = fenceMatch[1];
      } else if (fence === fenceMatch[1]) {
        fence = undefined;
      }
      continue;
    }

    const header = fence === undefined ? HEADER_LINE.exec(line) : null;
    if (!header) {
      continue;
    }

    flush(lineStart);
    const level = header[1].length;
    path = [...path.filter((entry) => entry.level < level), { level, title: header[2].trim() }];
    bodyStart = offset;
  }

  flush(markdown.length);
  return segments;
}
