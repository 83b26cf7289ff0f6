import { describe, expect, it } from 'vitest';

import { LlmExtractionCrawler } from '../src/crawler/extraction/llmExtraction.js';
import { parseExtractionPayload } from '../src/crawler/extraction/parseExtraction.js';
import { UsageTracker } from '../src/crawler/extraction/usage.js';
import { CrawlerError } from '../src/errors.js';
import type { ExtractionResponse } from '../src/types.js';
import { FakePageFetcher, ScriptedExtractor } from './helpers/fakes.js';

const URL_UNDER_TEST = 'https://example.com/pricing';

function response(structuredContent: string, totalTokens = 10): ExtractionResponse {
  return {
    structuredContent,
    usage: { completionTokens: totalTokens / 2, promptTokens: totalTokens / 2, totalTokens },
  };
}

async function captureError(promise: Promise<unknown>): Promise<CrawlerError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof CrawlerError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the promise to reject');
}

describe('parseExtractionPayload', () => {
  it('reads a fenced JSON list after a reasoning block', () => {
    const raw = '<think>plan the blocks</think>\n```json\n[{"tag":"Plans","content":"Basic and Pro"}]\n```';

    expect(parseExtractionPayload(raw)).toEqual([
      { tag: 'Plans', contentLines: ['Basic and Pro'], error: false },
    ]);
  });

  it('fills in missing fields', () => {
    expect(parseExtractionPayload('[{}, {"tag":"Bad","content":["x"],"error":true}]')).toEqual([
      { tag: 'No Tag', contentLines: [], error: false },
      { tag: 'Bad', contentLines: ['x'], error: true },
    ]);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseExtractionPayload('Sure! Here is the content.')).toThrowError(
      'Failed to parse extracted content as JSON',
    );
  });

  it('rejects JSON that is not a block list', () => {
    let caught: unknown;
    try {
      parseExtractionPayload('{"tag":"solo"}');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CrawlerError);
    expect(caught instanceof CrawlerError && caught.kind).toBe('parse');
    expect(
      caught instanceof CrawlerError &&
        caught.message.startsWith('Extracted content does not match the expected block list: '),
    ).toBe(true);
  });
});

describe('UsageTracker', () => {
  it('numbers requests and keeps running totals', () => {
    const tracker = new UsageTracker();
    tracker.record({ completionTokens: 10, promptTokens: 20, totalTokens: 30 });
    const second = tracker.record({ completionTokens: -5, promptTokens: 2.7, totalTokens: Number.NaN });

    expect(second).toEqual({ request: 2, completionTokens: 0, promptTokens: 2, totalTokens: 0 });
    expect(tracker.summary()).toEqual({ completionTokens: 10, promptTokens: 22, totalTokens: 30 });
    expect(tracker.entries().map((entry) => entry.request)).toEqual([1, 2]);
  });
});

describe('LlmExtractionCrawler', () => {
  it('sends overlapping windows of the page and merges the records', async () => {
    const fetcher = new FakePageFetcher({
      [URL_UNDER_TEST]: { content: '0123456789abcdefghij', links: ['https://example.com/'] },
    });
    const extractor = new ScriptedExtractor([
      response('[{"tag":"First","content":["a"]}]', 10),
      response('[{"tag":"Second","content":["b"]}]', 20),
      response('[]', 4),
    ]);

    const result = await new LlmExtractionCrawler(fetcher, extractor, {
      chunkSize: 10,
      overlapRate: 0.2,
      instruction: 'Pull out the prices.',
    }).extract(URL_UNDER_TEST);

    expect(extractor.requests).toEqual([
      { url: URL_UNDER_TEST, content: '0123456789', instruction: 'Pull out the prices.' },
      { url: URL_UNDER_TEST, content: '89abcdefgh', instruction: 'Pull out the prices.' },
      { url: URL_UNDER_TEST, content: 'ghij', instruction: 'Pull out the prices.' },
    ]);
    expect(result.records.map((record) => record.tag)).toEqual(['First', 'Second']);
    expect(result.usage).toEqual({ completionTokens: 17, promptTokens: 17, totalTokens: 34 });
    expect(result.usageHistory.map((entry) => entry.totalTokens)).toEqual([10, 20, 4]);
    expect(result.internalLinks).toEqual([{ href: 'https://example.com/' }]);
  });

  it('makes one request with empty content for an empty page', async () => {
    const fetcher = new FakePageFetcher({ [URL_UNDER_TEST]: { content: '' } });
    const extractor = new ScriptedExtractor([response('[]')]);

    const result = await new LlmExtractionCrawler(fetcher, extractor).extract(URL_UNDER_TEST);

    expect(extractor.requests.map((request) => request.content)).toEqual(['']);
    expect(result.records).toEqual([]);
  });

  it('fails when the page cannot be fetched', async () => {
    const extractor = new ScriptedExtractor([response('[]')]);

    const error = await captureError(
      new LlmExtractionCrawler(new FakePageFetcher({}), extractor).extract(URL_UNDER_TEST),
    );

    expect(error.kind).toBe('extraction');
    expect(error.message).toBe('Crawl failed: HTTP 404');
  });

  it('fails when the extractor request fails', async () => {
    const fetcher = new FakePageFetcher({ [URL_UNDER_TEST]: {} });

    const error = await captureError(
      new LlmExtractionCrawler(fetcher, new ScriptedExtractor([])).extract(URL_UNDER_TEST),
    );

    expect(error.kind).toBe('extraction');
    expect(error.message).toBe('Extraction request failed: no scripted response');
  });

  it('fails when a response cannot be parsed', async () => {
    const fetcher = new FakePageFetcher({ [URL_UNDER_TEST]: {} });

    const error = await captureError(
      new LlmExtractionCrawler(fetcher, new ScriptedExtractor([response('not json')])).extract(URL_UNDER_TEST),
    );

    expect(error.kind).toBe('parse');
  });
});
