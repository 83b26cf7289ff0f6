import { describe, expect, it } from 'vitest';

import { DEFAULT_CHAT_MODEL, type ChatModelName } from '../src/config.js';
import { CrawlerError } from '../src/errors.js';
import { UnconfiguredEmbeddingModel } from '../src/providers/openaiCompatible.js';
import { NOT_READY_RESPONSE } from '../src/rag/retrievalQa.js';
import { CRAWL_FIRST_MESSAGE, Session, validateStartUrl } from '../src/session.js';
import type { Credentials, EmbeddingModel, ExtractionResponse } from '../src/types.js';
import { FakePageFetcher, LetterEmbedding, RecordingChatModel, ScriptedExtractor, type FakePage } from './helpers/fakes.js';

const ROOT = 'https://example.com';
const CREDENTIALS: Credentials = { apiKey: 'test-secret' };

interface Harness {
  session: Session;
  model: RecordingChatModel;
  chatModelsCreated: Array<{ credentials: Credentials; modelName: ChatModelName }>;
  extractorKeys: string[];
}

function createHarness(
  site: Record<string, FakePage> = { [ROOT]: { content: 'alpha beta' } },
  options: { extractions?: ExtractionResponse[]; embedder?: EmbeddingModel; reply?: string } = {},
): Harness {
  const model = new RecordingChatModel(options.reply ?? '<think>looking it up</think>\nThe answer.');
  const chatModelsCreated: Harness['chatModelsCreated'] = [];
  const extractorKeys: string[] = [];

  const session = new Session({
    fetcher: new FakePageFetcher(site),
    embedder: options.embedder ?? new LetterEmbedding(),
    createChatModel: (credentials, modelName) => {
      chatModelsCreated.push({ credentials, modelName });
      return model;
    },
    createExtractor: (credentials) => {
      extractorKeys.push(credentials.apiKey);
      return new ScriptedExtractor(options.extractions ?? []);
    },
  });

  return { session, model, chatModelsCreated, extractorKeys };
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

describe('validateStartUrl', () => {
  it('accepts http and https URLs and trims them', () => {
    expect(validateStartUrl('  https://example.com/docs ')).toBe('https://example.com/docs');
    expect(validateStartUrl('HTTP://example.com')).toBe('HTTP://example.com');
  });

  it.each(['example.com', 'ftp://example.com', 'https://', ''])('rejects %j', (raw) => {
    expect(() => validateStartUrl(raw)).toThrowError('Please enter a valid URL.');
  });
});

describe('Session', () => {
  it('answers the not-ready sentinel before the chat is prepared', async () => {
    const { session } = createHarness();

    await expect(session.ask('anything?')).resolves.toBe(NOT_READY_RESPONSE);

    await session.startCrawl(ROOT, 'markdown-base');
    await expect(session.ask('anything?')).resolves.toBe(NOT_READY_RESPONSE);
  });

  it('refuses to prepare the chat before a crawl', async () => {
    const { session } = createHarness();

    const error = await captureError(session.prepareSession(CREDENTIALS));

    expect(error.kind).toBe('session');
    expect(error.message).toBe(CRAWL_FIRST_MESSAGE);
  });

  it('crawls, prepares and answers with reasoning removed', async () => {
    const { session, model, chatModelsCreated } = createHarness();

    const outcome = await session.startCrawl(` ${ROOT} `, 'markdown-base');
    expect(outcome.kind).toBe('pages');
    expect(session.corpusText).toBe(`# ${ROOT}\n\nalpha beta\n\n`);

    await expect(session.prepareSession({ apiKey: ' test-secret ' })).resolves.toBe('ready');
    expect(session.isReady).toBe(true);
    expect(chatModelsCreated).toEqual([{ credentials: CREDENTIALS, modelName: DEFAULT_CHAT_MODEL }]);

    await expect(session.ask('What is here?')).resolves.toBe('The answer.');
    expect(model.prompts).toEqual([
      'Answer the question based only on the following context:\nalpha beta\n\nQuestion: What is here?\n',
    ]);
  });

  it('validates the chat inputs', async () => {
    const { session } = createHarness();
    await session.startCrawl(ROOT, 'markdown-base');

    const blankKey = await captureError(session.prepareSession({ apiKey: '  ' }));
    expect(blankKey.message).toBe('An API key is required to prepare the chat.');

    const unknownModel = await captureError(session.prepareSession(CREDENTIALS, 'gpt-unknown'));
    expect(unknownModel.kind).toBe('input');
    expect(unknownModel.message).toBe('Unknown model: gpt-unknown');

    await session.prepareSession(CREDENTIALS, 'llama-3.1-8b-instant');
    const blankQuestion = await captureError(session.ask('   '));
    expect(blankQuestion.message).toBe('Please enter a question.');
  });

  it('rejects invalid start URLs and LLM crawls without a key', async () => {
    const { session, extractorKeys } = createHarness();

    const badUrl = await captureError(session.startCrawl('example.com', 'markdown-base'));
    expect(badUrl.kind).toBe('input');
    expect(badUrl.message).toBe('Please enter a valid URL.');

    const noKey = await captureError(session.startCrawl(ROOT, 'llm', { apiKey: ' ' }));
    expect(noKey.message).toBe('An API key is required for LLM extraction.');
    expect(extractorKeys).toEqual([]);
  });

  it('propagates an empty crawl as an error and keeps no outcome', async () => {
    const { session } = createHarness({});

    const error = await captureError(session.startCrawl(ROOT, 'markdown-base'));

    expect(error.message).toBe('No pages found for the given URL.');
    expect(session.lastOutcome).toBeUndefined();
    expect(session.crawlSummary()).toEqual([]);
  });

  it('builds the corpus from extraction records and reports token usage', async () => {
    const { session, extractorKeys } = createHarness(
      { [ROOT]: { content: 'pricing' } },
      {
        extractions: [
          {
            structuredContent:
              '[{"tag":"Plans","content":["Basic","Pro"]},{"tag":"Oops","content":["x"],"error":true}]',
            usage: { completionTokens: 8, promptTokens: 12, totalTokens: 20 },
          },
        ],
      },
    );

    const outcome = await session.startCrawl(ROOT, 'llm', CREDENTIALS);

    expect(outcome.kind).toBe('extraction');
    expect(extractorKeys).toEqual(['test-secret']);
    expect(session.corpusText).toBe('# **Plans**\nBasic\nPro\n\n');
    expect(session.crawlSummary().map((row) => row.metric)).toEqual([
      'Total Extractions',
      'Total Images',
      'Total Links',
      'Time Taken',
    ]);
    expect(session.crawlSummary()[0]).toEqual({ metric: 'Total Extractions', value: 2 });
    expect(session.usageSummary()).toEqual([
      { metric: 'Completion', value: 8 },
      { metric: 'Prompt', value: 12 },
      { metric: 'Total', value: 20 },
    ]);
  });

  it('wraps LLM crawl failures', async () => {
    const { session } = createHarness({});

    const error = await captureError(session.startCrawl(ROOT, 'llm', CREDENTIALS));

    expect(error.kind).toBe('extraction');
    expect(error.message).toBe('LLM crawl failed: Crawl failed: HTTP 404');
  });

  it('drops the prepared chat when a new crawl starts', async () => {
    const { session } = createHarness();
    await session.startCrawl(ROOT, 'markdown-base');
    await session.prepareSession(CREDENTIALS);
    expect(session.isReady).toBe(true);

    await session.startCrawl(ROOT, 'markdown-base');

    expect(session.isReady).toBe(false);
    await expect(session.ask('still there?')).resolves.toBe(NOT_READY_RESPONSE);
  });

  it('discards an index build overtaken by a new crawl', async () => {
    const letters = new LetterEmbedding();
    const slowEmbedder: EmbeddingModel = {
      embed: async (text) => {
        await new Promise((resolve) => setTimeout(resolve, 30));
        return letters.embed(text);
      },
    };
    const { session } = createHarness(undefined, { embedder: slowEmbedder });
    await session.startCrawl(ROOT, 'markdown-base');

    const preparing = captureError(session.prepareSession(CREDENTIALS));
    await session.startCrawl(ROOT, 'markdown-base');
    const error = await preparing;

    expect(error.kind).toBe('session');
    expect(error.message).toBe('A new crawl started while the chat was being prepared; prepare it again.');
    expect(session.isReady).toBe(false);
  });

  it('keeps the combined HTML and per-page stats of the last crawl', async () => {
    const { session } = createHarness({ [ROOT]: { images: ['/a.png'], links: [`${ROOT}/x`] } });
    expect(session.combinedHtml).toBe('');
    expect(session.pageStats()).toEqual([]);

    await session.startCrawl(ROOT, 'markdown-base');

    expect(session.combinedHtml).toBe(`<h1>${ROOT}</h1>\n\n<html><body>${ROOT}</body></html>\n\n`);
    expect(session.pageStats()).toEqual([{ url: ROOT, images: 1, links: 1 }]);
  });

  it('crawls without embedding credentials and reports them missing on prepare', async () => {
    const { session } = createHarness(undefined, { embedder: new UnconfiguredEmbeddingModel() });

    const outcome = await session.startCrawl(ROOT, 'markdown-base');
    expect(outcome.kind).toBe('pages');

    const error = await captureError(session.prepareSession(CREDENTIALS));
    expect(error.kind).toBe('config');
    expect(error.message).toBe('EMBEDDING_API_KEY or OPENAI_API_KEY must be set for embeddings.');
    expect(session.isReady).toBe(false);
  });

  it('runs overlapping prepare calls one build at a time', async () => {
    const letters = new LetterEmbedding();
    let active = 0;
    let maxActive = 0;
    const slowEmbedder: EmbeddingModel = {
      embed: async (text) => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 10));
        active -= 1;
        return letters.embed(text);
      },
    };
    const { session } = createHarness(undefined, { embedder: slowEmbedder });
    await session.startCrawl(ROOT, 'markdown-base');

    const results = await Promise.all([
      session.prepareSession(CREDENTIALS),
      session.prepareSession(CREDENTIALS),
      session.prepareSession(CREDENTIALS),
    ]);

    expect(results).toEqual(['ready', 'ready', 'ready']);
    expect(letters.calls).toHaveLength(3);
    expect(maxActive).toBe(1);
  });
});
