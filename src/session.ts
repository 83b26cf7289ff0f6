import {
  DEFAULT_CHAT_MODEL,
  DEFAULT_RETRIEVAL_K,
  isChatModelName,
  AVAILABLE_CHAT_MODELS,
  type ChatModelName,
} from './config.js';
import { CrawlOrchestrator, type SitemapLookup } from './crawler/crawl.js';
import { isHttpUrl } from './crawler/url/normalizeUrl.js';
import {
  buildCrawlSummary,
  buildPageStats,
  buildUsageSummary,
  type PageStatsRow,
  type SummaryRow,
} from './crawler/reporting/summary.js';
import {
  createInputError,
  createSessionError,
  ensureCrawlerError,
} from './errors.js';
import { componentLogger } from './logger.js';
import { DocumentChunker } from './rag/chunker.js';
import { buildCorpus, buildHtmlCorpus } from './rag/corpus.js';
import { NOT_READY_RESPONSE, RetrievalQA } from './rag/retrievalQa.js';
import { VectorIndex } from './rag/vectorIndex.js';
import type {
  ChatModel,
  ChunkerOptions,
  CrawlHandlers,
  CrawlMode,
  CrawlOptions,
  CrawlOutcome,
  Credentials,
  EmbeddingModel,
  PageFetcher,
  StructuredExtractor,
} from './types.js';
import { stripReasoning } from './util/reasoning.js';

export interface SessionDependencies {
  fetcher: PageFetcher;
  embedder: EmbeddingModel;
  createChatModel(credentials: Credentials, modelName: ChatModelName): ChatModel;
  createExtractor(credentials: Credentials): StructuredExtractor;
  crawlOptions?: Partial<CrawlOptions>;
  chunkerOptions?: Partial<ChunkerOptions>;
  retrievalK?: number;
  handlers?: CrawlHandlers;
  sitemap?: SitemapLookup;
}

export const CRAWL_FIRST_MESSAGE = 'Please crawl a website first to load documents.';

/**
 * Caller-owned state for one crawl-and-chat workflow: the last crawl, the
 * corpus built from it, and the vector index with its chat model. Starting a
 * new crawl discards the index. Index builds are serialized and `ask` waits
 * for a build in flight.
 */
export class Session {
  private readonly orchestrator: CrawlOrchestrator;
  private readonly chunker: DocumentChunker;
  private readonly qa: RetrievalQA;
  private outcome: CrawlOutcome | undefined;
  private corpus = '';
  private htmlCorpus = '';
  private index: VectorIndex | undefined;
  private chatModel: ChatModel | undefined;
  private building: Promise<void> | undefined;
  private generation = 0;

  constructor(private readonly deps: SessionDependencies) {
    this.orchestrator = new CrawlOrchestrator({
      fetcher: deps.fetcher,
      options: deps.crawlOptions,
      handlers: deps.handlers,
      sitemap: deps.sitemap,
    });
    this.chunker = new DocumentChunker(deps.chunkerOptions);
    this.qa = new RetrievalQA(deps.embedder, { k: deps.retrievalK ?? DEFAULT_RETRIEVAL_K });
  }

  get lastOutcome(): CrawlOutcome | undefined {
    return this.outcome;
  }

  get corpusText(): string {
    return this.corpus;
  }

  get combinedHtml(): string {
    return this.htmlCorpus;
  }

  get isReady(): boolean {
    return this.index !== undefined && this.chatModel !== undefined;
  }

  async startCrawl(url: string, mode: CrawlMode, credentials?: Credentials): Promise<CrawlOutcome> {
    const startUrl = validateStartUrl(url);
    const apiKey = credentials?.apiKey.trim() ?? '';
    if (mode === 'llm' && apiKey.length === 0) {
      throw createInputError('An API key is required for LLM extraction.');
    }

    this.reset();

    let outcome: CrawlOutcome;
    try {
      outcome =
        mode === 'llm'
          ? await this.orchestrator.crawl({
              mode: 'llm',
              url: startUrl,
              extractor: this.deps.createExtractor({ apiKey }),
            })
          : await this.orchestrator.crawl({
              mode: 'markdown',
              url: startUrl,
              deepCrawl: mode === 'markdown-deep',
            });
    } catch (error) {
      throw ensureCrawlerError(error, { kind: 'internal', message: 'Crawl failed' });
    }

    this.outcome = outcome;
    this.corpus = buildCorpus(outcome);
    this.htmlCorpus = buildHtmlCorpus(outcome);
    componentLogger('session').info(
      { url: startUrl, mode, corpusLength: this.corpus.length },
      'crawl stored',
    );
    return outcome;
  }

  async prepareSession(
    credentials: Credentials,
    modelChoice: string = DEFAULT_CHAT_MODEL,
  ): Promise<'ready'> {
    if (!this.outcome) {
      throw createSessionError(CRAWL_FIRST_MESSAGE);
    }

    const apiKey = credentials.apiKey.trim();
    if (apiKey.length === 0) {
      throw createInputError('An API key is required to prepare the chat.');
    }

    if (!isChatModelName(modelChoice)) {
      throw createInputError(`Unknown model: ${modelChoice}`, {
        available: AVAILABLE_CHAT_MODELS.join(', '),
      });
    }

    // Every waiter wakes when a build settles; only one of them may start the next.
    while (this.building) {
      await Promise.allSettled([this.building]);
    }

    const build = this.buildIndex({ apiKey }, modelChoice, this.generation);
    this.building = build;
    try {
      await build;
    } finally {
      if (this.building === build) {
        this.building = undefined;
      }
    }

    return 'ready';
  }

  async ask(question: string): Promise<string> {
    while (this.building) {
      await Promise.allSettled([this.building]);
    }

    if (!this.index || !this.chatModel) {
      return NOT_READY_RESPONSE;
    }

    if (question.trim().length === 0) {
      throw createInputError('Please enter a question.');
    }

    try {
      const answer = await this.qa.query(this.index, this.chatModel, question);
      return stripReasoning(answer);
    } catch (error) {
      throw ensureCrawlerError(error, { kind: 'model', message: 'Failed to answer the question' });
    }
  }

  crawlSummary(): SummaryRow[] {
    return this.outcome ? buildCrawlSummary(this.outcome) : [];
  }

  pageStats(): PageStatsRow[] {
    return this.outcome ? buildPageStats(this.outcome) : [];
  }

  usageSummary(): SummaryRow[] {
    return this.outcome ? buildUsageSummary(this.outcome) : [];
  }

  private reset(): void {
    this.generation += 1;
    this.outcome = undefined;
    this.corpus = '';
    this.htmlCorpus = '';
    this.index = undefined;
    this.chatModel = undefined;
  }

  private async buildIndex(
    credentials: Credentials,
    modelName: ChatModelName,
    generation: number,
  ): Promise<void> {
    const chunks = this.chunker.chunk(this.corpus);

    let chatModel: ChatModel;
    try {
      chatModel = this.deps.createChatModel(credentials, modelName);
    } catch (error) {
      throw ensureCrawlerError(error, { kind: 'model', message: 'Failed to create the chat model' });
    }

    let index: VectorIndex;
    try {
      index = await VectorIndex.build(chunks, this.deps.embedder);
    } catch (error) {
      throw ensureCrawlerError(error, { kind: 'embedding', message: 'Failed to create vector store' });
    }

    if (generation !== this.generation) {
      throw createSessionError('A new crawl started while the chat was being prepared; prepare it again.');
    }

    this.index = index;
    this.chatModel = chatModel;
    componentLogger('session').info({ chunks: chunks.length, model: modelName }, 'session ready');
  }
}

export function validateStartUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!/^https?:\/\//i.test(trimmed) || !isHttpUrl(trimmed)) {
    throw createInputError('Please enter a valid URL.', { url: raw });
  }
  return trimmed;
}
