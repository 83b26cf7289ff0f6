export { Session, validateStartUrl, CRAWL_FIRST_MESSAGE, type SessionDependencies } from './session.js';
export {
  CrawlOrchestrator,
  NO_PAGES_MESSAGE,
  type CrawlOrchestratorConfig,
  type CrawlRequest,
  type SitemapLookup,
} from './crawler/crawl.js';
export { SitemapResolver, sitemapCandidates, type SitemapResolution } from './crawler/sitemap/sitemapResolver.js';
export { LinkDiscoveryCrawler, type DiscoveryResult } from './crawler/discovery/linkDiscovery.js';
export { FetchScheduler, type ScheduledFetchResult } from './crawler/scheduler/fetchScheduler.js';
export { LlmExtractionCrawler } from './crawler/extraction/llmExtraction.js';
export { HttpPageFetcher } from './crawler/network/httpPageFetcher.js';
export { DocumentChunker } from './rag/chunker.js';
export { VectorIndex, type ScoredChunk } from './rag/vectorIndex.js';
export { RetrievalQA, NOT_READY_RESPONSE, buildGroundedPrompt } from './rag/retrievalQa.js';
export { buildCorpus, buildHtmlCorpus } from './rag/corpus.js';
export {
  OpenAIChatModel,
  OpenAIEmbeddingModel,
  OpenAIStructuredExtractor,
  UnconfiguredEmbeddingModel,
  createDefaultSessionDependencies,
} from './providers/openaiCompatible.js';
export {
  AVAILABLE_CHAT_MODELS,
  DEFAULT_CHAT_MODEL,
  loadProviderConfig,
  resolveChunkerOptions,
  resolveCrawlOptions,
  type ChatModelName,
  type ProviderConfig,
} from './config.js';
export { CrawlerError, isCrawlerError, type ErrorKind, type ErrorSeverity } from './errors.js';
export { configureLogger, getLogger, setLoggerInstance, type LoggerLike } from './logger.js';
export type * from './types.js';
