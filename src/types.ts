export type SitemapSource = 'base' | 'sitemap' | 'generated' | 'fallback';

export type CrawlMode = 'markdown-base' | 'markdown-deep' | 'llm';

export type FailureStage = 'sitemap' | 'discovery' | 'fetch' | 'extraction';

export interface ImageDescriptor {
  src: string;
  alt?: string;
}

export interface LinkDescriptor {
  href: string;
  text?: string;
}

export interface PageRecord {
  readonly url: string;
  readonly content: string;
  readonly html: string;
  readonly images: readonly ImageDescriptor[];
  readonly internalLinks: readonly LinkDescriptor[];
}

export interface FailureEvent {
  url: string;
  stage: FailureStage;
  reason: string;
}

export interface CrawlResult {
  baseUrl: string;
  pages: PageRecord[];
  totalPages: number;
  sitemapSource: SitemapSource;
  failures: FailureEvent[];
  durationMs: number;
}

export interface ExtractionRecord {
  tag: string;
  contentLines: string[];
  error: boolean;
}

export interface UsageStats {
  completionTokens: number;
  promptTokens: number;
  totalTokens: number;
}

export interface UsageEntry extends UsageStats {
  request: number;
}

export interface ExtractionResult {
  url: string;
  records: ExtractionRecord[];
  html: string;
  images: ImageDescriptor[];
  internalLinks: LinkDescriptor[];
  usage: UsageStats;
  usageHistory: UsageEntry[];
  durationMs: number;
}

export type CrawlOutcome =
  | { kind: 'pages'; result: CrawlResult }
  | { kind: 'extraction'; result: ExtractionResult };

export interface HeaderEntry {
  level: number;
  title: string;
}

export interface Chunk {
  readonly text: string;
  readonly headerPath: readonly HeaderEntry[];
  readonly sourceOffset: number;
}

/**
 * Options forwarded untouched to the page fetcher. Rendering hints only mean
 * something to fetchers that drive a browser.
 */
export interface PageFetchOptions {
  timeoutMs?: number;
  scanFullPage?: boolean;
  waitForImages?: boolean;
  removeOverlayElements?: boolean;
  excludeExternalLinks?: boolean;
  [option: string]: unknown;
}

export type PageFetchResult =
  | {
      success: true;
      url: string;
      markdown: string;
      html: string;
      images: ImageDescriptor[];
      internalLinks: LinkDescriptor[];
    }
  | { success: false; url: string; reason: string };

export interface PageFetcher {
  fetch(url: string, options: PageFetchOptions): Promise<PageFetchResult>;
}

export interface ExtractionRequest {
  url: string;
  content: string;
  instruction: string;
}

export interface ExtractionResponse {
  structuredContent: string;
  usage: UsageStats;
}

export interface StructuredExtractor {
  extract(request: ExtractionRequest): Promise<ExtractionResponse>;
}

export interface EmbeddingModel {
  embed(text: string): Promise<number[]>;
}

export interface ChatModel {
  readonly modelName: string;
  complete(prompt: string): Promise<string>;
}

export interface Credentials {
  apiKey: string;
}

export interface CrawlHandlers {
  onStage?(source: SitemapSource): void;
  onPage?(page: PageRecord): void;
  onFailure?(event: FailureEvent): void;
}

export interface CrawlOptions {
  concurrency: number;
  timeoutMs: number;
  sitemapTimeoutMs: number;
  maxDiscoveredUrls: number;
  extractionChunkSize: number;
  extractionOverlapRate: number;
  fetchOptions: PageFetchOptions;
}

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
}
