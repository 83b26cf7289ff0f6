import { z } from 'zod';

import { createConfigurationError } from './errors.js';
import type { ChunkerOptions, CrawlOptions } from './types.js';

export const DEFAULT_CRAWL_OPTIONS: CrawlOptions = {
  concurrency: 8,
  timeoutMs: 30_000,
  sitemapTimeoutMs: 10_000,
  maxDiscoveredUrls: 100,
  extractionChunkSize: 8_000,
  extractionOverlapRate: 0.2,
  fetchOptions: {
    scanFullPage: true,
    waitForImages: true,
    removeOverlayElements: true,
    excludeExternalLinks: true,
  },
};

export const DEFAULT_CHUNKER_OPTIONS: ChunkerOptions = {
  chunkSize: 1_500,
  chunkOverlap: 300,
};

export const DEFAULT_RETRIEVAL_K = 4;

export const DEFAULT_EXTRACTION_INSTRUCTION =
  'Extract all the content in a clear and precise manner suitable for RAG chatbots.';

export const AVAILABLE_CHAT_MODELS = [
  'deepseek-r1-distill-llama-70b',
  'llama-3.3-70b-versatile',
  'llama-3.1-8b-instant',
  'mixtral-8x7b-32768',
  'gemma2-9b-it',
] as const;

export type ChatModelName = (typeof AVAILABLE_CHAT_MODELS)[number];

export const DEFAULT_CHAT_MODEL: ChatModelName = 'deepseek-r1-distill-llama-70b';

export function isChatModelName(value: string): value is ChatModelName {
  return AVAILABLE_CHAT_MODELS.some((name) => name === value);
}

export function resolveCrawlOptions(config: Partial<CrawlOptions> = {}): CrawlOptions {
  const options: CrawlOptions = {
    ...DEFAULT_CRAWL_OPTIONS,
    ...config,
    fetchOptions: { ...DEFAULT_CRAWL_OPTIONS.fetchOptions, ...(config.fetchOptions ?? {}) },
  };

  options.concurrency = coercePositiveInteger(options.concurrency, 'concurrency');
  options.timeoutMs = coercePositiveInteger(options.timeoutMs, 'timeout-ms');
  options.sitemapTimeoutMs = coercePositiveInteger(options.sitemapTimeoutMs, 'sitemap-timeout-ms');
  options.maxDiscoveredUrls = coercePositiveInteger(options.maxDiscoveredUrls, 'max-discovered-urls');
  options.extractionChunkSize = coercePositiveInteger(
    options.extractionChunkSize,
    'extraction-chunk-size',
  );

  const rate = options.extractionOverlapRate;
  if (!Number.isFinite(rate) || rate < 0 || rate >= 1) {
    throw createConfigurationError('extraction-overlap-rate must be in the range [0, 1).', {
      value: rate,
    });
  }

  options.fetchOptions.timeoutMs ??= options.timeoutMs;

  return options;
}

export function resolveChunkerOptions(config: Partial<ChunkerOptions> = {}): ChunkerOptions {
  const chunkSize = coercePositiveInteger(
    config.chunkSize ?? DEFAULT_CHUNKER_OPTIONS.chunkSize,
    'chunk-size',
  );
  const chunkOverlap = coerceNonNegativeInteger(
    config.chunkOverlap ?? DEFAULT_CHUNKER_OPTIONS.chunkOverlap,
    'chunk-overlap',
  );

  if (chunkOverlap >= chunkSize) {
    throw createConfigurationError('chunk-overlap must be smaller than chunk-size.', {
      chunkSize,
      chunkOverlap,
    });
  }

  return { chunkSize, chunkOverlap };
}

const nonBlank = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined));

const providerEnvSchema = z.object({
  GROQ_API_KEY: nonBlank.optional(),
  LLM_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  EXTRACTION_MODEL: z.string().min(1).default(DEFAULT_CHAT_MODEL),
  EMBEDDING_API_KEY: nonBlank.optional(),
  OPENAI_API_KEY: nonBlank.optional(),
  EMBEDDING_BASE_URL: z.string().url().optional(),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
});

export interface ProviderConfig {
  llmApiKey?: string;
  llmBaseUrl: string;
  extractionModel: string;
  embeddingApiKey?: string;
  embeddingBaseUrl?: string;
  embeddingModel: string;
}

export function loadProviderConfig(env: NodeJS.ProcessEnv = process.env): ProviderConfig {
  const parsed = providerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw createConfigurationError(
      `Invalid environment: ${issue?.path.join('.') ?? 'unknown'} ${issue?.message ?? ''}`.trim(),
      { issues: parsed.error.issues.length },
    );
  }

  const values = parsed.data;
  return {
    llmApiKey: values.GROQ_API_KEY,
    llmBaseUrl: values.LLM_BASE_URL,
    extractionModel: values.EXTRACTION_MODEL,
    embeddingApiKey: values.EMBEDDING_API_KEY ?? values.OPENAI_API_KEY,
    embeddingBaseUrl: values.EMBEDDING_BASE_URL,
    embeddingModel: values.EMBEDDING_MODEL,
  };
}

function coercePositiveInteger(value: number, field: string): number {
  const integer = Math.trunc(value);
  if (!Number.isFinite(integer) || integer < 1) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return integer;
}

function coerceNonNegativeInteger(value: number, field: string): number {
  const integer = Math.trunc(value);
  if (!Number.isFinite(integer) || integer < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  // -0.5 truncates to -0.
  return integer === 0 ? 0 : integer;
}
