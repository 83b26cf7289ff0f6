import OpenAI from 'openai';

import type { ChatModelName, ProviderConfig } from '../config.js';
import { createConfigurationError, createInternalError } from '../errors.js';
import { HttpPageFetcher } from '../crawler/network/httpPageFetcher.js';
import type { SessionDependencies } from '../session.js';
import type {
  ChatModel,
  Credentials,
  EmbeddingModel,
  ExtractionRequest,
  ExtractionResponse,
  StructuredExtractor,
  UsageStats,
} from '../types.js';

const CHAT_TEMPERATURE = 0.7;
const EXTRACTION_MAX_TOKENS = 6_800;

const EXTRACTION_SYSTEM_PROMPT = `You turn web page content into structured blocks.
Reply with a JSON array only. Each element is an object with:
- "tag": a short label for the block (for example a section title),
- "content": an array of strings holding the block text,
- "error": false.
Do not wrap the array in any other object.`;

export class OpenAIChatModel implements ChatModel {
  private readonly client: OpenAI;

  constructor(
    readonly modelName: string,
    credentials: Credentials,
    baseURL?: string,
  ) {
    this.client = new OpenAI({ apiKey: credentials.apiKey, baseURL });
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.modelName,
      temperature: CHAT_TEMPERATURE,
      messages: [{ role: 'user', content: prompt }],
    });

    return response.choices[0]?.message?.content ?? '';
  }
}

export class OpenAIStructuredExtractor implements StructuredExtractor {
  private readonly client: OpenAI;

  constructor(
    private readonly modelName: string,
    credentials: Credentials,
    baseURL?: string,
  ) {
    this.client = new OpenAI({ apiKey: credentials.apiKey, baseURL });
  }

  async extract(request: ExtractionRequest): Promise<ExtractionResponse> {
    const response = await this.client.chat.completions.create({
      model: this.modelName,
      temperature: CHAT_TEMPERATURE,
      max_tokens: EXTRACTION_MAX_TOKENS,
      top_p: 1,
      messages: [
        { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
        {
          role: 'user',
          content: `${request.instruction}\n\nURL: ${request.url}\n\n<content>\n${request.content}\n</content>`,
        },
      ],
    });

    return {
      structuredContent: response.choices[0]?.message?.content ?? '',
      usage: toUsageStats(response.usage),
    };
  }
}

export class OpenAIEmbeddingModel implements EmbeddingModel {
  private readonly client: OpenAI;

  constructor(
    private readonly modelName: string,
    apiKey: string,
    baseURL?: string,
  ) {
    this.client = new OpenAI({ apiKey, baseURL });
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({ model: this.modelName, input: text });
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw createInternalError('Embedding response contained no vector', { model: this.modelName });
    }
    return embedding;
  }
}

/**
 * Stands in for the embedder when no embedding key is configured, so crawling
 * still works and the missing key is reported once something is embedded.
 */
export class UnconfiguredEmbeddingModel implements EmbeddingModel {
  async embed(): Promise<number[]> {
    throw createConfigurationError('EMBEDDING_API_KEY or OPENAI_API_KEY must be set for embeddings.');
  }
}

/**
 * Session wiring over an OpenAI-compatible chat endpoint (Groq by default),
 * an OpenAI-compatible embeddings endpoint and the plain HTTP page fetcher.
 */
export function createDefaultSessionDependencies(
  config: ProviderConfig,
): Pick<SessionDependencies, 'fetcher' | 'embedder' | 'createChatModel' | 'createExtractor'> {
  return {
    fetcher: new HttpPageFetcher(),
    embedder: config.embeddingApiKey
      ? new OpenAIEmbeddingModel(config.embeddingModel, config.embeddingApiKey, config.embeddingBaseUrl)
      : new UnconfiguredEmbeddingModel(),
    createChatModel: (credentials: Credentials, modelName: ChatModelName) =>
      new OpenAIChatModel(modelName, credentials, config.llmBaseUrl),
    createExtractor: (credentials: Credentials) =>
      new OpenAIStructuredExtractor(config.extractionModel, credentials, config.llmBaseUrl),
  };
}

function toUsageStats(usage: OpenAI.CompletionUsage | undefined): UsageStats {
  return {
    completionTokens: usage?.completion_tokens ?? 0,
    promptTokens: usage?.prompt_tokens ?? 0,
    totalTokens: usage?.total_tokens ?? 0,
  };
}
