import { DEFAULT_RETRIEVAL_K } from '../config.js';
import { ensureCrawlerError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { ChatModel, EmbeddingModel } from '../types.js';
import type { VectorIndex } from './vectorIndex.js';

export const NOT_READY_RESPONSE = 'Please load documents first.';

export function buildGroundedPrompt(context: string, question: string): string {
  return `Answer the question based only on the following context:
${context}

Question: ${question}
`;
}

export interface RetrievalQAOptions {
  k?: number;
}

export class RetrievalQA {
  private readonly k: number;

  constructor(
    private readonly embedder: EmbeddingModel,
    options: RetrievalQAOptions = {},
  ) {
    this.k = options.k ?? DEFAULT_RETRIEVAL_K;
  }

  /**
   * Answers from the `k` closest chunks with a single completion and returns
   * the model text untouched. Without an index it answers NOT_READY_RESPONSE.
   */
  async query(index: VectorIndex | undefined, model: ChatModel, question: string): Promise<string> {
    if (!index) {
      return NOT_READY_RESPONSE;
    }

    let queryVector: number[];
    try {
      queryVector = await this.embedder.embed(question);
    } catch (error) {
      throw ensureCrawlerError(error, { kind: 'embedding', message: 'Failed to embed the question' });
    }

    const matches = index.search(queryVector, this.k);
    const context = matches.map((match) => match.chunk.text).join('\n\n');
    componentLogger('retrieval').debug(
      { matches: matches.length, scores: matches.map((match) => Number(match.score.toFixed(4))) },
      'retrieved context',
    );

    try {
      return await model.complete(buildGroundedPrompt(context, question));
    } catch (error) {
      throw ensureCrawlerError(error, { kind: 'model', message: `Model ${model.modelName} failed` });
    }
  }
}
