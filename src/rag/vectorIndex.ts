import pLimit from 'p-limit';

import { CrawlerError, createEmptyResultError, isCrawlerError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { Chunk, EmbeddingModel } from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

interface IndexEntry {
  chunk: Chunk;
  vector: number[];
  norm: number;
}

export interface VectorIndexBuildOptions {
  concurrency?: number;
}

const DEFAULT_EMBEDDING_CONCURRENCY = 4;

/** In-memory cosine-similarity index over embedded chunks. */
export class VectorIndex {
  private constructor(
    private readonly entries: readonly IndexEntry[],
    readonly dimension: number,
  ) {}

  /**
   * Embeds every chunk and indexes the ones that embed cleanly. Chunks whose
   * embedding fails or has a different dimension from the first are skipped.
   */
  static async build(
    chunks: readonly Chunk[],
    embedder: EmbeddingModel,
    options: VectorIndexBuildOptions = {},
  ): Promise<VectorIndex> {
    if (chunks.length === 0) {
      throw createEmptyResultError('Cannot build a vector index without chunks');
    }

    const log = componentLogger('vector-index');
    const limit = pLimit(options.concurrency ?? DEFAULT_EMBEDDING_CONCURRENCY);
    const vectors = await Promise.all(
      chunks.map((chunk, index) =>
        limit(async (): Promise<number[] | undefined> => {
          try {
            return await embedder.embed(chunk.text);
          } catch (error) {
            // A missing key or endpoint fails every chunk the same way.
            if (isCrawlerError(error) && error.kind === 'config') {
              throw error;
            }
            reportCrawlerError(
              error,
              { stage: 'embedding', chunk: index },
              { defaultKind: 'embedding', defaultSeverity: 'recoverable', throwOnFatal: false },
            );
            return undefined;
          }
        }),
      ),
    );

    const entries: IndexEntry[] = [];
    let dimension = 0;

    vectors.forEach((vector, index) => {
      if (!vector || vector.length === 0 || !vector.every(Number.isFinite)) {
        return;
      }

      if (dimension === 0) {
        dimension = vector.length;
      } else if (vector.length !== dimension) {
        log.warn({ chunk: index, expected: dimension, actual: vector.length }, 'embedding dimension mismatch');
        return;
      }

      entries.push({ chunk: chunks[index], vector, norm: magnitude(vector) });
    });

    if (entries.length === 0) {
      throw new CrawlerError({
        message: 'Failed to create vector store: no chunk could be embedded.',
        kind: 'embedding',
        severity: 'fatal',
        details: { chunks: chunks.length },
      });
    }

    log.info({ chunks: chunks.length, indexed: entries.length, dimension }, 'vector index built');
    return new VectorIndex(entries, dimension);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Top `k` chunks by cosine similarity; equal scores keep index order. */
  search(vector: readonly number[], k: number): ScoredChunk[] {
    if (vector.length !== this.dimension) {
      throw new CrawlerError({
        message: `Query vector has dimension ${vector.length}, index expects ${this.dimension}.`,
        kind: 'embedding',
        severity: 'fatal',
      });
    }

    const queryNorm = magnitude(vector);
    return this.entries
      .map((entry) => ({ chunk: entry.chunk, score: cosine(entry, vector, queryNorm) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, k));
  }
}

function cosine(entry: IndexEntry, query: readonly number[], queryNorm: number): number {
  if (entry.norm === 0 || queryNorm === 0) {
    return 0;
  }

  let dot = 0;
  for (let i = 0; i < query.length; i += 1) {
    dot += entry.vector[i] * query[i];
  }
  return dot / (entry.norm * queryNorm);
}

function magnitude(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}
