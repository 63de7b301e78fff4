/**
 * Retriever
 * Embeds a question and finds the closest passages of one collection
 */
import type { EmbeddingService } from '../api/collaborators.js';
import type { AgentConfig } from '../config/index.js';
import { EmbeddingError, EmbeddingSpaceMismatch, InvalidK, InvalidQuestion } from '../errors.js';
import type { RetrievalResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { PassageStore } from './vector-store/passage-store.js';

export type RetrievalConfig = Pick<AgentConfig, 'topK' | 'maxTopK' | 'minSimilarity' | 'callTimeoutMs'>;

export interface RetrieverOptions {
  embedder: EmbeddingService;
  store: PassageStore;
  config: RetrievalConfig;
}

export class Retriever {
  private readonly embedder: EmbeddingService;
  private readonly store: PassageStore;
  private readonly config: RetrievalConfig;

  constructor(options: RetrieverOptions) {
    this.embedder = options.embedder;
    this.store = options.store;
    this.config = options.config;
  }

  /**
   * Top passages scoring at least `minSimilarity`, best first
   */
  async retrieve(collection: string, question: string, k: number = this.config.topK): Promise<RetrievalResult> {
    if (!Number.isInteger(k) || k < 1 || k > this.config.maxTopK) {
      throw new InvalidK(k, this.config.maxTopK);
    }

    const query = question.trim();
    if (query.length === 0) {
      throw new InvalidQuestion('Question must not be empty');
    }

    const info = await this.store.describe(collection);
    if (info.space.model !== this.embedder.model) {
      throw new EmbeddingSpaceMismatch(
        `Collection "${collection}" was indexed with ${info.space.model}, but queries are embedded with ${this.embedder.model}`,
        { context: { collection } }
      );
    }

    if (info.count === 0) {
      logger.debug(`Collection ${collection} is empty`);
      return [];
    }

    const [vector] = await withTimeout(
      this.embedder.embed([query]),
      this.config.callTimeoutMs,
      () =>
        new EmbeddingError(`Query embedding did not finish within ${this.config.callTimeoutMs}ms`, {
          context: { collection },
          timedOut: true,
        })
    );

    if (!vector) {
      throw new EmbeddingError(`${this.embedder.model} returned no vector for the question`, { context: { collection } });
    }
    if (vector.length !== info.space.dimension) {
      throw new EmbeddingSpaceMismatch(
        `Query vector has ${vector.length} dimensions, collection "${collection}" holds ${info.space.dimension}`,
        { context: { collection } }
      );
    }

    const results = await this.store.search(collection, vector, k);
    const relevant = results.filter(result => result.score >= this.config.minSimilarity).slice(0, k);

    logger.debug(`Retrieved ${relevant.length}/${results.length} passages above ${this.config.minSimilarity} from ${collection}`);
    return relevant;
  }
}
