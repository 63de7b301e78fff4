import { createHash } from 'node:crypto';
import { EmbeddingSpaceMismatch, StoreUnavailable } from '../../errors.js';
import type {
  CollectionInfo,
  EmbeddingSpace,
  EmbeddingVector,
  IndexedPassage,
  RetrievalResult,
  ScoredPassage,
  SimilarityMetric,
} from '../../types/index.js';

/**
 * A vector index partitioned by collection.
 *
 * Implementations fail with StoreUnavailable when the backend cannot be
 * reached and with CollectionNotFound when a collection was never created.
 */
export interface PassageStore {
  /** Create the collection, or check that an existing one has the same space. */
  createCollection(collection: string, space: EmbeddingSpace): Promise<CollectionInfo>;
  describe(collection: string): Promise<CollectionInfo>;
  upsert(collection: string, passages: IndexedPassage[]): Promise<void>;
  deleteBySource(collection: string, sourceUrl: string): Promise<number>;
  /** Delete then upsert one source's passages as a single logical step. */
  replaceSource(collection: string, sourceUrl: string, passages: IndexedPassage[]): Promise<void>;
  /**
   * Replace several sources at once: every source is swapped, or none is.
   * Once `signal` is aborted nothing more is written and the step is undone.
   */
  replaceSources(collection: string, sources: Map<string, IndexedPassage[]>, signal?: AbortSignal): Promise<void>;
  search(collection: string, queryVector: EmbeddingVector, k: number): Promise<RetrievalResult>;
  close(): Promise<void>;
}

/**
 * Stable identity of an indexed passage: (source URL, ordinal)
 */
export function passageId(sourceUrl: string, ordinal: number): string {
  const digest = createHash('sha256').update(sourceUrl).digest('hex').slice(0, 16);
  return `${digest}_${ordinal}`;
}

/**
 * Descending score, then ascending ordinal, then source URL
 */
export function compareScored(a: ScoredPassage, b: ScoredPassage): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.passage.ordinal !== b.passage.ordinal) return a.passage.ordinal - b.passage.ordinal;
  if (a.passage.sourceUrl < b.passage.sourceUrl) return -1;
  if (a.passage.sourceUrl > b.passage.sourceUrl) return 1;
  return 0;
}

export function similarity(metric: SimilarityMetric, a: EmbeddingVector, b: EmbeddingVector): number {
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (metric === 'ip') {
    return dotProduct;
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}

export function assertSameSpace(collection: string, existing: EmbeddingSpace, requested: EmbeddingSpace): void {
  const differences: string[] = [];
  if (existing.model !== requested.model) differences.push(`model ${existing.model} ≠ ${requested.model}`);
  if (existing.dimension !== requested.dimension) differences.push(`dimension ${existing.dimension} ≠ ${requested.dimension}`);
  if (existing.metric !== requested.metric) differences.push(`metric ${existing.metric} ≠ ${requested.metric}`);

  if (differences.length > 0) {
    throw new EmbeddingSpaceMismatch(
      `Collection "${collection}" was indexed with a different embedding space (${differences.join(', ')})`,
      { context: { collection } }
    );
  }
}

export function assertDimensions(collection: string, space: EmbeddingSpace, vectors: EmbeddingVector[]): void {
  const wrong = vectors.find(vector => vector.length !== space.dimension);
  if (wrong) {
    throw new EmbeddingSpaceMismatch(
      `Collection "${collection}" holds ${space.dimension}-dimensional vectors, got ${wrong.length}`,
      { context: { collection } }
    );
  }
}

export function assertK(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`k must be a positive integer, got ${k}`);
  }
}

/**
 * Stop a store write whose caller has given up on it
 */
export function assertNotAborted(collection: string, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new StoreUnavailable(`Write to "${collection}" was abandoned by the caller`, {
      context: { collection },
      timedOut: true,
    });
  }
}
