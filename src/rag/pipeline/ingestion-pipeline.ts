/**
 * Ingestion Pipeline
 * crawl → chunk → embed → index for one documentation source
 */
import type { CrawlService, EmbeddingService } from '../../api/collaborators.js';
import type { AgentConfig } from '../../config/index.js';
import {
  AgentError,
  CrawlError,
  EmbeddingError,
  EmbeddingSpaceMismatch,
  IngestionInProgress,
  StoreUnavailable,
  isAgentError,
  toError,
} from '../../errors.js';
import type {
  ActivePhase,
  Document,
  EmbeddingSpace,
  EmbeddingVector,
  IndexedPassage,
  IngestionEvent,
  IngestionPhase,
  IngestionReport,
  IngestionStatus,
  Passage,
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { RateLimiter } from '../../utils/rate-limiter.js';
import { isRateLimitError, withRetryThrow } from '../../utils/retry-handler.js';
import { withTimeout } from '../../utils/timeout.js';
import { SemanticChunker } from '../chunker/semantic-chunker.js';
import { assertSameSpace, type PassageStore } from '../vector-store/passage-store.js';

export type IngestionConfig = Pick<
  AgentConfig,
  | 'crawlMaxPages'
  | 'crawlMaxDepth'
  | 'crawlTimeoutMs'
  | 'chunkTargetSize'
  | 'chunkOverlap'
  | 'chunkMinSize'
  | 'embeddingBatchSize'
  | 'embeddingConcurrency'
  | 'embeddingMaxRetries'
  | 'embeddingRetryDelayMs'
  | 'similarityMetric'
  | 'callTimeoutMs'
>;

export type IngestionListener = (event: IngestionEvent) => void;

export interface IngestionPipelineOptions {
  crawler: CrawlService;
  embedder: EmbeddingService;
  store: PassageStore;
  config: IngestionConfig;
}

interface RunContext {
  collection: string;
  rootUrl: string;
  onEvent?: IngestionListener;
  /** Store calls of this run, settled or not */
  pending: Set<Promise<unknown>>;
}

export class IngestionPipeline {
  private readonly crawler: CrawlService;
  private readonly embedder: EmbeddingService;
  private readonly store: PassageStore;
  private readonly config: IngestionConfig;
  private readonly chunker: SemanticChunker;
  private readonly statuses = new Map<string, IngestionStatus>();
  private readonly running = new Set<string>();

  constructor(options: IngestionPipelineOptions) {
    this.crawler = options.crawler;
    this.embedder = options.embedder;
    this.store = options.store;
    this.config = options.config;
    this.chunker = new SemanticChunker(
      options.config.chunkTargetSize,
      options.config.chunkOverlap,
      options.config.chunkMinSize
    );
  }

  /**
   * Current state of a collection; `idle` when it was never ingested here
   */
  getStatus(collection: string): IngestionStatus {
    const status = this.statuses.get(collection);
    return status
      ? { ...status }
      : { collection, phase: 'idle', updatedAt: new Date().toISOString() };
  }

  isRunning(collection: string): boolean {
    return this.running.has(collection);
  }

  /**
   * Ingest a documentation source into a collection. Only one run per
   * collection may be in flight; the lock is held until every store call
   * the run started has settled, including ones that timed out.
   */
  async ingest(collection: string, rootUrl: string, onEvent?: IngestionListener): Promise<IngestionReport> {
    if (this.running.has(collection)) {
      throw new IngestionInProgress(collection);
    }

    this.running.add(collection);
    const context: RunContext = { collection, rootUrl, onEvent, pending: new Set() };
    try {
      return await this.run(context);
    } finally {
      await Promise.allSettled(context.pending);
      this.running.delete(collection);
    }
  }

  private async run(context: RunContext): Promise<IngestionReport> {
    const { collection, rootUrl } = context;
    const startedAt = new Date();
    const timings: IngestionReport['timings'] = {};
    let phase: ActivePhase = 'crawling';
    let phaseStart = Date.now();

    const enter = (next: ActivePhase) => {
      timings[phase] = Date.now() - phaseStart;
      phase = next;
      phaseStart = Date.now();
      this.transition(context, next);
    };

    try {
      this.transition(context, 'crawling');
      logger.info(`Crawling ${rootUrl} with ${this.crawler.name} crawler...`);
      const documents = dedupeByUrl(await this.crawl(rootUrl));

      enter('chunking');
      const passages = documents.flatMap(doc => this.chunker.chunkDocument(doc));
      if (passages.length === 0) {
        throw new CrawlError(`Crawl of ${rootUrl} produced no text to index`, { context: { url: rootUrl } });
      }
      logger.info(`Created ${passages.length} passages from ${documents.length} documents`);

      enter('embedding');
      const vectors = await this.embedAll(context, passages);
      const space = this.spaceOf(collection, vectors);
      await this.checkExistingSpace(collection, space);

      enter('indexing');
      const sources = await this.index(context, space, passages, vectors);

      timings[phase] = Date.now() - phaseStart;
      this.transition(context, 'ready');

      const report: IngestionReport = {
        collection,
        rootUrl,
        documents: documents.length,
        passages: passages.length,
        sources,
        space,
        timings,
        startedAt: startedAt.toISOString(),
        finishedAt: new Date().toISOString(),
      };
      logger.success(`Indexed ${passages.length} passages from ${sources} sources into ${collection}`);
      return report;
    } catch (error) {
      const failure = annotate(error, phase, collection);
      this.statuses.set(collection, {
        collection,
        phase: 'failed',
        failedPhase: phase,
        error: failure,
        updatedAt: new Date().toISOString(),
      });
      context.onEvent?.({ type: 'phase', collection, phase: 'failed' });
      logger.error(`Ingestion of ${rootUrl} failed while ${phase}: ${failure.message}`);
      throw failure;
    }
  }

  private transition(context: RunContext, phase: IngestionPhase): void {
    this.statuses.set(context.collection, {
      collection: context.collection,
      phase,
      updatedAt: new Date().toISOString(),
    });
    context.onEvent?.({ type: 'phase', collection: context.collection, phase });
    logger.debug(`${context.collection}: ${phase}`);
  }

  private crawl(rootUrl: string): Promise<Document[]> {
    return withTimeout(
      this.crawler.crawl(rootUrl, {
        maxPages: this.config.crawlMaxPages,
        maxDepth: this.config.crawlMaxDepth,
      }),
      this.config.crawlTimeoutMs,
      () =>
        new CrawlError(`Crawl of ${rootUrl} did not finish within ${this.config.crawlTimeoutMs}ms`, {
          context: { url: rootUrl },
          timedOut: true,
        })
    );
  }

  /**
   * Embed passages in concurrent batches, reassembled in passage order
   */
  private async embedAll(context: RunContext, passages: Passage[]): Promise<EmbeddingVector[]> {
    const { embeddingBatchSize, embeddingConcurrency, embeddingMaxRetries, embeddingRetryDelayMs } = this.config;

    const batches: Passage[][] = [];
    for (let i = 0; i < passages.length; i += embeddingBatchSize) {
      batches.push(passages.slice(i, i + embeddingBatchSize));
    }

    const limiter = new RateLimiter({ maxConcurrent: embeddingConcurrency, baseDelayMs: 0 });
    let completed = 0;
    let aborted = false;

    const settled = await Promise.allSettled(
      batches.map((batch, index) =>
        limiter.execute(async () => {
          // A failed batch fails the run; the rest of the queue is skipped
          if (aborted) return [];

          try {
            const vectors = await withRetryThrow(() => this.embedBatch(batch), {
              retries: embeddingMaxRetries,
              baseDelayMs: embeddingRetryDelayMs,
              onRetry: (error, attempt, delayMs) => {
                if (isRateLimitError(error)) limiter.reportRateLimit();
                logger.warn(
                  `Embedding batch ${index + 1}/${batches.length} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${error.message}`
                );
              },
            });

            completed++;
            context.onEvent?.({ type: 'batch', collection: context.collection, completed, total: batches.length });
            return vectors;
          } catch (error) {
            aborted = true;
            throw error;
          }
        })
      )
    );

    for (const result of settled) {
      if (result.status === 'rejected') throw toError(result.reason);
    }

    return settled.flatMap(result => (result.status === 'fulfilled' ? result.value : []));
  }

  private async embedBatch(batch: Passage[]): Promise<EmbeddingVector[]> {
    const vectors = await withTimeout(
      this.embedder.embed(batch.map(passage => passage.text)),
      this.config.callTimeoutMs,
      () =>
        new EmbeddingError(`Embedding call did not finish within ${this.config.callTimeoutMs}ms`, {
          timedOut: true,
          retryable: true,
        })
    );

    if (vectors.length !== batch.length) {
      throw new EmbeddingError(`Expected ${batch.length} vectors from ${this.embedder.model}, got ${vectors.length}`);
    }
    return vectors;
  }

  private spaceOf(collection: string, vectors: EmbeddingVector[]): EmbeddingSpace {
    const dimension = vectors[0]?.length ?? 0;
    if (dimension === 0) {
      throw new EmbeddingError(`${this.embedder.model} returned empty vectors`);
    }

    const mixed = vectors.find(vector => vector.length !== dimension);
    if (mixed) {
      throw new EmbeddingSpaceMismatch(
        `${this.embedder.model} returned vectors of ${dimension} and ${mixed.length} dimensions`,
        { context: { collection, collaborator: 'embedder' } }
      );
    }

    return { model: this.embedder.model, dimension, metric: this.config.similarityMetric };
  }

  /**
   * Re-ingestion must use the space the collection was created with
   */
  private async checkExistingSpace(collection: string, space: EmbeddingSpace): Promise<void> {
    const existing = await this.store.describe(collection).catch((error: unknown) => {
      if (isAgentError(error) && error.kind === 'CollectionNotFound') return null;
      throw error;
    });

    if (existing) {
      assertSameSpace(collection, existing.space, space);
    }
  }

  /**
   * Swap in the passages of every crawled source at once. A failure leaves
   * the previous index as it was.
   */
  private async index(
    context: RunContext,
    space: EmbeddingSpace,
    passages: Passage[],
    vectors: EmbeddingVector[]
  ): Promise<number> {
    const { collection } = context;
    await this.callStore(context, () => this.store.createCollection(collection, space));

    const bySource = new Map<string, IndexedPassage[]>();
    passages.forEach((passage, i) => {
      const entries = bySource.get(passage.sourceUrl) ?? [];
      entries.push({ collection, passage, vector: vectors[i] });
      bySource.set(passage.sourceUrl, entries);
    });

    await this.callStore(context, signal => this.store.replaceSources(collection, bySource, signal));
    logger.debug(`Replaced passages for ${bySource.size} sources`);

    return bySource.size;
  }

  /**
   * Run a store call under the call timeout. On timeout the call is told to
   * stop through its signal and stays tracked until it settles.
   */
  private callStore<T>(context: RunContext, operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const task = operation(controller.signal);
    context.pending.add(task);

    return withTimeout(task, this.config.callTimeoutMs, () => {
      controller.abort();
      return new StoreUnavailable(`Store call did not finish within ${this.config.callTimeoutMs}ms`, {
        context: { collection: context.collection },
        timedOut: true,
        retryable: true,
      });
    });
  }
}

/**
 * One document per URL; a later duplicate replaces the earlier one
 */
export function dedupeByUrl(documents: Document[]): Document[] {
  const byUrl = new Map<string, Document>();
  for (const doc of documents) {
    byUrl.set(doc.url, doc);
  }
  return [...byUrl.values()];
}

/**
 * Attach the phase to a failure, wrapping foreign errors in the phase's error kind
 */
function annotate(error: unknown, phase: ActivePhase, collection: string): AgentError {
  if (isAgentError(error)) {
    error.context.collection ??= collection;
    return error.inPhase(phase);
  }

  const cause = toError(error);
  const options = { cause, context: { collection } };
  switch (phase) {
    case 'crawling':
    case 'chunking':
      return new CrawlError(cause.message, options).inPhase(phase);
    case 'embedding':
      return new EmbeddingError(cause.message, options).inPhase(phase);
    case 'indexing':
      return new StoreUnavailable(cause.message, options).inPhase(phase);
  }
}
