import { ChromaClient, type Collection } from 'chromadb';
import { z } from 'zod';
import { CollectionNotFound, EmbeddingSpaceMismatch, StoreUnavailable, toError } from '../../errors.js';
import { logger } from '../../utils/logger.js';
import type {
  CollectionInfo,
  EmbeddingSpace,
  EmbeddingVector,
  IndexedPassage,
  Passage,
  RetrievalResult,
} from '../../types/index.js';
import {
  assertDimensions,
  assertK,
  assertNotAborted,
  assertSameSpace,
  compareScored,
  passageId,
  type PassageStore,
} from './passage-store.js';

const spaceMetadataSchema = z.object({
  'hnsw:space': z.enum(['cosine', 'ip']),
  embedding_model: z.string(),
  embedding_dimension: z.number().int().positive(),
});

const passageMetadataSchema = z.object({
  source_url: z.string(),
  ordinal: z.number().int().nonnegative(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  overlap: z.number().int().nonnegative(),
  headings: z.string(),
});

const UPSERT_BATCH_SIZE = 100;

export interface ChromaStoreOptions {
  url?: string;
  client?: ChromaClient;
}

export class ChromaPassageStore implements PassageStore {
  private client: ChromaClient;
  private collections = new Map<string, { handle: Collection; space: EmbeddingSpace }>();

  constructor(options: ChromaStoreOptions = {}) {
    if (options.client) {
      this.client = options.client;
    } else {
      // URL format: http://hostname:port
      const url = new URL(options.url ?? process.env.CHROMA_URL ?? 'http://localhost:8000');
      const ssl = url.protocol === 'https:';
      this.client = new ChromaClient({
        host: url.hostname,
        port: url.port ? Number(url.port) : ssl ? 443 : 8000,
        ssl,
      });
    }
  }

  async createCollection(collection: string, space: EmbeddingSpace): Promise<CollectionInfo> {
    const existing = await this.open(collection).catch((error: unknown) => {
      if (error instanceof CollectionNotFound) return null;
      throw error;
    });

    if (existing) {
      assertSameSpace(collection, existing.space, space);
      return this.describe(collection);
    }

    logger.info(`Creating Chroma collection: ${collection}`);
    const handle = await this.call(collection, 'create collection', () =>
      this.client.createCollection({
        name: collection,
        metadata: {
          'hnsw:space': space.metric,
          embedding_model: space.model,
          embedding_dimension: space.dimension,
        },
      })
    );

    this.collections.set(collection, { handle, space: { ...space } });
    return { name: collection, space: { ...space }, count: 0 };
  }

  async describe(collection: string): Promise<CollectionInfo> {
    const { handle, space } = await this.open(collection);
    const count = await this.call(collection, 'count', () => handle.count());
    return { name: collection, space: { ...space }, count };
  }

  async upsert(collection: string, passages: IndexedPassage[]): Promise<void> {
    if (passages.length === 0) return;

    const { handle, space } = await this.open(collection);
    assertDimensions(collection, space, passages.map(p => p.vector));

    // Add in batches to keep request payloads bounded
    for (let i = 0; i < passages.length; i += UPSERT_BATCH_SIZE) {
      const batch = passages.slice(i, i + UPSERT_BATCH_SIZE);

      await this.call(collection, 'upsert', () =>
        handle.upsert({
          ids: batch.map(p => passageId(p.passage.sourceUrl, p.passage.ordinal)),
          embeddings: batch.map(p => p.vector),
          documents: batch.map(p => p.passage.text),
          metadatas: batch.map(p => ({
            source_url: p.passage.sourceUrl,
            ordinal: p.passage.ordinal,
            start: p.passage.start,
            end: p.passage.end,
            overlap: p.passage.overlap,
            headings: JSON.stringify(p.passage.headings),
          })),
        })
      );
    }

    logger.debug(`Upserted ${passages.length} passages into ${collection}`);
  }

  async deleteBySource(collection: string, sourceUrl: string): Promise<number> {
    const { handle } = await this.open(collection);

    const existing = await this.call(collection, 'get', () =>
      handle.get({ where: { source_url: sourceUrl }, include: [] })
    );
    if (existing.ids.length === 0) return 0;

    await this.call(collection, 'delete', () => handle.delete({ ids: existing.ids }));
    return existing.ids.length;
  }

  async replaceSource(collection: string, sourceUrl: string, passages: IndexedPassage[]): Promise<void> {
    await this.replaceSources(collection, new Map([[sourceUrl, passages]]));
  }

  /**
   * Chroma has no transactions: the passages of every affected source are
   * read first and written back when a later step fails. Only a crash of
   * this process mid-write can leave a source absent.
   */
  async replaceSources(
    collection: string,
    sources: Map<string, IndexedPassage[]>,
    signal?: AbortSignal
  ): Promise<void> {
    const { handle, space } = await this.open(collection);
    for (const passages of sources.values()) {
      assertDimensions(collection, space, passages.map(p => p.vector));
    }
    assertNotAborted(collection, signal);

    const sourceUrls = [...sources.keys()];
    const snapshot = await this.snapshot(collection, handle, sourceUrls);

    try {
      for (const [sourceUrl, passages] of sources) {
        assertNotAborted(collection, signal);
        await this.deleteBySource(collection, sourceUrl);
        await this.upsert(collection, passages);
      }
      assertNotAborted(collection, signal);
    } catch (error) {
      await this.restore(collection, sourceUrls, snapshot);
      throw error;
    }
  }

  async search(collection: string, queryVector: EmbeddingVector, k: number): Promise<RetrievalResult> {
    assertK(k);
    const { handle, space } = await this.open(collection);
    assertDimensions(collection, space, [queryVector]);

    const count = await this.call(collection, 'count', () => handle.count());
    if (count === 0) return [];

    const results = await this.call(collection, 'query', () =>
      handle.query({
        queryEmbeddings: [queryVector],
        nResults: Math.min(k, count),
        include: ['documents', 'metadatas', 'distances'],
      })
    );

    const ids = results.ids?.[0] ?? [];
    const documents = results.documents?.[0] ?? [];
    const metadatas = results.metadatas?.[0] ?? [];
    const distances = results.distances?.[0] ?? [];

    const scored: RetrievalResult = ids.map((id, i) => {
      const metadata = passageMetadataSchema.safeParse(metadatas[i]);
      if (!metadata.success) {
        throw new StoreUnavailable(`Malformed metadata for passage ${id} in ${collection}`, {
          context: { collection },
        });
      }

      return {
        passage: toPassage(metadata.data, documents[i] ?? ''),
        score: 1 - (distances[i] ?? 1),
      };
    });

    return scored.sort(compareScored).slice(0, k);
  }

  async close(): Promise<void> {
    this.collections.clear();
  }

  /**
   * Current passages of the given sources, with their vectors
   */
  private async snapshot(collection: string, handle: Collection, sourceUrls: string[]): Promise<IndexedPassage[]> {
    const saved: IndexedPassage[] = [];

    for (const sourceUrl of sourceUrls) {
      const existing = await this.call(collection, 'get', () =>
        handle.get({ where: { source_url: sourceUrl }, include: ['embeddings', 'documents', 'metadatas'] })
      );

      existing.ids.forEach((id, i) => {
        const metadata = passageMetadataSchema.safeParse(existing.metadatas[i]);
        const vector = existing.embeddings[i];
        if (!metadata.success || !vector) {
          throw new StoreUnavailable(`Cannot back up passage ${id} in ${collection}`, { context: { collection } });
        }

        saved.push({
          collection,
          passage: toPassage(metadata.data, existing.documents[i] ?? ''),
          vector: [...vector],
        });
      });
    }

    return saved;
  }

  private async restore(collection: string, sourceUrls: string[], snapshot: IndexedPassage[]): Promise<void> {
    try {
      for (const sourceUrl of sourceUrls) {
        await this.deleteBySource(collection, sourceUrl);
      }
      await this.upsert(collection, snapshot);
      logger.warn(`Restored ${snapshot.length} passages in ${collection} after a failed write`);
    } catch (error) {
      logger.error(`Could not restore ${collection} after a failed write: ${toError(error).message}`);
    }
  }

  private async open(collection: string): Promise<{ handle: Collection; space: EmbeddingSpace }> {
    const cached = this.collections.get(collection);
    if (cached) return cached;

    const handle = await this.call(collection, 'get collection', () =>
      this.client.getCollection({ name: collection })
    );

    const metadata = spaceMetadataSchema.safeParse(handle.metadata);
    if (!metadata.success) {
      throw new EmbeddingSpaceMismatch(
        `Chroma collection "${collection}" carries no embedding space metadata`,
        { context: { collection } }
      );
    }

    const entry = {
      handle,
      space: {
        model: metadata.data.embedding_model,
        dimension: metadata.data.embedding_dimension,
        metric: metadata.data['hnsw:space'],
      },
    };
    this.collections.set(collection, entry);
    return entry;
  }

  private async call<T>(collection: string, operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const cause = toError(error);
      if (/not ?found|does not exist/i.test(`${cause.name} ${cause.message}`)) {
        throw new CollectionNotFound(collection);
      }
      throw new StoreUnavailable(`Chroma ${operation} failed for "${collection}": ${cause.message}`, {
        cause,
        context: { collection },
        retryable: true,
      });
    }
  }
}

function toPassage(metadata: z.infer<typeof passageMetadataSchema>, text: string): Passage {
  return {
    sourceUrl: metadata.source_url,
    ordinal: metadata.ordinal,
    text,
    start: metadata.start,
    end: metadata.end,
    overlap: metadata.overlap,
    headings: parseHeadings(metadata.headings),
  };
}

function parseHeadings(raw: string): string[] {
  const parsed = z.array(z.string()).safeParse(safeJson(raw));
  return parsed.success ? parsed.data : [];
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
