/**
 * Local Passage Store
 * Keeps collections in memory and, when given a file, persists them as JSON
 */
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { CollectionNotFound, StoreUnavailable, toError } from '../../errors.js';
import { logger } from '../../utils/logger.js';
import type {
  CollectionInfo,
  EmbeddingSpace,
  EmbeddingVector,
  IndexedPassage,
  RetrievalResult,
} from '../../types/index.js';
import {
  assertDimensions,
  assertK,
  assertNotAborted,
  assertSameSpace,
  compareScored,
  passageId,
  similarity,
  type PassageStore,
} from './passage-store.js';

interface StoredCollection {
  space: EmbeddingSpace;
  passages: Map<string, IndexedPassage>;
}

const snapshotSchema = z.object({
  version: z.literal(1),
  collections: z.record(
    z.object({
      space: z.object({
        model: z.string(),
        dimension: z.number().int().positive(),
        metric: z.enum(['cosine', 'ip']),
      }),
      passages: z.array(
        z.object({
          passage: z.object({
            sourceUrl: z.string(),
            ordinal: z.number().int().nonnegative(),
            text: z.string(),
            start: z.number().int().nonnegative(),
            end: z.number().int().nonnegative(),
            overlap: z.number().int().nonnegative(),
            headings: z.array(z.string()),
          }),
          vector: z.array(z.number()),
        })
      ),
    })
  ),
});

type Snapshot = z.infer<typeof snapshotSchema>;

export interface LocalStoreOptions {
  filePath?: string;
}

export class LocalPassageStore implements PassageStore {
  private readonly collections = new Map<string, StoredCollection>();
  private readonly filePath?: string;

  constructor(options: LocalStoreOptions = {}) {
    this.filePath = options.filePath;
    if (this.filePath) {
      this.load(this.filePath);
    }
  }

  async createCollection(collection: string, space: EmbeddingSpace): Promise<CollectionInfo> {
    const existing = this.collections.get(collection);
    if (existing) {
      assertSameSpace(collection, existing.space, space);
      return this.info(collection, existing);
    }

    const created: StoredCollection = { space: { ...space }, passages: new Map() };
    this.collections.set(collection, created);
    this.persist();
    logger.debug(`Created collection ${collection} (${space.model}, ${space.dimension}d, ${space.metric})`);
    return this.info(collection, created);
  }

  async describe(collection: string): Promise<CollectionInfo> {
    return this.info(collection, this.get(collection));
  }

  async upsert(collection: string, passages: IndexedPassage[]): Promise<void> {
    const stored = this.get(collection);
    assertDimensions(collection, stored.space, passages.map(p => p.vector));

    for (const entry of passages) {
      stored.passages.set(passageId(entry.passage.sourceUrl, entry.passage.ordinal), copyOf(collection, entry));
    }
    this.persist();
  }

  async deleteBySource(collection: string, sourceUrl: string): Promise<number> {
    const stored = this.get(collection);
    const removed = this.removeSource(stored, sourceUrl);
    if (removed > 0) this.persist();
    return removed;
  }

  async replaceSource(collection: string, sourceUrl: string, passages: IndexedPassage[]): Promise<void> {
    await this.replaceSources(collection, new Map([[sourceUrl, passages]]));
  }

  /**
   * Swaps every source without yielding, so concurrent searches see either
   * the old or the new passages. A failed write restores the old ones.
   */
  async replaceSources(
    collection: string,
    sources: Map<string, IndexedPassage[]>,
    signal?: AbortSignal
  ): Promise<void> {
    const stored = this.get(collection);
    for (const passages of sources.values()) {
      assertDimensions(collection, stored.space, passages.map(p => p.vector));
    }
    assertNotAborted(collection, signal);

    const previous = new Map(stored.passages);
    for (const [sourceUrl, passages] of sources) {
      this.removeSource(stored, sourceUrl);
      for (const entry of passages) {
        stored.passages.set(passageId(entry.passage.sourceUrl, entry.passage.ordinal), copyOf(collection, entry));
      }
    }

    try {
      this.persist();
    } catch (error) {
      stored.passages = previous;
      throw error;
    }
  }

  async search(collection: string, queryVector: EmbeddingVector, k: number): Promise<RetrievalResult> {
    assertK(k);
    const stored = this.get(collection);
    assertDimensions(collection, stored.space, [queryVector]);

    const scored: RetrievalResult = [];
    for (const entry of stored.passages.values()) {
      scored.push({
        passage: { ...entry.passage, headings: [...entry.passage.headings] },
        score: similarity(stored.space.metric, queryVector, entry.vector),
      });
    }

    return scored.sort(compareScored).slice(0, k);
  }

  async close(): Promise<void> {
    this.persist();
  }

  /**
   * Names of all collections
   */
  listCollections(): string[] {
    return [...this.collections.keys()].sort();
  }

  private get(collection: string): StoredCollection {
    const stored = this.collections.get(collection);
    if (!stored) {
      throw new CollectionNotFound(collection);
    }
    return stored;
  }

  private info(name: string, stored: StoredCollection): CollectionInfo {
    return { name, space: { ...stored.space }, count: stored.passages.size };
  }

  private removeSource(stored: StoredCollection, sourceUrl: string): number {
    let removed = 0;
    for (const [id, entry] of stored.passages) {
      if (entry.passage.sourceUrl === sourceUrl) {
        stored.passages.delete(id);
        removed++;
      }
    }
    return removed;
  }

  private load(filePath: string): void {
    if (!fs.existsSync(filePath)) return;

    let snapshot: Snapshot;
    try {
      snapshot = snapshotSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
    } catch (error) {
      throw new StoreUnavailable(`Could not read passage store ${filePath}: ${toError(error).message}`, { cause: error });
    }

    for (const [name, data] of Object.entries(snapshot.collections)) {
      const passages = new Map<string, IndexedPassage>();
      for (const entry of data.passages) {
        passages.set(passageId(entry.passage.sourceUrl, entry.passage.ordinal), { collection: name, ...entry });
      }
      this.collections.set(name, { space: data.space, passages });
    }

    logger.debug(`Loaded ${this.collections.size} collections from ${filePath}`);
  }

  private persist(): void {
    if (!this.filePath) return;

    const snapshot: Snapshot = { version: 1, collections: {} };
    for (const [name, stored] of this.collections) {
      snapshot.collections[name] = {
        space: stored.space,
        passages: [...stored.passages.values()].map(({ passage, vector }) => ({ passage, vector })),
      };
    }

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.tmp`;
      fs.writeFileSync(tempPath, JSON.stringify(snapshot), 'utf8');
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      throw new StoreUnavailable(`Could not write passage store ${this.filePath}: ${toError(error).message}`, { cause: error });
    }
  }
}

function copyOf(collection: string, entry: IndexedPassage): IndexedPassage {
  return {
    collection,
    passage: { ...entry.passage, headings: [...entry.passage.headings] },
    vector: [...entry.vector],
  };
}
