import { describe, it, expect, beforeEach } from 'vitest';
import { Retriever } from '../../../src/rag/retriever.js';
import { LocalPassageStore } from '../../../src/rag/vector-store/local-store.js';
import { CollectionNotFound, EmbeddingSpaceMismatch, InvalidK, InvalidQuestion } from '../../../src/errors.js';
import type { EmbeddingService } from '../../../src/api/collaborators.js';
import type { IndexedPassage } from '../../../src/types/index.js';
import { KeywordEmbedder, testConfig } from '../../helpers/fakes.js';

const VOCAB = ['install', 'autoscaling', 'billing'];

function indexed(sourceUrl: string, ordinal: number, vector: number[]): IndexedPassage {
  return {
    collection: 'docs',
    passage: { sourceUrl, ordinal, text: `${sourceUrl}#${ordinal}`, start: 0, end: 1, overlap: 0, headings: [] },
    vector,
  };
}

describe('Retriever', () => {
  let store: LocalPassageStore;
  let embedder: KeywordEmbedder;
  let retriever: Retriever;

  beforeEach(async () => {
    store = new LocalPassageStore();
    embedder = new KeywordEmbedder(VOCAB);
    retriever = new Retriever({ embedder, store, config: testConfig({ topK: 2, maxTopK: 4, minSimilarity: 0.5 }) });

    await store.createCollection('docs', { model: 'fake-embed', dimension: 3, metric: 'cosine' });
    await store.upsert('docs', [
      indexed('https://docs.test/scale', 0, [0, 1, 0]),
      indexed('https://docs.test/scale', 1, [0, 3, 4]),
      indexed('https://docs.test/mixed', 0, [1, 1, 0]),
      indexed('https://docs.test/bill', 0, [0, 0, 1]),
    ]);
  });

  it('returns the top k passages at or above the threshold', async () => {
    const results = await retriever.retrieve('docs', 'How does autoscaling work?', 4);

    expect(results.map(r => `${r.passage.sourceUrl}:${r.passage.ordinal}`)).toEqual([
      'https://docs.test/scale:0',
      'https://docs.test/mixed:0',
      'https://docs.test/scale:1',
    ]);
    expect(results[0].score).toBe(1);
    expect(results[2].score).toBeCloseTo(0.6);
  });

  it('defaults k to topK', async () => {
    const results = await retriever.retrieve('docs', 'autoscaling');
    expect(results).toHaveLength(2);
  });

  it('drops everything below the threshold', async () => {
    expect(await retriever.retrieve('docs', 'install', 4)).toEqual([
      expect.objectContaining({ passage: expect.objectContaining({ sourceUrl: 'https://docs.test/mixed' }) }),
    ]);
    expect(await retriever.retrieve('docs', 'nothing relevant here', 4)).toEqual([]);
  });

  it.each([0, 5, 1.5, -1])('rejects k = %s', async k => {
    await expect(retriever.retrieve('docs', 'autoscaling', k)).rejects.toBeInstanceOf(InvalidK);
  });

  it('rejects an empty question', async () => {
    await expect(retriever.retrieve('docs', '   ')).rejects.toBeInstanceOf(InvalidQuestion);
    expect(embedder.calls).toBe(0);
  });

  it('throws CollectionNotFound for a collection that was never ingested', async () => {
    await expect(retriever.retrieve('missing', 'autoscaling')).rejects.toBeInstanceOf(CollectionNotFound);
  });

  it('returns nothing for an empty collection without embedding', async () => {
    await store.createCollection('empty', { model: 'fake-embed', dimension: 3, metric: 'cosine' });

    expect(await retriever.retrieve('empty', 'autoscaling')).toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  it('refuses to query with a different embedding model', async () => {
    const other = new KeywordEmbedder(VOCAB, 'other-embed');
    const mismatched = new Retriever({ embedder: other, store, config: testConfig() });

    await expect(mismatched.retrieve('docs', 'autoscaling')).rejects.toBeInstanceOf(EmbeddingSpaceMismatch);
    expect(other.calls).toBe(0);
  });

  it('refuses a query vector of another dimension', async () => {
    const wide: EmbeddingService = { model: 'fake-embed', embed: async texts => texts.map(() => [1, 0, 0, 0]) };
    const mismatched = new Retriever({ embedder: wide, store, config: testConfig() });

    await expect(mismatched.retrieve('docs', 'autoscaling')).rejects.toBeInstanceOf(EmbeddingSpaceMismatch);
  });
});
