import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LocalPassageStore } from '../../../../src/rag/vector-store/local-store.js';
import { CollectionNotFound, EmbeddingSpaceMismatch, StoreUnavailable } from '../../../../src/errors.js';
import type { EmbeddingSpace, IndexedPassage } from '../../../../src/types/index.js';

const SPACE: EmbeddingSpace = { model: 'fake-embed', dimension: 2, metric: 'cosine' };

function indexed(collection: string, sourceUrl: string, ordinal: number, vector: number[], text = `${sourceUrl}#${ordinal}`): IndexedPassage {
  return {
    collection,
    passage: { sourceUrl, ordinal, text, start: ordinal * 10, end: ordinal * 10 + 10, overlap: 0, headings: [] },
    vector,
  };
}

describe('LocalPassageStore', () => {
  let store: LocalPassageStore;

  beforeEach(async () => {
    store = new LocalPassageStore();
    await store.createCollection('docs', SPACE);
  });

  describe('collections', () => {
    it('describes a new collection as empty', async () => {
      expect(await store.describe('docs')).toEqual({ name: 'docs', space: SPACE, count: 0 });
      expect(await store.search('docs', [1, 0], 3)).toEqual([]);
    });

    it('throws CollectionNotFound for an unknown collection', async () => {
      await expect(store.search('missing', [1, 0], 3)).rejects.toBeInstanceOf(CollectionNotFound);
      await expect(store.describe('missing')).rejects.toBeInstanceOf(CollectionNotFound);
    });

    it('accepts re-creating a collection with the same space', async () => {
      await store.upsert('docs', [indexed('docs', 'https://a', 0, [1, 0])]);
      const info = await store.createCollection('docs', { ...SPACE });
      expect(info.count).toBe(1);
    });

    it('rejects re-creating a collection with another space', async () => {
      await expect(store.createCollection('docs', { ...SPACE, metric: 'ip' })).rejects.toBeInstanceOf(EmbeddingSpaceMismatch);
      await expect(store.createCollection('docs', { ...SPACE, dimension: 3 })).rejects.toBeInstanceOf(EmbeddingSpaceMismatch);
    });

    it('keeps collections isolated', async () => {
      await store.createCollection('other', SPACE);
      await store.upsert('docs', [indexed('docs', 'https://a', 0, [1, 0])]);
      await store.upsert('other', [indexed('other', 'https://b', 0, [1, 0])]);

      const results = await store.search('other', [1, 0], 5);
      expect(results.map(r => r.passage.sourceUrl)).toEqual(['https://b']);
      expect(store.listCollections()).toEqual(['docs', 'other']);
    });
  });

  describe('upsert', () => {
    it('overwrites passages with the same source and ordinal', async () => {
      const passages = [indexed('docs', 'https://a', 0, [1, 0]), indexed('docs', 'https://a', 1, [0, 1])];
      await store.upsert('docs', passages);
      await store.upsert('docs', passages);

      expect((await store.describe('docs')).count).toBe(2);
    });

    it('rejects vectors of another dimension', async () => {
      await expect(store.upsert('docs', [indexed('docs', 'https://a', 0, [1, 0, 0])])).rejects.toBeInstanceOf(
        EmbeddingSpaceMismatch
      );
    });
  });

  describe('deleteBySource and replaceSource', () => {
    beforeEach(async () => {
      await store.upsert('docs', [
        indexed('docs', 'https://a', 0, [1, 0]),
        indexed('docs', 'https://a', 1, [1, 0]),
        indexed('docs', 'https://a', 2, [1, 0]),
        indexed('docs', 'https://b', 0, [0, 1]),
      ]);
    });

    it('deletes every passage of one source', async () => {
      expect(await store.deleteBySource('docs', 'https://a')).toBe(3);
      expect(await store.deleteBySource('docs', 'https://a')).toBe(0);
      expect((await store.describe('docs')).count).toBe(1);
    });

    it('supersedes a source instead of merging', async () => {
      await store.replaceSource('docs', 'https://a', [indexed('docs', 'https://a', 0, [1, 0], 'new text')]);

      const results = await store.search('docs', [1, 0], 10);
      expect(results.map(r => [r.passage.sourceUrl, r.passage.ordinal, r.passage.text])).toEqual([
        ['https://a', 0, 'new text'],
        ['https://b', 0, 'https://b#0'],
      ]);
    });
  });

  describe('search', () => {
    it('orders by score, then ordinal, then source URL', async () => {
      await store.upsert('docs', [
        indexed('docs', 'https://b', 1, [1, 0]),
        indexed('docs', 'https://a', 1, [1, 0]),
        indexed('docs', 'https://c', 0, [1, 0]),
        indexed('docs', 'https://d', 0, [0, 1]),
      ]);

      const results = await store.search('docs', [1, 0], 10);
      expect(results.map(r => `${r.passage.sourceUrl}:${r.passage.ordinal}`)).toEqual([
        'https://c:0',
        'https://a:1',
        'https://b:1',
        'https://d:0',
      ]);
      expect(results.map(r => r.score)).toEqual([1, 1, 1, 0]);
    });

    it('returns at most k results', async () => {
      await store.upsert('docs', [indexed('docs', 'https://a', 0, [1, 0]), indexed('docs', 'https://a', 1, [1, 1])]);
      expect(await store.search('docs', [1, 0], 1)).toHaveLength(1);
    });

    it('rejects a non-positive k', async () => {
      await expect(store.search('docs', [1, 0], 0)).rejects.toBeInstanceOf(RangeError);
    });

    it('uses the inner product for ip collections', async () => {
      await store.createCollection('ip', { ...SPACE, metric: 'ip' });
      await store.upsert('ip', [indexed('ip', 'https://a', 0, [3, 4])]);

      const [result] = await store.search('ip', [2, 0], 1);
      expect(result.score).toBe(6);
    });
  });

  describe('replacing sources', () => {
    it('swaps several sources in one step', async () => {
      await store.upsert('docs', [indexed('docs', 'https://a', 0, [1, 0]), indexed('docs', 'https://c', 0, [0, 1])]);

      await store.replaceSources(
        'docs',
        new Map([
          ['https://a', [indexed('docs', 'https://a', 0, [1, 0], 'new a')]],
          ['https://b', [indexed('docs', 'https://b', 0, [1, 1], 'new b')]],
        ])
      );

      const results = await store.search('docs', [1, 0], 5);
      expect(results.map(r => r.passage.text)).toEqual(['new a', 'new b', 'https://c#0']);
    });

    it('writes nothing once the signal is aborted', async () => {
      await store.upsert('docs', [indexed('docs', 'https://a', 0, [1, 0])]);
      const controller = new AbortController();
      controller.abort();

      await expect(
        store.replaceSources('docs', new Map([['https://a', []]]), controller.signal)
      ).rejects.toMatchObject({ kind: 'StoreUnavailable', timedOut: true, context: { collection: 'docs' } });
      expect(await store.describe('docs')).toMatchObject({ count: 1 });
    });
  });

  describe('persistence', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'passage-store-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reloads collections written by an earlier instance', async () => {
      const filePath = path.join(dir, 'store.json');
      const first = new LocalPassageStore({ filePath });
      await first.createCollection('docs', SPACE);
      await first.upsert('docs', [indexed('docs', 'https://a', 0, [1, 0], 'persisted')]);
      await first.close();

      const second = new LocalPassageStore({ filePath });
      expect(await second.describe('docs')).toEqual({ name: 'docs', space: SPACE, count: 1 });
      const [result] = await second.search('docs', [1, 0], 1);
      expect(result.passage.text).toBe('persisted');
    });

    it('keeps the previous passages of every source when the file cannot be written', async () => {
      const filePath = path.join(dir, 'store.json');
      const fileStore = new LocalPassageStore({ filePath });
      await fileStore.createCollection('docs', SPACE);
      await fileStore.upsert('docs', [
        indexed('docs', 'https://a', 0, [1, 0], 'old a'),
        indexed('docs', 'https://b', 0, [0, 1], 'old b'),
      ]);
      fs.mkdirSync(`${filePath}.tmp`);

      const sources = new Map([
        ['https://a', [indexed('docs', 'https://a', 0, [1, 0], 'new a')]],
        ['https://b', [indexed('docs', 'https://b', 0, [0, 1], 'new b'), indexed('docs', 'https://b', 1, [0, 1], 'new b2')]],
      ]);

      await expect(fileStore.replaceSources('docs', sources)).rejects.toBeInstanceOf(StoreUnavailable);
      const results = await fileStore.search('docs', [1, 0], 5);
      expect(results.map(r => r.passage.text)).toEqual(['old a', 'old b']);
    });

    it('reports a corrupt file as StoreUnavailable', () => {
      const filePath = path.join(dir, 'store.json');
      fs.writeFileSync(filePath, '{not json', 'utf8');

      expect(() => new LocalPassageStore({ filePath })).toThrow(StoreUnavailable);
    });
  });
});
