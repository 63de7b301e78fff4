import path from 'path';
import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../../../src/config/index.js';
import { getAudioDir, getCacheRoot, getStoreFile } from '../../../src/config/paths.js';
import { ConfigurationError } from '../../../src/errors.js';

describe('loadConfig', () => {
  it('falls back to defaults with an empty environment', () => {
    const config = loadConfig({}, {});

    expect(config).toMatchObject({
      crawler: 'site',
      crawlMaxPages: DEFAULT_CONFIG.CRAWL_MAX_PAGES,
      chunkTargetSize: 1200,
      chunkOverlap: 150,
      topK: 5,
      minSimilarity: 0.3,
      voiceStyle: 'default',
      embeddingBaseUrl: DEFAULT_CONFIG.LLM_BASE_URL,
      cacheDir: path.join(process.cwd(), 'rag_cache'),
    });
    expect(config.firecrawlApiKey).toBeUndefined();
    expect(config.chromaUrl).toBeUndefined();
  });

  it('reads and coerces environment variables', () => {
    const config = loadConfig(
      {},
      {
        CRAWLER: 'firecrawl',
        FIRECRAWL_API_KEY: 'test-secret',
        TOP_K: '3',
        MIN_SIMILARITY: '0.5',
        LLM_BASE_URL: 'http://llm.test/v1',
        LLM_API_KEY: 'test-secret',
        VOICE_STYLE: 'female',
        HTTPS_PROXY: 'http://proxy.test:3128',
      }
    );

    expect(config).toMatchObject({
      crawler: 'firecrawl',
      firecrawlApiKey: 'test-secret',
      topK: 3,
      minSimilarity: 0.5,
      llmBaseUrl: 'http://llm.test/v1',
      embeddingBaseUrl: 'http://llm.test/v1',
      embeddingApiKey: 'test-secret',
      voiceStyle: 'female',
      proxyUrl: 'http://proxy.test:3128',
    });
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({}, { TOP_K: '  ', FIRECRAWL_API_KEY: '' });

    expect(config.topK).toBe(5);
    expect(config.firecrawlApiKey).toBeUndefined();
  });

  it('derives the minimum chunk size from a small target size', () => {
    const config = loadConfig({ chunkTargetSize: 300, chunkOverlap: 50 }, {});

    expect(config.chunkMinSize).toBe(125);
  });

  it('keeps an explicit minimum chunk size', () => {
    expect(loadConfig({}, { CHUNK_MIN_SIZE: '100' }).chunkMinSize).toBe(100);
    expect(loadConfig({}, {}).chunkMinSize).toBe(200);
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig({ topK: 2 }, { TOP_K: '7' });

    expect(config.topK).toBe(2);
  });

  it('reports every cross-field issue at once', () => {
    let caught: unknown;
    try {
      loadConfig({ chunkTargetSize: 100, chunkOverlap: 100, topK: 30 }, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const issues = caught instanceof ConfigurationError ? caught.issues : [];
    expect(issues).toContain('chunkOverlap: must be strictly less than chunkTargetSize');
    expect(issues).toContain('topK: must not exceed maxTopK');
  });

  it('rejects values outside an enumeration', () => {
    expect(() => loadConfig({}, { VOICE_STYLE: 'robot' })).toThrow(ConfigurationError);
    expect(() => loadConfig({}, { CRAWLER: 'spider' })).toThrow(/crawler:/);
  });
});

describe('paths', () => {
  it('resolves the cache root from RAG_CACHE_DIR', () => {
    expect(getCacheRoot({ RAG_CACHE_DIR: 'tmp/cache' })).toBe(path.resolve('tmp/cache'));
    expect(getStoreFile('/var/cache/agent')).toBe(path.join('/var/cache/agent', 'passage-store.json'));
    expect(getAudioDir('/var/cache/agent')).toBe(path.join('/var/cache/agent', 'audio'));
  });
});
