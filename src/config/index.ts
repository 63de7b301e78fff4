import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { getCacheRoot } from './paths.js';

export const DEFAULT_CONFIG = {
  // Crawling
  CRAWLER: 'site',
  CRAWL_MAX_PAGES: 5,
  CRAWL_MAX_DEPTH: 2,
  CRAWL_TIMEOUT_MS: 300_000,
  FIRECRAWL_BASE_URL: 'https://api.firecrawl.dev/v1',

  // Chunking (characters)
  CHUNK_TARGET_SIZE: 1200,
  CHUNK_OVERLAP: 150,
  CHUNK_MIN_SIZE: 200,

  // Embedding
  EMBEDDING_MODEL: 'nomic-embed-text',
  EMBEDDING_BATCH_SIZE: 32,
  EMBEDDING_CONCURRENCY: 4,
  EMBEDDING_MAX_RETRIES: 3,
  EMBEDDING_RETRY_DELAY_MS: 500,
  SIMILARITY_METRIC: 'cosine',

  // Retrieval
  TOP_K: 5,
  MAX_TOP_K: 20,
  MIN_SIMILARITY: 0.3,

  // Answering
  REASONING_MODEL: 'llama3.2:latest',
  MAX_PROMPT_CHARS: 12_000,
  LLM_BASE_URL: 'http://localhost:11434/v1',

  // Speech
  VOICE_STYLE: 'default',
  TTS_MODEL: 'tts-1',

  // Collaborator calls
  CALL_TIMEOUT_MS: 60_000,
} as const;

/**
 * Minimum passage size when none is configured: at most CHUNK_MIN_SIZE and
 * never more than half the room a window has for new content
 */
export function defaultChunkMinSize(targetSize: number, overlap: number): number {
  return Math.max(1, Math.min(DEFAULT_CONFIG.CHUNK_MIN_SIZE, Math.floor((targetSize - overlap) / 2)));
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

const configSchema = z
  .object({
    crawler: z.enum(['site', 'firecrawl']),
    crawlMaxPages: positiveInt,
    crawlMaxDepth: nonNegativeInt,
    crawlTimeoutMs: positiveInt,
    firecrawlBaseUrl: z.string().url(),
    firecrawlApiKey: optionalString,

    chunkTargetSize: positiveInt,
    chunkOverlap: nonNegativeInt,
    chunkMinSize: positiveInt.optional(),

    embeddingModel: z.string().trim().min(1),
    embeddingBaseUrl: z.string().url(),
    embeddingApiKey: optionalString,
    embeddingBatchSize: positiveInt,
    embeddingConcurrency: positiveInt,
    embeddingMaxRetries: nonNegativeInt,
    embeddingRetryDelayMs: nonNegativeInt,
    similarityMetric: z.enum(['cosine', 'ip']),

    topK: positiveInt,
    maxTopK: positiveInt,
    minSimilarity: z.coerce.number().min(-1).max(1),

    reasoningModel: z.string().trim().min(1),
    llmBaseUrl: z.string().url(),
    llmApiKey: optionalString,
    maxPromptChars: positiveInt,

    voiceStyle: z.enum(['default', 'male', 'female']),
    ttsBaseUrl: z.string().url().optional(),
    ttsApiKey: optionalString,
    ttsModel: z.string().trim().min(1),

    callTimeoutMs: positiveInt,

    chromaUrl: z.string().url().optional(),
    cacheDir: z.string().min(1),
    proxyUrl: optionalString,
  })
  .superRefine((config, ctx) => {
    if (config.chunkOverlap >= config.chunkTargetSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunkOverlap'],
        message: 'must be strictly less than chunkTargetSize',
      });
    }
    const minSize = config.chunkMinSize ?? defaultChunkMinSize(config.chunkTargetSize, config.chunkOverlap);
    if (minSize * 2 > config.chunkTargetSize - config.chunkOverlap) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunkMinSize'],
        message: 'must be at most half of chunkTargetSize - chunkOverlap',
      });
    }
    if (config.topK > config.maxTopK) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['topK'],
        message: 'must not exceed maxTopK',
      });
    }
  })
  .transform(config => ({
    ...config,
    chunkMinSize: config.chunkMinSize ?? defaultChunkMinSize(config.chunkTargetSize, config.chunkOverlap),
  }));

export type AgentConfig = z.output<typeof configSchema>;
export type AgentConfigInput = Partial<z.input<typeof configSchema>>;

const emptyToUndefined = (value: string | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Build the agent configuration from defaults, environment variables and
 * explicit overrides (highest precedence)
 */
export function loadConfig(
  overrides: AgentConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): AgentConfig {
  const llmBaseUrl = emptyToUndefined(env.LLM_BASE_URL) ?? DEFAULT_CONFIG.LLM_BASE_URL;

  const raw: Record<string, unknown> = {
    crawler: emptyToUndefined(env.CRAWLER) ?? DEFAULT_CONFIG.CRAWLER,
    crawlMaxPages: emptyToUndefined(env.CRAWL_MAX_PAGES) ?? DEFAULT_CONFIG.CRAWL_MAX_PAGES,
    crawlMaxDepth: emptyToUndefined(env.CRAWL_MAX_DEPTH) ?? DEFAULT_CONFIG.CRAWL_MAX_DEPTH,
    crawlTimeoutMs: emptyToUndefined(env.CRAWL_TIMEOUT_MS) ?? DEFAULT_CONFIG.CRAWL_TIMEOUT_MS,
    firecrawlBaseUrl: emptyToUndefined(env.FIRECRAWL_BASE_URL) ?? DEFAULT_CONFIG.FIRECRAWL_BASE_URL,
    firecrawlApiKey: env.FIRECRAWL_API_KEY,

    chunkTargetSize: emptyToUndefined(env.CHUNK_TARGET_SIZE) ?? DEFAULT_CONFIG.CHUNK_TARGET_SIZE,
    chunkOverlap: emptyToUndefined(env.CHUNK_OVERLAP) ?? DEFAULT_CONFIG.CHUNK_OVERLAP,
    chunkMinSize: emptyToUndefined(env.CHUNK_MIN_SIZE),

    embeddingModel: emptyToUndefined(env.EMBEDDING_MODEL) ?? DEFAULT_CONFIG.EMBEDDING_MODEL,
    embeddingBaseUrl: emptyToUndefined(env.EMBEDDING_BASE_URL) ?? llmBaseUrl,
    embeddingApiKey: env.EMBEDDING_API_KEY ?? env.LLM_API_KEY,
    embeddingBatchSize: emptyToUndefined(env.EMBEDDING_BATCH_SIZE) ?? DEFAULT_CONFIG.EMBEDDING_BATCH_SIZE,
    embeddingConcurrency: emptyToUndefined(env.EMBEDDING_CONCURRENCY) ?? DEFAULT_CONFIG.EMBEDDING_CONCURRENCY,
    embeddingMaxRetries: emptyToUndefined(env.EMBEDDING_MAX_RETRIES) ?? DEFAULT_CONFIG.EMBEDDING_MAX_RETRIES,
    embeddingRetryDelayMs: emptyToUndefined(env.EMBEDDING_RETRY_DELAY_MS) ?? DEFAULT_CONFIG.EMBEDDING_RETRY_DELAY_MS,
    similarityMetric: emptyToUndefined(env.SIMILARITY_METRIC) ?? DEFAULT_CONFIG.SIMILARITY_METRIC,

    topK: emptyToUndefined(env.TOP_K) ?? DEFAULT_CONFIG.TOP_K,
    maxTopK: emptyToUndefined(env.MAX_TOP_K) ?? DEFAULT_CONFIG.MAX_TOP_K,
    minSimilarity: emptyToUndefined(env.MIN_SIMILARITY) ?? DEFAULT_CONFIG.MIN_SIMILARITY,

    reasoningModel: emptyToUndefined(env.REASONING_MODEL) ?? DEFAULT_CONFIG.REASONING_MODEL,
    llmBaseUrl,
    llmApiKey: env.LLM_API_KEY,
    maxPromptChars: emptyToUndefined(env.MAX_PROMPT_CHARS) ?? DEFAULT_CONFIG.MAX_PROMPT_CHARS,

    voiceStyle: emptyToUndefined(env.VOICE_STYLE) ?? DEFAULT_CONFIG.VOICE_STYLE,
    ttsBaseUrl: emptyToUndefined(env.TTS_BASE_URL),
    ttsApiKey: env.TTS_API_KEY,
    ttsModel: emptyToUndefined(env.TTS_MODEL) ?? DEFAULT_CONFIG.TTS_MODEL,

    callTimeoutMs: emptyToUndefined(env.CALL_TIMEOUT_MS) ?? DEFAULT_CONFIG.CALL_TIMEOUT_MS,

    chromaUrl: emptyToUndefined(env.CHROMA_URL),
    cacheDir: getCacheRoot(env),
    proxyUrl: env.HTTPS_PROXY ?? env.HTTP_PROXY ?? env.https_proxy ?? env.http_proxy,
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  return parsed.data;
}
