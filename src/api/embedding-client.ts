/**
 * Embeddings client for OpenAI-compatible endpoints (OpenAI, Ollama, vLLM, ...)
 */
import { z } from 'zod';
import { EmbeddingError, toError } from '../errors.js';
import type { EmbeddingVector } from '../types/index.js';
import type { EmbeddingService } from './collaborators.js';
import { HttpClient, failureOptions, type HttpClientOptions } from './http-client.js';

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        index: z.number().int().nonnegative(),
        embedding: z.array(z.number()).min(1),
      })
    )
    .min(1),
});

// Inputs are cut to this many whitespace-separated words
const MAX_INPUT_WORDS = 512;

export interface EmbeddingClientOptions extends HttpClientOptions {
  model: string;
}

export class OpenAiEmbeddingClient implements EmbeddingService {
  readonly model: string;
  private readonly http: HttpClient;

  constructor(options: EmbeddingClientOptions) {
    this.model = options.model;
    this.http = new HttpClient(options);
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];

    let body: unknown;
    try {
      body = await this.http.postJson('embeddings', {
        model: this.model,
        input: texts.map(truncate),
      });
    } catch (error) {
      throw new EmbeddingError(`Embedding request failed: ${toError(error).message}`, failureOptions(error));
    }

    const parsed = embeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingError(`Malformed embedding response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
    }

    const vectors = [...parsed.data.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
    if (vectors.length !== texts.length) {
      throw new EmbeddingError(`Expected ${texts.length} embeddings, received ${vectors.length}`);
    }

    const dimension = vectors[0].length;
    if (vectors.some(vector => vector.length !== dimension)) {
      throw new EmbeddingError('Embedding response mixes vector dimensions');
    }

    return vectors;
  }
}

function truncate(text: string): string {
  const words = text.split(/\s+/);
  return words.length > MAX_INPUT_WORDS ? words.slice(0, MAX_INPUT_WORDS).join(' ') : text;
}
