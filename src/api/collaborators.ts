/**
 * Contracts of the external services the agent sequences
 */
import type {
  CrawlLimits,
  Document,
  EmbeddingVector,
  SynthesizedAudio,
  VoiceStyle,
} from '../types/index.js';

/** Fails with CrawlError. */
export interface CrawlService {
  readonly name: string;
  crawl(rootUrl: string, limits: CrawlLimits): Promise<Document[]>;
}

/** Fails with EmbeddingError. Vectors come back in input order. */
export interface EmbeddingService {
  readonly model: string;
  embed(texts: string[]): Promise<EmbeddingVector[]>;
}

export interface CompletionRequest {
  system: string;
  prompt: string;
}

/** Fails with ReasoningError. */
export interface ReasoningService {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

/** Fails with SynthesisError. */
export interface SpeechService {
  synthesize(text: string, voice: VoiceStyle): Promise<SynthesizedAudio>;
}
