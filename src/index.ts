/**
 * Documentation voice agent
 * Crawl a documentation site, index it, and answer questions about it in text and speech
 */
export * from './types/index.js';
export * from './errors.js';
export { DEFAULT_CONFIG, loadConfig, type AgentConfig, type AgentConfigInput } from './config/index.js';
export { logger, Logger } from './utils/logger.js';

export type {
  CompletionRequest,
  CrawlService,
  EmbeddingService,
  ReasoningService,
  SpeechService,
} from './api/collaborators.js';
export { HttpClient, HttpError, type FetchLike, type HttpClientOptions } from './api/http-client.js';
export { OpenAiEmbeddingClient } from './api/embedding-client.js';
export { ChatCompletionClient } from './api/chat-client.js';
export { SpeechClient, DEFAULT_VOICES } from './api/speech-client.js';
export { FirecrawlCrawler } from './api/firecrawl-crawler.js';
export { SiteCrawler } from './api/site-crawler.js';
export { LocalDocsCrawler, SourceRouter, isLocalSource } from './api/local-docs-crawler.js';

export { SemanticChunker, chunkDocument } from './rag/chunker/semantic-chunker.js';
export type { PassageStore } from './rag/vector-store/passage-store.js';
export { LocalPassageStore } from './rag/vector-store/local-store.js';
export { ChromaPassageStore } from './rag/vector-store/chroma-store.js';
export { IngestionPipeline, type IngestionListener } from './rag/pipeline/ingestion-pipeline.js';
export { Retriever } from './rag/retriever.js';
export { AnswerComposer, INSUFFICIENT_CONTEXT_ANSWER, SYSTEM_PROMPT, buildPrompt } from './rag/answer-composer.js';
export { ResponsePackager, MIME_TYPES, writeAudioFile } from './rag/response-packager.js';
export {
  DocsVoiceAgent,
  collectionIdFor,
  createAgent,
  type AgentServices,
  type AskOptions,
  type CollectionSession,
  type IngestOptions,
} from './rag/voice-agent.js';
