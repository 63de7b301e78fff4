/**
 * Documentation voice agent
 * Wires ingestion and the question pipeline together, one session per collection
 */
import { createHash } from 'crypto';
import path from 'path';
import { ChatCompletionClient } from '../api/chat-client.js';
import type {
  CrawlService,
  EmbeddingService,
  ReasoningService,
  SpeechService,
} from '../api/collaborators.js';
import { OpenAiEmbeddingClient } from '../api/embedding-client.js';
import { FirecrawlCrawler } from '../api/firecrawl-crawler.js';
import { SourceRouter } from '../api/local-docs-crawler.js';
import { SiteCrawler } from '../api/site-crawler.js';
import { SpeechClient } from '../api/speech-client.js';
import type { AgentConfig } from '../config/index.js';
import { getStoreFile } from '../config/paths.js';
import type { IngestionReport, IngestionStatus, VoiceResponse, VoiceStyle } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { AnswerComposer } from './answer-composer.js';
import { IngestionPipeline, type IngestionListener } from './pipeline/ingestion-pipeline.js';
import { ResponsePackager } from './response-packager.js';
import { Retriever } from './retriever.js';
import { ChromaPassageStore } from './vector-store/chroma-store.js';
import { LocalPassageStore } from './vector-store/local-store.js';
import type { PassageStore } from './vector-store/passage-store.js';

export interface AgentServices {
  crawler: CrawlService;
  embedder: EmbeddingService;
  reasoner: ReasoningService;
  speech?: SpeechService;
  store: PassageStore;
}

export interface CollectionSession {
  collection: string;
  rootUrl: string;
  status: IngestionStatus;
  report?: IngestionReport;
}

export interface IngestOptions {
  collection?: string;
  onEvent?: IngestionListener;
}

export interface AskOptions {
  k?: number;
  voice?: VoiceStyle;
}

export class DocsVoiceAgent {
  readonly pipeline: IngestionPipeline;
  readonly retriever: Retriever;
  readonly composer: AnswerComposer;
  readonly packager: ResponsePackager;
  private readonly store: PassageStore;
  private readonly sessions = new Map<string, { rootUrl: string; report?: IngestionReport }>();

  constructor(services: AgentServices, config: AgentConfig) {
    this.store = services.store;
    this.pipeline = new IngestionPipeline({
      crawler: services.crawler,
      embedder: services.embedder,
      store: services.store,
      config,
    });
    this.retriever = new Retriever({ embedder: services.embedder, store: services.store, config });
    this.composer = new AnswerComposer({ reasoner: services.reasoner, config });
    this.packager = new ResponsePackager({ speech: services.speech, config });
  }

  /**
   * Crawl and index a documentation source. The collection defaults to one
   * derived from the root URL.
   */
  async ingest(rootUrl: string, options: IngestOptions = {}): Promise<IngestionReport> {
    const collection = options.collection ?? collectionIdFor(rootUrl);

    if (!this.pipeline.isRunning(collection)) {
      this.sessions.set(collection, { ...this.sessions.get(collection), rootUrl });
    }

    const report = await this.pipeline.ingest(collection, rootUrl, options.onEvent);
    this.sessions.set(collection, { rootUrl, report });
    return report;
  }

  /**
   * Answer a question from one collection: retrieve, compose, speak
   */
  async ask(collection: string, question: string, options: AskOptions = {}): Promise<VoiceResponse> {
    const retrieval = await this.retriever.retrieve(collection, question, options.k);
    const answer = await this.composer.compose(question.trim(), retrieval);
    logger.debug(`Answer for ${collection}: ${answer.contextPassages} passages in context, grounded=${answer.grounded}`);
    return this.packager.package(answer, options.voice);
  }

  getSession(collection: string): CollectionSession | undefined {
    const session = this.sessions.get(collection);
    if (!session) return undefined;

    return {
      collection,
      rootUrl: session.rootUrl,
      status: this.pipeline.getStatus(collection),
      report: session.report,
    };
  }

  listSessions(): CollectionSession[] {
    return [...this.sessions.keys()].flatMap(collection => this.getSession(collection) ?? []);
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}

/**
 * Collection id for a documentation root: `docs_<host>_<hash>`
 */
export function collectionIdFor(rootUrl: string): string {
  const source = rootUrl.trim();
  const digest = createHash('sha256').update(source).digest('hex').slice(0, 8);

  let label: string;
  try {
    label = new URL(source).hostname;
  } catch {
    label = path.basename(path.resolve(source));
  }

  const slug =
    label
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '_')
      .replace(/^_+|_+$/g, '')
      .slice(0, 40) || 'local';
  return `docs_${slug}_${digest}`;
}

/**
 * Build an agent from configuration; any service can be replaced
 */
export function createAgent(config: AgentConfig, overrides: Partial<AgentServices> = {}): DocsVoiceAgent {
  const http = { timeoutMs: config.callTimeoutMs, proxyUrl: config.proxyUrl };

  const services: AgentServices = {
    crawler: overrides.crawler ?? new SourceRouter(createCrawler(config)),
    embedder:
      overrides.embedder ??
      new OpenAiEmbeddingClient({
        ...http,
        baseUrl: config.embeddingBaseUrl,
        apiKey: config.embeddingApiKey,
        model: config.embeddingModel,
      }),
    reasoner:
      overrides.reasoner ??
      new ChatCompletionClient({
        ...http,
        baseUrl: config.llmBaseUrl,
        apiKey: config.llmApiKey,
        model: config.reasoningModel,
      }),
    // An explicit `speech: undefined` turns synthesis off
    speech:
      'speech' in overrides
        ? overrides.speech
        : config.ttsBaseUrl
          ? new SpeechClient({ ...http, baseUrl: config.ttsBaseUrl, apiKey: config.ttsApiKey, model: config.ttsModel })
          : undefined,
    store:
      overrides.store ??
      (config.chromaUrl
        ? new ChromaPassageStore({ url: config.chromaUrl })
        : new LocalPassageStore({ filePath: getStoreFile(config.cacheDir) })),
  };

  if (!services.speech) {
    logger.debug('TTS_BASE_URL is not set; answers will be text only');
  }

  return new DocsVoiceAgent(services, config);
}

function createCrawler(config: AgentConfig): CrawlService {
  if (config.crawler === 'firecrawl') {
    return new FirecrawlCrawler({
      baseUrl: config.firecrawlBaseUrl,
      apiKey: config.firecrawlApiKey,
      timeoutMs: config.callTimeoutMs,
      proxyUrl: config.proxyUrl,
      crawlTimeoutMs: config.crawlTimeoutMs,
    });
  }

  return new SiteCrawler({
    timeoutMs: config.callTimeoutMs,
    proxyUrl: config.proxyUrl,
  });
}
