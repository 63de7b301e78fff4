/**
 * In-process collaborators for tests
 */
import type {
  CompletionRequest,
  CrawlService,
  EmbeddingService,
  ReasoningService,
  SpeechService,
} from '../../src/api/collaborators.js';
import type { HttpRequestInit, HttpResponse } from '../../src/api/http-client.js';
import { loadConfig, type AgentConfig, type AgentConfigInput } from '../../src/config/index.js';
import type {
  CrawlLimits,
  Document,
  EmbeddingVector,
  SynthesizedAudio,
  VoiceStyle,
} from '../../src/types/index.js';

/**
 * Small chunks so a handful of paragraphs produce several passages
 */
export function testConfig(overrides: AgentConfigInput = {}): AgentConfig {
  return loadConfig(
    {
      chunkTargetSize: 100,
      chunkOverlap: 20,
      chunkMinSize: 30,
      embeddingModel: 'fake-embed',
      embeddingBatchSize: 4,
      embeddingConcurrency: 2,
      embeddingMaxRetries: 2,
      embeddingRetryDelayMs: 0,
      callTimeoutMs: 1000,
      crawlTimeoutMs: 1000,
      ...overrides,
    },
    {}
  );
}

export class FakeCrawler implements CrawlService {
  readonly name = 'fake';
  calls: Array<{ rootUrl: string; limits: CrawlLimits }> = [];
  private readonly pages: Document[] | (() => Promise<Document[]>);

  constructor(pages: Document[] | (() => Promise<Document[]>)) {
    this.pages = pages;
  }

  async crawl(rootUrl: string, limits: CrawlLimits): Promise<Document[]> {
    this.calls.push({ rootUrl, limits });
    return typeof this.pages === 'function' ? this.pages() : this.pages.map(page => ({ ...page }));
  }
}

/**
 * Counts vocabulary words: one dimension per word
 */
export class KeywordEmbedder implements EmbeddingService {
  readonly model: string;
  calls = 0;
  private readonly vocabulary: string[];
  private failures: Error[] = [];

  constructor(vocabulary: string[], model = 'fake-embed') {
    this.vocabulary = vocabulary;
    this.model = model;
  }

  /** The next calls fail with these errors, in order */
  failWith(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    this.calls++;
    const failure = this.failures.shift();
    if (failure) throw failure;
    return texts.map(text => this.vectorOf(text));
  }

  vectorOf(text: string): EmbeddingVector {
    const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
    return this.vocabulary.map(term => words.filter(word => word === term).length);
  }
}

export class FakeReasoner implements ReasoningService {
  readonly model = 'fake-llm';
  requests: CompletionRequest[] = [];
  private readonly reply: string | Error;

  constructor(reply: string | Error = 'A grounded answer.') {
    this.reply = reply;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export class FakeSpeech implements SpeechService {
  calls: Array<{ text: string; voice: VoiceStyle }> = [];
  private readonly result: SynthesizedAudio | Error;

  constructor(result: SynthesizedAudio | Error = { data: Uint8Array.from([73, 68, 51]), format: 'mp3' }) {
    this.result = result;
  }

  async synthesize(text: string, voice: VoiceStyle): Promise<SynthesizedAudio> {
    this.calls.push({ text, voice });
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

/**
 * A promise whose settlement the test controls
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(settle => {
    resolve = settle;
  });
  return { promise, resolve };
}

export interface RecordedRequest {
  url: string;
  init: HttpRequestInit;
}

export type Route = (request: RecordedRequest) => HttpResponse | Promise<HttpResponse>;

/**
 * A fetch stand-in that records requests and answers from a route function
 */
export function fakeFetch(route: Route): {
  fetch: (url: string, init: HttpRequestInit) => Promise<HttpResponse>;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  return {
    requests,
    fetch: async (url, init) => {
      const request = { url, init };
      requests.push(request);
      return route(request);
    },
  };
}

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return textResponse(JSON.stringify(body), status);
}

export function textResponse(body: string, status = 200): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    text: async () => body,
    json: async () => JSON.parse(body),
    arrayBuffer: async () => toArrayBuffer(new TextEncoder().encode(body)),
  };
}

export function bytesResponse(bytes: Uint8Array, status = 200): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: 'OK',
    text: async () => '',
    json: async () => null,
    arrayBuffer: async () => toArrayBuffer(bytes),
  };
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

export function requestBody(request: RecordedRequest): unknown {
  return request.init.body === undefined ? undefined : JSON.parse(request.init.body);
}

/**
 * A paragraph of exactly `length` characters starting with `lead`
 */
export function paragraph(lead: string, length = 70): string {
  const filler = ' lorem ipsum dolor sit amet consectetur adipiscing elit sed do eiusmod tempor incididunt';
  return (lead + filler.repeat(3)).slice(0, length).trimEnd().padEnd(length, 'x');
}

/**
 * Four paragraphs of 70 characters; chunks into four passages under testConfig()
 */
export function fourParagraphPage(url: string, keyword: string): Document {
  const paragraphs = [1, 2, 3, 4].map(n => paragraph(`Part ${keyword} ${'z'.repeat(n)}`));
  return { url, title: keyword, content: paragraphs.join('\n\n') };
}
