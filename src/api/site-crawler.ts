/**
 * Site Crawler
 * Breadth-first crawl of a documentation site, converting each page to markdown
 */
import { CrawlError, toError } from '../errors.js';
import { HtmlCleaner } from '../parser/html-cleaner.js';
import { MarkdownConverter } from '../parser/markdown-converter.js';
import type { CrawlLimits, Document } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { createRateLimiter, type RateLimiter } from '../utils/rate-limiter.js';
import { isRateLimitError, withRetry } from '../utils/retry-handler.js';
import type { CrawlService } from './collaborators.js';
import { HttpClient, type FetchLike } from './http-client.js';

const USER_AGENT = 'DocsVoiceAgent-Crawler/1.0';

// Links to these are never pages worth indexing
const ASSET_EXTENSION = /\.(png|jpe?g|gif|svg|webp|ico|pdf|zip|gz|tgz|tar|css|js|mjs|json|xml|txt|mp3|mp4|webm|woff2?|ttf)$/i;

export interface SiteCrawlerOptions {
  timeoutMs: number;
  concurrency?: number;
  retries?: number;
  retryDelayMs?: number;
  proxyUrl?: string;
  fetch?: FetchLike;
}

type PageResult =
  | { url: string; ok: true; html: string }
  | { url: string; ok: false; error: Error };

export class SiteCrawler implements CrawlService {
  readonly name = 'site';
  private readonly options: SiteCrawlerOptions;
  private readonly cleaner = new HtmlCleaner();
  private readonly converter = new MarkdownConverter();

  constructor(options: SiteCrawlerOptions) {
    this.options = options;
  }

  async crawl(rootUrl: string, limits: CrawlLimits): Promise<Document[]> {
    const root = parseRoot(rootUrl);
    const scope = scopeOf(root);

    const http = new HttpClient({
      baseUrl: root,
      timeoutMs: this.options.timeoutMs,
      proxyUrl: this.options.proxyUrl,
      fetch: this.options.fetch,
      headers: { 'User-Agent': USER_AGENT },
    });
    const limiter = createRateLimiter(this.options.concurrency ?? 4);

    const seen = new Set<string>([root]);
    const documents: Document[] = [];
    let frontier = [root];

    for (let depth = 0; frontier.length > 0 && documents.length < limits.maxPages; depth++) {
      const batch = frontier.slice(0, limits.maxPages - documents.length);
      logger.debug(`Crawling depth ${depth}: ${batch.length} pages`);

      const pages = await Promise.all(batch.map(url => limiter.execute(() => this.fetchPage(http, limiter, url))));
      const next: string[] = [];

      for (const page of pages) {
        if (!page.ok) {
          if (page.url === root) {
            throw new CrawlError(`Could not fetch ${root}: ${page.error.message}`, {
              cause: page.error,
              context: { url: root },
            });
          }
          logger.warn(`Skipping ${page.url}: ${page.error.message}`);
          continue;
        }

        const content = this.converter.convert(this.cleaner.clean(page.html));
        if (content.length > 0) {
          documents.push({ url: page.url, title: this.cleaner.extractTitle(page.html), content });
        }

        if (depth >= limits.maxDepth) continue;

        for (const link of this.cleaner.extractLinks(page.html, page.url)) {
          const candidate = normalizeUrl(link);
          if (candidate && inScope(candidate, scope) && !seen.has(candidate)) {
            seen.add(candidate);
            next.push(candidate);
          }
        }
      }

      frontier = next;
    }

    if (documents.length === 0) {
      throw new CrawlError(`No readable pages found under ${root}`, { context: { url: root } });
    }

    logger.info(`Crawled ${documents.length} pages from ${root}`);
    return documents;
  }

  private async fetchPage(http: HttpClient, limiter: RateLimiter, url: string): Promise<PageResult> {
    const result = await withRetry(() => http.getText(url, { Accept: 'text/html' }), {
      retries: this.options.retries ?? 2,
      baseDelayMs: this.options.retryDelayMs ?? 1000,
      onRetry: error => {
        // Report rate limit to adjust speed
        if (isRateLimitError(error)) limiter.reportRateLimit();
      },
    });

    return result.success
      ? { url, ok: true, html: result.data }
      : { url, ok: false, error: toError(result.error) };
  }
}

function parseRoot(rootUrl: string): string {
  let url: URL;
  try {
    url = new URL(rootUrl);
  } catch (error) {
    throw new CrawlError(`Invalid documentation URL: ${rootUrl}`, { cause: error, context: { url: rootUrl } });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new CrawlError(`Unsupported protocol ${url.protocol} in ${rootUrl}`, { context: { url: rootUrl } });
  }

  url.hash = '';
  return url.toString();
}

/**
 * Origin plus the directory of the root page; only links below it are followed
 */
function scopeOf(root: string): { origin: string; pathPrefix: string } {
  const url = new URL(root);
  return { origin: url.origin, pathPrefix: url.pathname.slice(0, url.pathname.lastIndexOf('/') + 1) };
}

function inScope(candidate: string, scope: { origin: string; pathPrefix: string }): boolean {
  const url = new URL(candidate);
  return url.origin === scope.origin && url.pathname.startsWith(scope.pathPrefix) && !ASSET_EXTENSION.test(url.pathname);
}

export function normalizeUrl(link: string): string | null {
  try {
    const url = new URL(link);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}
