/**
 * Firecrawl crawl client
 * Starts a crawl job and polls its status until the job settles
 */
import { z } from 'zod';
import { ConfigurationError, CrawlError, toError } from '../errors.js';
import { MarkdownConverter } from '../parser/markdown-converter.js';
import type { CrawlLimits, Document } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/retry-handler.js';
import type { CrawlService } from './collaborators.js';
import { HttpClient, failureOptions, type HttpClientOptions } from './http-client.js';

const crawlJobSchema = z.object({
  success: z.boolean().optional(),
  id: z.string().min(1),
});

const crawledPageSchema = z.object({
  markdown: z.string().nullish(),
  html: z.string().nullish(),
  url: z.string().optional(),
  metadata: z
    .object({
      sourceURL: z.string().optional(),
      url: z.string().optional(),
      title: z.string().optional(),
    })
    .nullish(),
});

const crawlStatusSchema = z.object({
  status: z.string(),
  data: z.array(crawledPageSchema).default([]),
  next: z.string().nullish(),
  error: z.string().optional(),
});

type CrawledPage = z.infer<typeof crawledPageSchema>;

export interface FirecrawlOptions extends HttpClientOptions {
  crawlTimeoutMs: number;
  pollIntervalMs?: number;
}

export class FirecrawlCrawler implements CrawlService {
  readonly name = 'firecrawl';
  private readonly http: HttpClient;
  private readonly crawlTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly converter = new MarkdownConverter();

  constructor(options: FirecrawlOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError(['firecrawlApiKey: required when the firecrawl crawler is selected']);
    }
    this.http = new HttpClient(options);
    this.crawlTimeoutMs = options.crawlTimeoutMs;
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
  }

  async crawl(rootUrl: string, limits: CrawlLimits): Promise<Document[]> {
    const job = crawlJobSchema.safeParse(
      await this.request(rootUrl, () =>
        this.http.postJson('crawl', {
          url: rootUrl,
          limit: limits.maxPages,
          maxDepth: limits.maxDepth,
          scrapeOptions: { formats: ['markdown'] },
        })
      )
    );
    if (!job.success) {
      throw new CrawlError('Firecrawl did not return a crawl job id', { context: { url: rootUrl } });
    }

    logger.debug(`Firecrawl job ${job.data.id} started for ${rootUrl}`);
    const deadline = Date.now() + this.crawlTimeoutMs;

    for (;;) {
      const status = await this.fetchStatus(rootUrl, `crawl/${job.data.id}`);

      if (status.status === 'completed') {
        const pages = [...status.data];
        let next = status.next;
        while (next) {
          const more = await this.fetchStatus(rootUrl, next);
          pages.push(...more.data);
          next = more.next;
        }
        return this.toDocuments(rootUrl, pages);
      }

      if (status.status === 'failed' || status.status === 'cancelled') {
        throw new CrawlError(`Firecrawl job ${status.status}${status.error ? `: ${status.error}` : ''}`, {
          context: { url: rootUrl },
        });
      }

      if (Date.now() >= deadline) {
        throw new CrawlError(`Firecrawl job did not finish within ${this.crawlTimeoutMs}ms`, {
          context: { url: rootUrl },
          timedOut: true,
        });
      }

      await sleep(this.pollIntervalMs);
    }
  }

  private async fetchStatus(rootUrl: string, path: string): Promise<z.infer<typeof crawlStatusSchema>> {
    const parsed = crawlStatusSchema.safeParse(await this.request(rootUrl, () => this.http.getJson(path)));
    if (!parsed.success) {
      throw new CrawlError(`Malformed Firecrawl status response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`, {
        context: { url: rootUrl },
      });
    }
    return parsed.data;
  }

  private toDocuments(rootUrl: string, pages: CrawledPage[]): Document[] {
    const documents: Document[] = [];

    for (const page of pages) {
      const markdown = page.markdown?.trim();
      const content = markdown || (page.html ? this.converter.convert(page.html) : '');
      if (!content) continue;

      documents.push({
        url: page.metadata?.sourceURL ?? page.metadata?.url ?? page.url ?? rootUrl,
        title: page.metadata?.title,
        content,
      });
    }

    if (documents.length === 0) {
      throw new CrawlError(`Firecrawl returned no content for ${rootUrl}`, { context: { url: rootUrl } });
    }

    logger.info(`Firecrawl returned ${documents.length} pages for ${rootUrl}`);
    return documents;
  }

  private async request(rootUrl: string, fn: () => Promise<unknown>): Promise<unknown> {
    try {
      return await fn();
    } catch (error) {
      const options = failureOptions(error);
      throw new CrawlError(`Firecrawl request failed: ${toError(error).message}`, {
        ...options,
        context: { ...options.context, url: rootUrl },
      });
    }
  }
}
