/**
 * Local Docs Crawler
 * Reads markdown files from a directory, e.g. the output of an earlier scrape
 */
import fs from 'fs';
import path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { glob } from 'glob';
import { z } from 'zod';
import { CrawlError, toError } from '../errors.js';
import type { CrawlLimits, Document } from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { CrawlService } from './collaborators.js';

// Optional `<name>.json` beside `<name>.md`
const sidecarSchema = z.object({
  url: z.string().url().optional(),
  title: z.string().optional(),
});

export class LocalDocsCrawler implements CrawlService {
  readonly name = 'local';

  async crawl(rootUrl: string, limits: CrawlLimits): Promise<Document[]> {
    const rootDir = toDirectory(rootUrl);
    if (!isDirectory(rootDir)) {
      throw new CrawlError(`Not a directory: ${rootDir}`, { context: { url: rootUrl } });
    }

    const files = (await glob('**/*.{md,markdown}', { cwd: rootDir, nodir: true, posix: true }))
      .filter(file => file.split('/').length - 1 <= limits.maxDepth)
      .sort()
      .slice(0, limits.maxPages);

    const documents: Document[] = [];
    for (const file of files) {
      const filePath = path.join(rootDir, file);

      let content: string;
      try {
        content = await fs.promises.readFile(filePath, 'utf8');
      } catch (error) {
        throw new CrawlError(`Could not read ${filePath}: ${toError(error).message}`, {
          cause: error,
          context: { url: pathToFileURL(filePath).href },
        });
      }
      if (content.trim().length === 0) continue;

      const sidecar = readSidecar(filePath);
      documents.push({
        url: sidecar.url ?? pathToFileURL(filePath).href,
        title: sidecar.title ?? firstHeading(content) ?? path.basename(file, path.extname(file)),
        content,
      });
    }

    if (documents.length === 0) {
      throw new CrawlError(`No markdown documents found in ${rootDir}`, { context: { url: rootUrl } });
    }

    logger.info(`Loaded ${documents.length} documents from ${rootDir}`);
    return documents;
  }
}

/**
 * Whether the root points at an existing local directory rather than a site
 */
export function isLocalSource(rootUrl: string): boolean {
  if (/^https?:\/\//i.test(rootUrl)) return false;
  return isDirectory(toDirectory(rootUrl));
}

function toDirectory(rootUrl: string): string {
  return rootUrl.startsWith('file:') ? fileURLToPath(rootUrl) : path.resolve(rootUrl);
}

function isDirectory(dir: string): boolean {
  return fs.existsSync(dir) && fs.statSync(dir).isDirectory();
}

function readSidecar(markdownPath: string): z.infer<typeof sidecarSchema> {
  const metaPath = markdownPath.replace(/\.(md|markdown)$/, '.json');
  if (!fs.existsSync(metaPath)) return {};

  try {
    const parsed = sidecarSchema.safeParse(JSON.parse(fs.readFileSync(metaPath, 'utf8')));
    return parsed.success ? parsed.data : {};
  } catch (error) {
    logger.warn(`Ignoring unreadable metadata ${metaPath}: ${toError(error).message}`);
    return {};
  }
}

function firstHeading(content: string): string | undefined {
  return content.match(/^#{1,6}\s+(.+)$/m)?.[1]?.trim();
}

/**
 * Sends local directories to the local reader and everything else to the
 * configured remote crawler
 */
export class SourceRouter implements CrawlService {
  readonly name: string;
  private readonly remote: CrawlService;
  private readonly local: CrawlService;

  constructor(remote: CrawlService, local: CrawlService = new LocalDocsCrawler()) {
    this.name = remote.name;
    this.remote = remote;
    this.local = local;
  }

  crawl(rootUrl: string, limits: CrawlLimits): Promise<Document[]> {
    return isLocalSource(rootUrl) ? this.local.crawl(rootUrl, limits) : this.remote.crawl(rootUrl, limits);
  }
}
