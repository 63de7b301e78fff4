/**
 * HTML Cleaner
 * Removes boilerplate elements from documentation pages
 */
import * as cheerio from 'cheerio';

// CSS selectors for content areas (in priority order)
const CONTENT_SELECTORS = [
  // Common documentation generators
  '.theme-doc-markdown',
  '.markdown-body',
  '.md-content',
  '.rst-content',
  '.documentation-content',
  '#doc-content',

  // Semantic containers
  'main article',
  'article',
  '[role="main"]',
  'main',
  '.main-content',
  '.content',

  // Last resort: body with removals
  'body',
];

// Elements to remove
const REMOVE_SELECTORS = [
  // Navigation
  'header', 'nav', 'aside', '.sidebar', '.navigation',
  '.breadcrumb', '.breadcrumbs', '.toc', '.table-of-contents',
  '.menu', '.pagination', '.edit-this-page',

  // Headers and footers
  'footer', '.footer', '#footer', '.site-header',

  // Interactive elements
  '.search-box', '#search', '.search-form',
  '.cookie-banner', '.cookie-consent',
  '.feedback', '.rate-this-page', '.share-buttons',

  // Scripts and styles
  'script', 'style', 'noscript', 'template', 'svg', 'iframe',
  'link[rel="stylesheet"]', 'meta', 'base',
];

// Content shorter than this is treated as an empty container
const MIN_CONTENT_CHARS = 100;

export class HtmlCleaner {
  /**
   * Clean HTML by removing boilerplate and extracting the main content
   */
  clean(html: string): string {
    const $ = cheerio.load(html);

    $(REMOVE_SELECTORS.join(', ')).remove();
    $('*')
      .contents()
      .filter((_, node) => node.type === 'comment')
      .remove();

    let content: string | null = null;
    for (const selector of CONTENT_SELECTORS) {
      const found = $(selector).first();
      if (found.length > 0 && found.text().trim().length > MIN_CONTENT_CHARS) {
        content = found.html();
        break;
      }
    }

    content ??= $('body').html() ?? '';

    return content
      .replace(/\s(data-[a-z0-9-]+|on[a-z]+)="[^"]*"/gi, '')
      .replace(/\n\s*\n\s*\n/g, '\n\n')
      .replace(/[ \t]+/g, ' ')
      .trim();
  }

  /**
   * Extract title from HTML
   */
  extractTitle(html: string): string {
    const $ = cheerio.load(html);

    return (
      $('main h1, article h1').first().text().trim() ||
      $('h1').first().text().trim() ||
      $('title').first().text().trim() ||
      'Untitled'
    );
  }

  /**
   * Absolute URLs of every link on the page
   */
  extractLinks(html: string, pageUrl: string): string[] {
    const $ = cheerio.load(html);
    const links: string[] = [];

    $('a[href]').each((_, element) => {
      const href = $(element).attr('href')?.trim();
      if (!href || href.startsWith('#') || /^(javascript|mailto|tel):/i.test(href)) return;

      const link = resolveHref(href, pageUrl);
      if (link) links.push(link);
    });

    return links;
  }
}

function resolveHref(href: string, pageUrl: string): string | null {
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}
