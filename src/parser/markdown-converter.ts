/**
 * Markdown Converter
 * Converts cleaned HTML to markdown format
 */
import TurndownService from 'turndown';

export class MarkdownConverter {
  private turndown: TurndownService;

  constructor() {
    this.turndown = new TurndownService({
      headingStyle: 'atx',
      codeBlockStyle: 'fenced',
      bulletListMarker: '-',
      strongDelimiter: '**',
      emDelimiter: '_',
    });

    this.setupRules();
  }

  private setupRules(): void {
    // Handle code blocks with language specification
    this.turndown.addRule('codeBlocks', {
      filter: 'pre',
      replacement: (content, node) => {
        const className = node.getAttribute('class') ?? '';
        const codeClass = node.querySelector('code')?.getAttribute('class') ?? '';

        // Extract language from class names like "language-python", "lang-js"
        const langMatch = `${className} ${codeClass}`.match(/(?:language|lang)-([a-z0-9]+)/i);
        const language = langMatch ? langMatch[1] : '';

        const code = (node.textContent ?? content)
          .replace(/^\n+|\n+$/g, '')
          .replace(/\n{3,}/g, '\n\n');

        return `\n\n\`\`\`${language}\n${code}\n\`\`\`\n\n`;
      },
    });

    // Remove empty links
    this.turndown.addRule('emptyLinks', {
      filter: node => node.nodeName === 'A' && !node.textContent?.trim(),
      replacement: () => '',
    });

    // Images carry no answerable text
    this.turndown.addRule('images', {
      filter: 'img',
      replacement: (_content, node) => {
        const alt = node.getAttribute('alt')?.trim();
        return alt ? `(${alt})` : '';
      },
    });
  }

  /**
   * Convert HTML to markdown
   */
  convert(html: string): string {
    if (!html || html.trim().length === 0) {
      return '';
    }

    return this.postProcess(this.turndown.turndown(html));
  }

  /**
   * Post-process markdown for better formatting
   */
  private postProcess(markdown: string): string {
    return markdown
      // Remove excessive blank lines
      .replace(/\n{3,}/g, '\n\n')
      // Fix heading spacing
      .replace(/^(#{1,6})\s+/gm, '$1 ')
      // Remove trailing whitespace
      .replace(/[ \t]+$/gm, '')
      .trim();
  }
}
