import MarkdownIt from 'markdown-it';
import { DEFAULT_CONFIG, defaultChunkMinSize } from '../../config/index.js';
import { ChunkingConfigError } from '../../errors.js';
import type { Document, Passage } from '../../types/index.js';

const md = new MarkdownIt();

interface HeaderInfo {
  level: number;
  text: string;
  position: number;
}

interface Window {
  start: number;
  end: number;
}

/**
 * Candidate cut points, strongest first. A cut point is the offset where
 * the next window would begin.
 */
interface Boundaries {
  headings: number[];
  paragraphs: number[];
  sentences: number[];
}

const PARAGRAPH_BREAK = /\n[ \t]*\n\s*/g;
const SENTENCE_END = /[.!?]['")\]]*\s+/g;

export class SemanticChunker {
  private targetSize: number;
  private overlap: number;
  private minSize: number;

  constructor(
    targetSize: number = DEFAULT_CONFIG.CHUNK_TARGET_SIZE,
    overlap: number = DEFAULT_CONFIG.CHUNK_OVERLAP,
    minSize?: number
  ) {
    this.targetSize = targetSize;
    this.overlap = overlap;
    this.minSize = minSize ?? defaultChunkMinSize(targetSize, overlap);
    this.validate();
  }

  /**
   * Chunk a document into overlapping passages, cutting at headings,
   * paragraphs and sentences before falling back to whitespace or a hard cut
   */
  chunkDocument(doc: Document): Passage[] {
    const text = doc.content;
    if (text.trim().length === 0) {
      return [];
    }

    const headers = this.extractHeaders(text);
    const windows = this.planWindows(text, headers);

    return windows.map((window, ordinal) => {
      const prefix = Math.min(window.start, this.overlap);
      return {
        sourceUrl: doc.url,
        ordinal,
        text: text.slice(window.start - prefix, window.end),
        start: window.start,
        end: window.end,
        overlap: prefix,
        headings: this.headingTrail(headers, window.start),
      };
    });
  }

  private validate(): void {
    const { targetSize, overlap, minSize } = this;

    if (!Number.isInteger(targetSize) || targetSize < 1) {
      throw new ChunkingConfigError(`targetSize must be a positive integer, got ${targetSize}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= targetSize) {
      throw new ChunkingConfigError(`overlap must be an integer in [0, ${targetSize - 1}], got ${overlap}`);
    }
    if (!Number.isInteger(minSize) || minSize < 1 || minSize * 2 > targetSize - overlap) {
      throw new ChunkingConfigError(
        `minSize must be an integer in [1, ${Math.floor((targetSize - overlap) / 2)}], got ${minSize}`
      );
    }
  }

  /**
   * Lay out the windows of new content. Windows tile the text exactly;
   * every passage (overlap prefix + window) stays within [minSize, targetSize].
   */
  private planWindows(text: string, headers: HeaderInfo[]): Window[] {
    const length = text.length;
    if (length <= this.targetSize) {
      return [{ start: 0, end: length }];
    }

    const boundaries = this.findBoundaries(text, headers);
    const windows: Window[] = [];
    let start = 0;

    while (length - start > this.budgetAt(start)) {
      const end = this.pickCut(text, boundaries, start + this.minSize, start + this.budgetAt(start));
      windows.push({ start, end });
      start = end;
    }

    const tailLength = Math.min(start, this.overlap) + (length - start);
    const previous = windows.pop();

    if (!previous || tailLength >= this.minSize) {
      if (previous) windows.push(previous);
      windows.push({ start, end: length });
      return windows;
    }

    // Short tail: fold it into the previous window, or rebalance the two
    const merged = length - previous.start;
    if (merged <= this.budgetAt(previous.start)) {
      windows.push({ start: previous.start, end: length });
      return windows;
    }

    const lo = Math.max(previous.start + this.minSize, length - (this.targetSize - this.overlap));
    const hi = Math.min(previous.start + this.budgetAt(previous.start), length - this.minSize);
    const middle = Math.floor((previous.start + length) / 2);
    const cut = this.findCut(text, boundaries, lo, hi) ?? Math.min(Math.max(middle, lo), hi);

    windows.push({ start: previous.start, end: cut }, { start: cut, end: length });
    return windows;
  }

  /**
   * Room for new content in a window starting at `start`
   */
  private budgetAt(start: number): number {
    return this.targetSize - Math.min(start, this.overlap);
  }

  private pickCut(text: string, boundaries: Boundaries, lo: number, hi: number): number {
    return this.findCut(text, boundaries, lo, hi) ?? hi;
  }

  private findCut(text: string, boundaries: Boundaries, lo: number, hi: number): number | undefined {
    return (
      lastWithin(boundaries.headings, lo, hi) ??
      lastWithin(boundaries.paragraphs, lo, hi) ??
      lastWithin(boundaries.sentences, lo, hi) ??
      lastWordStart(text, lo, hi)
    );
  }

  private findBoundaries(text: string, headers: HeaderInfo[]): Boundaries {
    return {
      headings: headers.map(h => h.position),
      paragraphs: matchEnds(text, PARAGRAPH_BREAK),
      sentences: matchEnds(text, SENTENCE_END),
    };
  }

  /**
   * Extract headers with markdown-it so fenced code and other
   * non-heading `#` lines are ignored
   */
  private extractHeaders(content: string): HeaderInfo[] {
    const lineOffsets = [0];
    for (let i = 0; i < content.length; i++) {
      if (content[i] === '\n') lineOffsets.push(i + 1);
    }

    const tokens = md.parse(content, {});
    const headers: HeaderInfo[] = [];

    tokens.forEach((token, index) => {
      if (token.type !== 'heading_open' || !token.map) return;

      const position = lineOffsets[token.map[0]];
      if (position === undefined) return;

      headers.push({
        level: Number(token.tag.slice(1)),
        text: tokens[index + 1]?.content.trim() ?? '',
        position,
      });
    });

    return headers;
  }

  /**
   * Headings in effect at `position`, outermost first
   */
  private headingTrail(headers: HeaderInfo[], position: number): string[] {
    const stack: HeaderInfo[] = [];

    for (const header of headers) {
      if (header.position > position) break;
      while (stack.length > 0 && stack[stack.length - 1].level >= header.level) {
        stack.pop();
      }
      stack.push(header);
    }

    return stack.map(h => h.text);
  }
}

function matchEnds(text: string, pattern: RegExp): number[] {
  const ends: number[] = [];
  for (const match of text.matchAll(pattern)) {
    ends.push((match.index ?? 0) + match[0].length);
  }
  return ends;
}

/**
 * Largest value of a sorted array inside [lo, hi]
 */
function lastWithin(sorted: number[], lo: number, hi: number): number | undefined {
  for (let i = sorted.length - 1; i >= 0; i--) {
    const value = sorted[i];
    if (value < lo) return undefined;
    if (value <= hi) return value;
  }
  return undefined;
}

/**
 * Latest offset in [lo, hi] where a word starts after whitespace
 */
function lastWordStart(text: string, lo: number, hi: number): number | undefined {
  for (let i = hi; i >= lo; i--) {
    if (i > 0 && i < text.length && /\s/.test(text[i - 1]) && !/\s/.test(text[i])) {
      return i;
    }
  }
  return undefined;
}

/**
 * Chunk a document with the given target size and overlap
 */
export function chunkDocument(doc: Document, targetSize: number, overlap: number, minSize?: number): Passage[] {
  return new SemanticChunker(targetSize, overlap, minSize).chunkDocument(doc);
}
