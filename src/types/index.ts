/**
 * Type definitions for the documentation voice agent
 */

// ============================================================================
// Crawled Content Types
// ============================================================================

export interface Document {
  url: string;               // Source URL the crawler fetched
  title?: string;
  content: string;           // Markdown (or plain text) body
}

export interface CrawlLimits {
  maxPages: number;
  maxDepth: number;
}

// ============================================================================
// Passage & Index Types
// ============================================================================

export interface Passage {
  sourceUrl: string;
  ordinal: number;           // Position within the source document, 0-based
  text: string;              // Overlap prefix + new content
  start: number;             // Offset of the new content in the document
  end: number;               // Exclusive end offset in the document
  overlap: number;           // Length of the prefix shared with the previous passage
  headings: string[];        // Markdown heading trail in effect at `start`
}

export type EmbeddingVector = number[];

export type SimilarityMetric = 'cosine' | 'ip';

export interface EmbeddingSpace {
  model: string;
  dimension: number;
  metric: SimilarityMetric;
}

export interface IndexedPassage {
  collection: string;
  passage: Passage;
  vector: EmbeddingVector;
}

export interface ScoredPassage {
  passage: Passage;
  score: number;
}

export type RetrievalResult = ScoredPassage[];

export interface CollectionInfo {
  name: string;
  space: EmbeddingSpace;
  count: number;
}

// ============================================================================
// Answer Types
// ============================================================================

export interface Answer {
  text: string;
  citations: string[];       // Distinct source URLs, order of first appearance
  grounded: boolean;
  contextPassages: number;   // Passages actually placed in the prompt
}

export type VoiceStyle = 'default' | 'male' | 'female';

export type AudioFormat = 'mp3' | 'wav' | 'opus' | 'aac' | 'flac';

export interface SynthesizedAudio {
  data: Uint8Array;
  format: AudioFormat;
}

export type AudioArtifact =
  | { status: 'available'; data: Uint8Array; format: AudioFormat; mimeType: string }
  | { status: 'unavailable'; reason: string };

export interface VoiceResponse {
  text: string;
  sources: string[];
  grounded: boolean;
  audio: AudioArtifact;
}

// ============================================================================
// Ingestion Types
// ============================================================================

export type IngestionPhase =
  | 'idle'
  | 'crawling'
  | 'chunking'
  | 'embedding'
  | 'indexing'
  | 'ready'
  | 'failed';

export type ActivePhase = Exclude<IngestionPhase, 'idle' | 'ready' | 'failed'>;

export interface IngestionStatus {
  collection: string;
  phase: IngestionPhase;
  failedPhase?: ActivePhase;
  error?: Error;
  updatedAt: string;         // ISO timestamp
}

export interface IngestionReport {
  collection: string;
  rootUrl: string;
  documents: number;
  passages: number;
  sources: number;
  space: EmbeddingSpace;
  timings: Partial<Record<ActivePhase, number>>;
  startedAt: string;         // ISO timestamp
  finishedAt: string;        // ISO timestamp
}

export type IngestionEvent =
  | { type: 'phase'; collection: string; phase: IngestionPhase }
  | { type: 'batch'; collection: string; completed: number; total: number };
