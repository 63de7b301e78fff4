/**
 * Error taxonomy
 *
 * Every failure the agent surfaces is an AgentError with a stable `kind`
 * and enough context (collection, url, phase, collaborator) to act on.
 */
import type { ActivePhase } from './types/index.js';

export type ErrorKind =
  | 'CrawlError'
  | 'EmbeddingError'
  | 'EmbeddingSpaceMismatch'
  | 'StoreUnavailable'
  | 'CollectionNotFound'
  | 'IngestionInProgress'
  | 'InvalidK'
  | 'InvalidQuestion'
  | 'ReasoningError'
  | 'SynthesisError'
  | 'ChunkingConfigError'
  | 'ConfigurationError';

export type Collaborator = 'crawler' | 'embedder' | 'store' | 'reasoner' | 'speech';

export interface ErrorContext {
  collection?: string;
  url?: string;
  phase?: ActivePhase;
  collaborator?: Collaborator;
  status?: number;           // HTTP status, when a collaborator answered
}

interface AgentErrorOptions {
  cause?: unknown;
  context?: ErrorContext;
  retryable?: boolean;
  timedOut?: boolean;
}

export abstract class AgentError extends Error {
  abstract readonly kind: ErrorKind;
  readonly context: ErrorContext;
  readonly retryable: boolean;
  readonly timedOut: boolean;

  constructor(message: string, options: AgentErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.context = { ...options.context };
    this.retryable = options.retryable ?? false;
    this.timedOut = options.timedOut ?? false;
  }

  /** Record the ingestion phase the error surfaced in. */
  inPhase(phase: ActivePhase): this {
    this.context.phase ??= phase;
    return this;
  }
}

export class CrawlError extends AgentError {
  readonly kind = 'CrawlError';
  constructor(message: string, options: AgentErrorOptions = {}) {
    super(message, { ...options, context: { collaborator: 'crawler', ...options.context } });
  }
}

export class EmbeddingError extends AgentError {
  readonly kind = 'EmbeddingError';
  constructor(message: string, options: AgentErrorOptions = {}) {
    super(message, { ...options, context: { collaborator: 'embedder', ...options.context } });
  }
}

export class EmbeddingSpaceMismatch extends AgentError {
  readonly kind = 'EmbeddingSpaceMismatch';
}

export class StoreUnavailable extends AgentError {
  readonly kind = 'StoreUnavailable';
  constructor(message: string, options: AgentErrorOptions = {}) {
    super(message, { ...options, context: { collaborator: 'store', ...options.context } });
  }
}

export class CollectionNotFound extends AgentError {
  readonly kind = 'CollectionNotFound';
  constructor(collection: string) {
    super(`Collection "${collection}" has not been ingested yet`, { context: { collection } });
  }
}

export class IngestionInProgress extends AgentError {
  readonly kind = 'IngestionInProgress';
  constructor(collection: string) {
    super(`An ingestion run for "${collection}" is already in progress`, { context: { collection } });
  }
}

export class InvalidK extends AgentError {
  readonly kind = 'InvalidK';
  constructor(k: number, maxK: number) {
    super(`k must be an integer between 1 and ${maxK}, got ${k}`);
  }
}

export class InvalidQuestion extends AgentError {
  readonly kind = 'InvalidQuestion';
}

export class ReasoningError extends AgentError {
  readonly kind = 'ReasoningError';
  constructor(message: string, options: AgentErrorOptions = {}) {
    super(message, { ...options, context: { collaborator: 'reasoner', ...options.context } });
  }
}

export class SynthesisError extends AgentError {
  readonly kind = 'SynthesisError';
  constructor(message: string, options: AgentErrorOptions = {}) {
    super(message, { ...options, context: { collaborator: 'speech', ...options.context } });
  }
}

export class ChunkingConfigError extends AgentError {
  readonly kind = 'ChunkingConfigError';
}

export class ConfigurationError extends AgentError {
  readonly kind = 'ConfigurationError';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.issues = issues;
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * One-line, user-facing description of a failure
 */
export function describeError(error: unknown): string {
  if (!isAgentError(error)) {
    return toError(error).message;
  }

  const details: string[] = [];
  const { phase, url, collaborator, collection, status } = error.context;
  if (phase) details.push(`phase: ${phase}`);
  if (collaborator) details.push(`collaborator: ${collaborator}`);
  if (url) details.push(`url: ${url}`);
  if (collection) details.push(`collection: ${collection}`);
  if (status !== undefined) details.push(`status: ${status}`);
  if (error.timedOut) details.push('timed out');

  const suffix = details.length > 0 ? ` (${details.join(', ')})` : '';
  return `${error.kind}: ${error.message}${suffix}`;
}
