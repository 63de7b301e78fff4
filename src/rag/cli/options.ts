/**
 * Argument parsers shared by the CLIs
 */
import { InvalidArgumentError } from 'commander';
import type { AgentConfig } from '../../config/index.js';
import type { VoiceStyle } from '../../types/index.js';

export function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function nonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function crawlerKind(value: string): AgentConfig['crawler'] {
  if (value === 'site' || value === 'firecrawl') return value;
  throw new InvalidArgumentError('Expected "site" or "firecrawl".');
}

export function voiceStyle(value: string): VoiceStyle {
  if (value === 'default' || value === 'female' || value === 'male') return value;
  throw new InvalidArgumentError('Expected "default", "female" or "male".');
}
