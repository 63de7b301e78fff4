/**
 * Answer Composer
 * Builds a grounded prompt from retrieved passages and asks the reasoning model
 */
import type { ReasoningService } from '../api/collaborators.js';
import type { AgentConfig } from '../config/index.js';
import { ReasoningError, isAgentError, toError } from '../errors.js';
import type { Answer, RetrievalResult, ScoredPassage } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { compareScored } from './vector-store/passage-store.js';

export const SYSTEM_PROMPT = 'You are a helpful documentation assistant.';

export const INSUFFICIENT_CONTEXT_ANSWER =
  "I couldn't find anything in the indexed documentation that answers this question. " +
  'Try rephrasing it, or ingest more pages of the documentation.';

export type CompositionConfig = Pick<AgentConfig, 'minSimilarity' | 'maxPromptChars' | 'callTimeoutMs'>;

export interface AnswerComposerOptions {
  reasoner: ReasoningService;
  config: CompositionConfig;
}

export class AnswerComposer {
  private readonly reasoner: ReasoningService;
  private readonly config: CompositionConfig;

  constructor(options: AnswerComposerOptions) {
    this.reasoner = options.reasoner;
    this.config = options.config;
  }

  async compose(question: string, retrieval: RetrievalResult): Promise<Answer> {
    if (retrieval.length === 0) {
      return { text: INSUFFICIENT_CONTEXT_ANSWER, citations: [], grounded: false, contextPassages: 0 };
    }

    const context = this.fitToBudget(question, retrieval);
    if (context.length === 0) {
      return { text: INSUFFICIENT_CONTEXT_ANSWER, citations: [], grounded: false, contextPassages: 0 };
    }

    const prompt = buildPrompt(question, context);

    const text = await this.complete(prompt);

    return {
      text,
      citations: citationsOf(context),
      grounded: context.some(entry => entry.score >= this.config.minSimilarity),
      contextPassages: context.length,
    };
  }

  /**
   * Drop the weakest passages until the prompt fits; cut the best one if it
   * still does not. Empty when not even part of the best passage fits.
   */
  fitToBudget(question: string, retrieval: RetrievalResult): ScoredPassage[] {
    const budget = this.config.maxPromptChars - SYSTEM_PROMPT.length;
    const selected = [...retrieval].sort(compareScored);

    while (selected.length > 1 && buildPrompt(question, selected).length > budget) {
      selected.pop();
    }

    const overflow = buildPrompt(question, selected).length - budget;
    if (overflow > 0) {
      const [best] = selected;
      const kept = best.passage.text.length - overflow;
      if (kept <= 0) {
        logger.warn(`Prompt budget of ${this.config.maxPromptChars} characters leaves no room for documentation`);
        return [];
      }
      logger.debug(`Truncating top passage from ${best.passage.text.length} to ${kept} characters`);
      selected[0] = { ...best, passage: { ...best.passage, text: best.passage.text.slice(0, kept) } };
    }

    if (selected.length < retrieval.length) {
      logger.debug(`Prompt budget kept ${selected.length} of ${retrieval.length} passages`);
    }
    return selected;
  }

  private async complete(prompt: string): Promise<string> {
    let reply: string;
    try {
      reply = await withTimeout(
        this.reasoner.complete({ system: SYSTEM_PROMPT, prompt }),
        this.config.callTimeoutMs,
        () =>
          new ReasoningError(`${this.reasoner.model} did not answer within ${this.config.callTimeoutMs}ms`, {
            timedOut: true,
          })
      );
    } catch (error) {
      if (isAgentError(error)) throw error;
      throw new ReasoningError(`Reasoning call failed: ${toError(error).message}`, { cause: error });
    }

    const text = reply.trim();
    if (text.length === 0) {
      throw new ReasoningError(`${this.reasoner.model} returned an empty answer`);
    }
    return text;
  }
}

export function buildPrompt(question: string, context: ScoredPassage[]): string {
  let prompt = 'Based on the following documentation:\n\n';
  for (const { passage } of context) {
    prompt += `From ${passage.sourceUrl}:\n${passage.text}\n\n`;
  }
  prompt += `\nUser Question: ${question}\n\nPlease provide a clear, concise answer.`;
  return prompt;
}

/**
 * Distinct source URLs in order of first appearance
 */
export function citationsOf(context: ScoredPassage[]): string[] {
  return [...new Set(context.map(entry => entry.passage.sourceUrl))];
}
