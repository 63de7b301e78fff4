/**
 * Chat completions client for OpenAI-compatible endpoints
 */
import { z } from 'zod';
import { ReasoningError, toError } from '../errors.js';
import type { CompletionRequest, ReasoningService } from './collaborators.js';
import { HttpClient, failureOptions, type HttpClientOptions } from './http-client.js';

const completionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

export interface ChatClientOptions extends HttpClientOptions {
  model: string;
  temperature?: number;
}

export class ChatCompletionClient implements ReasoningService {
  readonly model: string;
  private readonly temperature: number;
  private readonly http: HttpClient;

  constructor(options: ChatClientOptions) {
    this.model = options.model;
    this.temperature = options.temperature ?? 0.2;
    this.http = new HttpClient(options);
  }

  async complete(request: CompletionRequest): Promise<string> {
    let body: unknown;
    try {
      body = await this.http.postJson('chat/completions', {
        model: this.model,
        temperature: this.temperature,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
      });
    } catch (error) {
      throw new ReasoningError(`Completion request failed: ${toError(error).message}`, failureOptions(error));
    }

    const parsed = completionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ReasoningError('Malformed completion response: no choices returned');
    }

    const reply = parsed.data.choices[0].message.content?.trim();
    if (!reply) {
      throw new ReasoningError(`Model ${this.model} returned an empty reply`);
    }

    return reply;
  }
}
