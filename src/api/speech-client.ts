/**
 * Text-to-speech client for OpenAI-compatible `/audio/speech` endpoints
 */
import { SynthesisError, toError } from '../errors.js';
import type { AudioFormat, SynthesizedAudio, VoiceStyle } from '../types/index.js';
import type { SpeechService } from './collaborators.js';
import { HttpClient, failureOptions, type HttpClientOptions } from './http-client.js';

export const DEFAULT_VOICES: Record<VoiceStyle, string> = {
  default: 'alloy',
  female: 'nova',
  male: 'onyx',
};

// Longest input the speech endpoint accepts
const MAX_SPEECH_CHARS = 4096;

export interface SpeechClientOptions extends HttpClientOptions {
  model: string;
  format?: AudioFormat;
  voices?: Partial<Record<VoiceStyle, string>>;
}

export class SpeechClient implements SpeechService {
  private readonly model: string;
  private readonly format: AudioFormat;
  private readonly voices: Record<VoiceStyle, string>;
  private readonly http: HttpClient;

  constructor(options: SpeechClientOptions) {
    this.model = options.model;
    this.format = options.format ?? 'mp3';
    this.voices = { ...DEFAULT_VOICES, ...options.voices };
    this.http = new HttpClient(options);
  }

  async synthesize(text: string, voice: VoiceStyle): Promise<SynthesizedAudio> {
    let data: Uint8Array;
    try {
      data = await this.http.postForBytes('audio/speech', {
        model: this.model,
        voice: this.voices[voice],
        input: text.slice(0, MAX_SPEECH_CHARS),
        response_format: this.format,
      });
    } catch (error) {
      throw new SynthesisError(`Speech synthesis failed: ${toError(error).message}`, failureOptions(error));
    }

    if (data.byteLength === 0) {
      throw new SynthesisError('Speech endpoint returned no audio');
    }

    return { data, format: this.format };
  }
}
