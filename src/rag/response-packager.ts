/**
 * Response Packager
 * Turns an answer into a voice response, degrading to text when speech fails
 */
import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import type { SpeechService } from '../api/collaborators.js';
import type { AgentConfig } from '../config/index.js';
import { SynthesisError, describeError, isAgentError, toError } from '../errors.js';
import type { Answer, AudioArtifact, AudioFormat, VoiceResponse, VoiceStyle } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

export const MIME_TYPES: Record<AudioFormat, string> = {
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  opus: 'audio/ogg',
  aac: 'audio/aac',
  flac: 'audio/flac',
};

export type PackagingConfig = Pick<AgentConfig, 'voiceStyle' | 'callTimeoutMs'>;

export interface ResponsePackagerOptions {
  speech?: SpeechService;
  config: PackagingConfig;
}

export class ResponsePackager {
  private readonly speech?: SpeechService;
  private readonly config: PackagingConfig;

  constructor(options: ResponsePackagerOptions) {
    this.speech = options.speech;
    this.config = options.config;
  }

  async package(answer: Answer, voice: VoiceStyle = this.config.voiceStyle): Promise<VoiceResponse> {
    return {
      text: answer.text,
      sources: [...answer.citations],
      grounded: answer.grounded,
      audio: await this.synthesize(answer.text, voice),
    };
  }

  private async synthesize(text: string, voice: VoiceStyle): Promise<AudioArtifact> {
    if (!this.speech) {
      return { status: 'unavailable', reason: 'Speech synthesis is not configured' };
    }

    try {
      const audio = await withTimeout(
        this.speech.synthesize(text, voice),
        this.config.callTimeoutMs,
        () => new SynthesisError(`Speech synthesis did not finish within ${this.config.callTimeoutMs}ms`, { timedOut: true })
      );
      if (audio.data.byteLength === 0) {
        throw new SynthesisError('Speech service returned an empty audio payload');
      }

      return { status: 'available', data: audio.data, format: audio.format, mimeType: MIME_TYPES[audio.format] };
    } catch (error) {
      const failure = isAgentError(error)
        ? error
        : new SynthesisError(`Speech synthesis failed: ${toError(error).message}`, { cause: error });
      logger.warn(`Answering without audio: ${describeError(failure)}`);
      return { status: 'unavailable', reason: failure.message };
    }
  }
}

/**
 * Save the response's audio as `response_<uuid>.<format>`; null when there is none
 */
export async function writeAudioFile(response: VoiceResponse, dir: string): Promise<string | null> {
  if (response.audio.status !== 'available') {
    return null;
  }

  await fs.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, `response_${randomUUID()}.${response.audio.format}`);
  await fs.writeFile(filePath, response.audio.data);
  logger.debug(`Wrote ${response.audio.data.byteLength} bytes of audio to ${filePath}`);
  return filePath;
}
