import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import { ResponsePackager, writeAudioFile } from '../../../src/rag/response-packager.js';
import { SynthesisError } from '../../../src/errors.js';
import type { Answer, VoiceResponse } from '../../../src/types/index.js';
import { FakeSpeech, testConfig } from '../../helpers/fakes.js';

const ANSWER: Answer = {
  text: 'Autoscaling adds replicas under load.',
  citations: ['https://docs.test/autoscaling'],
  grounded: true,
  contextPassages: 2,
};

describe('ResponsePackager', () => {
  it('attaches synthesized audio with its MIME type', async () => {
    const speech = new FakeSpeech();
    const packager = new ResponsePackager({ speech, config: testConfig({ voiceStyle: 'female' }) });

    const response = await packager.package(ANSWER);

    expect(response).toEqual({
      text: ANSWER.text,
      sources: ANSWER.citations,
      grounded: true,
      audio: { status: 'available', data: Uint8Array.from([73, 68, 51]), format: 'mp3', mimeType: 'audio/mpeg' },
    });
    expect(speech.calls).toEqual([{ text: ANSWER.text, voice: 'female' }]);
  });

  it('uses the requested voice over the configured one', async () => {
    const speech = new FakeSpeech();
    await new ResponsePackager({ speech, config: testConfig() }).package(ANSWER, 'male');

    expect(speech.calls[0].voice).toBe('male');
  });

  it('degrades to text when synthesis fails', async () => {
    const packager = new ResponsePackager({
      speech: new FakeSpeech(new SynthesisError('voice service down')),
      config: testConfig(),
    });

    const response = await packager.package(ANSWER);

    expect(response).toEqual({
      text: ANSWER.text,
      sources: ANSWER.citations,
      grounded: true,
      audio: { status: 'unavailable', reason: 'voice service down' },
    });
  });

  it('treats an empty payload as unavailable', async () => {
    const packager = new ResponsePackager({
      speech: new FakeSpeech({ data: new Uint8Array(0), format: 'mp3' }),
      config: testConfig(),
    });

    const { audio } = await packager.package(ANSWER);
    expect(audio).toEqual({ status: 'unavailable', reason: 'Speech service returned an empty audio payload' });
  });

  it('reports audio as unavailable without a speech service', async () => {
    const { audio } = await new ResponsePackager({ config: testConfig() }).package(ANSWER);
    expect(audio).toEqual({ status: 'unavailable', reason: 'Speech synthesis is not configured' });
  });
});

describe('writeAudioFile', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes available audio under a unique name', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'audio-'));
    dirs.push(dir);
    const response: VoiceResponse = {
      text: 'hi',
      sources: [],
      grounded: false,
      audio: { status: 'available', data: Uint8Array.from([1, 2, 3]), format: 'wav', mimeType: 'audio/wav' },
    };

    const filePath = await writeAudioFile(response, path.join(dir, 'nested'));

    expect(filePath).toMatch(/[/\\]nested[/\\]response_[0-9a-f-]{36}\.wav$/);
    expect([...fs.readFileSync(filePath ?? '')]).toEqual([1, 2, 3]);
  });

  it('writes nothing when audio is unavailable', async () => {
    const response: VoiceResponse = {
      text: 'hi',
      sources: [],
      grounded: false,
      audio: { status: 'unavailable', reason: 'down' },
    };

    expect(await writeAudioFile(response, os.tmpdir())).toBeNull();
  });
});
