import { execFile } from 'node:child_process';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { promisify } from 'node:util';
import OpenAI from 'openai';
import { getAllAudioBase64 } from 'google-tts-api';
import { v4 as uuidv4 } from 'uuid';

import { truncateAtSentence } from './sanitize';

export type SpeechProviderName = 'openai' | 'google' | 'espeak';

export type AudioFormat = 'mp3' | 'wav';

export interface SpeechProvider {
  readonly name: SpeechProviderName;
  readonly format: AudioFormat;
  isEnabled(): boolean;
  synthesize(text: string): Promise<Buffer>;
}

const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

type OpenAiVoice = (typeof OPENAI_VOICES)[number];

const OPENAI_MAX_INPUT_CHARS = 4096;

const toOpenAiVoice = (voice: string): OpenAiVoice =>
  OPENAI_VOICES.find((candidate) => candidate === voice.toLowerCase()) ?? 'alloy';

/** Primary neural voice through the OpenAI speech endpoint. */
export class OpenAiSpeechProvider implements SpeechProvider {
  readonly name = 'openai';

  readonly format = 'mp3';

  private client: OpenAI | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly voice: string = 'alloy',
    private readonly model: string = 'tts-1',
  ) {}

  isEnabled(): boolean {
    return Boolean(this.apiKey);
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    if (!this.apiKey) {
      throw new Error('OpenAI speech is not configured. Set OPENAI_API_KEY.');
    }

    this.client = new OpenAI({ apiKey: this.apiKey });
    return this.client;
  }

  async synthesize(text: string): Promise<Buffer> {
    const response = await this.getClient().audio.speech.create({
      model: this.model,
      voice: toOpenAiVoice(this.voice),
      input: truncateAtSentence(text, OPENAI_MAX_INPUT_CHARS),
      response_format: 'mp3',
    });

    return Buffer.from(await response.arrayBuffer());
  }
}

/** Secondary cloud voice: Google Translate TTS, fetched in short segments and concatenated. */
export class GoogleTranslateSpeechProvider implements SpeechProvider {
  readonly name = 'google';

  readonly format = 'mp3';

  constructor(
    private readonly language: string = 'en',
    private readonly timeoutMs: number = 10_000,
  ) {}

  isEnabled(): boolean {
    return true;
  }

  async synthesize(text: string): Promise<Buffer> {
    const segments = await getAllAudioBase64(text, {
      lang: this.language,
      slow: false,
      host: 'https://translate.google.com',
      timeout: this.timeoutMs,
      splitPunct: ',.?!;:',
    });

    return Buffer.concat(segments.map((segment) => Buffer.from(segment.base64, 'base64')));
  }
}

const execFileAsync = promisify(execFile);

/** Legacy offline voice via a local espeak(-ng) binary writing WAV. */
export class EspeakSpeechProvider implements SpeechProvider {
  readonly name = 'espeak';

  readonly format = 'wav';

  constructor(
    private readonly disabled: boolean,
    private readonly binary: string = 'espeak-ng',
    private readonly wordsPerMinute: number = 165,
  ) {}

  isEnabled(): boolean {
    return !this.disabled;
  }

  async synthesize(text: string): Promise<Buffer> {
    const wavPath = path.join(os.tmpdir(), `espeak-${uuidv4()}.wav`);

    try {
      await execFileAsync(this.binary, ['-s', String(this.wordsPerMinute), '-w', wavPath, text], {
        timeout: 60_000,
      });
      return await fs.readFile(wavPath);
    } finally {
      await fs.rm(wavPath, { force: true });
    }
  }
}
