import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import { type ProviderFailure, SynthesisUnavailable, describeError } from '../errors';
import { createComponentLogger } from '../util/logger';
import { withTimeout } from '../util/retry';
import type { AudioFormat, SpeechProvider, SpeechProviderName } from './providers';
import { estimateSpeechSeconds, truncateAtSentence } from './sanitize';

export type SpeechArtifact = {
  id: string;
  fileName: string;
  path: string;
  provider: SpeechProviderName;
  format: AudioFormat;
  createdAt: string;
  durationEstimateSeconds: number;
  bytes: number;
};

export type SweepOptions = {
  retentionSeconds?: number;
  now?: number;
};

export type VoiceStackReport = {
  providers: { name: SpeechProviderName; enabled: boolean }[];
  browserFallback: true;
  storageDir: string;
  retentionSeconds: number;
};

type SpeechSynthesizerOptions = {
  dir: string;
  providers: SpeechProvider[];
  retentionSeconds?: number;
  minAudioBytes?: number;
  providerTimeoutMs?: number;
  browserTextLimit?: number;
};

const PART_SUFFIX = '.part';
const ARTIFACT_RE = /^\d+-[0-9a-f-]{36}\.(mp3|wav)$/;
// In-progress writes are never swept before this age, whatever the retention window.
const PART_FILE_MIN_AGE_MS = 60 * 60 * 1000;

const log = createComponentLogger('speech');

const isMissing = (error: unknown): boolean =>
  Boolean(error) && typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

export const isArtifactFileName = (fileName: string): boolean => ARTIFACT_RE.test(fileName);

export const contentTypeFor = (fileName: string): string =>
  fileName.endsWith('.wav') ? 'audio/wav' : 'audio/mpeg';

/**
 * Runs speech providers in order until one returns usable audio and stores it in `dir`.
 * Files are written under a `.part` name and renamed into place, so readers and the
 * cleanup sweep only ever see complete artifacts.
 */
export class SpeechSynthesizer {
  readonly dir: string;

  private readonly providers: SpeechProvider[];

  private readonly retentionSeconds: number;

  private readonly minAudioBytes: number;

  private readonly providerTimeoutMs: number;

  private readonly browserTextLimit: number;

  constructor({
    dir,
    providers,
    retentionSeconds = 3600,
    minAudioBytes = 512,
    providerTimeoutMs = 45_000,
    browserTextLimit = 800,
  }: SpeechSynthesizerOptions) {
    this.dir = path.resolve(dir);
    this.providers = providers;
    this.retentionSeconds = retentionSeconds;
    this.minAudioBytes = minAudioBytes;
    this.providerTimeoutMs = providerTimeoutMs;
    this.browserTextLimit = browserTextLimit;
  }

  private async persist(audio: Buffer, provider: SpeechProvider, text: string): Promise<SpeechArtifact> {
    const id = uuidv4();
    const createdAt = Date.now();
    const fileName = `${createdAt}-${id}.${provider.format}`;
    const finalPath = path.join(this.dir, fileName);
    const partPath = `${finalPath}${PART_SUFFIX}`;

    await fs.mkdir(this.dir, { recursive: true });

    try {
      await fs.writeFile(partPath, audio);
      await fs.rename(partPath, finalPath);
    } catch (error) {
      await fs.rm(partPath, { force: true });
      throw error;
    }

    return {
      id,
      fileName,
      path: finalPath,
      provider: provider.name,
      format: provider.format,
      createdAt: new Date(createdAt).toISOString(),
      durationEstimateSeconds: estimateSpeechSeconds(text),
      bytes: audio.length,
    };
  }

  /**
   * @throws SynthesisUnavailable when no provider produced audio; it carries the
   * shortened text the client should hand to browser speech synthesis.
   */
  async synthesize(text: string): Promise<SpeechArtifact> {
    const failures: ProviderFailure[] = [];
    const input = text.trim();

    if (!input) {
      throw new SynthesisUnavailable([{ provider: 'none', reason: 'empty text' }], '');
    }

    for (const provider of this.providers) {
      if (!provider.isEnabled()) {
        failures.push({ provider: provider.name, reason: 'disabled' });
        log.debug({ provider: provider.name }, 'Speech provider disabled, skipping.');
        continue;
      }

      try {
        const audio = await withTimeout(
          provider.synthesize(input),
          this.providerTimeoutMs,
          `${provider.name} speech synthesis`,
        );

        if (audio.length < this.minAudioBytes) {
          throw new Error(`audio too small (${audio.length} bytes)`);
        }

        const artifact = await this.persist(audio, provider, input);
        log.info({ provider: provider.name, fileName: artifact.fileName, bytes: artifact.bytes }, 'Speech synthesized.');

        return artifact;
      } catch (error) {
        const reason = describeError(error);
        failures.push({ provider: provider.name, reason });
        log.warn({ provider: provider.name, reason }, 'Speech provider failed, trying next.');
      }
    }

    throw new SynthesisUnavailable(failures, truncateAtSentence(input, this.browserTextLimit));
  }

  /**
   * Deletes finished artifacts older than the retention window and abandoned `.part`
   * files. Safe to run while new files are being written. Returns the number removed.
   */
  async sweep({ retentionSeconds = this.retentionSeconds, now = Date.now() }: SweepOptions = {}): Promise<number> {
    let names: string[];

    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      if (isMissing(error)) {
        return 0;
      }
      throw error;
    }

    const retentionMs = Math.max(0, retentionSeconds) * 1000;
    let removed = 0;

    for (const name of names) {
      const isPart = name.endsWith(PART_SUFFIX);
      const baseName = isPart ? name.slice(0, -PART_SUFFIX.length) : name;

      if (!isArtifactFileName(baseName)) {
        continue;
      }

      const filePath = path.join(this.dir, name);
      const maxAgeMs = isPart ? Math.max(retentionMs, PART_FILE_MIN_AGE_MS) : retentionMs;

      try {
        const stats = await fs.stat(filePath);
        if (now - stats.mtimeMs <= maxAgeMs) {
          continue;
        }
        await fs.unlink(filePath);
        removed += 1;
      } catch (error) {
        if (!isMissing(error)) {
          log.warn({ err: error, file: name }, 'Failed to remove expired speech artifact.');
        }
      }
    }

    if (removed > 0) {
      log.info({ removed, dir: this.dir }, 'Expired speech artifacts removed.');
    }

    return removed;
  }

  /** Starts the periodic sweep; returns a function that stops it. */
  startCleanup(intervalSeconds: number): () => void {
    if (intervalSeconds <= 0) {
      return () => undefined;
    }

    const timer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        log.error({ err: error }, 'Speech artifact sweep failed.');
      });
    }, intervalSeconds * 1000);
    timer.unref();

    return () => clearInterval(timer);
  }

  resolveArtifact(fileName: string): string | null {
    return isArtifactFileName(fileName) ? path.join(this.dir, fileName) : null;
  }

  report(): VoiceStackReport {
    return {
      providers: this.providers.map((provider) => ({ name: provider.name, enabled: provider.isEnabled() })),
      browserFallback: true,
      storageDir: this.dir,
      retentionSeconds: this.retentionSeconds,
    };
  }
}
