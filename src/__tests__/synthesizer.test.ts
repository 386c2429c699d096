import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SynthesisUnavailable } from '../errors';
import type { SpeechProvider, SpeechProviderName } from '../speech/providers';
import { SpeechSynthesizer } from '../speech/synthesizer';

const AUDIO = Buffer.alloc(1024, 7);

const fakeProvider = (
  name: SpeechProviderName,
  synthesize: () => Promise<Buffer>,
  enabled = true,
): SpeechProvider => ({
  name,
  format: name === 'espeak' ? 'wav' : 'mp3',
  isEnabled: () => enabled,
  synthesize: vi.fn(synthesize),
});

const failing = (message: string) => async (): Promise<Buffer> => {
  throw new Error(message);
};

const artifactName = (timestamp: number, suffix = '.mp3'): string =>
  `${timestamp}-123e4567-e89b-12d3-a456-42661417400${timestamp % 10}${suffix}`;

describe('SpeechSynthesizer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'speech-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('synthesize', () => {
    it('uses the first provider that returns audio', async () => {
      const openai = fakeProvider('openai', failing('quota exceeded'));
      const google = fakeProvider('google', async () => AUDIO);
      const espeak = fakeProvider('espeak', async () => AUDIO);
      const synthesizer = new SpeechSynthesizer({ dir, providers: [openai, google, espeak] });

      const artifact = await synthesizer.synthesize('Your fit score is 85.');

      expect(artifact.provider).toBe('google');
      expect(artifact.format).toBe('mp3');
      expect(artifact.bytes).toBe(1024);
      expect(artifact.fileName).toMatch(/^\d+-[0-9a-f-]{36}\.mp3$/);
      expect(espeak.synthesize).not.toHaveBeenCalled();
      expect(await fs.readFile(artifact.path)).toEqual(AUDIO);
      expect(await fs.readdir(dir)).toEqual([artifact.fileName]);
    });

    it('treats too-small audio as a failure', async () => {
      const openai = fakeProvider('openai', async () => Buffer.alloc(10));
      const espeak = fakeProvider('espeak', async () => AUDIO);
      const synthesizer = new SpeechSynthesizer({ dir, providers: [openai, espeak] });

      const artifact = await synthesizer.synthesize('Hello.');

      expect(artifact.provider).toBe('espeak');
      expect(artifact.fileName.endsWith('.wav')).toBe(true);
    });

    it('skips disabled providers', async () => {
      const openai = fakeProvider('openai', async () => AUDIO, false);
      const google = fakeProvider('google', async () => AUDIO);
      const synthesizer = new SpeechSynthesizer({ dir, providers: [openai, google] });

      await synthesizer.synthesize('Hello.');

      expect(openai.synthesize).not.toHaveBeenCalled();
    });

    it('signals browser fallback when every provider fails', async () => {
      const synthesizer = new SpeechSynthesizer({
        dir,
        providers: [
          fakeProvider('openai', async () => AUDIO, false),
          fakeProvider('google', failing('network down')),
          fakeProvider('espeak', async () => AUDIO, false),
        ],
      });

      const error = await synthesizer.synthesize('Read this aloud.').catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(SynthesisUnavailable);
      if (!(error instanceof SynthesisUnavailable)) {
        return;
      }
      expect(error.failures).toEqual([
        { provider: 'openai', reason: 'disabled' },
        { provider: 'google', reason: 'network down' },
        { provider: 'espeak', reason: 'disabled' },
      ]);
      expect(error.browserText).toBe('Read this aloud.');
      expect(await fs.readdir(dir)).toEqual([]);
    });

    it('shortens the browser fallback text', async () => {
      const synthesizer = new SpeechSynthesizer({ dir, providers: [], browserTextLimit: 30 });

      const error = await synthesizer
        .synthesize('First sentence is here. Second sentence goes past the limit.')
        .catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(SynthesisUnavailable);
      expect(error instanceof SynthesisUnavailable ? error.browserText : null).toBe('First sentence is here.');
    });

    it('times out a provider that never answers', async () => {
      const hanging = fakeProvider('openai', () => new Promise<Buffer>(() => undefined));
      const google = fakeProvider('google', async () => AUDIO);
      const synthesizer = new SpeechSynthesizer({ dir, providers: [hanging, google], providerTimeoutMs: 20 });

      const artifact = await synthesizer.synthesize('Hello.');

      expect(artifact.provider).toBe('google');
    });
  });

  describe('sweep', () => {
    const touch = async (name: string, mtime: Date): Promise<string> => {
      const filePath = path.join(dir, name);
      await fs.writeFile(filePath, AUDIO);
      await fs.utimes(filePath, mtime, mtime);
      return filePath;
    };

    it('with zero retention removes everything older than now and keeps later writes', async () => {
      const now = Date.now();
      await touch(artifactName(1001), new Date(now - 60_000));
      await touch(artifactName(1002, '.wav'), new Date(now - 1_000));
      const fresh = await touch(artifactName(1003), new Date(now + 5_000));

      const synthesizer = new SpeechSynthesizer({ dir, providers: [] });
      const removed = await synthesizer.sweep({ retentionSeconds: 0, now });

      expect(removed).toBe(2);
      expect(await fs.readdir(dir)).toEqual([path.basename(fresh)]);
    });

    it('keeps artifacts inside the retention window', async () => {
      const now = Date.now();
      await touch(artifactName(2001), new Date(now - 30 * 60_000));
      await touch(artifactName(2002), new Date(now - 2 * 3600_000));

      const synthesizer = new SpeechSynthesizer({ dir, providers: [], retentionSeconds: 3600 });

      expect(await synthesizer.sweep({ now })).toBe(1);
      expect(await fs.readdir(dir)).toEqual([artifactName(2001)]);
    });

    it('leaves recent in-progress writes and foreign files alone', async () => {
      const now = Date.now();
      await touch(artifactName(3001, '.mp3.part'), new Date(now - 10 * 60_000));
      await touch(artifactName(3002, '.mp3.part'), new Date(now - 2 * 3600_000));
      await touch('notes.txt', new Date(now - 24 * 3600_000));

      const synthesizer = new SpeechSynthesizer({ dir, providers: [] });
      const removed = await synthesizer.sweep({ retentionSeconds: 0, now });

      expect(removed).toBe(1);
      expect((await fs.readdir(dir)).sort()).toEqual([artifactName(3001, '.mp3.part'), 'notes.txt']);
    });

    it('returns zero when the storage directory does not exist', async () => {
      const synthesizer = new SpeechSynthesizer({ dir: path.join(dir, 'missing'), providers: [] });

      expect(await synthesizer.sweep()).toBe(0);
    });
  });

  it('resolves only well-formed artifact names', () => {
    const synthesizer = new SpeechSynthesizer({ dir, providers: [] });

    expect(synthesizer.resolveArtifact(artifactName(4001))).toBe(path.join(dir, artifactName(4001)));
    expect(synthesizer.resolveArtifact('../secrets.mp3')).toBeNull();
  });

  it('reports the voice stack', () => {
    const synthesizer = new SpeechSynthesizer({
      dir,
      providers: [fakeProvider('openai', async () => AUDIO, false), fakeProvider('google', async () => AUDIO)],
      retentionSeconds: 120,
    });

    expect(synthesizer.report()).toEqual({
      providers: [
        { name: 'openai', enabled: false },
        { name: 'google', enabled: true },
      ],
      browserFallback: true,
      storageDir: dir,
      retentionSeconds: 120,
    });
  });
});
