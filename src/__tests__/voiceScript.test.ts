import { describe, expect, it, vi } from 'vitest';

import type { LlmProvider, NarrationRequest } from '../llm/client';
import { MAX_SCRIPT_WORDS, limitWords, planVoiceScript } from '../speech/voiceScript';

const SPEECH_TEXT = 'Strengths: • Python. • SQL. Gaps: • Cloud.';
const QUERY = 'How does my resume look overall?';

const providerWith = (narrate: (request: NarrationRequest) => Promise<string>): LlmProvider => ({
  generate: vi.fn(async () => 'unused'),
  narrate: vi.fn(narrate),
});

describe('planVoiceScript', () => {
  it('cleans the script the model writes', async () => {
    const llm = providerWith(
      async () =>
        '**Hi Dana**, your Python depth stands out.\n\nOne thing to work on is cloud experience. Overall, a solid match.',
    );

    const script = await planVoiceScript(llm, {
      speechText: SPEECH_TEXT,
      query: QUERY,
      modelId: 'Gemini 2.5 Flash',
      userName: 'Dana',
    });

    expect(script).toEqual({
      status: 'scripted',
      text: 'Hi Dana, your Python depth stands out. One thing to work on is cloud experience. Overall, a solid match.',
    });
    expect(llm.narrate).toHaveBeenCalledWith({
      modelId: 'Gemini 2.5 Flash',
      query: QUERY,
      userName: 'Dana',
      analysis: SPEECH_TEXT,
    });
  });

  it('drops code fences and markup tags around the script', async () => {
    const llm = providerWith(async () => '```\nHi there <break time="300ms"/> your resume reads well.\n```');

    await expect(planVoiceScript(llm, { speechText: SPEECH_TEXT, query: QUERY, modelId: 'Gemini 2.5 Flash' })).resolves.toEqual({
      status: 'scripted',
      text: 'Hi there your resume reads well.',
    });
  });

  it('needs a question of at least four words', async () => {
    const llm = providerWith(async () => 'script');

    const script = await planVoiceScript(llm, { speechText: SPEECH_TEXT, query: 'Fit score?', modelId: 'Gemini 2.5 Flash' });

    expect(script).toEqual({ status: 'unavailable', text: SPEECH_TEXT, reason: 'Query too short for a voice script.' });
    expect(llm.narrate).not.toHaveBeenCalled();
  });

  it('returns the sanitized text when the model call fails', async () => {
    const llm = providerWith(async () => Promise.reject(new Error('503 upstream')));

    await expect(planVoiceScript(llm, { speechText: SPEECH_TEXT, query: QUERY, modelId: 'LLaMA 3.1 8B' })).resolves.toEqual({
      status: 'failed',
      text: SPEECH_TEXT,
      reason: '503 upstream',
    });
  });

  it('returns the sanitized text when the script is empty after cleaning', async () => {
    const llm = providerWith(async () => '```\n```');

    await expect(planVoiceScript(llm, { speechText: SPEECH_TEXT, query: QUERY, modelId: 'LLaMA 3.1 8B' })).resolves.toEqual({
      status: 'failed',
      text: SPEECH_TEXT,
      reason: 'Voice script was empty.',
    });
  });

  it('keeps long scripts within the word limit', async () => {
    const sentence = 'One two three four five six seven.';
    const llm = providerWith(async () => Array(30).fill(sentence).join(' '));

    const script = await planVoiceScript(llm, { speechText: SPEECH_TEXT, query: QUERY, modelId: 'LLaMA 3.1 8B' });

    expect(script.text).toBe(Array(25).fill(sentence).join(' '));
    expect(script.text.split(' ').length).toBeLessThanOrEqual(MAX_SCRIPT_WORDS);
  });
});

describe('limitWords', () => {
  it('leaves short text alone', () => {
    expect(limitWords('Short and sweet.', 5)).toBe('Short and sweet.');
  });

  it('cuts at the word limit when no sentence ends inside it', () => {
    expect(limitWords('one two three four five', 3)).toBe('one two three');
  });
});
