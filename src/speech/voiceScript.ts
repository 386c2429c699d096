import { describeError } from '../errors';
import type { LlmProvider } from '../llm/client';
import { normalizeForSpeech, truncateAtSentence } from './sanitize';

export const MIN_SCRIPT_QUERY_WORDS = 4;
export const MAX_SCRIPT_WORDS = 180;
const MAX_ANALYSIS_CHARS = 4000;

export type NarrationStyle = 'plain' | 'script';

export type VoiceScript =
  | { status: 'scripted'; text: string }
  | { status: 'unavailable' | 'failed'; text: string; reason: string };

export type VoiceScriptRequest = {
  /** Sanitized answer; it is both the model input and the fallback narration. */
  speechText: string;
  query: string;
  modelId: string;
  userName?: string;
};

const FENCE_EDGE_RE = /^\s*```[\w-]*\s*|\s*```\s*$/g;
const TAG_RE = /<[^>]+>/g;
const BULLET_RE = /•\s*/g;

const toWords = (text: string): string[] => text.split(/\s+/).filter(Boolean);

/** Keeps at most `maxWords` words, ending on the last complete sentence when there is one. */
export const limitWords = (text: string, maxWords: number): string => {
  const words = toWords(text);

  if (words.length <= maxWords) {
    return text;
  }

  const clipped = words.slice(0, maxWords).join(' ');

  if (/[.!?]$/.test(clipped)) {
    return clipped;
  }

  const sentenceEnd = Math.max(clipped.lastIndexOf('. '), clipped.lastIndexOf('! '), clipped.lastIndexOf('? '));

  return sentenceEnd > 0 ? clipped.slice(0, sentenceEnd + 1) : clipped;
};

const cleanScript = (raw: string): string => {
  const spoken = normalizeForSpeech(raw.replace(FENCE_EDGE_RE, '').replace(TAG_RE, ' '))
    .replace(BULLET_RE, '')
    .replace(/\s+/g, ' ')
    .trim();

  return limitWords(spoken, MAX_SCRIPT_WORDS);
};

/**
 * Turns the sanitized answer into a short conversational script for narration.
 * Never throws: every miss returns the sanitized text with a reason.
 */
export const planVoiceScript = async (llm: LlmProvider, request: VoiceScriptRequest): Promise<VoiceScript> => {
  const { speechText, query, modelId, userName } = request;

  if (!speechText) {
    return { status: 'unavailable', text: speechText, reason: 'Nothing to narrate.' };
  }

  if (toWords(query).length < MIN_SCRIPT_QUERY_WORDS) {
    return { status: 'unavailable', text: speechText, reason: 'Query too short for a voice script.' };
  }

  try {
    const raw = await llm.narrate({
      modelId,
      query,
      userName,
      analysis: truncateAtSentence(speechText, MAX_ANALYSIS_CHARS),
    });
    const script = cleanScript(raw);

    if (!script) {
      return { status: 'failed', text: speechText, reason: 'Voice script was empty.' };
    }

    return { status: 'scripted', text: script };
  } catch (error) {
    return { status: 'failed', text: speechText, reason: describeError(error) };
  }
};
