import OpenAI from 'openai';

import { createComponentLogger } from '../util/logger';
import { exponentialBackoff } from '../util/retry';
import type { TaskLabel } from '../tasks/labels';
import { type LlmProviderName, type ModelInfo, PROVIDER_BASE_URLS, resolveModel } from './models';
import {
  NARRATION_SYSTEM_PROMPT,
  type NarrationContext,
  type PromptContext,
  SYSTEM_PROMPT,
  buildNarrationPrompt,
  buildUserPrompt,
} from './prompts';

export type GenerationRequest = {
  task: TaskLabel;
  context: PromptContext;
  modelId: string;
};

export type NarrationRequest = NarrationContext & {
  modelId: string;
};

export interface LlmProvider {
  generate(request: GenerationRequest): Promise<string>;
  /** Rewrites an answer as a short spoken script. */
  narrate(request: NarrationRequest): Promise<string>;
}

type Prompt = {
  system: string;
  user: string;
};

type LlmClientOptions = {
  apiKeys: Partial<Record<LlmProviderName, string>>;
  maxOutputTokens: number;
  temperature?: number;
  maxAttempts?: number;
  timeoutMs?: number;
};

const GOOGLE_FALLBACK_MODEL = 'gemini-1.5-flash';

const log = createComponentLogger('llm');

const isRetryable = (error: unknown): boolean => {
  if (error instanceof OpenAI.APIError && typeof error.status === 'number') {
    return error.status === 429 || error.status >= 500;
  }

  return true;
};

/**
 * Chat-completion client for every configured provider. Google, Groq, Perplexity and
 * OpenRouter all expose OpenAI-compatible endpoints, so one SDK covers them.
 */
export class ChatCompletionLlmClient implements LlmProvider {
  private readonly clients = new Map<LlmProviderName, OpenAI>();

  private readonly temperature: number;

  private readonly maxAttempts: number;

  private readonly timeoutMs: number;

  constructor(private readonly options: LlmClientOptions) {
    this.temperature = options.temperature ?? 0.4;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  isConfigured(provider: LlmProviderName): boolean {
    return Boolean(this.options.apiKeys[provider]);
  }

  private getClient(provider: LlmProviderName): OpenAI {
    const existing = this.clients.get(provider);
    if (existing) {
      return existing;
    }

    const apiKey = this.options.apiKeys[provider];

    if (!apiKey) {
      throw new Error(`LLM API key not configured for provider "${provider}".`);
    }

    const client = new OpenAI({
      apiKey,
      baseURL: PROVIDER_BASE_URLS[provider],
      timeout: this.timeoutMs,
      maxRetries: 0,
    });

    this.clients.set(provider, client);
    return client;
  }

  private async complete({ provider, model }: ModelInfo, prompt: Prompt): Promise<string> {
    const client = this.getClient(provider);

    const response = await exponentialBackoff(
      async () =>
        client.chat.completions.create({
          model,
          temperature: this.temperature,
          max_tokens: this.options.maxOutputTokens,
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
        }),
      {
        maxAttempts: this.maxAttempts,
        label: `${provider} completion`,
        shouldRetry: isRetryable,
        onRetry: (error, attempt, delayMs) => {
          log.warn({ err: error, provider, model, attempt, delayMs }, 'Retrying LLM call.');
        },
      },
    );

    const content = response.choices[0]?.message?.content;

    if (!content || !content.trim()) {
      throw new Error('LLM response did not contain any content.');
    }

    return content.trim();
  }

  private async completeWithFallback(modelId: string, prompt: Prompt): Promise<string> {
    const model = resolveModel(modelId);

    if (!model) {
      throw new Error(`Unknown model "${modelId}".`);
    }

    try {
      return await this.complete(model, prompt);
    } catch (error) {
      if (model.provider !== 'google' || model.model === GOOGLE_FALLBACK_MODEL) {
        throw error;
      }

      log.warn({ err: error, model: model.model, fallback: GOOGLE_FALLBACK_MODEL }, 'Gemini call failed, trying fallback model.');
      return this.complete({ provider: 'google', model: GOOGLE_FALLBACK_MODEL }, prompt);
    }
  }

  async generate({ task, context, modelId }: GenerationRequest): Promise<string> {
    log.debug({ task, modelId }, 'Requesting completion.');

    return this.completeWithFallback(modelId, { system: SYSTEM_PROMPT, user: buildUserPrompt(task, context) });
  }

  async narrate({ modelId, ...context }: NarrationRequest): Promise<string> {
    log.debug({ modelId }, 'Requesting voice script.');

    return this.completeWithFallback(modelId, { system: NARRATION_SYSTEM_PROMPT, user: buildNarrationPrompt(context) });
  }
}
