export const LLM_PROVIDERS = ['google', 'groq', 'perplexity', 'openrouter'] as const;

export type LlmProviderName = (typeof LLM_PROVIDERS)[number];

export type ModelInfo = {
  provider: LlmProviderName;
  model: string;
};

/** Display name → provider model id. Keys are what clients send as `model`. */
export const AVAILABLE_MODELS = {
  'Gemini 2.5 Pro': { provider: 'google', model: 'gemini-2.5-pro' },
  'Gemini 2.5 Flash': { provider: 'google', model: 'gemini-2.5-flash' },
  'Gemini 1.5 Flash': { provider: 'google', model: 'gemini-1.5-flash' },
  'LLaMA 4 Maverick 17B': { provider: 'groq', model: 'meta-llama/llama-4-maverick-17b-128e-instruct' },
  'LLaMA 3.1 8B': { provider: 'groq', model: 'llama-3.1-8b-instant' },
  'LLaMA 3.3 70B-Versatile': { provider: 'groq', model: 'llama-3.3-70b-versatile' },
  'DeepSeek R1 Distill LLaMA 70B': { provider: 'groq', model: 'deepseek-r1-distill-llama-70b' },
  'Perplexity Sonar Reasoning Pro': { provider: 'perplexity', model: 'sonar-reasoning-pro' },
  'Perplexity Sonar': { provider: 'perplexity', model: 'sonar' },
  'Mistral Small 3.2 (OpenRouter)': { provider: 'openrouter', model: 'mistralai/mistral-small-3.2-24b-instruct:free' },
} as const satisfies Record<string, ModelInfo>;

export type ModelName = keyof typeof AVAILABLE_MODELS;

export const PROVIDER_BASE_URLS: Record<LlmProviderName, string> = {
  google: 'https://generativelanguage.googleapis.com/v1beta/openai/',
  groq: 'https://api.groq.com/openai/v1',
  perplexity: 'https://api.perplexity.ai',
  openrouter: 'https://openrouter.ai/api/v1',
};

export const MODEL_NAMES = Object.keys(AVAILABLE_MODELS).filter(
  (name): name is ModelName => name in AVAILABLE_MODELS,
);

export const isModelName = (value: unknown): value is ModelName =>
  typeof value === 'string' && Object.prototype.hasOwnProperty.call(AVAILABLE_MODELS, value);

/**
 * Resolves a display name or a raw `provider:model` id. Returns null for anything unknown.
 */
export const resolveModel = (modelId: string): ModelInfo | null => {
  if (isModelName(modelId)) {
    return AVAILABLE_MODELS[modelId];
  }

  const separator = modelId.indexOf(':');
  if (separator <= 0) {
    return null;
  }

  const provider = modelId.slice(0, separator);
  const model = modelId.slice(separator + 1).trim();

  const match = LLM_PROVIDERS.find((name) => name === provider);

  return match && model ? { provider: match, model } : null;
};
