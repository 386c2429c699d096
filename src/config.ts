import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? fallback : TRUTHY.has(value.trim().toLowerCase())));

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') {
        return fallback;
      }
      const parsed = Number.parseInt(value, 10);
      if (!Number.isFinite(parsed) || parsed < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a non-negative integer, received "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3000),
  LOG_LEVEL: z.string().optional(),

  OPENAI_API_KEY: optionalSecret,
  OPENROUTER_API_KEY: optionalSecret,
  GROQ_API_KEY: optionalSecret,
  GOOGLE_API_KEY: optionalSecret,
  PPLX_API_KEY: optionalSecret,
  PERPLEXITY_API_KEY: optionalSecret,
  DEFAULT_MODEL: z.string().default('Gemini 2.5 Flash'),
  LLM_MAX_OUTPUT_TOKENS: positiveInt(4096),

  ROUTER_BACKEND: z.enum(['embedding', 'chroma', 'keyword']).default('embedding'),
  ROUTER_HISTORY_LIMIT: positiveInt(50),
  ROUTER_TOP_K: positiveInt(3),
  OLLAMA_EMBED_URL: z.string().default('http://127.0.0.1:11434'),
  OLLAMA_EMBED_MODEL: z.string().default('nomic-embed-text'),
  CHROMA_URL: z.string().default('http://127.0.0.1:8000'),
  CHROMA_COLLECTION: z.string().default('task-prototypes'),

  TTS_DIR: z.string().default(path.join('.data', 'tts')),
  TTS_VOICE: z.string().default('alloy'),
  TTS_LANGUAGE: z.string().default('en'),
  TTS_RETENTION_SECONDS: positiveInt(3600),
  TTS_CLEANUP_INTERVAL_SECONDS: positiveInt(600),
  TTS_MAX_CHARS: positiveInt(4800),
  DISABLE_OFFLINE_TTS: flag(false),
  VOICE_DEBUG: flag(false),

  SESSION_TTL_SECONDS: positiveInt(7200),
});

export type RouterBackend = z.infer<typeof envSchema>['ROUTER_BACKEND'];

export type AppConfig = {
  env: string;
  port: number;
  logLevel?: string;
  llm: {
    defaultModel: string;
    maxOutputTokens: number;
    apiKeys: {
      openai?: string;
      openrouter?: string;
      groq?: string;
      google?: string;
      perplexity?: string;
    };
  };
  router: {
    backend: RouterBackend;
    historyLimit: number;
    topK: number;
    embedUrl: string;
    embedModel: string;
    chromaUrl: string;
    chromaCollection: string;
  };
  speech: {
    dir: string;
    voice: string;
    language: string;
    retentionSeconds: number;
    cleanupIntervalSeconds: number;
    maxChars: number;
    disableOffline: boolean;
  };
  diagnostics: boolean;
  sessionTtlSeconds: number;
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;

  return {
    env: values.NODE_ENV,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    llm: {
      defaultModel: values.DEFAULT_MODEL,
      maxOutputTokens: values.LLM_MAX_OUTPUT_TOKENS,
      apiKeys: {
        openai: values.OPENAI_API_KEY,
        openrouter: values.OPENROUTER_API_KEY,
        groq: values.GROQ_API_KEY,
        google: values.GOOGLE_API_KEY,
        perplexity: values.PPLX_API_KEY ?? values.PERPLEXITY_API_KEY,
      },
    },
    router: {
      backend: values.ROUTER_BACKEND,
      historyLimit: values.ROUTER_HISTORY_LIMIT,
      topK: values.ROUTER_TOP_K,
      embedUrl: values.OLLAMA_EMBED_URL,
      embedModel: values.OLLAMA_EMBED_MODEL,
      chromaUrl: values.CHROMA_URL,
      chromaCollection: values.CHROMA_COLLECTION,
    },
    speech: {
      dir: path.resolve(values.TTS_DIR),
      voice: values.TTS_VOICE,
      language: values.TTS_LANGUAGE,
      retentionSeconds: values.TTS_RETENTION_SECONDS,
      cleanupIntervalSeconds: values.TTS_CLEANUP_INTERVAL_SECONDS,
      maxChars: values.TTS_MAX_CHARS,
      disableOffline: values.DISABLE_OFFLINE_TTS,
    },
    diagnostics: values.VOICE_DEBUG,
    sessionTtlSeconds: values.SESSION_TTL_SECONDS,
  };
};
