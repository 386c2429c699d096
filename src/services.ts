import type { AppConfig } from './config';
import { ChatCompletionLlmClient } from './llm/client';
import { PipelineOrchestrator } from './pipeline/orchestrator';
import { PdfDocumentExtractor } from './pipeline/parsePdf';
import { ChromaTaskIndex } from './rag/client';
import { OllamaEmbeddingBackend } from './rag/embeddings';
import { EmbeddingTaskIndex, type TaskIndex } from './rag/taskIndex';
import { EspeakSpeechProvider, GoogleTranslateSpeechProvider, OpenAiSpeechProvider } from './speech/providers';
import { SpeechSynthesizer } from './speech/synthesizer';
import { SessionStore } from './store/sessions';
import { TaskRouter } from './tasks/router';
import { createComponentLogger } from './util/logger';

export type AppServices = {
  config: AppConfig;
  sessions: SessionStore;
  router: TaskRouter;
  llm: ChatCompletionLlmClient;
  synthesizer: SpeechSynthesizer;
  orchestrator: PipelineOrchestrator;
};

const log = createComponentLogger('services');

/** Builds the configured vector index; null means routing runs on keywords only. */
export const buildTaskIndex = (config: AppConfig['router']): TaskIndex | null => {
  try {
    switch (config.backend) {
      case 'embedding':
        return new EmbeddingTaskIndex(new OllamaEmbeddingBackend({ baseUrl: config.embedUrl, model: config.embedModel }));
      case 'chroma':
        return new ChromaTaskIndex({
          chromaUrl: config.chromaUrl,
          collectionName: config.chromaCollection,
          ollamaUrl: config.embedUrl,
          ollamaModel: config.embedModel,
        });
      case 'keyword':
        return null;
    }
  } catch (error) {
    log.warn({ err: error, backend: config.backend }, 'Task index unavailable, routing with keywords only.');
    return null;
  }
};

export const buildSpeechSynthesizer = (config: AppConfig): SpeechSynthesizer =>
  new SpeechSynthesizer({
    dir: config.speech.dir,
    retentionSeconds: config.speech.retentionSeconds,
    providers: [
      new OpenAiSpeechProvider(config.llm.apiKeys.openai, config.speech.voice),
      new GoogleTranslateSpeechProvider(config.speech.language),
      new EspeakSpeechProvider(config.speech.disableOffline),
    ],
  });

export const createServices = (config: AppConfig): AppServices => {
  const router = new TaskRouter(buildTaskIndex(config.router), { topK: config.router.topK });
  const llm = new ChatCompletionLlmClient({
    apiKeys: config.llm.apiKeys,
    maxOutputTokens: config.llm.maxOutputTokens,
  });
  const synthesizer = buildSpeechSynthesizer(config);

  const orchestrator = new PipelineOrchestrator({
    extractor: new PdfDocumentExtractor(),
    router,
    llm,
    synthesizer,
    sanitizerOptions: { maxChars: config.speech.maxChars },
  });

  log.info(
    { routerBackend: router.backend, voiceStack: synthesizer.report().providers },
    'Services initialised.',
  );

  return {
    config,
    sessions: new SessionStore({ ttlSeconds: config.sessionTtlSeconds, historyLimit: config.router.historyLimit }),
    router,
    llm,
    synthesizer,
    orchestrator,
  };
};
