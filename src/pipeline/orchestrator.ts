import {
  GenerationError,
  IngestError,
  PipelineError,
  type PipelineStage,
  STAGE_MESSAGES,
  SanitizationDegraded,
  SynthesisUnavailable,
  describeError,
} from '../errors';
import type { LlmProvider } from '../llm/client';
import type { SpeechArtifact } from '../speech/synthesizer';
import {
  DEFAULT_MAX_SPEECH_CHARS,
  type SpeechSanitizerOptions,
  normalizeForSpeech,
  stripToAlphanumeric,
} from '../speech/sanitize';
import { type NarrationStyle, type VoiceScript, planVoiceScript } from '../speech/voiceScript';
import { fingerprintInputs } from '../store/responseCache';
import type { Session } from '../store/sessions';
import type { RoutingResult } from '../tasks/router';
import type { RoutingCorpus } from '../tasks/corpus';
import type { DocumentExtractor } from './parsePdf';
import { extractFitScore } from './fitScore';

export type PipelineRequest = {
  resumeFile?: Buffer;
  resumeText?: string;
  jobDescription: string;
  query: string;
  modelId: string;
  voice?: boolean;
  /** `script` narrates a short spoken rewrite of the answer instead of the sanitized text. */
  narrationStyle?: NarrationStyle;
  userName?: string;
};

export type PipelineState = 'ingested' | 'routed' | 'generated' | 'sanitized' | 'synthesized' | 'delivered' | 'errored';

export type StateTransition = {
  state: PipelineState;
  at: string;
  stage?: PipelineStage;
};

export type AudioStatus = 'ready' | 'unavailable' | 'skipped';

export type DeliveredAudio = Omit<SpeechArtifact, 'path'> & { url: string };

export type Narration =
  | { style: 'plain' }
  | { style: 'script'; status: VoiceScript['status']; reason?: string };

export type DeliveredOutcome = {
  status: 'delivered';
  routing: RoutingResult;
  modelId: string;
  markdown: string;
  speechText: string;
  speechDegraded: boolean;
  /** Text handed to the speech providers. */
  spokenText: string;
  narration: Narration;
  cached: boolean;
  fitScore: number | null;
  audio: DeliveredAudio | null;
  audioStatus: AudioStatus;
  audioUnavailable: boolean;
  browserFallbackText: string | null;
  transitions: StateTransition[];
};

export type ErroredOutcome = {
  status: 'errored';
  stage: PipelineStage;
  code: string;
  message: string;
  transitions: StateTransition[];
};

export type PipelineOutcome = DeliveredOutcome | ErroredOutcome;

/** The orchestrator only needs these capabilities of its collaborators. */
export interface QueryRouter {
  route(query: string, corpus: RoutingCorpus): Promise<RoutingResult>;
}

export interface SpeechSynthesis {
  synthesize(text: string): Promise<SpeechArtifact>;
}

type PipelineOrchestratorDeps = {
  extractor: DocumentExtractor;
  router: QueryRouter;
  llm: LlmProvider;
  synthesizer: SpeechSynthesis;
  sanitizerOptions?: SpeechSanitizerOptions;
  audioBaseUrl?: string;
};

const MISSING_RESUME_MESSAGE = 'Please upload a resume or paste its text before asking a question.';
const MISSING_JOB_DESCRIPTION_MESSAGE = 'Please provide the job description you are applying for.';

type SynthesisStep = Pick<DeliveredOutcome, 'audio' | 'audioStatus' | 'audioUnavailable' | 'browserFallbackText'>;

/**
 * Runs one request through ingest → route → generate → sanitize → synthesize → deliver.
 * Synthesis voices an optional spoken script that falls back to the sanitized text.
 * Routing and synthesis failures degrade in place; ingest and generation failures end
 * the run in `errored`. `run` always resolves.
 */
export class PipelineOrchestrator {
  private readonly audioBaseUrl: string;

  constructor(private readonly deps: PipelineOrchestratorDeps) {
    this.audioBaseUrl = deps.audioBaseUrl ?? '/audio';
  }

  async run(session: Session, request: PipelineRequest): Promise<PipelineOutcome> {
    const transitions: StateTransition[] = [];
    const log = session.logger;
    let stage: PipelineStage = 'ingest';

    const enter = (state: PipelineState): void => {
      transitions.push({ state, at: new Date().toISOString() });
    };

    try {
      const { resumeText, jobDescription } = await this.ingest(request);
      session.cache.bindInputs(resumeText, jobDescription);
      session.corpus.ingest({ resume: resumeText, jobDescription });
      enter('ingested');

      stage = 'route';
      const routing = await this.deps.router.route(request.query, session.corpus);
      enter('routed');
      log.info({ task: routing.task, score: routing.score, provenance: routing.provenance }, 'Query routed.');

      stage = 'generate';
      const { text: markdown, cached } = await session.cache.getOrCompute(
        { task: routing.task, modelId: request.modelId, fingerprint: fingerprintInputs(resumeText, jobDescription) },
        () =>
          this.generate(routing, request, {
            resumeText,
            jobDescription,
          }),
      );
      enter('generated');
      log.info({ task: routing.task, modelId: request.modelId, cached }, 'Analysis generated.');

      stage = 'sanitize';
      const { speechText, speechDegraded } = this.sanitize(markdown, session);
      enter('sanitized');

      stage = 'synthesize';
      const voice = request.voice ?? true;
      const { spokenText, narration } = await this.narrate(speechText, request, voice, session);
      const synthesis = await this.synthesize(spokenText, voice, session);
      if (synthesis.audio) {
        enter('synthesized');
      }

      stage = 'deliver';
      enter('delivered');

      return {
        status: 'delivered',
        routing,
        modelId: request.modelId,
        markdown,
        speechText,
        speechDegraded,
        spokenText,
        narration,
        cached,
        fitScore: routing.task === 'job_fit' ? extractFitScore(markdown) : null,
        ...synthesis,
        transitions,
      };
    } catch (error) {
      const failedStage = error instanceof PipelineError ? error.stage : stage;
      const message = error instanceof PipelineError ? error.userMessage : STAGE_MESSAGES[failedStage];
      const code = error instanceof PipelineError ? error.code : 'UNEXPECTED';

      log.error({ err: error, stage: failedStage, code }, 'Pipeline stage failed.');
      transitions.push({ state: 'errored', stage: failedStage, at: new Date().toISOString() });

      return {
        status: 'errored',
        stage: failedStage,
        code,
        message,
        transitions,
      };
    }
  }

  private async ingest(request: PipelineRequest): Promise<{ resumeText: string; jobDescription: string }> {
    let resumeText = request.resumeText?.trim() ?? '';

    if (request.resumeFile) {
      const document = await this.deps.extractor.extract(request.resumeFile);
      resumeText = document.text.trim();
    }

    if (!resumeText) {
      throw new IngestError('Resume text is empty.', 'INGEST_MISSING_INPUT', MISSING_RESUME_MESSAGE);
    }

    const jobDescription = request.jobDescription.trim();

    if (!jobDescription) {
      throw new IngestError('Job description is empty.', 'INGEST_MISSING_INPUT', MISSING_JOB_DESCRIPTION_MESSAGE);
    }

    return { resumeText, jobDescription };
  }

  private async generate(
    routing: RoutingResult,
    request: PipelineRequest,
    { resumeText, jobDescription }: { resumeText: string; jobDescription: string },
  ): Promise<string> {
    let markdown: string;

    try {
      markdown = await this.deps.llm.generate({
        task: routing.task,
        modelId: request.modelId,
        context: { resumeText, jobDescription, query: request.query },
      });
    } catch (error) {
      throw new GenerationError(`LLM generation failed: ${describeError(error)}`, { cause: error });
    }

    if (!markdown.trim()) {
      throw new GenerationError('LLM returned an empty response.');
    }

    return markdown;
  }

  private sanitize(markdown: string, session: Session): { speechText: string; speechDegraded: boolean } {
    const options = this.deps.sanitizerOptions ?? {};

    try {
      return { speechText: normalizeForSpeech(markdown, options), speechDegraded: false };
    } catch (error) {
      const degraded = new SanitizationDegraded(`Speech normalization failed: ${describeError(error)}`, { cause: error });
      session.logger.warn({ err: degraded }, 'Falling back to plain-text speech rendering.');

      return {
        speechText: stripToAlphanumeric(markdown, options.maxChars ?? DEFAULT_MAX_SPEECH_CHARS),
        speechDegraded: true,
      };
    }
  }

  private async narrate(
    speechText: string,
    request: PipelineRequest,
    voice: boolean,
    session: Session,
  ): Promise<{ spokenText: string; narration: Narration }> {
    if (request.narrationStyle !== 'script') {
      return { spokenText: speechText, narration: { style: 'plain' } };
    }

    if (!voice) {
      return { spokenText: speechText, narration: { style: 'script', status: 'unavailable', reason: 'Voice is off.' } };
    }

    const script = await planVoiceScript(this.deps.llm, {
      speechText,
      query: request.query,
      modelId: request.modelId,
      userName: request.userName,
    });

    if (script.status !== 'scripted') {
      session.logger.warn({ status: script.status, reason: script.reason }, 'Voice script unavailable, narrating the answer.');
      return { spokenText: script.text, narration: { style: 'script', status: script.status, reason: script.reason } };
    }

    return { spokenText: script.text, narration: { style: 'script', status: 'scripted' } };
  }

  private async synthesize(speechText: string, voice: boolean, session: Session): Promise<SynthesisStep> {
    if (!voice || !speechText) {
      return { audio: null, audioStatus: 'skipped', audioUnavailable: false, browserFallbackText: null };
    }

    try {
      const artifact = await this.deps.synthesizer.synthesize(speechText);

      return {
        audio: {
          id: artifact.id,
          fileName: artifact.fileName,
          provider: artifact.provider,
          format: artifact.format,
          createdAt: artifact.createdAt,
          durationEstimateSeconds: artifact.durationEstimateSeconds,
          bytes: artifact.bytes,
          url: `${this.audioBaseUrl}/${artifact.fileName}`,
        },
        audioStatus: 'ready',
        audioUnavailable: false,
        browserFallbackText: null,
      };
    } catch (error) {
      if (!(error instanceof SynthesisUnavailable)) {
        throw error;
      }

      session.logger.warn({ failures: error.failures }, 'Audio unavailable, delivering text only.');

      return {
        audio: null,
        audioStatus: 'unavailable',
        audioUnavailable: true,
        browserFallbackText: error.browserText || null,
      };
    }
  }
}
