export type PipelineStage = 'ingest' | 'route' | 'generate' | 'sanitize' | 'synthesize' | 'deliver';

type PipelineErrorCode =
  | 'INGEST_EMPTY_DOCUMENT'
  | 'INGEST_UNREADABLE_DOCUMENT'
  | 'INGEST_MISSING_INPUT'
  | 'ROUTING_BACKEND_UNAVAILABLE'
  | 'GENERATION_FAILED'
  | 'SANITIZATION_DEGRADED'
  | 'SYNTHESIS_UNAVAILABLE'
  | 'UNEXPECTED';

export const STAGE_MESSAGES: Record<PipelineStage, string> = {
  ingest: 'We could not read your resume or job description. Please check the inputs and try again.',
  route: 'We could not understand the request. Please rephrase your question.',
  generate: 'The analysis could not be generated right now. Please try again in a moment.',
  sanitize: 'The analysis could not be prepared for narration.',
  synthesize: 'Audio narration is unavailable right now.',
  deliver: 'Something went wrong while preparing your results.',
};

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    public readonly stage: PipelineStage,
    public readonly userMessage: string = STAGE_MESSAGES[stage],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export class IngestError extends PipelineError {
  constructor(
    message: string,
    code: Extract<PipelineErrorCode, 'INGEST_EMPTY_DOCUMENT' | 'INGEST_UNREADABLE_DOCUMENT' | 'INGEST_MISSING_INPUT'>,
    userMessage: string,
    options?: { cause?: unknown },
  ) {
    super(message, code, 'ingest', userMessage, options);
    this.name = 'IngestError';
  }
}

/** Raised inside the router only; it is always recovered through the keyword fallback. */
export class RoutingBackendUnavailable extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ROUTING_BACKEND_UNAVAILABLE', 'route', STAGE_MESSAGES.route, options);
    this.name = 'RoutingBackendUnavailable';
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'GENERATION_FAILED', 'generate', STAGE_MESSAGES.generate, options);
    this.name = 'GenerationError';
  }
}

export class SanitizationDegraded extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SANITIZATION_DEGRADED', 'sanitize', STAGE_MESSAGES.sanitize, options);
    this.name = 'SanitizationDegraded';
  }
}

export type ProviderFailure = {
  provider: string;
  reason: string;
};

export class SynthesisUnavailable extends PipelineError {
  constructor(
    public readonly failures: ProviderFailure[],
    public readonly browserText: string,
  ) {
    super(
      `All speech providers failed (${failures.map((failure) => failure.provider).join(', ') || 'none enabled'}).`,
      'SYNTHESIS_UNAVAILABLE',
      'synthesize',
    );
    this.name = 'SynthesisUnavailable';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'Unknown error';
};
