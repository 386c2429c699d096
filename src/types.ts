import type { JobStatus } from './store/jobs';
import type { PipelineOutcome } from './pipeline/orchestrator';

export interface UploadResponse {
  files: { id: string; name: string }[];
}

export interface SessionCreated {
  id: string;
}

export interface AnalyzeRequest {
  session_id?: string;
  resume_file_id?: string;
  resume_text?: string;
  job_description: string;
  query: string;
  model?: string;
  voice?: boolean;
  narration_style?: 'plain' | 'script';
  user_name?: string;
}

export interface AnalyzeQueued {
  id: string;
  session_id: string;
  status: Extract<JobStatus, 'queued'>;
}

export interface ProcessingStatus {
  id: string;
  status: Extract<JobStatus, 'queued' | 'processing'>;
}

export interface FinishedStatus {
  id: string;
  status: Extract<JobStatus, 'completed' | 'failed'>;
  result: PipelineOutcome;
  error?: string;
}

export type ResultResponse = ProcessingStatus | FinishedStatus;

export interface ModelsResponse {
  default: string;
  models: { name: string; provider: string; model: string; available: boolean }[];
}
