export type UploadSlot = 'cv' | 'exampleLetter' | 'jobDescription';

export interface RawUpload {
  name: string;
  data: ArrayBuffer;
}

export interface StructuredJdSummary {
  kind: 'structured';
  companyName: string | null;
  roleTitle: string | null;
  requirements: string[];
}

export interface FallbackJdSummary {
  kind: 'fallback';
  requirements: string[];
}

export type JdSummary = StructuredJdSummary | FallbackJdSummary;

export interface SessionState {
  finalLetter: string;
  factsBlock: string;
  recentJobs: string[];
  jdSummary: JdSummary | null;
}

export interface LetterInput {
  apiKey: string;
  model: string;
  cvText: string;
  jobDescriptionPasted: string;
  jobDescriptionUploaded: string;
  exampleLetterText: string;
}

export type PipelineStage =
  | 'summarizing_jd'
  | 'extracting_facts'
  | 'extracting_jobs'
  | 'drafting'
  | 'verifying';

export type LlmErrorCategory = 'auth' | 'network' | 'rate_limit' | 'api' | 'empty_response';

export interface LlmError {
  category: LlmErrorCategory;
  errorName: string;
}

export type LlmCallResult =
  | { ok: true; text: string }
  | { ok: false; error: LlmError };

export type PipelineOutcome =
  | { status: 'success'; session: SessionState }
  | { status: 'input_error'; message: string }
  | { status: 'extraction_error'; message: string }
  | { status: 'upstream_error'; stage: PipelineStage; error: LlmError; message: string };
