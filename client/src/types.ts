export type LanguageCode = 'en' | 'ta' | 'fr' | 'es' | 'de' | 'zh' | 'hi';

export type PipelineStage = 'extract' | 'transcribe' | 'translate' | 'emit' | 'assemble';

export interface Cue {
  start: number; // seconds
  end: number;
  text: string;
}

export interface JobResult {
  vtt: string;
  cues: Cue[];
  playerHtml: string;
  subtitlesUrl: string;
}

export interface JobStatus {
  id: string;
  status: 'queued' | 'processing' | 'done' | 'error';
  stage: 'upload' | PipelineStage | 'complete';
  progress: number;
  message?: string;
  error?: string;
  failedStage?: PipelineStage;
  segmentIndex?: number;
  originalFilename?: string;
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
  result?: JobResult;
}

export interface UploadResponse {
  jobId: string;
}
