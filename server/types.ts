export const LANGUAGE_CODES = ['en', 'ta', 'fr', 'es', 'de', 'zh', 'hi'] as const;

export type LanguageCode = typeof LANGUAGE_CODES[number];

export type JobStatus = 'queued' | 'processing' | 'done' | 'error';

export type PipelineStage = 'extract' | 'transcribe' | 'translate' | 'emit' | 'assemble';

export type JobStage = 'upload' | PipelineStage | 'complete';

export interface Segment {
  start: number; // seconds
  end: number;
  text: string;
}

// Same timing as the source segment, text in the target language
export type TranslatedSegment = Segment;

export interface JobResult {
  vtt: string;
  cues: TranslatedSegment[];
  playerHtml: string;
  subtitlesUrl: string;
}

export interface Job {
  id: string;
  status: JobStatus;
  stage: JobStage;
  progress: number;
  message?: string;
  error?: string;
  failedStage?: PipelineStage;
  segmentIndex?: number;
  originalFilename?: string;
  createdAt: number;
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
  result?: JobResult;
}

export interface UploadedVideo {
  path: string;
  originalFilename: string;
  mimeType: string;
}

export type StageReporter = (stage: JobStage, progress: number, message: string) => void;
