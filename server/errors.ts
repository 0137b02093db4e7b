import { PipelineStage } from './types.js';

export class PipelineError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.stage = stage;
  }
}

export class ExtractionFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('extract', message, options);
    this.name = 'ExtractionFailedError';
  }
}

export class TranscriptionFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transcribe', message, options);
    this.name = 'TranscriptionFailedError';
  }
}

export class TranslationFailedError extends PipelineError {
  readonly segmentIndex: number;

  constructor(segmentIndex: number, message: string, options?: { cause?: unknown }) {
    super('translate', `Segment ${segmentIndex}: ${message}`, options);
    this.name = 'TranslationFailedError';
    this.segmentIndex = segmentIndex;
  }
}

export class EmitFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('emit', message, options);
    this.name = 'EmitFailedError';
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
