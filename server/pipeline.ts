import fs from 'fs/promises';
import path from 'path';
import {
  LanguageCode,
  PipelineStage,
  StageReporter,
  TranslatedSegment,
  UploadedVideo
} from './types.js';
import {
  EmitFailedError,
  ExtractionFailedError,
  PipelineError,
  TranscriptionFailedError,
  errorMessage
} from './errors.js';
import { AudioExtractor } from './extractor.js';
import { Transcriber } from './transcriber.js';
import { Translator, translateSegments } from './translator.js';
import { writeVtt } from './subtitles.js';
import { buildPlayerMarkup } from './player.js';
import { Logger } from './logger.js';

export interface PipelineRequest {
  jobId: string;
  video: UploadedVideo;
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
}

export interface PipelineOutput {
  vtt: string;
  cues: TranslatedSegment[];
  playerHtml: string;
}

export interface SubtitleRunner {
  run(request: PipelineRequest, report: StageReporter): Promise<PipelineOutput>;
}

export interface PipelineDeps {
  extractor: AudioExtractor;
  transcriber: Transcriber;
  translator: Translator;
  logger: Logger;
  workDir: string;
  translateConcurrency?: number;
}

function wrapStageError(stage: PipelineStage, err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  const message = errorMessage(err);
  switch (stage) {
    case 'extract':
      return new ExtractionFailedError(message, { cause: err });
    case 'transcribe':
      return new TranscriptionFailedError(message, { cause: err });
    case 'emit':
      return new EmitFailedError(message, { cause: err });
    default:
      return new PipelineError(stage, message, { cause: err });
  }
}

async function inStage<T>(stage: PipelineStage, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (err) {
    throw wrapStageError(stage, err);
  }
}

// rename() cannot cross devices; fall back to copy + delete
async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EXDEV') {
      await fs.copyFile(from, to);
      await fs.rm(from, { force: true });
      return;
    }
    throw err;
  }
}

// Progress bands per stage, in percent
const PROGRESS = {
  extract: 5,
  transcribe: [15, 50],
  translate: [50, 85],
  emit: 90,
  assemble: 95
} as const;

const scale = ([from, to]: readonly [number, number], fraction: number) =>
  Math.round(from + (to - from) * fraction);

export class SubtitlePipeline implements SubtitleRunner {
  constructor(private readonly deps: PipelineDeps) {}

  async run(request: PipelineRequest, report: StageReporter): Promise<PipelineOutput> {
    const { extractor, transcriber, translator, workDir } = this.deps;
    const logger = this.deps.logger.child(`job ${request.jobId}`);
    let workspace: string | null = null;

    try {
      workspace = await inStage('extract', () => fs.mkdtemp(path.join(workDir, 'subtitle-job-')));
      logger.debug(`Workspace ${workspace}`);

      const ext = path.extname(request.video.originalFilename) || '.mp4';
      const videoPath = path.join(workspace, `input${ext}`);
      const audioPath = path.join(workspace, 'audio.mp3');
      const subsPath = path.join(workspace, 'subtitles.vtt');

      // Stage 1: Audio Extraction
      report('extract', PROGRESS.extract, 'Extracting audio...');
      await inStage('extract', async () => {
        await moveFile(request.video.path, videoPath);
        await extractor.extract(videoPath, audioPath);
      });
      logger.info('Audio extracted');

      // Stage 2: Transcription
      report('transcribe', PROGRESS.transcribe[0], 'Transcribing audio...');
      const segments = await inStage('transcribe', () =>
        transcriber.transcribe(audioPath, request.sourceLang, {
          onProgress: (fraction) =>
            report('transcribe', scale(PROGRESS.transcribe, fraction), 'Transcribing audio...')
        })
      );
      logger.info(`Transcribed ${segments.length} segment(s)`);

      // Stage 3: Translation
      report('translate', PROGRESS.translate[0], 'Translating subtitles...');
      const translated = await inStage('translate', () =>
        translateSegments(segments, translator, {
          targetLang: request.targetLang,
          sourceLang: request.sourceLang,
          concurrency: this.deps.translateConcurrency,
          onProgress: (fraction) =>
            report('translate', scale(PROGRESS.translate, fraction), 'Translating subtitles...')
        })
      );
      logger.info(`Translated ${translated.length} segment(s) to ${request.targetLang}`);

      // Stage 4: Subtitle File Creation
      report('emit', PROGRESS.emit, 'Writing subtitle track...');
      const vtt = await inStage('emit', () => writeVtt(translated, subsPath));

      report('assemble', PROGRESS.assemble, 'Preparing player...');
      const playerHtml = await inStage('assemble', async () =>
        buildPlayerMarkup({
          video: await fs.readFile(videoPath),
          videoMimeType: request.video.mimeType,
          vtt: await fs.readFile(subsPath, 'utf-8'),
          targetLang: request.targetLang
        })
      );

      return { vtt, cues: translated, playerHtml };
    } finally {
      await this.release(workspace, request.video.path, logger);
    }
  }

  private async release(workspace: string | null, uploadPath: string, logger: Logger): Promise<void> {
    const removals = [fs.rm(uploadPath, { force: true })];
    if (workspace) {
      removals.push(fs.rm(workspace, { recursive: true, force: true }));
    }
    const results = await Promise.allSettled(removals);
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.warn(`Temporary file cleanup failed: ${errorMessage(result.reason)}`);
      }
    }
  }
}
