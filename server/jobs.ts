import { v4 as uuidv4 } from 'uuid';
import { Job, LanguageCode, PipelineStage, UploadedVideo } from './types.js';
import { PipelineError, TranslationFailedError, errorMessage } from './errors.js';
import { SubtitleRunner } from './pipeline.js';
import { Logger } from './logger.js';

export class JobBusyError extends Error {
  constructor(readonly activeJobId: string) {
    super(`Job ${activeJobId} is still running`);
    this.name = 'JobBusyError';
  }
}

const STAGE_FAILURES: Record<PipelineStage, string> = {
  extract: 'Audio extraction failed',
  transcribe: 'Transcription failed',
  translate: 'Translation failed',
  emit: 'Subtitle file creation failed',
  assemble: 'Player assembly failed'
};

// Holds the current job in memory for status polling; one job runs at a time
export class JobManager {
  private readonly jobs = new Map<string, Job>();
  private active: { id: string; done: Promise<void> } | null = null;

  constructor(private readonly runner: SubtitleRunner, private readonly logger: Logger) {}

  get(id: string): Job | undefined {
    return this.jobs.get(id);
  }

  isBusy(): boolean {
    return this.active !== null;
  }

  async whenIdle(): Promise<void> {
    await this.active?.done;
  }

  start(video: UploadedVideo, sourceLang: LanguageCode, targetLang: LanguageCode): Job {
    if (this.active) {
      throw new JobBusyError(this.active.id);
    }
    // Finished jobs are dropped once a new one begins
    this.jobs.clear();

    const job: Job = {
      id: uuidv4(),
      status: 'queued',
      stage: 'upload',
      progress: 0,
      originalFilename: video.originalFilename,
      createdAt: Date.now(),
      sourceLang,
      targetLang
    };
    this.jobs.set(job.id, job);
    this.logger.info(`Job ${job.id} queued: ${video.originalFilename} (${sourceLang} -> ${targetLang})`);

    const done = this.process(job, video).finally(() => {
      this.active = null;
    });
    this.active = { id: job.id, done };
    return job;
  }

  private update(id: string, partial: Partial<Job>): void {
    const job = this.jobs.get(id);
    if (job) {
      this.jobs.set(id, { ...job, ...partial });
    }
  }

  private async process(job: Job, video: UploadedVideo): Promise<void> {
    try {
      const output = await this.runner.run(
        { jobId: job.id, video, sourceLang: job.sourceLang, targetLang: job.targetLang },
        (stage, progress, message) => this.update(job.id, { status: 'processing', stage, progress, message })
      );
      this.update(job.id, {
        status: 'done',
        stage: 'complete',
        progress: 100,
        message: 'Done! Subtitles are shown in the player.',
        result: { ...output, subtitlesUrl: `/api/jobs/${job.id}/subtitles.vtt` }
      });
      this.logger.info(`Job ${job.id} done: ${output.cues.length} cue(s)`);
    } catch (err) {
      const failedStage = err instanceof PipelineError ? err.stage : undefined;
      const segmentIndex = err instanceof TranslationFailedError ? err.segmentIndex : undefined;
      this.logger.error(`Job ${job.id} failed${failedStage ? ` at ${failedStage}` : ''}: ${errorMessage(err)}`);
      this.update(job.id, {
        status: 'error',
        message: failedStage ? STAGE_FAILURES[failedStage] : 'Processing failed',
        error: errorMessage(err),
        failedStage,
        segmentIndex
      });
    }
  }
}
