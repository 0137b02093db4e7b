import path from 'path';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createApp } from './app.js';
import { JobManager } from './jobs.js';
import { SubtitlePipeline } from './pipeline.js';
import { FfmpegAudioExtractor } from './extractor.js';
import { WhisperTranscriber } from './transcriber.js';
import { GoogleTranslator } from './translator.js';

const config = loadConfig();
const logger = createLogger('server', config.logLevel);

// Collaborators are created once here and handed to the pipeline
const pipeline = new SubtitlePipeline({
  extractor: new FfmpegAudioExtractor(),
  transcriber: new WhisperTranscriber(config.whisper, logger.child('whisper')),
  translator: new GoogleTranslator(config.translate),
  logger,
  workDir: config.workDir,
  translateConcurrency: config.translate.concurrency
});

const app = createApp({
  jobs: new JobManager(pipeline, logger),
  logger,
  uploadDir: path.join(config.workDir, 'subtitle-uploads'),
  uploadLimitBytes: config.uploadLimitBytes
});

app.listen(config.port, () => {
  logger.info(`Server running on http://localhost:${config.port}`);
});
