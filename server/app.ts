import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { z } from 'zod';
import { LANGUAGE_CODES } from './types.js';
import { JobBusyError, JobManager } from './jobs.js';
import { buildSrt } from './subtitles.js';
import { errorMessage } from './errors.js';
import { Logger } from './logger.js';

export interface AppOptions {
  jobs: JobManager;
  logger: Logger;
  uploadDir: string;
  uploadLimitBytes: number;
}

const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.mkv', '.webm', '.avi'];

const JobRequestSchema = z.object({
  sourceLang: z.enum(LANGUAGE_CODES),
  targetLang: z.enum(LANGUAGE_CODES)
});

const SUBTITLE_FORMATS = {
  vtt: { contentType: 'text/vtt; charset=utf-8' },
  srt: { contentType: 'application/x-subrip; charset=utf-8' }
} as const;

const isSubtitleFormat = (value: string): value is keyof typeof SUBTITLE_FORMATS =>
  Object.prototype.hasOwnProperty.call(SUBTITLE_FORMATS, value);

export function createApp({ jobs, logger, uploadDir, uploadLimitBytes }: AppOptions) {
  const app = express();

  app.use(cors({ origin: '*' }));
  app.use(express.json());

  fs.mkdirSync(uploadDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: (req, file, cb) => {
      cb(null, uploadDir);
    },
    filename: (req, file, cb) => {
      const cleanName = file.originalname.replace(/[^a-zA-Z0-9.-]/g, '_');
      const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1E9);
      cb(null, uniqueSuffix + '-' + cleanName);
    }
  });
  const upload = multer({
    storage,
    limits: { fileSize: uploadLimitBytes, files: 1 },
    fileFilter: (req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      cb(null, file.mimetype.startsWith('video/') || VIDEO_EXTENSIONS.includes(ext));
    }
  });

  const discardUpload = (filePath: string) => {
    fs.promises.rm(filePath, { force: true }).catch((err: unknown) => {
      logger.warn(`Could not remove upload ${filePath}: ${errorMessage(err)}`);
    });
  };

  app.get('/api/languages', (req: Request, res: Response) => {
    res.json({ languages: LANGUAGE_CODES });
  });

  app.post('/api/jobs', upload.single('file'), (req: Request, res: Response) => {
    const file = req.file;
    if (!file) {
      res.status(400).json({ error: 'No video file uploaded' });
      return;
    }

    const parsed = JobRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      discardUpload(file.path);
      res.status(400).json({ error: `Unsupported language selection. Choose from: ${LANGUAGE_CODES.join(', ')}` });
      return;
    }

    try {
      const job = jobs.start(
        { path: file.path, originalFilename: file.originalname, mimeType: file.mimetype || 'video/mp4' },
        parsed.data.sourceLang,
        parsed.data.targetLang
      );
      res.json({ jobId: job.id });
    } catch (err) {
      discardUpload(file.path);
      if (err instanceof JobBusyError) {
        res.status(409).json({ error: 'Another video is still being processed. Try again when it finishes.' });
        return;
      }
      throw err;
    }
  });

  app.get('/api/jobs/:jobId', (req: Request, res: Response) => {
    const job = jobs.get(req.params.jobId);
    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }
    res.json(job);
  });

  app.get('/api/jobs/:jobId/subtitles.:format', (req: Request, res: Response) => {
    const { jobId, format } = req.params;
    const job = jobs.get(jobId);

    if (!job || job.status !== 'done' || !job.result) {
      res.status(404).json({ error: 'File not ready or job not found' });
      return;
    }
    if (!isSubtitleFormat(format)) {
      res.status(400).json({ error: 'Invalid format' });
      return;
    }

    const body = format === 'vtt' ? job.result.vtt : buildSrt(job.result.cues);
    res.type(SUBTITLE_FORMATS[format].contentType);
    res.attachment(`subtitles.${job.targetLang}.${format}`);
    res.send(body);
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: `Upload error: ${err.message}` });
      return;
    }
    logger.error(`Unhandled request error: ${errorMessage(err)}`);
    res.status(500).json({ error: errorMessage(err) || 'Internal Server Error' });
  });

  return app;
}
