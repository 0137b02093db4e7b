import os from 'os';
import path from 'path';
import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export const MAX_UPLOAD_MB = 320;

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  // The player inlines the whole video as one base64 string, which V8 caps just under 2^29 characters
  UPLOAD_LIMIT_MB: z.coerce.number().int().positive().max(MAX_UPLOAD_MB).default(200),
  WORK_DIR: z.string().min(1).default(os.tmpdir()),
  PYTHON_BIN: z.string().min(1).default(process.platform === 'win32' ? 'python' : 'python3'),
  TRANSCRIBE_SCRIPT: z.string().min(1).default(path.resolve(process.cwd(), 'transcribe_service.py')),
  WHISPER_MODEL: z.string().min(1).default('small'),
  WHISPER_DEVICE: z.string().min(1).default('cpu'),
  WHISPER_COMPUTE_TYPE: z.string().min(1).default('int8'),
  TRANSLATE_ENDPOINT: z.string().url().default('https://translate.googleapis.com/translate_a/single'),
  TRANSLATE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  TRANSLATE_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

export type LogLevel = typeof LOG_LEVELS[number];

export interface AppConfig {
  port: number;
  uploadLimitBytes: number;
  workDir: string;
  whisper: {
    pythonBin: string;
    scriptPath: string;
    model: string;
    device: string;
    computeType: string;
  };
  translate: {
    endpoint: string;
    timeoutMs: number;
    concurrency: number;
  };
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty variables fall back to their defaults
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = ConfigSchema.safeParse(defined);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const c = parsed.data;

  return {
    port: c.PORT,
    uploadLimitBytes: c.UPLOAD_LIMIT_MB * 1024 * 1024,
    workDir: path.resolve(c.WORK_DIR),
    whisper: {
      pythonBin: c.PYTHON_BIN,
      scriptPath: path.resolve(c.TRANSCRIBE_SCRIPT),
      model: c.WHISPER_MODEL,
      device: c.WHISPER_DEVICE,
      computeType: c.WHISPER_COMPUTE_TYPE
    },
    translate: {
      endpoint: c.TRANSLATE_ENDPOINT,
      timeoutMs: c.TRANSLATE_TIMEOUT_MS,
      concurrency: c.TRANSLATE_CONCURRENCY
    },
    logLevel: c.LOG_LEVEL
  };
}
