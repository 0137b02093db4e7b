import { spawn } from 'child_process';
import { z } from 'zod';
import { LanguageCode, Segment } from './types.js';
import { TranscriptionFailedError } from './errors.js';
import { Logger } from './logger.js';

export interface TranscribeOptions {
  // 0..1, derived from the audio duration the worker reports
  onProgress?: (fraction: number) => void;
}

export interface Transcriber {
  transcribe(audioPath: string, language: LanguageCode, options?: TranscribeOptions): Promise<Segment[]>;
}

export interface WhisperOptions {
  pythonBin: string;
  scriptPath: string;
  model: string;
  device: string;
  computeType: string;
}

const WorkerMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('segment'),
    start: z.number().min(0),
    end: z.number().min(0),
    text: z.string()
  }),
  z.object({
    type: z.literal('info'),
    language: z.string().nullable(),
    duration: z.number().nullable()
  })
]);

export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;

// Returns null for plain log lines; JSON that is not a known message is an error
export function parseWorkerLine(line: string): WorkerMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = WorkerMessageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TranscriptionFailedError(`Malformed transcription output: ${line}`);
  }
  return parsed.data;
}

const MAX_STDERR_CHARS = 4000;

// Runs the faster-whisper worker script and collects its segments in order
export class WhisperTranscriber implements Transcriber {
  constructor(private readonly options: WhisperOptions, private readonly logger: Logger) {}

  transcribe(audioPath: string, language: LanguageCode, options: TranscribeOptions = {}): Promise<Segment[]> {
    const { pythonBin, scriptPath, model, device, computeType } = this.options;
    const args = [
      scriptPath, audioPath,
      '--language', language,
      '--model', model,
      '--device', device,
      '--compute-type', computeType
    ];

    return new Promise<Segment[]>((resolve, reject) => {
      const worker = spawn(pythonBin, args);
      const segments: Segment[] = [];
      let duration: number | null = null;
      let pending = '';
      let errorOutput = '';
      let failure: TranscriptionFailedError | null = null;

      const handleLine = (line: string) => {
        if (!line.trim() || failure) return;
        let msg: WorkerMessage | null;
        try {
          msg = parseWorkerLine(line);
        } catch (err) {
          failure = err instanceof TranscriptionFailedError
            ? err
            : new TranscriptionFailedError(String(err), { cause: err });
          worker.kill();
          return;
        }
        if (!msg) {
          this.logger.debug(`[whisper] ${line}`);
          return;
        }
        if (msg.type === 'info') {
          duration = msg.duration;
          this.logger.info(`Detected language ${msg.language ?? 'unknown'}, duration ${msg.duration ?? '?'}s`);
          return;
        }
        segments.push({ start: msg.start, end: msg.end, text: msg.text.trim() });
        if (duration && options.onProgress) {
          options.onProgress(Math.min(1, msg.end / duration));
        }
      };

      // Decode across chunks so a character split between reads stays whole
      worker.stdout.setEncoding('utf8');
      worker.stderr.setEncoding('utf8');

      worker.stdout.on('data', (data: string) => {
        pending += data;
        const lines = pending.split('\n');
        pending = lines.pop() ?? '';
        lines.forEach(handleLine);
      });

      worker.stderr.on('data', (data: string) => {
        errorOutput = (errorOutput + data).slice(-MAX_STDERR_CHARS);
      });

      worker.on('error', (err) => {
        reject(new TranscriptionFailedError(
          `Failed to spawn "${pythonBin}". Make sure Python and faster-whisper are installed. Details: ${err.message}`,
          { cause: err }
        ));
      });

      worker.on('close', (code) => {
        handleLine(pending);
        pending = '';
        if (failure) {
          reject(failure);
        } else if (code !== 0) {
          reject(new TranscriptionFailedError(`Transcription failed (exit ${code}): ${errorOutput.trim() || 'Unknown error'}`));
        } else {
          resolve(segments);
        }
      });
    });
  }
}
