import fs from 'fs/promises';
import { Logger } from './logger.js';
import { AudioExtractor } from './extractor.js';
import { TranscribeOptions, Transcriber } from './transcriber.js';
import { Translator } from './translator.js';
import { LanguageCode, Segment } from './types.js';

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function recordingLogger(lines: string[] = []): RecordingLogger {
  const record = (level: string) => (message: string) => {
    lines.push(`${level} ${message}`);
  };
  return {
    lines,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child: () => recordingLogger(lines)
  };
}

// Writes a placeholder audio file next to the video
export class FakeExtractor implements AudioExtractor {
  readonly calls: { videoPath: string; audioPath: string }[] = [];

  constructor(private readonly failWith?: Error) {}

  async extract(videoPath: string, audioPath: string): Promise<void> {
    this.calls.push({ videoPath, audioPath });
    if (this.failWith) throw this.failWith;
    await fs.writeFile(audioPath, 'fake-mp3');
  }
}

export class FakeTranscriber implements Transcriber {
  readonly calls: { audioPath: string; language: LanguageCode; audio: string }[] = [];

  constructor(private readonly segments: Segment[], private readonly failWith?: Error) {}

  async transcribe(audioPath: string, language: LanguageCode, options: TranscribeOptions = {}): Promise<Segment[]> {
    this.calls.push({ audioPath, language, audio: await fs.readFile(audioPath, 'utf-8') });
    if (this.failWith) throw this.failWith;
    options.onProgress?.(1);
    return this.segments;
  }
}

export class FakeTranslator implements Translator {
  readonly calls: string[] = [];

  constructor(private readonly words: Record<string, string>) {}

  async translate(text: string, targetLang: LanguageCode): Promise<string> {
    this.calls.push(`${text}->${targetLang}`);
    const word = this.words[text];
    if (word === undefined) {
      throw new Error(`Request failed with status code 429`);
    }
    return word;
  }
}
