import fs from 'fs/promises';
import ffmpeg from 'fluent-ffmpeg';
import { ExtractionFailedError, errorMessage } from './errors.js';

export interface AudioExtractor {
  extract(videoPath: string, audioPath: string): Promise<void>;
}

const lastLine = (text: string | null | undefined): string => {
  const lines = (text ?? '').trim().split('\n');
  return lines[lines.length - 1] ?? '';
};

// Strips the video stream and re-encodes the audio as mp3, overwriting audioPath
export class FfmpegAudioExtractor implements AudioExtractor {
  async extract(videoPath: string, audioPath: string): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      ffmpeg(videoPath)
        .noVideo()
        .audioCodec('libmp3lame')
        .save(audioPath)
        .on('end', () => resolve())
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
          const detail = lastLine(stderr) || err.message;
          reject(new ExtractionFailedError(`Audio extraction failed: ${detail}`, { cause: err }));
        });
    });

    // ffmpeg can exit cleanly without writing anything useful
    let size: number;
    try {
      size = (await fs.stat(audioPath)).size;
    } catch (err) {
      throw new ExtractionFailedError(`Audio extraction produced no file: ${errorMessage(err)}`, { cause: err });
    }
    if (size === 0) {
      throw new ExtractionFailedError('Audio extraction produced an empty file (does the video have an audio track?)');
    }
  }
}
