import { JobStatus } from './types.js';
import { SERVER_ORIGIN, STAGE_LABELS } from './constants.js';

export const getFullUrl = (path: string) => {
  if (path.startsWith('http')) return path;
  return `${SERVER_ORIGIN}${path}`;
};

// Display form of a cue time, truncated like the track itself
export function formatCueTime(seconds: number): string {
  const totalMs = Math.floor(Math.max(0, seconds) * 1000);
  const ms = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const mins = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return `${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}.${ms.toString().padStart(3, '0')}`;
}

export function describeFailure(job: JobStatus): string {
  const detail = job.error || 'Unknown error';
  if (!job.failedStage) return detail;
  const where = STAGE_LABELS[job.failedStage] || job.failedStage;
  const segment = job.segmentIndex !== undefined ? ` (segment ${job.segmentIndex + 1})` : '';
  return `${where}${segment}: ${detail}`;
}
