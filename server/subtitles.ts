import fs from 'fs/promises';
import { Segment, TranslatedSegment } from './types.js';
import { EmitFailedError, errorMessage } from './errors.js';

const pad = (value: number, width: number) => value.toString().padStart(width, '0');

interface TimeParts {
  hrs: number;
  mins: number;
  secs: number;
  ms: number;
}

// Every field is truncated, never rounded: 1.9995s is 00:00:01.999
function splitSeconds(seconds: number): TimeParts {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new RangeError(`Timestamp must be a non-negative number of seconds, got ${seconds}`);
  }
  return {
    hrs: Math.floor(seconds / 3600),
    mins: Math.floor((seconds % 3600) / 60),
    secs: Math.floor(seconds % 60),
    ms: Math.floor((seconds * 1000) % 1000)
  };
}

// Convert seconds to WebVTT timestamp format: 00:00:00.000
export function formatTimestamp(seconds: number): string {
  const { hrs, mins, secs, ms } = splitSeconds(seconds);
  return `${pad(hrs, 2)}:${pad(mins, 2)}:${pad(secs, 2)}.${pad(ms, 3)}`;
}

// Same truncation, SRT flavour: 00:00:00,000
export function formatSrtTimestamp(seconds: number): string {
  const { hrs, mins, secs, ms } = splitSeconds(seconds);
  return `${pad(hrs, 2)}:${pad(mins, 2)}:${pad(secs, 2)},${pad(ms, 3)}`;
}

// A blank line ends a cue, so one segment must never contain one
function cueText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/\n(?:[ \t]*\n)+/g, '\n')
    .replace(/^\n+|\n+$/g, '');
}

// "-->" would read as a timing line; players render the entity as ">"
const escapeArrow = (text: string) => text.replace(/-->/g, '--&gt;');
const unescapeArrow = (text: string) => text.replace(/--&gt;/g, '-->');

export function buildVtt(segments: TranslatedSegment[]): string {
  let out = 'WEBVTT\n\n';
  for (const seg of segments) {
    out += `${formatTimestamp(seg.start)} --> ${formatTimestamp(seg.end)}\n${escapeArrow(cueText(seg.text))}\n\n`;
  }
  return out;
}

export function buildSrt(segments: TranslatedSegment[]): string {
  return segments
    .map((seg, index) =>
      `${index + 1}\n${formatSrtTimestamp(seg.start)} --> ${formatSrtTimestamp(seg.end)}\n${cueText(seg.text)}\n`
    )
    .join('\n');
}

export async function writeVtt(segments: TranslatedSegment[], filePath: string): Promise<string> {
  let content: string;
  try {
    content = buildVtt(segments);
  } catch (err) {
    throw new EmitFailedError(`Could not format subtitles: ${errorMessage(err)}`, { cause: err });
  }
  try {
    await fs.writeFile(filePath, content, 'utf-8');
  } catch (err) {
    throw new EmitFailedError(`Could not write ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return content;
}

const TIMING_LINE = /^((?:\d+:)?\d{2}:\d{2}\.\d{3})\s+-->\s+((?:\d+:)?\d{2}:\d{2}\.\d{3})/;

export function parseVttTimestamp(value: string): number {
  const [clock, fraction] = value.split('.');
  const fields = clock.split(':').map((part) => parseInt(part, 10));
  const [hrs, mins, secs] = fields.length === 3 ? fields : [0, fields[0], fields[1]];
  return hrs * 3600 + mins * 60 + secs + parseInt(fraction, 10) / 1000;
}

// Parse a WebVTT file back into timed segments
export function parseVtt(content: string): Segment[] {
  const normalized = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  if (!/^WEBVTT(?:[ \t]|\n|$)/.test(normalized)) {
    throw new Error('Not a WebVTT file: missing WEBVTT header');
  }

  const segments: Segment[] = [];
  // The first block is the header
  const blocks = normalized.split(/\n[ \t]*\n/).slice(1);

  for (const block of blocks) {
    const lines = block.replace(/\n+$/, '').split('\n');
    if (/^(NOTE|STYLE|REGION)\b/.test(lines[0])) continue;

    // Line 0 may be an optional cue identifier
    const timingIndex = lines.findIndex((line) => line.includes('-->'));
    if (timingIndex === -1 || timingIndex > 1) continue;

    const match = TIMING_LINE.exec(lines[timingIndex].trim());
    if (!match) continue;

    segments.push({
      start: parseVttTimestamp(match[1]),
      end: parseVttTimestamp(match[2]),
      text: unescapeArrow(lines.slice(timingIndex + 1).join('\n'))
    });
  }
  return segments;
}
