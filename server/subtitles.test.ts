import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { buildSrt, buildVtt, formatSrtTimestamp, formatTimestamp, parseVtt, writeVtt } from './subtitles.js';
import { EmitFailedError } from './errors.js';
import { TranslatedSegment } from './types.js';

describe('formatTimestamp', () => {
  it('formats zero', () => {
    expect(formatTimestamp(0)).toBe('00:00:00.000');
  });

  it('splits hours, minutes, seconds and milliseconds', () => {
    expect(formatTimestamp(3661.5)).toBe('01:01:01.500');
  });

  it('truncates instead of rounding', () => {
    expect(formatTimestamp(59.9999)).toBe('00:00:59.999');
    expect(formatTimestamp(1.9995)).toBe('00:00:01.999');
  });

  it('lets hours grow past two digits', () => {
    expect(formatTimestamp(100 * 3600)).toBe('100:00:00.000');
  });

  it('rejects negative and non-finite input', () => {
    expect(() => formatTimestamp(-1)).toThrow(RangeError);
    expect(() => formatTimestamp(Number.NaN)).toThrow(RangeError);
  });

  it('has an SRT variant with a comma separator', () => {
    expect(formatSrtTimestamp(3661.5)).toBe('01:01:01,500');
  });
});

const french: TranslatedSegment[] = [
  { start: 0.0, end: 1.2, text: 'Bonjour' },
  { start: 1.2, end: 3.0, text: 'Monde' }
];

describe('buildVtt', () => {
  it('renders the header and one block per segment', () => {
    expect(buildVtt(french)).toBe(
      'WEBVTT\n\n' +
      '00:00:00.000 --> 00:00:01.200\nBonjour\n\n' +
      '00:00:01.200 --> 00:00:03.000\nMonde\n\n'
    );
  });

  it('renders only the header for no segments', () => {
    expect(buildVtt([])).toBe('WEBVTT\n\n');
  });

  it('keeps a segment with blank lines as a single cue', () => {
    const vtt = buildVtt([{ start: 0, end: 1, text: 'one\n\ntwo\r\n' }]);
    expect(vtt).toBe('WEBVTT\n\n00:00:00.000 --> 00:00:01.000\none\ntwo\n\n');
  });

  it('escapes an arrow inside cue text', () => {
    const vtt = buildVtt([{ start: 0, end: 1, text: 'A --> B' }]);
    expect(vtt).toBe('WEBVTT\n\n00:00:00.000 --> 00:00:01.000\nA --&gt; B\n\n');
  });
});

describe('parseVtt', () => {
  it('reads back the cues it wrote, in order', () => {
    const segments: TranslatedSegment[] = [
      { start: 0.25, end: 2.5, text: 'premier' },
      { start: 2.5, end: 4.75, text: 'deuxième\nligne' },
      { start: 3725.125, end: 3727.0, text: 'troisième' }
    ];
    const parsed = parseVtt(buildVtt(segments));

    expect(parsed).toHaveLength(segments.length);
    parsed.forEach((cue, i) => {
      expect(cue.text).toBe(segments[i].text);
      expect(Math.abs(cue.start - segments[i].start)).toBeLessThan(0.001);
      expect(Math.abs(cue.end - segments[i].end)).toBeLessThan(0.001);
    });
  });

  it('reads back text that contained an arrow', () => {
    const parsed = parseVtt(buildVtt([
      { start: 0, end: 1, text: 'Paris --> Lyon' },
      { start: 1, end: 2, text: 'suite' }
    ]));

    expect(parsed.map((cue) => cue.text)).toEqual(['Paris --> Lyon', 'suite']);
  });

  it('stays within a millisecond when the source had finer timing', () => {
    const [cue] = parseVtt(buildVtt([{ start: 1.9995, end: 2.0004, text: 'x' }]));
    expect(cue.start).toBeCloseTo(1.999, 6);
    expect(2.0004 - cue.end).toBeLessThan(0.001);
  });

  it('skips identifiers, notes and cue settings', () => {
    const content = [
      'WEBVTT - sample',
      '',
      'NOTE written by hand',
      '',
      'intro',
      '00:01.000 --> 00:02.500 align:start',
      'Hi',
      '',
      '01:00:00.000 --> 01:00:01.000',
      'Bye',
      ''
    ].join('\r\n');

    expect(parseVtt(content)).toEqual([
      { start: 1, end: 2.5, text: 'Hi' },
      { start: 3600, end: 3601, text: 'Bye' }
    ]);
  });

  it('rejects content without the header', () => {
    expect(() => parseVtt('00:00:00.000 --> 00:00:01.000\nHi\n')).toThrow('missing WEBVTT header');
  });
});

describe('buildSrt', () => {
  it('numbers cues and uses comma timestamps', () => {
    expect(buildSrt(french)).toBe(
      '1\n00:00:00,000 --> 00:00:01,200\nBonjour\n\n' +
      '2\n00:00:01,200 --> 00:00:03,000\nMonde\n'
    );
  });
});

describe('writeVtt', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it('writes the track and returns its content', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vtt-test-'));
    const target = path.join(dir, 'subs.vtt');

    const content = await writeVtt(french, target);

    expect(await fs.readFile(target, 'utf-8')).toBe(content);
    expect(content.startsWith('WEBVTT\n\n')).toBe(true);
  });

  it('reports write failures as EmitFailedError', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vtt-test-'));
    const target = path.join(dir, 'missing', 'subs.vtt');

    await expect(writeVtt(french, target)).rejects.toBeInstanceOf(EmitFailedError);
  });

  it('reports bad timing as EmitFailedError', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vtt-test-'));
    const target = path.join(dir, 'subs.vtt');

    await expect(writeVtt([{ start: -1, end: 1, text: 'x' }], target)).rejects.toMatchObject({
      name: 'EmitFailedError',
      stage: 'emit'
    });
  });
});
