import { LanguageCode } from './types.js';

export interface PlayerInput {
  video: Buffer;
  videoMimeType: string;
  vtt: string;
  targetLang: LanguageCode;
}

export const toDataUri = (bytes: Buffer, mimeType: string): string =>
  `data:${mimeType};base64,${bytes.toString('base64')}`;

const escapeAttr = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');

// Inline video + subtitle track, both as base64 data URIs
export function buildPlayerMarkup({ video, videoMimeType, vtt, targetLang }: PlayerInput): string {
  const videoUri = toDataUri(video, videoMimeType);
  const subsUri = toDataUri(Buffer.from(vtt, 'utf-8'), 'text/vtt');

  return [
    '<video controls width="640" style="border-radius:10px;" crossorigin="anonymous">',
    `  <source src="${escapeAttr(videoUri)}" type="${escapeAttr(videoMimeType)}">`,
    `  <track src="${escapeAttr(subsUri)}" kind="subtitles" srclang="${escapeAttr(targetLang)}" label="${escapeAttr(targetLang.toUpperCase())}" default>`,
    '  Your browser does not support the video tag.',
    '</video>'
  ].join('\n');
}
