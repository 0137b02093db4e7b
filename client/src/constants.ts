import { LanguageCode } from './types.js';

export const API_BASE = 'http://localhost:3001/api';
export const SERVER_ORIGIN = 'http://localhost:3001';

export const LANGUAGES: { code: LanguageCode; label: string }[] = [
  { code: 'en', label: 'English' },
  { code: 'ta', label: 'Tamil' },
  { code: 'fr', label: 'French' },
  { code: 'es', label: 'Spanish' },
  { code: 'de', label: 'German' },
  { code: 'zh', label: 'Chinese' },
  { code: 'hi', label: 'Hindi' }
];

export const STAGE_LABELS: Record<string, string> = {
  upload: 'Uploading Video',
  extract: 'Extracting Audio',
  transcribe: 'Transcribing Audio',
  translate: 'Translating Subtitles',
  emit: 'Building Subtitle Track',
  assemble: 'Preparing Player',
  complete: 'Process Complete'
};
