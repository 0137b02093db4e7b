import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { LanguageCode, Segment, TranslatedSegment } from './types.js';
import { TranslationFailedError, errorMessage } from './errors.js';

export interface Translator {
  translate(text: string, targetLang: LanguageCode, sourceLang?: LanguageCode): Promise<string>;
}

export interface GoogleTranslatorOptions {
  endpoint: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

const ResponseSchema = z.tuple([z.array(z.array(z.unknown()))]).rest(z.unknown());

// The gtx endpoint answers [[["Bonjour","Hello",...], ...], null, "en", ...]
export function parseTranslateResponse(data: unknown): string {
  const parsed = ResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error('Unexpected translation response shape');
  }
  const chunks = parsed.data[0]
    .map((chunk) => chunk[0])
    .filter((piece): piece is string => typeof piece === 'string');
  if (chunks.length === 0) {
    throw new Error('Translation response contained no text');
  }
  return chunks.join('');
}

export class GoogleTranslator implements Translator {
  private readonly http: AxiosInstance;

  constructor(private readonly options: GoogleTranslatorOptions) {
    this.http = options.http ?? axios.create();
  }

  async translate(text: string, targetLang: LanguageCode, sourceLang?: LanguageCode): Promise<string> {
    if (!text.trim()) return text;

    const res = await this.http.get<unknown>(this.options.endpoint, {
      params: {
        client: 'gtx',
        sl: sourceLang ?? 'auto',
        tl: targetLang,
        dt: 't',
        q: text
      },
      timeout: this.options.timeoutMs
    });
    return parseTranslateResponse(res.data);
  }
}

export interface TranslateSegmentsOptions {
  targetLang: LanguageCode;
  sourceLang?: LanguageCode;
  concurrency?: number;
  onProgress?: (fraction: number) => void;
}

// One call per segment, at most `concurrency` in flight, results kept in input order
export async function translateSegments(
  segments: Segment[],
  translator: Translator,
  { targetLang, sourceLang, concurrency = 1, onProgress }: TranslateSegmentsOptions
): Promise<TranslatedSegment[]> {
  const translated: TranslatedSegment[] = new Array(segments.length);
  let next = 0;
  let completed = 0;
  let failed = false;

  const worker = async () => {
    while (!failed && next < segments.length) {
      const index = next++;
      const seg = segments[index];
      let text: string;
      try {
        text = await translator.translate(seg.text, targetLang, sourceLang);
      } catch (err) {
        failed = true;
        throw new TranslationFailedError(index, errorMessage(err), { cause: err });
      }
      translated[index] = { start: seg.start, end: seg.end, text };
      completed++;
      onProgress?.(completed / segments.length);
    }
  };

  const workers = Math.max(1, Math.min(concurrency, segments.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return translated;
}
