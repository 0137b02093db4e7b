import axios, { InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { GoogleTranslator, Translator, parseTranslateResponse, translateSegments } from './translator.js';
import { TranslationFailedError } from './errors.js';
import { LanguageCode, Segment } from './types.js';

const fakeHttp = (handler: (config: InternalAxiosRequestConfig) => unknown) =>
  axios.create({
    adapter: async (config) => ({
      data: handler(config),
      status: 200,
      statusText: 'OK',
      headers: {},
      config
    })
  });

const ENDPOINT = 'https://translate.test/translate_a/single';

describe('parseTranslateResponse', () => {
  it('joins the translated chunks', () => {
    const data = [[['Bonjour. ', 'Hello. ', null, null, 10], ['Le monde', 'The world', null, null, 10]], null, 'en'];
    expect(parseTranslateResponse(data)).toBe('Bonjour. Le monde');
  });

  it('rejects unexpected shapes', () => {
    expect(() => parseTranslateResponse({ text: 'Bonjour' })).toThrow('Unexpected translation response shape');
    expect(() => parseTranslateResponse([[]])).toThrow('no text');
  });
});

describe('GoogleTranslator', () => {
  it('sends the text and languages as query parameters', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const translator = new GoogleTranslator({
      endpoint: ENDPOINT,
      timeoutMs: 1234,
      http: fakeHttp((config) => {
        seen.push(config);
        return [[['Hola', 'Hello', null, null, 1]], null, 'en'];
      })
    });

    await expect(translator.translate('Hello', 'es', 'en')).resolves.toBe('Hola');
    expect(seen).toHaveLength(1);
    expect(seen[0].url).toBe(ENDPOINT);
    expect(seen[0].timeout).toBe(1234);
    expect(seen[0].params).toEqual({ client: 'gtx', sl: 'en', tl: 'es', dt: 't', q: 'Hello' });
  });

  it('auto-detects the source when none is given', async () => {
    let sl: unknown;
    const translator = new GoogleTranslator({
      endpoint: ENDPOINT,
      timeoutMs: 1000,
      http: fakeHttp((config) => {
        sl = config.params.sl;
        return [[['Hallo', 'Hello']]];
      })
    });

    await translator.translate('Hello', 'de');
    expect(sl).toBe('auto');
  });

  it('skips the request for blank text', async () => {
    const handler = vi.fn(() => [[['x']]]);
    const translator = new GoogleTranslator({ endpoint: ENDPOINT, timeoutMs: 1000, http: fakeHttp(handler) });

    await expect(translator.translate('   ', 'fr')).resolves.toBe('   ');
    expect(handler).not.toHaveBeenCalled();
  });
});

class DictionaryTranslator implements Translator {
  readonly calls: string[] = [];

  constructor(private readonly words: Record<string, string>, private readonly delays: Record<string, number> = {}) {}

  async translate(text: string, targetLang: LanguageCode): Promise<string> {
    this.calls.push(`${text}->${targetLang}`);
    await new Promise((resolve) => setTimeout(resolve, this.delays[text] ?? 0));
    const word = this.words[text];
    if (word === undefined) throw new Error(`no translation for ${text}`);
    return word;
  }
}

const segments: Segment[] = [
  { start: 0.0, end: 1.2, text: 'Hello' },
  { start: 1.2, end: 3.0, text: 'World' },
  { start: 3.0, end: 4.5, text: 'Again' }
];

describe('translateSegments', () => {
  const words = { Hello: 'Bonjour', World: 'Monde', Again: 'Encore' };

  it('translates every segment once and keeps timing', async () => {
    const translator = new DictionaryTranslator(words);

    const result = await translateSegments(segments, translator, { targetLang: 'fr' });

    expect(translator.calls).toEqual(['Hello->fr', 'World->fr', 'Again->fr']);
    expect(result).toEqual([
      { start: 0.0, end: 1.2, text: 'Bonjour' },
      { start: 1.2, end: 3.0, text: 'Monde' },
      { start: 3.0, end: 4.5, text: 'Encore' }
    ]);
  });

  it('keeps input order when calls finish out of order', async () => {
    const translator = new DictionaryTranslator(words, { Hello: 30, World: 10, Again: 0 });

    const result = await translateSegments(segments, translator, { targetLang: 'fr', concurrency: 3 });

    expect(result.map((seg) => seg.text)).toEqual(['Bonjour', 'Monde', 'Encore']);
  });

  it('reports progress after each segment', async () => {
    const progress: number[] = [];

    await translateSegments(segments, new DictionaryTranslator(words), {
      targetLang: 'fr',
      onProgress: (fraction) => progress.push(fraction)
    });

    expect(progress).toEqual([1 / 3, 2 / 3, 1]);
  });

  it('returns nothing for no segments', async () => {
    await expect(translateSegments([], new DictionaryTranslator(words), { targetLang: 'fr' })).resolves.toEqual([]);
  });

  it('names the failing segment index', async () => {
    const translator = new DictionaryTranslator({ Hello: 'Bonjour', Again: 'Encore' });

    const failure = await translateSegments(segments, translator, { targetLang: 'fr' }).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(TranslationFailedError);
    expect(failure).toMatchObject({ stage: 'translate', segmentIndex: 1 });
    // Sequential dispatch stops at the first failure
    expect(translator.calls).toEqual(['Hello->fr', 'World->fr']);
  });
});
