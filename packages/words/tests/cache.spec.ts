import { createRequire } from 'node:module';
import { Worker } from 'node:worker_threads';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ConfigurationError,
  DictionaryCache,
  PayloadError,
  decodePayload,
  encodePayload,
  getDefaultCache,
  isDebugMode,
  listLanguages,
  setLoggerConfig,
  type CompressedPayload,
  type LogSink,
} from '../src/index.js';

const FIXTURES: Record<string, readonly string[]> = {
  en: ['apple', 'banana', 'cherry'],
  de: ['Apfel', 'Birne'],
};

function fixturePayload(lang: string): CompressedPayload {
  return encodePayload(lang, lang, FIXTURES[lang] ?? [`${lang}-word`]);
}

interface WorkerReport {
  loadedBefore: boolean;
  size: number;
  known: boolean;
}

const requireFrom = createRequire(import.meta.url);

// Workers load the TypeScript entry through tsx's programmatic loader.
const WORKER_BOOT = `
const { workerData } = require('node:worker_threads');
const { tsImport } = require(workerData.tsx);
tsImport(workerData.entry, workerData.entry);
`;

function runWorker(): Promise<WorkerReport> {
  const workerData = {
    tsx: requireFrom.resolve('tsx/esm/api'),
    entry: new URL('./fixtures/dictionary-worker.ts', import.meta.url).href,
  };
  return new Promise((resolve, reject) => {
    const worker = new Worker(WORKER_BOOT, { eval: true, workerData });
    worker.once('message', (report: WorkerReport) => resolve(report));
    worker.once('error', reject);
  });
}

describe('DictionaryCache', () => {
  let sink: LogSink;

  beforeEach(() => {
    sink = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    setLoggerConfig({ sink, debugMode: false });
  });

  afterEach(() => {
    setLoggerConfig({ sink: console, debugMode: false });
  });

  it('builds a language on first use and returns the same dictionary after', () => {
    const decode = vi.fn(decodePayload);
    const cache = new DictionaryCache({ loadPayload: fixturePayload, decode });

    expect(cache.isLoaded('en')).toBe(false);
    const first = cache.dictionaryFor('en');
    const second = cache.dictionaryFor('en');

    expect(first).toBe(second);
    expect(first.words).toEqual(['apple', 'banana', 'cherry']);
    expect(decode).toHaveBeenCalledTimes(1);
    expect(cache.isLoaded('en')).toBe(true);
  });

  it('builds once for interleaved async first callers', async () => {
    const decode = vi.fn(decodePayload);
    const cache = new DictionaryCache({ loadPayload: fixturePayload, decode });

    const sizes = await Promise.all(
      Array.from({ length: 64 }, async (_, i) => {
        await new Promise((resolve) => setTimeout(resolve, i % 4));
        return cache.dictionaryFor('en').size;
      })
    );

    expect(new Set(sizes)).toEqual(new Set([3]));
    expect(decode).toHaveBeenCalledTimes(1);
  });

  it('keeps languages independent', () => {
    const loadPayload = vi.fn(fixturePayload);
    const cache = new DictionaryCache({ loadPayload });

    cache.dictionaryFor('de');
    expect(cache.isLoaded('de')).toBe(true);
    expect(cache.isLoaded('en')).toBe(false);
    expect(loadPayload).toHaveBeenCalledWith('de');
    expect(loadPayload).not.toHaveBeenCalledWith('en');
  });

  it('rejects an unsupported language', () => {
    const cache = new DictionaryCache({ loadPayload: fixturePayload });
    expect(() => cache.dictionaryFor('xx')).toThrow(ConfigurationError);
    expect(() => cache.dictionaryFor('xx')).toThrow(
      'Language "xx" is not a supported language'
    );
  });

  it('treats a corrupt payload as fatal for that language only', () => {
    const decode = vi.fn(decodePayload);
    const loadPayload = (lang: string): CompressedPayload =>
      lang === 'de'
        ? { ...fixturePayload('de'), count: 5 }
        : fixturePayload(lang);
    const cache = new DictionaryCache({ loadPayload, decode });

    expect(() => cache.dictionaryFor('de')).toThrow(PayloadError);
    expect(() => cache.dictionaryFor('de')).toThrow('expected 5 words, found 2');
    expect(decode).toHaveBeenCalledTimes(1);
    expect(sink.error).toHaveBeenCalledWith(
      '[lexiphrase] error [cache] failed to build "de": ' +
        'Corrupt payload for "de": expected 5 words, found 2'
    );

    expect(cache.dictionaryFor('en').size).toBe(3);
  });

  it('logs each build in debug mode', () => {
    setLoggerConfig({ debugMode: true });
    expect(isDebugMode()).toBe(true);
    const cache = new DictionaryCache({ loadPayload: fixturePayload });

    cache.dictionaryFor('en');

    expect(sink.log).toHaveBeenCalledTimes(1);
    expect(sink.log).toHaveBeenCalledWith(
      expect.stringMatching(
        /^\[lexiphrase\] debug \[cache\] built "en": 3 words in \d+\.\d{2}ms$/
      )
    );
  });

  it('logs nothing for a build when debug mode is off', () => {
    expect(isDebugMode()).toBe(false);
    new DictionaryCache({ loadPayload: fixturePayload }).dictionaryFor('en');
    expect(sink.log).not.toHaveBeenCalled();
  });

  it('warms up every enabled language by default', () => {
    const cache = new DictionaryCache({ loadPayload: fixturePayload });
    cache.warmup();
    for (const lang of listLanguages()) {
      expect(cache.isLoaded(lang)).toBe(true);
    }
  });

  it('warms up only the languages asked for', () => {
    const cache = new DictionaryCache({ loadPayload: fixturePayload });
    cache.warmup(['de']);
    expect(cache.isLoaded('de')).toBe(true);
    expect(cache.isLoaded('en')).toBe(false);
  });
});

describe('getDefaultCache', () => {
  it('returns one cache per process', () => {
    expect(getDefaultCache()).toBe(getDefaultCache());
  });

  it('decodes the embedded payloads', () => {
    const dictionary = getDefaultCache().dictionaryFor('en');
    expect(dictionary.size).toBe(7776);
    expect(dictionary.lang).toBe('en');
  });
});

describe('worker threads', () => {
  it('gives every worker its own cache over the same payloads', async () => {
    getDefaultCache().dictionaryFor('en');

    const reports = await Promise.all([runWorker(), runWorker(), runWorker()]);

    expect(reports).toEqual([
      { loadedBefore: false, size: 7776, known: true },
      { loadedBefore: false, size: 7776, known: true },
      { loadedBefore: false, size: 7776, known: true },
    ]);
  }, 30_000);
});
