import { describe, expect, it } from 'vitest';
import {
  DictionaryCache,
  WordSource,
  all,
  allLen,
  allStartsWith,
  codePointLength,
  dictionarySize,
  encodePayload,
  firstChar,
  foldChar,
  get,
  getLen,
  getStartsWith,
  listLanguages,
  seededRandom,
  type RandomSource,
} from '../src/index.js';

const LANGS = listLanguages();

describe('embedded dictionaries', () => {
  it('builds all seven languages', () => {
    expect(LANGS).toEqual(['de', 'en', 'es', 'fr', 'ja', 'ru', 'zh']);
  });

  describe.each(LANGS)('%s', (lang) => {
    it('holds the documented number of words on every call', () => {
      expect(all(lang)).toHaveLength(7776);
      expect(dictionarySize(lang)).toBe(7776);
      expect(all(lang)).toBe(all(lang));
    });

    it('holds no duplicates and no empty words', () => {
      const words = all(lang);
      expect(new Set(words).size).toBe(words.length);
      expect(words.every((word) => word.length > 0)).toBe(true);
    });

    it('files every word under its own length', () => {
      for (const word of all(lang)) {
        expect(allLen(codePointLength(word), lang)).toContain(word);
      }
    });

    it('partitions the dictionary by length', () => {
      const source = new WordSource();
      const union = source
        .dictionary(lang)
        .index.lengths()
        .flatMap((length) => allLen(length, lang));
      expect(union).toHaveLength(7776);
      expect(new Set(union)).toEqual(new Set(all(lang)));
    });

    it('returns nothing for impossible lengths', () => {
      expect(allLen(0, lang)).toEqual([]);
      expect(allLen(1_000_000, lang)).toEqual([]);
      expect(getLen(0, lang)).toBeUndefined();
    });

    it('finds a word for every initial and only for initials that occur', () => {
      const initials = new Set(
        all(lang).map((word) => foldChar(firstChar(word) ?? ''))
      );
      for (const initial of initials) {
        const word = getStartsWith(initial, lang);
        expect(word).toBeDefined();
        expect(allStartsWith(initial, lang)).toContain(word);
      }
      for (const absent of ['7', '#', ' ', 'ω']) {
        expect(initials.has(absent)).toBe(false);
        expect(getStartsWith(absent, lang)).toBeUndefined();
      }
    });

    it('draws words from the dictionary', () => {
      const words = new Set(all(lang));
      for (let i = 0; i < 50; i++) {
        expect(words.has(get(lang))).toBe(true);
      }
    });
  });

  it('folds Latin initials to lower case', () => {
    const upper = all('de').filter((word) => word.startsWith('S'));
    const lower = all('de').filter((word) => word.startsWith('s'));
    expect(upper).toHaveLength(595);
    expect(lower).toHaveLength(694);
    expect(allStartsWith('S', 'de')).toHaveLength(1289);
    expect(allStartsWith('s', 'de')).toBe(allStartsWith('S', 'de'));
  });

  it('matches kana and hanzi exactly', () => {
    expect(allStartsWith('あ', 'ja')).toHaveLength(92);
    expect(allStartsWith('あ', 'ja').slice(0, 3)).toEqual([
      'ああ',
      'ああま',
      'あいろ',
    ]);
    expect(allStartsWith('を', 'ja')).toEqual([]);
    expect(allLen(2, 'zh').length + allLen(3, 'zh').length).toBe(7776);
  });

  it('keeps dictionary order in length buckets', () => {
    expect(allLen(3, 'en')).toHaveLength(257);
    expect(allLen(3, 'en').slice(0, 5)).toEqual([
      'bai',
      'bam',
      'bea',
      'bey',
      'bla',
    ]);
  });

  it('has no English word starting with q or x', () => {
    expect(getStartsWith('q', 'en')).toBeUndefined();
    expect(getStartsWith('x', 'en')).toBeUndefined();
  });

  it('narrows by a longer prefix', () => {
    const words = allStartsWith('sch', 'de');
    expect(words).toHaveLength(474);
    expect(words.slice(0, 3)).toEqual(['Scha', 'Schabeuß', 'Schabie']);
  });
});

describe('WordSource', () => {
  const cache = new DictionaryCache({
    loadPayload: (lang) =>
      encodePayload(lang, lang, ['kiwi', 'lime', 'mango', 'melon', 'peach']),
  });

  function fixedRandom(values: number[]): RandomSource {
    let i = 0;
    return { nextInt: (bound) => values[i++ % values.length] % bound };
  }

  it('lists the languages it can serve', () => {
    const source = new WordSource({ cache });
    expect(source.languages()).toEqual(['de', 'en', 'es', 'fr', 'ja', 'ru', 'zh']);
  });

  it('picks the word at the drawn index', () => {
    const source = new WordSource({ cache, random: fixedRandom([0, 4, 2]) });
    const drawn = [source.get('en'), source.get('en'), source.get('en')];
    expect(drawn).toEqual(['kiwi', 'peach', 'mango']);
  });

  it('draws within the filtered candidates', () => {
    const source = new WordSource({ cache, random: fixedRandom([1]) });
    expect(source.getStartsWith('m', 'en')).toBe('melon');
    expect(source.getLen(4, 'en')).toBe('lime');
    expect(source.getStartsWith('z', 'en')).toBeUndefined();
    expect(source.getLen(9, 'en')).toBeUndefined();
  });

  it('asks the random source for an index below the candidate count', () => {
    const bounds: number[] = [];
    const source = new WordSource({
      cache,
      random: {
        nextInt: (bound) => {
          bounds.push(bound);
          return 0;
        },
      },
    });
    source.get('en');
    source.getStartsWith('m', 'en');
    source.getLen(5, 'en');
    expect(bounds).toEqual([5, 2, 3]);
  });

  it('repeats the same draws for the same seed', () => {
    const a = new WordSource({ random: seededRandom(7) });
    const b = new WordSource({ random: seededRandom(7) });
    const drawsA = Array.from({ length: 10 }, () => a.get('fr'));
    const drawsB = Array.from({ length: 10 }, () => b.get('fr'));
    expect(drawsA).toEqual(drawsB);
  });

  it('spreads draws across the dictionary', () => {
    const source = new WordSource({ random: seededRandom(2024) });
    const seen = new Set(Array.from({ length: 1000 }, () => source.get('en')));
    expect(seen.size).toBeGreaterThan(900);
  });

  it('shares the process-wide cache by default', () => {
    const a = new WordSource();
    const b = new WordSource();
    expect(a.cache).toBe(b.cache);
    expect(a.all('ru')).toBe(b.all('ru'));
  });
});
