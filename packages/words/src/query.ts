/**
 * Word queries over cached dictionaries.
 *
 * Every random pick is an independent uniform draw over the candidate
 * list, with replacement across calls.
 */

import { DictionaryCache, getDefaultCache } from './cache.js';
import { mergeSourceConfig, type WordSourceConfig } from './config.js';
import type { Dictionary } from './dictionary.js';
import { PayloadError } from './errors.js';
import { listLanguages, type Lang } from './payloads/index.js';
import { choose, type RandomSource } from './random.js';

/**
 * Query engine bound to a dictionary cache and a random source.
 *
 * @example
 * ```typescript
 * import { WordSource, seededRandom } from '@lexiphrase/words';
 *
 * const source = new WordSource({ random: seededRandom(42) });
 * const words = Array.from({ length: 4 }, () => source.get('en'));
 * ```
 */
export class WordSource {
  readonly cache: DictionaryCache;
  readonly random: RandomSource;

  constructor(config?: WordSourceConfig) {
    const resolved = mergeSourceConfig(config);
    this.cache = resolved.cache ?? getDefaultCache();
    this.random = resolved.random;
  }

  /**
   * The decoded dictionary for a language.
   */
  dictionary(lang: Lang): Dictionary {
    return this.cache.dictionaryFor(lang);
  }

  /**
   * A uniformly random word.
   */
  get(lang: Lang): string {
    const word = choose(this.all(lang), this.random);
    if (word === undefined) {
      throw new PayloadError('dictionary holds no words', lang);
    }
    return word;
  }

  /**
   * A uniformly random word of exactly `length` characters, if any.
   */
  getLen(length: number, lang: Lang): string | undefined {
    return choose(this.allLen(length, lang), this.random);
  }

  /**
   * A uniformly random word starting with `prefix`, if any.
   */
  getStartsWith(prefix: string, lang: Lang): string | undefined {
    return choose(this.allStartsWith(prefix, lang), this.random);
  }

  /**
   * Every word, in dictionary order.
   */
  all(lang: Lang): readonly string[] {
    return this.dictionary(lang).words;
  }

  /**
   * Every word of exactly `length` characters, in dictionary order.
   */
  allLen(length: number, lang: Lang): readonly string[] {
    return this.dictionary(lang).index.wordsOfLength(length);
  }

  /**
   * Every word starting with `prefix`, in dictionary order.
   */
  allStartsWith(prefix: string, lang: Lang): readonly string[] {
    return this.dictionary(lang).index.wordsStartingWith(prefix);
  }

  /**
   * Number of words in a language's dictionary.
   */
  dictionarySize(lang: Lang): number {
    return this.dictionary(lang).size;
  }

  /**
   * Languages this source can serve.
   */
  languages(): Lang[] {
    return listLanguages();
  }
}

let defaultSource: WordSource | null = null;

function source(): WordSource {
  if (!defaultSource) {
    defaultSource = new WordSource();
  }
  return defaultSource;
}

/**
 * Returns a random word with the given language.
 *
 * @example
 * ```typescript
 * const word = get('en');
 * ```
 */
export function get(lang: Lang): string {
  return source().get(lang);
}

/**
 * Returns a random word with the given length and language, if one exists.
 */
export function getLen(length: number, lang: Lang): string | undefined {
  return source().getLen(length, lang);
}

/**
 * Returns a random word with the given starting character and language, if
 * one exists.
 *
 * @example
 * ```typescript
 * const word = getStartsWith('c', 'en') ?? get('en');
 * ```
 */
export function getStartsWith(prefix: string, lang: Lang): string | undefined {
  return source().getStartsWith(prefix, lang);
}

/**
 * Returns all words with the given language.
 */
export function all(lang: Lang): readonly string[] {
  return source().all(lang);
}

/**
 * Returns all words with the given length and language.
 */
export function allLen(length: number, lang: Lang): readonly string[] {
  return source().allLen(length, lang);
}

/**
 * Returns all words with the given starting character and language.
 */
export function allStartsWith(prefix: string, lang: Lang): readonly string[] {
  return source().allStartsWith(prefix, lang);
}

/**
 * Returns the number of words in the given language's dictionary.
 */
export function dictionarySize(lang: Lang): number {
  return source().dictionarySize(lang);
}
