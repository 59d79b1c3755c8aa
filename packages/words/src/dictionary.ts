/**
 * Decoded dictionaries and their length and first-character indexes.
 */

import { codePointLength, firstChar, foldChar, foldText } from './text.js';

const EMPTY: readonly string[] = Object.freeze([]);

/**
 * Length and first-character lookups over one word list.
 *
 * Both maps are filled in a single pass. Buckets hold the words in
 * dictionary order and are frozen once built; lookups hand out the buckets
 * themselves.
 */
export class DictionaryIndex {
  private readonly byLength = new Map<number, readonly string[]>();
  private readonly byInitial = new Map<string, readonly string[]>();

  constructor(words: readonly string[]) {
    const byLength = new Map<number, string[]>();
    const byInitial = new Map<string, string[]>();

    for (const word of words) {
      const len = codePointLength(word);
      const lenBucket = byLength.get(len);
      if (lenBucket) {
        lenBucket.push(word);
      } else {
        byLength.set(len, [word]);
      }

      const first = firstChar(word);
      if (first === undefined) {
        continue;
      }
      const key = foldChar(first);
      const initialBucket = byInitial.get(key);
      if (initialBucket) {
        initialBucket.push(word);
      } else {
        byInitial.set(key, [word]);
      }
    }

    for (const [len, bucket] of byLength) {
      this.byLength.set(len, Object.freeze(bucket));
    }
    for (const [initial, bucket] of byInitial) {
      this.byInitial.set(initial, Object.freeze(bucket));
    }
  }

  /**
   * Words of exactly `length` code points, in dictionary order.
   */
  wordsOfLength(length: number): readonly string[] {
    return this.byLength.get(length) ?? EMPTY;
  }

  /**
   * Words starting with `prefix`, in dictionary order.
   *
   * Cased characters match case-insensitively; characters of scripts without
   * case match exactly. A single character returns the shared bucket; a
   * longer prefix narrows it into a new array. The prefix is compared in
   * NFC, the form the word lists are built in.
   */
  wordsStartingWith(query: string): readonly string[] {
    const prefix = query.normalize('NFC');
    const first = firstChar(prefix);
    if (first === undefined) {
      return EMPTY;
    }
    const bucket = this.byInitial.get(foldChar(first));
    if (!bucket) {
      return EMPTY;
    }
    if (prefix.length === first.length) {
      return bucket;
    }

    const folded = foldText(prefix);
    const matches = bucket.filter((word) => foldText(word).startsWith(folded));
    return matches.length === 0 ? EMPTY : Object.freeze(matches);
  }

  /**
   * Word lengths present in the dictionary, ascending.
   */
  lengths(): number[] {
    return Array.from(this.byLength.keys()).sort((a, b) => a - b);
  }

  /**
   * Folded first characters present in the dictionary, in first-seen order.
   */
  initials(): string[] {
    return Array.from(this.byInitial.keys());
  }
}

/**
 * One language's decoded word list with its index.
 */
export class Dictionary {
  readonly index: DictionaryIndex;

  constructor(
    readonly lang: string,
    readonly words: readonly string[]
  ) {
    this.index = new DictionaryIndex(words);
  }

  /**
   * Number of words in the dictionary.
   */
  get size(): number {
    return this.words.length;
  }
}
