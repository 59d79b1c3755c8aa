/**
 * Passphrase generation on top of the word query engine.
 */

import {
  WordSource,
  estimate,
  resolveLang,
  type Lang,
  type StrengthReport,
} from '@lexiphrase/words';
import { mergeConfig, type PassphraseConfig } from './config.js';

/**
 * A generated passphrase.
 */
export interface Passphrase {
  readonly lang: Lang;
  readonly words: readonly string[];
  readonly separator: string;

  /**
   * The words joined with the separator.
   */
  readonly text: string;

  /**
   * Size of the dictionary the words were drawn from.
   */
  readonly dictionarySize: number;
}

/**
 * Draw a passphrase of independent uniformly random words.
 *
 * @throws RangeError if the word count is not a positive integer
 * @throws ConfigurationError if the language was not built
 */
export function generatePassphrase(
  config?: PassphraseConfig,
  source: WordSource = new WordSource()
): Passphrase {
  const { wordCount, separator, lang: code } = mergeConfig(config);
  if (!Number.isSafeInteger(wordCount) || wordCount < 1) {
    throw new RangeError(
      `Word count must be a positive integer, got ${wordCount}`
    );
  }
  const lang = resolveLang(code);

  const words: string[] = [];
  for (let i = 0; i < wordCount; i++) {
    words.push(source.get(lang));
  }

  return {
    lang,
    words,
    separator,
    text: words.join(separator),
    dictionarySize: source.dictionarySize(lang),
  };
}

/**
 * Strength report for a generated passphrase.
 */
export function assessPassphrase(passphrase: Passphrase): StrengthReport {
  return estimate(passphrase.dictionarySize, passphrase.words.length);
}
