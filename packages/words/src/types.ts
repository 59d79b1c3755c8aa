/**
 * Core type definitions for lexiphrase word lists.
 */

/**
 * ISO 639-1 codes of every language a payload can be built for.
 */
export const SUPPORTED_LANGUAGES = [
  'de',
  'en',
  'es',
  'fr',
  'ja',
  'ru',
  'zh',
] as const;

/**
 * Any language lexiphrase knows about, whether or not its payload was built.
 */
export type Language = (typeof SUPPORTED_LANGUAGES)[number];

/**
 * English display names, keyed by language code.
 */
export const LANGUAGE_NAMES: Readonly<Record<Language, string>> = {
  de: 'German',
  en: 'English',
  es: 'Spanish',
  fr: 'French',
  ja: 'Japanese',
  ru: 'Russian',
  zh: 'Chinese',
};

/**
 * A compressed word list as produced by the build step.
 */
export interface CompressedPayload {
  /**
   * Language code the payload belongs to.
   */
  readonly lang: string;

  /**
   * Human-readable language name.
   */
  readonly name: string;

  /**
   * Number of words the payload decompresses to.
   */
  readonly count: number;

  /**
   * Gzip stream of the newline-separated UTF-8 word list.
   */
  readonly bytes: Uint8Array;
}

/**
 * Check if a value is one of the supported language codes.
 */
export function isLanguage(value: unknown): value is Language {
  return (
    typeof value === 'string' &&
    SUPPORTED_LANGUAGES.some((lang) => lang === value)
  );
}
