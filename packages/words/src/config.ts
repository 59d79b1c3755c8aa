/**
 * Configuration types for lexiphrase word sources.
 */

import type { DictionaryCache } from './cache.js';
import { decodePayload } from './decode.js';
import { loadPayload } from './payloads/index.js';
import { cryptoRandom, type RandomSource } from './random.js';
import type { CompressedPayload } from './types.js';

/**
 * Configuration for a `DictionaryCache`.
 */
export interface DictionaryCacheConfig {
  /**
   * Load the compressed payload for a language code. Only languages built
   * into the embedded manifest are ever requested.
   * @default loadPayload (the embedded manifest)
   */
  loadPayload?: (lang: string) => CompressedPayload;

  /**
   * Turn a payload into its ordered word list.
   * @default decodePayload
   */
  decode?: (payload: CompressedPayload) => readonly string[];
}

/**
 * Configuration for a `WordSource`.
 */
export interface WordSourceConfig {
  /**
   * Random source used to pick words.
   * @default cryptoRandom
   */
  random?: RandomSource;

  /**
   * Cache the dictionaries are read from.
   * Sources sharing a cache share its decoded dictionaries.
   * @default the process-wide cache
   */
  cache?: DictionaryCache;
}

/**
 * Default cache configuration.
 */
export const DEFAULT_CACHE_CONFIG: Required<DictionaryCacheConfig> = {
  loadPayload,
  decode: decodePayload,
};

/**
 * Merge user cache config with defaults.
 */
export function mergeCacheConfig(
  userConfig?: DictionaryCacheConfig
): Required<DictionaryCacheConfig> {
  return {
    loadPayload: userConfig?.loadPayload ?? DEFAULT_CACHE_CONFIG.loadPayload,
    decode: userConfig?.decode ?? DEFAULT_CACHE_CONFIG.decode,
  };
}

/**
 * Merge user source config with defaults; the cache is resolved by the
 * source itself.
 */
export function mergeSourceConfig(
  userConfig?: WordSourceConfig
): Required<Omit<WordSourceConfig, 'cache'>> & Pick<WordSourceConfig, 'cache'> {
  return {
    random: cryptoRandom,
    ...userConfig,
  };
}
