/**
 * lexiphrase words - compressed multilingual word lists
 *
 * Word lists ship as compressed payloads, are decoded once per process on
 * first use, and are indexed by word length and first character.
 *
 * @packageDocumentation
 */

// Query API
export {
  get,
  getLen,
  getStartsWith,
  all,
  allLen,
  allStartsWith,
  dictionarySize,
  WordSource,
} from './query.js';

// Dictionaries and caching
export { DictionaryCache, getDefaultCache } from './cache.js';
export { Dictionary, DictionaryIndex } from './dictionary.js';
export { Lazy } from './lazy.js';

// Payloads
export {
  listLanguages,
  isEnabled,
  resolveLang,
  loadPayload,
  parsePayloadEntry,
  PAYLOADS,
  PAYLOAD_FORMAT,
  type Lang,
  type PayloadEntryJson,
  type PayloadManifestJson,
} from './payloads/index.js';
export { decodePayload } from './decode.js';
export { encodePayload } from './encode.js';

// Strength estimation
export {
  estimate,
  ratingFor,
  bitsPerWord,
  wordsForEntropy,
  formatScientific,
  StrengthRating,
  RATING_THRESHOLDS,
  EXACT_COMBINATIONS_MAX_BITS,
  type RatingThreshold,
  type StrengthReport,
} from './strength.js';

// Text helpers
export {
  codePointLength,
  firstChar,
  foldChar,
  foldText,
  hasCase,
} from './text.js';

// Randomness
export {
  cryptoRandom,
  seededRandom,
  choose,
  type RandomSource,
} from './random.js';

// Configuration
export {
  type WordSourceConfig,
  type DictionaryCacheConfig,
  DEFAULT_CACHE_CONFIG,
  mergeCacheConfig,
} from './config.js';

// Types
export {
  SUPPORTED_LANGUAGES,
  LANGUAGE_NAMES,
  isLanguage,
  type Language,
  type CompressedPayload,
} from './types.js';

// Errors and logging
export {
  LexiphraseError,
  ConfigurationError,
  PayloadError,
} from './errors.js';
export {
  createLogger,
  setLoggerConfig,
  isDebugMode,
  LogLevel,
  type Logger,
  type LoggerConfig,
  type LogSink,
} from './logger.js';

export const VERSION = '0.1.0';
