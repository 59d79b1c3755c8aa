/**
 * Per-language dictionary cache.
 *
 * Each language owns a one-time cell. The first request for a language
 * loads its payload, decodes it and builds the index; every later request
 * returns the same `Dictionary`. There is no eviction and no refresh.
 */

import { mergeCacheConfig, type DictionaryCacheConfig } from './config.js';
import { Dictionary } from './dictionary.js';
import { Lazy } from './lazy.js';
import { createLogger, isDebugMode, startTimer } from './logger.js';
import { listLanguages, resolveLang } from './payloads/index.js';

const log = createLogger('cache');

export class DictionaryCache {
  private readonly cells = new Map<string, Lazy<Dictionary>>();
  private readonly config: Required<DictionaryCacheConfig>;

  constructor(config?: DictionaryCacheConfig) {
    this.config = mergeCacheConfig(config);
  }

  /**
   * Get the dictionary for a language, building it on first use.
   *
   * @throws ConfigurationError if the language was not built
   * @throws PayloadError if its payload is corrupt (on every call)
   */
  dictionaryFor(lang: string): Dictionary {
    return this.cellFor(lang).get();
  }

  /**
   * Check if a language's dictionary has been built.
   */
  isLoaded(lang: string): boolean {
    return this.cells.get(lang)?.isReady() ?? false;
  }

  /**
   * Build dictionaries ahead of first use.
   *
   * @param langs - Languages to build (default: every enabled language)
   */
  warmup(langs: readonly string[] = listLanguages()): void {
    for (const lang of langs) {
      this.dictionaryFor(lang);
    }
  }

  private cellFor(lang: string): Lazy<Dictionary> {
    const existing = this.cells.get(lang);
    if (existing) {
      return existing;
    }
    const code = resolveLang(lang);
    const cell = new Lazy(() => this.build(code));
    this.cells.set(code, cell);
    return cell;
  }

  private build(lang: string): Dictionary {
    const elapsed = startTimer();
    try {
      const payload = this.config.loadPayload(lang);
      const words = this.config.decode(payload);
      const dictionary = new Dictionary(lang, words);
      if (isDebugMode()) {
        const ms = elapsed().toFixed(2);
        log.debug(`built "${lang}": ${dictionary.size} words in ${ms}ms`);
      }
      return dictionary;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`failed to build "${lang}": ${message}`);
      throw err;
    }
  }
}

let defaultCache: DictionaryCache | null = null;

/**
 * The process-wide cache used by the top-level query functions.
 */
export function getDefaultCache(): DictionaryCache {
  if (!defaultCache) {
    defaultCache = new DictionaryCache();
  }
  return defaultCache;
}
