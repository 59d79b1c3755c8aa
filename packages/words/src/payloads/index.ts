/**
 * Embedded word list payloads.
 *
 * The manifest is written by `scripts/build-payloads.ts` and only holds the
 * languages that were selected when it ran. It is imported as a module, so
 * the compressed bytes ship with the package and no word list is read from
 * disk at run time.
 */

import manifest from './payloads.json' with { type: 'json' };
import { ConfigurationError } from '../errors.js';
import { isLanguage, type CompressedPayload, type Language } from '../types.js';

/**
 * Raw manifest entry format.
 */
export interface PayloadEntryJson {
  name: string;
  count: number;
  data: string;
}

/**
 * Raw manifest format.
 */
export interface PayloadManifestJson {
  format: string;
  languages: Record<string, PayloadEntryJson>;
}

export const PAYLOAD_FORMAT = 'gzip+base64';

/**
 * Built-in payload entries, keyed by language code.
 */
export const PAYLOADS = manifest.languages;

/**
 * A language whose payload was built into this package.
 */
export type Lang = Extract<keyof typeof PAYLOADS, Language>;

const ENTRIES: Readonly<Record<string, PayloadEntryJson>> = PAYLOADS;

/**
 * List the languages built into this package.
 */
export function listLanguages(): Lang[] {
  return Object.keys(ENTRIES).filter(isEnabled);
}

/**
 * Check if a language code names a language built into this package.
 */
export function isEnabled(code: string): code is Lang {
  return isLanguage(code) && Object.hasOwn(ENTRIES, code);
}

/**
 * Narrow a run-time string to an enabled language.
 *
 * @throws ConfigurationError if the code is unknown or was not built
 */
export function resolveLang(code: string): Lang {
  if (isEnabled(code)) {
    return code;
  }
  const enabled = listLanguages();
  if (enabled.length === 0) {
    throw new ConfigurationError(
      'No language payloads were built; ' +
        'run the payload build with at least one --lang'
    );
  }
  const reason = isLanguage(code)
    ? 'was not built into this package'
    : 'is not a supported language';
  throw new ConfigurationError(
    `Language "${code}" ${reason} (available: ${enabled.join(', ')})`
  );
}

/**
 * Turn a manifest entry into a payload.
 */
export function parsePayloadEntry(
  lang: string,
  entry: PayloadEntryJson
): CompressedPayload {
  return {
    lang,
    name: entry.name,
    count: entry.count,
    bytes: Buffer.from(entry.data, 'base64'),
  };
}

/**
 * Load the built-in payload for a language.
 *
 * @throws ConfigurationError if the language was not built
 */
export function loadPayload(lang: string): CompressedPayload {
  const code = resolveLang(lang);
  return parsePayloadEntry(code, ENTRIES[code]);
}
