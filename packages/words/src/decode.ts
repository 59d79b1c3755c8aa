/**
 * Payload decoding.
 *
 * Any defect in a payload is fatal: the caller gets a `PayloadError` and
 * never a partial word list.
 */

import { gunzipSync } from 'node:zlib';
import { PayloadError } from './errors.js';
import type { CompressedPayload } from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: false });

/**
 * Decompress a payload into its ordered word list.
 *
 * @throws PayloadError if the stream is corrupt, is not valid UTF-8, holds
 * no words or an empty word, or does not hold exactly `payload.count` words
 */
export function decodePayload(payload: CompressedPayload): readonly string[] {
  let raw: Buffer;
  try {
    raw = gunzipSync(payload.bytes);
  } catch (err: unknown) {
    throw new PayloadError('decompression failed', payload.lang, {
      cause: err,
    });
  }

  let text: string;
  try {
    text = utf8.decode(raw);
  } catch (err: unknown) {
    throw new PayloadError(
      'decompressed bytes are not valid UTF-8',
      payload.lang,
      { cause: err }
    );
  }

  return Object.freeze(splitWords(text, payload));
}

function splitWords(text: string, payload: CompressedPayload): string[] {
  if (payload.count === 0) {
    throw new PayloadError('payload holds no words', payload.lang);
  }

  const body = text.endsWith('\n') ? text.slice(0, -1) : text;
  const words = body.length === 0 ? [] : body.split('\n');

  if (words.length !== payload.count) {
    throw new PayloadError(
      `expected ${payload.count} words, found ${words.length}`,
      payload.lang
    );
  }

  const empty = words.indexOf('');
  if (empty !== -1) {
    throw new PayloadError(`empty word at line ${empty + 1}`, payload.lang);
  }

  return words;
}
