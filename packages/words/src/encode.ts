/**
 * Payload encoding, the inverse of `decodePayload`.
 *
 * Used by the payload build step; the library never encodes at run time.
 */

import { gzipSync } from 'node:zlib';
import type { CompressedPayload } from './types.js';

/**
 * Compress an ordered word list into a payload.
 *
 * @throws Error if the list is empty, or a word is empty or contains a line
 * break
 */
export function encodePayload(
  lang: string,
  name: string,
  words: readonly string[]
): CompressedPayload {
  if (words.length === 0) {
    throw new Error(`Word list for "${lang}" is empty`);
  }
  words.forEach((word, i) => {
    if (word.length === 0) {
      throw new Error(`Word ${i + 1} of "${lang}" is empty`);
    }
    if (/[\r\n]/.test(word)) {
      throw new Error(`Word ${i + 1} of "${lang}" contains a line break`);
    }
  });

  return {
    lang,
    name,
    count: words.length,
    bytes: new Uint8Array(gzipSync(words.join('\n'), { level: 9 })),
  };
}
