/**
 * Code point helpers shared by the index and the query engine.
 *
 * Word lengths and initials count Unicode code points, not UTF-16 units, so
 * a character outside the BMP is one character.
 */

/**
 * Number of code points in a string, without allocating.
 */
export function codePointLength(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    // high surrogate followed by low surrogate
    if (unit >= 0xd800 && unit <= 0xdbff && i + 1 < text.length) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
      }
    }
    count++;
  }
  return count;
}

/**
 * The first code point of a string as a string, or `undefined` for "".
 */
export function firstChar(text: string): string | undefined {
  const code = text.codePointAt(0);
  return code === undefined ? undefined : String.fromCodePoint(code);
}

/**
 * Whether a character belongs to a cased script (Latin, Cyrillic, Greek...).
 */
export function hasCase(char: string): boolean {
  return char.toLowerCase() !== char.toUpperCase();
}

/**
 * Fold a character for prefix matching: lower case for cased scripts,
 * unchanged otherwise.
 */
export function foldChar(char: string): string {
  return hasCase(char) ? char.toLowerCase() : char;
}

/**
 * Fold every cased character of a string.
 */
export function foldText(text: string): string {
  let out = '';
  for (const char of text) {
    out += foldChar(char);
  }
  return out;
}
