/**
 * Error types raised by the word list engine.
 *
 * Only build-time class defects are thrown: a language that was not built
 * into the payload manifest, or a payload that does not decode. Ordinary
 * queries never throw; a lookup without a match yields `undefined` or an
 * empty list.
 */

export class LexiphraseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LexiphraseError';
  }
}

/**
 * No language was built, or a caller named one that is unknown or disabled.
 */
export class ConfigurationError extends LexiphraseError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * An embedded payload failed to decompress or does not hold the word count
 * recorded for it.
 */
export class PayloadError extends LexiphraseError {
  constructor(
    message: string,
    public readonly lang: string,
    options?: ErrorOptions
  ) {
    super(`Corrupt payload for "${lang}": ${message}`, options);
    this.name = 'PayloadError';
  }
}
