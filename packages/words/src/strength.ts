/**
 * Passphrase strength estimation.
 *
 * A passphrase of `wordCount` words drawn uniformly and independently from
 * a dictionary of `dictionarySize` words has `dictionarySize ** wordCount`
 * equally likely values, i.e. `wordCount * log2(dictionarySize)` bits of
 * entropy.
 */

/**
 * Qualitative strength ratings, weakest first.
 */
export enum StrengthRating {
  VERY_WEAK = 'Very Weak',
  WEAK = 'Weak',
  REASONABLE = 'Reasonable',
  STRONG = 'Strong',
  VERY_STRONG = 'Very Strong',
  EXTREMELY_STRONG = 'Extremely Strong',
}

/**
 * A rating band. `minBits` is inclusive; a band ends where the next begins.
 */
export interface RatingThreshold {
  readonly rating: StrengthRating;
  readonly minBits: number;
  /** What an attacker faces at this level */
  readonly description: string;
}

export const RATING_THRESHOLDS: readonly RatingThreshold[] = [
  {
    rating: StrengthRating.VERY_WEAK,
    minBits: 0,
    description: 'crackable instantly',
  },
  {
    rating: StrengthRating.WEAK,
    minBits: 28,
    description: 'crackable in hours/days',
  },
  {
    rating: StrengthRating.REASONABLE,
    minBits: 36,
    description: 'crackable in months/years',
  },
  {
    rating: StrengthRating.STRONG,
    minBits: 60,
    description: 'secure for most purposes',
  },
  {
    rating: StrengthRating.VERY_STRONG,
    minBits: 80,
    description: 'military grade',
  },
  {
    rating: StrengthRating.EXTREMELY_STRONG,
    minBits: 128,
    description: 'overkill',
  },
];

/**
 * Result of a strength estimate.
 */
export interface StrengthReport {
  readonly wordCount: number;
  readonly dictionarySize: number;

  /**
   * Exact number of equally likely passphrases, or `undefined` above
   * `EXACT_COMBINATIONS_MAX_BITS` of entropy.
   */
  readonly combinations: bigint | undefined;

  /**
   * Number of passphrases in scientific notation, e.g. `~3.66e15`.
   */
  readonly combinationsApprox: string;

  readonly entropyBits: number;
  readonly rating: StrengthRating;
}

/**
 * Largest entropy for which `estimate` computes the exact combination count.
 */
export const EXACT_COMBINATIONS_MAX_BITS = 4096;

function assertCount(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(
      `${name} must be a non-negative integer, got ${value}`
    );
  }
}

/**
 * Entropy in bits of one word drawn from a dictionary; 0 for a dictionary
 * of at most one word.
 */
export function bitsPerWord(dictionarySize: number): number {
  assertCount('dictionarySize', dictionarySize);
  return dictionarySize <= 1 ? 0 : Math.log2(dictionarySize);
}

/**
 * Rating for an entropy value.
 */
export function ratingFor(entropyBits: number): StrengthRating {
  let rating = StrengthRating.VERY_WEAK;
  for (const threshold of RATING_THRESHOLDS) {
    if (entropyBits >= threshold.minBits) {
      rating = threshold.rating;
    }
  }
  return rating;
}

function scientific(mantissa: number, exponent: number): string {
  const rounded = mantissa.toFixed(2);
  if (rounded === '10.00') {
    return `~1.00e${exponent + 1}`;
  }
  return `~${rounded}e${exponent}`;
}

/**
 * Format a non-negative integer as `~m.mme<exp>`.
 */
export function formatScientific(value: bigint): string {
  const digits = value.toString();
  const leading = `${digits[0]}.${digits.slice(1, 17) || '0'}`;
  return scientific(Number(leading), digits.length - 1);
}

/**
 * `dictionarySize ** wordCount` as `~m.mme<exp>`, through logarithms.
 */
function approximateScientific(
  dictionarySize: number,
  wordCount: number
): string {
  if (wordCount === 0 || dictionarySize === 1) {
    return '~1.00e0';
  }
  if (dictionarySize === 0) {
    return '~0.00e0';
  }
  const log10 = wordCount * Math.log10(dictionarySize);
  const exponent = Math.floor(log10);
  return scientific(10 ** (log10 - exponent), exponent);
}

/**
 * Estimate the strength of a passphrase of `wordCount` words drawn from a
 * dictionary of `dictionarySize` words.
 *
 * @throws RangeError if either argument is negative or not an integer
 *
 * @example
 * ```typescript
 * const report = estimate(7776, 4);
 * report.entropyBits; // 51.699...
 * report.rating; // StrengthRating.REASONABLE
 * ```
 */
export function estimate(
  dictionarySize: number,
  wordCount: number
): StrengthReport {
  assertCount('wordCount', wordCount);
  const entropyBits = wordCount * bitsPerWord(dictionarySize);
  const combinations =
    entropyBits <= EXACT_COMBINATIONS_MAX_BITS
      ? BigInt(dictionarySize) ** BigInt(wordCount)
      : undefined;

  return {
    wordCount,
    dictionarySize,
    combinations,
    combinationsApprox:
      combinations === undefined
        ? approximateScientific(dictionarySize, wordCount)
        : formatScientific(combinations),
    entropyBits,
    rating: ratingFor(entropyBits),
  };
}

/**
 * Smallest word count whose passphrases reach `targetBits`, or `undefined`
 * when a dictionary of at most one word can never reach it.
 */
export function wordsForEntropy(
  dictionarySize: number,
  targetBits: number
): number | undefined {
  const perWord = bitsPerWord(dictionarySize);
  if (targetBits <= 0) {
    return 0;
  }
  if (perWord === 0) {
    return undefined;
  }
  let count = Math.ceil(targetBits / perWord);
  if (count > 0 && (count - 1) * perWord >= targetBits) {
    count -= 1;
  }
  return count;
}
