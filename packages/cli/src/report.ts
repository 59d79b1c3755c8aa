/**
 * Text rendering of strength reports.
 */

import {
  RATING_THRESHOLDS,
  StrengthRating,
  codePointLength,
  type StrengthReport,
} from '@lexiphrase/words';

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
} as const;

type Style = keyof typeof ANSI;

const RATING_STYLES: Record<StrengthRating, Style> = {
  [StrengthRating.VERY_WEAK]: 'red',
  [StrengthRating.WEAK]: 'yellow',
  [StrengthRating.REASONABLE]: 'blue',
  [StrengthRating.STRONG]: 'green',
  [StrengthRating.VERY_STRONG]: 'cyan',
  [StrengthRating.EXTREMELY_STRONG]: 'magenta',
};

export const RULE = '━'.repeat(47);

export interface ReportOptions {
  /**
   * Wrap values in ANSI color codes.
   * @default false
   */
  color?: boolean;
}

type Painter = (text: string, ...styles: Style[]) => string;

function painter(color: boolean): Painter {
  if (!color) {
    return (text) => text;
  }
  return (text, ...styles) => {
    const codes = styles.map((style) => ANSI[style]).join('');
    return `${codes}${text}${ANSI.reset}`;
  };
}

/**
 * Range label of a rating band, e.g. `28-36 bits`.
 */
export function rangeLabel(index: number): string {
  const threshold = RATING_THRESHOLDS[index];
  const next = RATING_THRESHOLDS[index + 1];
  if (index === 0 && next) {
    return `<${next.minBits} bits`;
  }
  if (!next) {
    return `>=${threshold.minBits} bits`;
  }
  return `${threshold.minBits}-${next.minBits} bits`;
}

/**
 * Render a strength report for a passphrase as lines of text.
 */
export function formatReport(
  report: StrengthReport,
  passphrase: string,
  options: ReportOptions = {}
): string[] {
  const paint = painter(options.color ?? false);
  const ratingStyle = RATING_STYLES[report.rating];
  const length = codePointLength(passphrase);
  const entropy = `${report.entropyBits.toFixed(2)} bits`;

  const lines = [
    '',
    paint(RULE, 'bold'),
    paint('Password Strength Analysis', 'bold'),
    paint(RULE, 'bold'),
    `Words used:          ${paint(String(report.wordCount), 'bold')}`,
    `Dictionary size:     ${paint(String(report.dictionarySize), 'bold')} words`,
    `Password length:     ${paint(String(length), 'bold')} characters`,
    `Possible combos:     ${paint(report.combinationsApprox, 'bold')}`,
    `Entropy:             ${paint(entropy, 'bold', ratingStyle)}`,
    `Strength rating:     ${paint(report.rating, 'bold', ratingStyle)}`,
    paint(RULE, 'bold'),
    '',
    paint('For reference:', 'dim'),
  ];

  RATING_THRESHOLDS.forEach((threshold, i) => {
    const label = `${rangeLabel(i)}:`.padEnd(13);
    const rating = paint(threshold.rating, RATING_STYLES[threshold.rating]);
    lines.push(`  • ${label} ${rating} (${threshold.description})`);
  });

  return lines;
}
