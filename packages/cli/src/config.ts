/**
 * Configuration for passphrase generation and the CLI.
 */

/**
 * Options for generating a passphrase.
 */
export interface PassphraseConfig {
  /**
   * Number of words in the passphrase.
   * @default 4
   */
  wordCount?: number;

  /**
   * String placed between words.
   * @default "-"
   */
  separator?: string;

  /**
   * Language code of the word list.
   * @default "en", or LEXIPHRASE_LANG when set
   */
  lang?: string;
}

/**
 * Options that only affect CLI output.
 */
export interface OutputConfig {
  /**
   * Print the strength report after the passphrase.
   * @default false
   */
  stats?: boolean;

  /**
   * Use ANSI colors in the report.
   * @default true when stdout is a terminal and NO_COLOR is unset
   */
  color?: boolean;

  /**
   * Log debug output to stderr.
   * @default false
   */
  verbose?: boolean;
}

export type CliConfig = PassphraseConfig & OutputConfig;

/**
 * Largest word count the CLI accepts.
 */
export const MAX_WORDS = 1000;

export const DEFAULT_CONFIG: Required<CliConfig> = {
  wordCount: 4,
  separator: '-',
  lang: 'en',
  stats: false,
  color: false,
  verbose: false,
} as const;

/**
 * Merge user config with defaults. An unset language falls back to
 * LEXIPHRASE_LANG before the built-in default.
 */
export function mergeConfig(
  userConfig: CliConfig = {},
  env: Record<string, string | undefined> = process.env
): Required<CliConfig> {
  return {
    wordCount: userConfig.wordCount ?? DEFAULT_CONFIG.wordCount,
    separator: userConfig.separator ?? DEFAULT_CONFIG.separator,
    lang: userConfig.lang ?? (env.LEXIPHRASE_LANG || DEFAULT_CONFIG.lang),
    stats: userConfig.stats ?? DEFAULT_CONFIG.stats,
    color: userConfig.color ?? DEFAULT_CONFIG.color,
    verbose: userConfig.verbose ?? DEFAULT_CONFIG.verbose,
  };
}
