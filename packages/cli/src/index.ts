/**
 * lexiphrase CLI - passphrases from compressed multilingual word lists
 *
 * @packageDocumentation
 */

export {
  run,
  createProgram,
  processIO,
  parseWordCount,
  type CliIO,
  type RunOptions,
} from './cli.js';
export {
  generatePassphrase,
  assessPassphrase,
  type Passphrase,
} from './passphrase.js';
export { formatReport, rangeLabel, RULE, type ReportOptions } from './report.js';
export {
  type PassphraseConfig,
  type OutputConfig,
  type CliConfig,
  DEFAULT_CONFIG,
  MAX_WORDS,
  mergeConfig,
} from './config.js';
export { VERSION } from './version.js';
