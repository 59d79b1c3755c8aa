/**
 * The `lexiphrase` command.
 *
 * `run` drives commander against an injected IO object and returns the exit
 * status, so the command can be exercised in-process.
 */

import { format } from 'node:util';
import { Command, CommanderError } from 'commander';
import {
  LANGUAGE_NAMES,
  LexiphraseError,
  WordSource,
  createLogger,
  listLanguages,
  setLoggerConfig,
  type LogSink,
} from '@lexiphrase/words';
import { MAX_WORDS, mergeConfig } from './config.js';
import { assessPassphrase, generatePassphrase } from './passphrase.js';
import { formatReport } from './report.js';
import { VERSION } from './version.js';

/**
 * Process surface the command reads and writes.
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readonly isTTY: boolean;
  readonly env: Record<string, string | undefined>;
}

export interface RunOptions {
  /**
   * Word source to draw from.
   * @default a source on the process-wide cache
   */
  source?: WordSource;
}

interface CliOptions {
  stats?: boolean;
  lang?: string;
  list?: boolean;
  color: boolean;
  verbose?: boolean;
}

const log = createLogger('cli');

/**
 * IO bound to the current process.
 */
export function processIO(): CliIO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    isTTY: Boolean(process.stdout.isTTY),
    env: process.env,
  };
}

function stderrSink(io: CliIO): LogSink {
  const write = (message: string, ...args: unknown[]): void =>
    io.stderr(`${format(message, ...args)}\n`);
  return { log: write, warn: write, error: write };
}

/**
 * Parse a word count argument.
 */
export function parseWordCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new LexiphraseError(`num_words must be a whole number, got "${value}"`);
  }
  const count = Number.parseInt(value, 10);
  if (count < 1) {
    throw new LexiphraseError('num_words must be at least 1');
  }
  if (count > MAX_WORDS) {
    throw new LexiphraseError(`num_words must be at most ${MAX_WORDS}`);
  }
  return count;
}

function listCommand(io: CliIO, source: WordSource): void {
  for (const lang of source.languages()) {
    const size = source.dictionarySize(lang);
    io.stdout(`${lang}\t${LANGUAGE_NAMES[lang]}\t${size} words\n`);
  }
}

/**
 * Build the commander program for one run.
 */
export function createProgram(io: CliIO, options: RunOptions = {}): Command {
  const program = new Command();

  program
    .name('lexiphrase')
    .description('Generate a passphrase of random words')
    .version(VERSION, '-V, --version')
    .argument('[num_words]', 'number of words to generate', '4')
    .argument('[separator]', 'string placed between words', '-')
    .option('-s, --stats', 'show password strength statistics')
    .option(
      '-l, --lang <code>',
      `word list language (${listLanguages().join(', ')})`
    )
    .option('--list', 'list available languages and exit')
    .option('--no-color', 'disable colored output')
    .option('-v, --verbose', 'log debug output to stderr')
    .addHelpText(
      'after',
      [
        '',
        'Examples:',
        '  $ lexiphrase              # 4 words joined with hyphens',
        '  $ lexiphrase 5 _          # 5 words joined with underscores',
        '  $ lexiphrase -s 6         # 6 words and strength statistics',
        '  $ lexiphrase -l de 4 .    # 4 German words joined with dots',
      ].join('\n')
    )
    .showHelpAfterError('(run with --help for usage)')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })
    .action((numWords: string, separator: string) => {
      const opts = program.opts<CliOptions>();
      const config = mergeConfig(
        {
          lang: opts.lang,
          stats: opts.stats,
          verbose: opts.verbose,
          color: opts.color && io.isTTY && !io.env.NO_COLOR,
        },
        io.env
      );
      if (config.verbose) {
        setLoggerConfig({ debugMode: true, sink: stderrSink(io) });
      }

      try {
        const source = options.source ?? new WordSource();
        if (opts.list) {
          listCommand(io, source);
          return;
        }
        if (separator.length === 0) {
          throw new LexiphraseError('separator must not be empty');
        }

        const passphrase = generatePassphrase(
          { wordCount: parseWordCount(numWords), separator, lang: config.lang },
          source
        );
        const { words, lang } = passphrase;
        log.debug(`drew ${words.length} words from "${lang}"`);
        io.stdout(`${passphrase.text}\n`);

        if (config.stats) {
          const lines = formatReport(
            assessPassphrase(passphrase),
            passphrase.text,
            { color: config.color }
          );
          io.stdout(`${lines.join('\n')}\n`);
        }
      } catch (err: unknown) {
        if (err instanceof LexiphraseError) {
          program.error(`error: ${err.message}`);
        }
        throw err;
      }
    });

  return program;
}

/**
 * Run the command with user arguments (without `node` and script path).
 *
 * @returns the exit status
 */
export function run(
  argv: readonly string[],
  io: CliIO = processIO(),
  options: RunOptions = {}
): number {
  const program = createProgram(io, options);
  try {
    program.parse([...argv], { from: 'user' });
    return 0;
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    io.stderr(`error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
