/**
 * Build the embedded payload manifest from plain-text word lists.
 *
 * Each `<lang>.txt` holds one word per line. Blank lines are skipped, word
 * order is kept, and a duplicate word fails the build. Only the languages
 * passed with `--lang` end up in the manifest, and so in the `Lang` type.
 *
 *   tsx scripts/build-payloads.ts --lang en,de
 */

import { Command } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { encodePayload } from '../src/encode.js';
import {
  PAYLOAD_FORMAT,
  type PayloadEntryJson,
  type PayloadManifestJson,
} from '../src/payloads/index.js';
import { createLogger, setLoggerConfig } from '../src/logger.js';
import {
  LANGUAGE_NAMES,
  SUPPORTED_LANGUAGES,
  isLanguage,
  type Language,
} from '../src/types.js';

interface Options {
  lang: string;
  source: string;
  out: string;
  verbose?: boolean;
}

const log = createLogger('build');

const SCRIPT_PATH = fileURLToPath(import.meta.url);
const PACKAGE_ROOT = path.resolve(path.dirname(SCRIPT_PATH), '..');

/**
 * Read a word list, dropping blank lines and rejecting duplicates.
 */
export function readWordList(file: string): string[] {
  const lines = fs.readFileSync(file, 'utf8').normalize('NFC').split(/\r?\n/);
  const seen = new Set<string>();
  const words: string[] = [];
  lines.forEach((line, i) => {
    const word = line.trim();
    if (!word) return;
    if (seen.has(word)) {
      throw new Error(`${path.basename(file)}:${i + 1}: duplicate word "${word}"`);
    }
    seen.add(word);
    words.push(word);
  });
  return words;
}

export function parseLanguages(csv: string): Language[] {
  const codes = csv
    .split(',')
    .map((code) => code.trim())
    .filter(Boolean);
  if (codes.length === 0) {
    throw new Error('at least one --lang is required');
  }
  return codes.map((code) => {
    if (!isLanguage(code)) {
      const supported = SUPPORTED_LANGUAGES.join(', ');
      throw new Error(
        `unsupported language "${code}" (supported: ${supported})`
      );
    }
    return code;
  });
}

export function buildManifest(
  langs: readonly Language[],
  sourceDir: string
): PayloadManifestJson {
  const languages: Record<string, PayloadEntryJson> = {};
  for (const lang of [...new Set(langs)].sort()) {
    const words = readWordList(path.join(sourceDir, `${lang}.txt`));
    if (words.length === 0) {
      throw new Error(`${lang}.txt holds no words`);
    }
    const payload = encodePayload(lang, LANGUAGE_NAMES[lang], words);
    languages[lang] = {
      name: payload.name,
      count: payload.count,
      data: Buffer.from(payload.bytes).toString('base64'),
    };
    const size = payload.bytes.byteLength;
    log.info(`${lang}: ${payload.count} words, ${size} bytes compressed`);
  }
  return { format: PAYLOAD_FORMAT, languages };
}

function main(): void {
  const program = new Command()
    .name('build-payloads')
    .description('Compress word lists into the embedded payload manifest')
    .option(
      '--lang <csv>',
      'languages to include (comma-separated)',
      SUPPORTED_LANGUAGES.join(',')
    )
    .option(
      '--source <dir>',
      'directory of <lang>.txt word lists',
      path.join(PACKAGE_ROOT, 'wordlists')
    )
    .option(
      '--out <file>',
      'manifest to write',
      path.join(PACKAGE_ROOT, 'src', 'payloads', 'payloads.json')
    )
    .option('-v, --verbose', 'log debug output')
    .parse(process.argv);

  const opts = program.opts<Options>();
  setLoggerConfig({ debugMode: Boolean(opts.verbose) });

  try {
    const manifest = buildManifest(parseLanguages(opts.lang), opts.source);
    fs.writeFileSync(opts.out, `${JSON.stringify(manifest, null, 2)}\n`);
    log.info(`wrote ${opts.out}`);
  } catch (err: unknown) {
    log.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === SCRIPT_PATH) {
  main();
}
