import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  buildManifest,
  parseLanguages,
  readWordList,
} from '../scripts/build-payloads.js';
import {
  PAYLOAD_FORMAT,
  decodePayload,
  parsePayloadEntry,
  setLoggerConfig,
} from '../src/index.js';

describe('build-payloads', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lexiphrase-'));
    setLoggerConfig({ sink: { log: () => {}, warn: () => {}, error: () => {} } });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    setLoggerConfig({ sink: console });
  });

  it('reads one word per line and skips blank lines', () => {
    const file = path.join(dir, 'en.txt');
    fs.writeFileSync(file, 'delta\r\nalpha\n\n  charlie  \n');
    expect(readWordList(file)).toEqual(['delta', 'alpha', 'charlie']);
  });

  it('rejects duplicate words', () => {
    const file = path.join(dir, 'en.txt');
    fs.writeFileSync(file, 'alpha\nbeta\nalpha\n');
    expect(() => readWordList(file)).toThrow('en.txt:3: duplicate word "alpha"');
  });

  it('parses the language toggles', () => {
    expect(parseLanguages('en, de')).toEqual(['en', 'de']);
    expect(() => parseLanguages('en,xx')).toThrow('unsupported language "xx"');
    expect(() => parseLanguages(' , ')).toThrow('at least one --lang is required');
  });

  it('writes only the selected languages', () => {
    fs.writeFileSync(path.join(dir, 'en.txt'), 'one\ntwo\nthree\n');
    fs.writeFileSync(path.join(dir, 'ja.txt'), 'いち\nに\n');
    fs.writeFileSync(path.join(dir, 'de.txt'), 'eins\n');

    const manifest = buildManifest(['ja', 'en', 'en'], dir);

    expect(manifest.format).toBe(PAYLOAD_FORMAT);
    expect(Object.keys(manifest.languages)).toEqual(['en', 'ja']);
    expect(manifest.languages.ja).toMatchObject({ name: 'Japanese', count: 2 });
    const en = parsePayloadEntry('en', manifest.languages.en);
    expect(decodePayload(en)).toEqual(['one', 'two', 'three']);
  });

  it('rejects a word list with no words', () => {
    fs.writeFileSync(path.join(dir, 'en.txt'), '\n  \n');
    expect(() => buildManifest(['en'], dir)).toThrow('en.txt holds no words');
  });
});
