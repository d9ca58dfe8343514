/**
 * Synonym File Loading Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {describe, it, expect, vi, beforeEach, afterEach} from 'vitest';
import type {SetLogConfig} from './config';
import {SynonymConfigurationError} from './services/setlog';
import {parseSynonymEntries, readSynonymFile} from './synonyms';

const BASE_CONFIG: SetLogConfig = {
  weightUnit: 'kg',
  onLineError: 'skip',
  tsvDecimalSeparator: ',',
};

let tempDir: string;

function writeTempFile(name: string, content: string): string {
  const file = path.join(tempDir, name);
  fs.writeFileSync(file, content);
  return file;
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'setlog-synonyms-'));
});

afterEach(() => {
  fs.rmSync(tempDir, {recursive: true, force: true});
  vi.restoreAllMocks();
});

describe('parseSynonymEntries', () => {
  it('accepts well-formed entries', () => {
    expect(parseSynonymEntries([{canonical: 'Hip Thrust', synonyms: ['ht']}])).toEqual([
      {canonical: 'Hip Thrust', synonyms: ['ht']},
    ]);
  });

  it.each([
    [{}, 'synonyms must be an array'],
    [[null], 'synonyms[0] must be an object'],
    [[{canonical: '', synonyms: []}], 'synonyms[0].canonical must be a non-empty string'],
    [[{canonical: 'Hip Thrust', synonyms: 'ht'}], 'synonyms[0].synonyms must be an array of strings'],
    [[{canonical: 'Hip Thrust', synonyms: ['ht', 3]}], 'synonyms[0].synonyms must be an array of strings'],
  ])('rejects %j', (value, message) => {
    expect(() => parseSynonymEntries(value)).toThrow(new SynonymConfigurationError(message));
  });
});

describe('readSynonymFile', () => {
  it('reads a JSON file and labels errors with its path', () => {
    const file = writeTempFile('extra.json', JSON.stringify({canonical: 'Hip Thrust'}));

    expect(() => readSynonymFile(file)).toThrow(`${file} must be an array`);
  });

  it('wraps read failures', () => {
    const missing = path.join(tempDir, 'missing.json');

    expect(() => readSynonymFile(missing)).toThrow(SynonymConfigurationError);
    expect(() => readSynonymFile(missing)).toThrow(`Cannot read synonym file ${missing}: ENOENT`);
  });

  it('wraps invalid JSON', () => {
    const file = writeTempFile('broken.json', '[{');

    expect(() => readSynonymFile(file)).toThrow(`Cannot read synonym file ${file}:`);
  });
});

describe('configureStandardizer', () => {
  beforeEach(() => {
    vi.resetModules();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('returns the bundled standardizer when no file is configured', async () => {
    const {configureStandardizer} = await import('./synonyms');

    expect(configureStandardizer(BASE_CONFIG).standardize('bp')).toBe('Bench Press');
  });

  it('extends the default table once from the configured file', async () => {
    const {configureStandardizer} = await import('./synonyms');
    const file = writeTempFile('extra.json', JSON.stringify([{canonical: 'Hip Thrust', synonyms: ['ht']}]));
    const config = {...BASE_CONFIG, synonymsPath: file};

    const first = configureStandardizer(config);
    expect(first.standardize('ht')).toBe('Hip Thrust');

    // Sealed by the lookup above: a second call must not extend again
    expect(configureStandardizer(config)).toBe(first);
    expect(console.log).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith(`Loaded 1 synonym entries from ${file} (21 total)`);
  });

  it('extends a fresh default standardizer after a reset', async () => {
    const {configureStandardizer} = await import('./synonyms');
    const {resetDefaultStandardizer} = await import('./services/setlog');
    const file = writeTempFile('extra.json', JSON.stringify([{canonical: 'Hip Thrust', synonyms: ['ht']}]));
    const config = {...BASE_CONFIG, synonymsPath: file};

    const first = configureStandardizer(config);
    first.standardize('ht');
    resetDefaultStandardizer();
    const second = configureStandardizer(config);

    expect(second).not.toBe(first);
    expect(second.standardize('ht')).toBe('Hip Thrust');
    expect(console.log).toHaveBeenCalledTimes(2);
  });

  it('does not ignore a different file once the table is in use', async () => {
    const {configureStandardizer} = await import('./synonyms');
    const {SynonymTableSealedError} = await import('./services/setlog');
    const first = writeTempFile('first.json', JSON.stringify([{canonical: 'Hip Thrust', synonyms: ['ht']}]));
    const second = writeTempFile('second.json', JSON.stringify([{canonical: 'Hack Squat', synonyms: ['hs']}]));

    configureStandardizer({...BASE_CONFIG, synonymsPath: first}).standardize('ht');

    expect(() => configureStandardizer({...BASE_CONFIG, synonymsPath: second})).toThrow(SynonymTableSealedError);
  });
});
