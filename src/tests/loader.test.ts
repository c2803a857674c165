import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadDictionary, readText, searchWords, ParsedDictionary } from '../loader.js';
import { Dictionary } from '../dictionary.js';
import { MemoryStore } from '../cache.js';
import { ConfigurationError, InputNotFoundError, UnknownEncodingError } from '../errors.js';
import { buildContainer, buildPayload, entryXml } from './fixtures.js';

const { describe, it, beforeEach, afterEach } = test;

describe('loadDictionary', () => {
  let tempDir: string;
  let containerPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'wordhoard-loader-'));
    containerPath = path.join(tempDir, 'Body.data');
    fs.writeFileSync(containerPath, buildContainer([
      buildPayload([entryXml('house', { derivatives: ['housing'] }), entryXml('stay')]),
      buildPayload([entryXml('cozen', { registers: ['literary'] })])
    ], { leadingJunk: 2 }));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should parse a container file into entries and links', () => {
    const dictionary = loadDictionary({ dictionaryPath: containerPath });

    assert.deepStrictEqual(Array.from(dictionary.entries.keys()), ['house', 'stay', 'cozen']);
    assert.deepStrictEqual(Array.from(dictionary.links), [['housing', 'house']]);
  });

  it('should reject paths that are not Body.data files', () => {
    const other = path.join(tempDir, 'Other.data');
    fs.writeFileSync(other, '');
    assert.throws(() => loadDictionary({ dictionaryPath: other }), ConfigurationError);
  });

  it('should report a missing container', () => {
    assert.throws(
      () => loadDictionary({ dictionaryPath: path.join(tempDir, 'missing', 'Body.data') }),
      InputNotFoundError
    );
  });

  it('should serve a second load from the store', () => {
    const store = new MemoryStore<ParsedDictionary>();
    const first = loadDictionary({ dictionaryPath: containerPath, store });

    fs.writeFileSync(containerPath, buildContainer([buildPayload([entryXml('other')])]));
    const second = loadDictionary({ dictionaryPath: containerPath, store });
    const uncached = loadDictionary({ dictionaryPath: containerPath });

    assert.deepStrictEqual(Array.from(second.entries.keys()), Array.from(first.entries.keys()));
    assert.deepStrictEqual(Array.from(second.links), Array.from(first.links));
    assert.strictEqual(second.get('cozen').content, first.get('cozen').content);
    assert.deepStrictEqual(Array.from(uncached.entries.keys()), ['other']);
  });

  it('should store entries and links keyed by absolute path', () => {
    const store = new MemoryStore<ParsedDictionary>();
    loadDictionary({ dictionaryPath: containerPath, store });

    const cached = store.get(path.resolve(containerPath));
    assert.ok(cached);
    assert.deepStrictEqual(cached.links, [['housing', 'house']]);
    assert.deepStrictEqual(cached.entries.map(([key]) => key), ['house', 'stay', 'cozen']);
  });
});

describe('readText', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'wordhoard-text-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read UTF-8 text', () => {
    const file = path.join(tempDir, 'book.txt');
    fs.writeFileSync(file, 'café society', 'utf-8');
    assert.strictEqual(readText(file), 'café society');
  });

  it('should fall back to Latin-1 when UTF-8 fails', () => {
    const file = path.join(tempDir, 'book.txt');
    fs.writeFileSync(file, Buffer.from([0x63, 0x61, 0x66, 0xe9]));
    assert.strictEqual(readText(file), 'café');
  });

  it('should fail when no candidate encoding decodes the file', () => {
    const file = path.join(tempDir, 'book.txt');
    fs.writeFileSync(file, Buffer.from([0x61, 0xff, 0x62]));
    assert.throws(
      () => readText(file, ['utf-8']),
      (err: unknown) => err instanceof UnknownEncodingError && err.tried.join() === 'utf-8'
    );
  });

  it('should reject non-ASCII bytes when ASCII is requested', () => {
    const file = path.join(tempDir, 'book.txt');
    fs.writeFileSync(file, 'café', 'utf-8');
    assert.throws(
      () => readText(file, ['ascii']),
      (err: unknown) => err instanceof UnknownEncodingError && err.tried.join() === 'ascii'
    );
  });

  it('should decode Latin-1 bytes 0x80-0x9f as control characters', () => {
    const file = path.join(tempDir, 'book.txt');
    fs.writeFileSync(file, Buffer.from([0x61, 0x80, 0x62]));
    assert.strictEqual(readText(file, ['iso-8859-1']), 'a\u0080b');
  });

  it('should try the given encodings in order', () => {
    const file = path.join(tempDir, 'book.txt');
    fs.writeFileSync(file, Buffer.from([0x63, 0x61, 0x66, 0xe9]));
    assert.strictEqual(readText(file, ['ascii', 'utf-8', 'latin1']), 'café');
  });

  it('should report a missing file', () => {
    assert.throws(() => readText(path.join(tempDir, 'missing.txt')), InputNotFoundError);
  });
});

describe('searchWords', () => {
  const dictionary = Dictionary.fromRecords([
    { key: 'lighthouse', content: entryXml('lighthouse') },
    { key: 'household', content: entryXml('household') },
    { key: 'house', content: entryXml('house', { derivatives: ['housing'] }) },
    { key: 'stay', content: entryXml('stay') }
  ]);

  it('should rank prefix matches, then substring matches, then links', () => {
    const results = searchWords('HOUS', dictionary);
    assert.deepStrictEqual(
      results.map(r => [r.word, r.key, r.matchType]),
      [
        ['house', 'house', 'prefix'],
        ['household', 'household', 'prefix'],
        ['lighthouse', 'lighthouse', 'substring'],
        ['housing', 'house', 'link']
      ]
    );
  });

  it('should apply the limit after ranking', () => {
    assert.deepStrictEqual(searchWords('hous', dictionary, { limit: 2 }).map(r => r.word), ['house', 'household']);
  });

  it('should return nothing when nothing matches', () => {
    assert.deepStrictEqual(searchWords('castle', dictionary), []);
  });
});
