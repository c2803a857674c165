import fs from 'fs-extra';
import * as path from 'node:path';
import registerDebug from 'debug';
import { z } from 'zod';
import { Dictionary } from './dictionary.js';
import { Entry } from './entry.js';
import { parseContainer } from './parser.js';
import { BODY_DATA_FORMAT, CONTAINER_FILE_NAME, ContainerFormat } from './format.js';
import { KeyValueStore } from './cache.js';
import { ConfigurationError, InputNotFoundError, UnknownEncodingError } from './errors.js';

const debug = registerDebug('wordhoard:loader');

/** Encodings tried, in order, when none is given */
export const DEFAULT_INPUT_ENCODINGS = ['utf-8', 'iso-8859-1', 'ascii'];

/**
 * What the loader memoizes per container path: the deduplicated entries and
 * their links, as pairs so the value survives a JSON round trip.
 */
export const ParsedDictionarySchema = z.object({
  entries: z.array(z.tuple([z.string(), z.string()])),
  links: z.array(z.tuple([z.string(), z.string()]))
});

export type ParsedDictionary = z.infer<typeof ParsedDictionarySchema>;

/**
 * Options for loading a dictionary container
 */
export interface LoadOptions {
  /** Path to a Body.data file */
  dictionaryPath: string;
  /** Optional memoization keyed by resolved container path */
  store?: KeyValueStore<ParsedDictionary>;
  /** Container layout (default: Body.data) */
  format?: ContainerFormat;
}

/**
 * Fail fast on a path that cannot be a container, before any parsing.
 */
export function checkContainerPath(dictionaryPath: string): string {
  if (!dictionaryPath.endsWith(CONTAINER_FILE_NAME)) {
    throw new ConfigurationError(`Expected a ${CONTAINER_FILE_NAME} file, got ${dictionaryPath}`);
  }
  if (!fs.pathExistsSync(dictionaryPath)) {
    throw new InputNotFoundError(dictionaryPath);
  }
  return path.resolve(dictionaryPath);
}

function toParsed(dictionary: Dictionary): ParsedDictionary {
  return {
    entries: Array.from(dictionary.entries, ([key, entry]): [string, string] => [key, entry.content]),
    links: Array.from(dictionary.links)
  };
}

function fromParsed(parsed: ParsedDictionary): Dictionary {
  const entries = new Map<string, Entry>();
  for (const [key, content] of parsed.entries) {
    entries.set(key, new Entry(key, content));
  }
  return new Dictionary(entries, new Map(parsed.links));
}

/**
 * Parse a container file into a dictionary, consulting the store first.
 */
export function loadDictionary(options: LoadOptions): Dictionary {
  const { dictionaryPath, store, format = BODY_DATA_FORMAT } = options;
  const cacheKey = checkContainerPath(dictionaryPath);

  const cached = store?.get(cacheKey);
  if (cached) {
    return fromParsed(cached);
  }

  debug('parsing %s', dictionaryPath);
  const bytes = fs.readFileSync(dictionaryPath);
  const result = parseContainer(bytes, format);
  debug(
    '%d entries from %d segments%s',
    result.entries.length,
    result.segmentCount,
    result.stoppedAtSentinel ? ' (stopped at sentinel)' : ''
  );

  const dictionary = Dictionary.fromRecords(result.entries);
  store?.set(cacheKey, toParsed(dictionary));
  return dictionary;
}

type Decode = (bytes: Uint8Array) => string;

// TextDecoder maps these labels to windows-1252, which accepts any byte
const STRICT_DECODERS = new Map<string, Decode>([
  ['ascii', decodeAscii],
  ['us-ascii', decodeAscii],
  ['iso-8859-1', decodeLatin1],
  ['latin1', decodeLatin1],
  ['latin-1', decodeLatin1]
]);

function decodeAscii(bytes: Uint8Array): string {
  const index = bytes.findIndex(byte => byte > 0x7f);
  if (index !== -1) {
    throw new RangeError(`byte 0x${bytes[index].toString(16)} at ${index} is not ASCII`);
  }
  return Buffer.from(bytes).toString('ascii');
}

function decodeLatin1(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('latin1');
}

function decodeWith(encoding: string, bytes: Uint8Array): string {
  const strict = STRICT_DECODERS.get(encoding.toLowerCase());
  if (strict) {
    return strict(bytes);
  }
  return new TextDecoder(encoding, { fatal: true }).decode(bytes);
}

/**
 * Read a text file, trying each encoding until one decodes without error.
 * @param encodings - Encodings to try in order (default: DEFAULT_INPUT_ENCODINGS)
 */
export function readText(inputPath: string, encodings: readonly string[] = DEFAULT_INPUT_ENCODINGS): string {
  if (!fs.pathExistsSync(inputPath)) {
    throw new InputNotFoundError(inputPath);
  }

  const bytes = fs.readFileSync(inputPath);

  for (const candidate of encodings) {
    try {
      const text = decodeWith(candidate, bytes);
      debug('decoded %s with %s', inputPath, candidate);
      return text;
    } catch (err) {
      debug('could not decode %s with %s: %s', inputPath, candidate, err);
    }
  }

  throw new UnknownEncodingError(inputPath, Array.from(encodings));
}

/**
 * Search options
 */
export interface SearchOptions {
  /** Maximum number of results to return */
  limit?: number;
}

/**
 * A search hit
 */
export interface SearchResult {
  /** The matching word */
  word: string;
  /** Headword whose entry defines it */
  key: string;
  /** Relevance score (lower = better match) */
  score: number;
  /** Type of match: 'prefix' and 'substring' match headwords, 'link' matches linked words */
  matchType: 'prefix' | 'substring' | 'link';
}

/**
 * Search headwords and linked words for a substring.
 * Results are sorted by: headword prefix matches, other headword matches, then links
 */
export function searchWords(
  query: string,
  dictionary: Dictionary,
  options: SearchOptions = {}
): SearchResult[] {
  const { limit } = options;
  const queryLower = query.toLowerCase();
  const results: SearchResult[] = [];

  for (const key of dictionary.entries.keys()) {
    const keyLower = key.toLowerCase();
    if (keyLower.startsWith(queryLower)) {
      results.push({ word: key, key, score: 0, matchType: 'prefix' });
    } else if (keyLower.includes(queryLower)) {
      results.push({ word: key, key, score: 1, matchType: 'substring' });
    }
  }

  for (const [word, key] of dictionary.links) {
    if (word.toLowerCase().includes(queryLower)) {
      results.push({ word, key, score: 2, matchType: 'link' });
    }
  }

  results.sort((a, b) => a.score - b.score || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0));

  if (limit && results.length > limit) {
    return results.slice(0, limit);
  }

  return results;
}
