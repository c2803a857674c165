import registerDebug from 'debug';
import { Entry } from './entry.js';
import { EntryRecord, LinkMap } from './types.js';
import { WordNotFoundError } from './errors.js';

const debug = registerDebug('wordhoard:links');

/**
 * Collect links for words that appear as derivatives or cross-references in
 * some entry but are not headwords themselves.
 *
 * Entries are visited in map order; the first entry to mention an unclaimed
 * word owns it.
 */
export function resolveLinks(entries: Map<string, Entry>): LinkMap {
  const links: LinkMap = new Map();
  let visited = 0;

  for (const [key, entry] of entries) {
    if (visited % 1000 === 0) {
      debug('getting links: %s%%', ((visited / entries.size) * 100).toFixed(1));
    }
    visited++;

    for (const word of entry.relatedWords) {
      if (entries.has(word) || links.has(word)) {
        continue;
      }
      links.set(word, key);
    }
  }

  debug('%d links', links.size);
  return links;
}

/**
 * Headword -> entry mapping plus links from non-headwords to headwords.
 */
export class Dictionary {
  /**
   * @param entries - Headword to entry
   * @param links - Words `w` in this map have their definition at `links.get(w)`
   */
  constructor(
    public readonly entries: Map<string, Entry>,
    public readonly links: LinkMap = new Map()
  ) {}

  /**
   * Build a dictionary from split records. A repeated headword replaces the
   * earlier entry; links are then derived from the final entry set.
   */
  static fromRecords(records: Iterable<EntryRecord>): Dictionary {
    const entries = new Map<string, Entry>();
    for (const { key, content } of records) {
      entries.set(key, new Entry(key, content));
    }
    return new Dictionary(entries, resolveLinks(entries));
  }

  get size(): number {
    return this.entries.size;
  }

  get linkCount(): number {
    return this.links.size;
  }

  has(word: string): boolean {
    return this.entries.has(word) || this.links.has(word);
  }

  /**
   * Canonical headword for `word`, or undefined when it resolves nowhere.
   */
  resolve(word: string): string | undefined {
    if (this.entries.has(word)) return word;
    return this.links.get(word);
  }

  /**
   * Entry for `word`, following a link if needed.
   * @throws WordNotFoundError
   */
  get(word: string): Entry {
    const direct = this.entries.get(word);
    if (direct) return direct;

    const target = this.links.get(word);
    if (target !== undefined) {
      const linked = this.entries.get(target);
      if (linked) return linked;
    }

    throw new WordNotFoundError(word);
  }

  /**
   * A new dictionary holding only `words`, each keyed by the requested word
   * even when it was reached through a link. The links of the result record
   * which requested words were link-resolved and where they point.
   * @throws WordNotFoundError on the first word that resolves nowhere; nothing is returned
   */
  filtered(words: Iterable<string>): Dictionary {
    const entries = new Map<string, Entry>();
    const links: LinkMap = new Map();

    for (const word of words) {
      entries.set(word, this.get(word));
      const target = this.links.get(word);
      if (target !== undefined) {
        links.set(word, target);
      }
    }

    return new Dictionary(entries, links);
  }

  /**
   * Merge links found elsewhere (e.g. from lemmatizing a text).
   *
   * Words that already resolve are left alone. A target that is itself a link
   * is replaced by its canonical headword so links never chain.
   * @throws WordNotFoundError when a target resolves nowhere; no link is added then
   */
  addLinks(links: Iterable<[string, string]>): number {
    const pending: LinkMap = new Map();
    for (const [word, target] of links) {
      if (this.has(word) || pending.has(word)) continue;
      const canonical = this.resolve(target);
      if (canonical === undefined) {
        throw new WordNotFoundError(target);
      }
      pending.set(word, canonical);
    }

    for (const [word, canonical] of pending) {
      this.links.set(word, canonical);
    }
    return pending.size;
  }

  describe(): string {
    return `Dictionary(${this.entries.size} definitions, ${this.links.size} links)`;
  }
}
