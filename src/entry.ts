import * as cheerio from 'cheerio';
import { isTag, isText } from 'domhandler';
import type { Element } from 'domhandler';

// Spans that give usage meta info, like "literary", "informal", etc.
export const SELECT_INFO = 'span[class="lg"] > span[class="reg"]';

// Bold words inside definitions, e.g. "noun (vitals)" in the entry for "vital"
export const SELECT_OTHER_WORDS = 'span[class="fg"] > span[class="f"]';

// Derivatives listed at the end of a definition
export const SELECT_DERIVATIVES = 'span[class*="t_derivatives"] span[class*="x_xoh"] > span[role="text"]';

/**
 * Text of an element up to its first child element.
 */
function leadingText(element: Element): string {
  const first = element.children[0];
  return first && isText(first) ? first.data : '';
}

/**
 * One dictionary headword and its raw markup.
 *
 * Parsed markup and derived word sets are computed on first access and kept
 * for the lifetime of the instance; entries never change after construction.
 */
export class Entry {
  private document: cheerio.CheerioAPI | undefined;
  private infoCache: Set<string> | undefined;
  private relatedCache: Set<string> | undefined;

  constructor(
    public readonly key: string,
    public readonly content: string
  ) {}

  /**
   * Leading text of every element matching `selector`, trimmed, with
   * `replacements` applied before trimming. Empty results are dropped.
   */
  select(selector: string, replacements: Array<[string, string]> = []): string[] {
    const $ = this.getDocument();
    const texts: string[] = [];

    for (const element of $(selector).toArray().filter(isTag)) {
      let text = leadingText(element);
      if (!text) continue;
      for (const [from, to] of replacements) {
        text = text.split(from).join(to);
      }
      text = text.trim();
      if (text) {
        texts.push(text);
      }
    }

    return texts;
  }

  /** Register annotations such as "literary" or "informal" */
  get info(): Set<string> {
    if (this.infoCache === undefined) {
      this.infoCache = new Set(this.select(SELECT_INFO));
    }
    return this.infoCache;
  }

  /** Derivatives and bold cross-reference words, without the key itself */
  get relatedWords(): Set<string> {
    if (this.relatedCache === undefined) {
      const words = new Set([
        ...this.select(SELECT_DERIVATIVES),
        ...this.select(SELECT_OTHER_WORDS, [['the', '']])
      ]);
      words.delete(this.key);
      this.relatedCache = words;
    }
    return this.relatedCache;
  }

  private getDocument(): cheerio.CheerioAPI {
    if (this.document === undefined) {
      this.document = cheerio.load(this.content, { xml: true });
    }
    return this.document;
  }

  toString(): string {
    return `Entry(${this.key})`;
  }
}
