import * as zlib from 'node:zlib';
import { BODY_DATA_FORMAT } from '../format.js';
import { LanguageTools, PartOfSpeech } from '../nlp.js';

export const NAMESPACE = 'http://www.example.com/DictionaryService-1.0';

export interface EntryParts {
  /** Register annotations, e.g. "literary" */
  registers?: string[];
  /** Bold cross-reference words */
  boldWords?: string[];
  /** Derivative forms */
  derivatives?: string[];
  /** Plain definition text */
  definition?: string;
}

/**
 * Build entry markup shaped like a Body.data entry.
 */
export function entryXml(key: string, parts: EntryParts = {}, prefix = 'd', namespace = NAMESPACE): string {
  const body: string[] = [];
  for (const register of parts.registers ?? []) {
    body.push(`<span class="lg"><span class="reg">${register}</span></span>`);
  }
  if (parts.definition) {
    body.push(`<span class="df">${parts.definition}</span>`);
  }
  for (const word of parts.boldWords ?? []) {
    body.push(`<span class="fg"><span class="f">${word}</span></span>`);
  }
  if (parts.derivatives && parts.derivatives.length > 0) {
    const items = parts.derivatives
      .map(word => `<span class="x_xoh"><span role="text">${word}</span></span>`)
      .join('');
    body.push(`<span class="se1 t_derivatives">${items}</span>`);
  }
  return `<${prefix}:entry xmlns:${prefix}="${namespace}" id="${key}" ${prefix}:title="${key}">${body.join('')}</${prefix}:entry>`;
}

/**
 * Build a decompressed segment payload: prefix bytes, then each entry followed
 * by a newline and gap bytes, then an optional trailer without newlines.
 */
export function buildPayload(entries: string[], trailer = ''): Buffer {
  const parts: Buffer[] = [Buffer.alloc(BODY_DATA_FORMAT.segmentPrefixSize, 7)];
  for (const entry of entries) {
    parts.push(Buffer.from(entry, 'utf-8'), Buffer.from('\n'), Buffer.alloc(BODY_DATA_FORMAT.entryGapSize, 1));
  }
  parts.push(Buffer.from(trailer, 'utf-8'));
  return Buffer.concat(parts);
}

export interface ContainerOptions {
  /** Zero bytes between the header and the first segment */
  leadingJunk?: number;
  /** Zero bytes after every segment */
  gap?: number;
}

/**
 * Build a container: zeroed header, then each payload deflated, separated by zero padding.
 */
export function buildContainer(payloads: Buffer[], options: ContainerOptions = {}): Buffer {
  const { leadingJunk = 0, gap = 4 } = options;
  const parts: Buffer[] = [Buffer.alloc(BODY_DATA_FORMAT.headerSize), Buffer.alloc(leadingJunk)];
  for (const payload of payloads) {
    parts.push(zlib.deflateSync(payload), Buffer.alloc(gap));
  }
  return Buffer.concat(parts);
}

/**
 * Tools that split on whitespace and lemmatize from a fixed table.
 * Words missing from the table lemmatize to themselves.
 */
export function stubTools(lemmas: Record<string, Partial<Record<PartOfSpeech, string>>> = {}): LanguageTools {
  return {
    partsOfSpeech: ['noun', 'verb', 'adjective'],
    tokenize: (text: string) => text.split(/\s+/).filter(token => token.length > 0),
    lemmatize: (word: string, pos: PartOfSpeech) => lemmas[word]?.[pos] ?? word
  };
}
