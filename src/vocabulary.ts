import registerDebug from 'debug';
import { Dictionary } from './dictionary.js';
import { LanguageTools } from './nlp.js';
import { LinkMap, WordCounts } from './types.js';

const debug = registerDebug('wordhoard:vocabulary');

/** Tokens of this length or shorter are dropped */
export const MIN_WORD_LENGTH = 1;

// Quote, period, hyphen and backtick characters at either end of a token
const EDGE_PUNCTUATION = /^['.\-`"]+|['.\-`"]+$/g;

const POSSESSIVE = /'s$/;

const ALL_DIGITS = /^\d+$/;

/**
 * Result of extracting vocabulary from a text
 */
export interface Vocabulary {
  /** Dictionary form -> summed occurrences of every source word reaching it */
  counts: WordCounts;
  /** Source word -> dictionary form, for words found only through a lemma */
  links: LinkMap;
}

/**
 * Lower-case the text and join lines that were wrapped mid-paragraph.
 * A newline preceded by anything other than a newline becomes a space, so
 * blank-line paragraph breaks keep one newline.
 */
export function prepareText(text: string): string {
  // Normalize line endings (handle Windows \r\n)
  return text
    .replace(/\r\n/g, '\n')
    .toLowerCase()
    .replace(/(.)\n/g, '$1 ');
}

/**
 * Clean raw tokens down to candidate words: strip edge punctuation and a
 * trailing possessive, then drop abbreviations, one-letter tokens and numbers.
 */
export function normalizeTokens(tokens: Iterable<string>): string[] {
  const words: string[] = [];
  for (const token of tokens) {
    const word = token.replace(EDGE_PUNCTUATION, '').replace(POSSESSIVE, '');
    if (word.includes('.')) continue;
    if (word.length <= MIN_WORD_LENGTH) continue;
    if (ALL_DIGITS.test(word)) continue;
    words.push(word);
  }
  return words;
}

/**
 * Count occurrences by exact string, in order of first appearance.
 */
export function countTokens(words: Iterable<string>): WordCounts {
  const counts: WordCounts = new Map();
  for (const word of words) {
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  return counts;
}

/**
 * Dictionary forms a word can stand for: itself if the dictionary knows it,
 * plus every differing lemma the dictionary knows, in part-of-speech order.
 */
export function candidateForms(word: string, dictionary: Dictionary, tools: LanguageTools): string[] {
  const candidates = new Set<string>();
  if (dictionary.has(word)) {
    candidates.add(word);
  }
  for (const pos of tools.partsOfSpeech) {
    const lemma = tools.lemmatize(word, pos);
    if (lemma !== word && dictionary.has(lemma)) {
      candidates.add(lemma);
    }
  }
  return Array.from(candidates);
}

/**
 * Count the words of a text that the dictionary can resolve.
 *
 * Each distinct word adds its count to every dictionary form it can stand
 * for, so "belongs" may count towards both "belong" and "belonging". A word
 * the dictionary does not know but whose lemma it does is linked to the first
 * such lemma. Words with no dictionary form are dropped.
 */
export function extractVocabulary(text: string, dictionary: Dictionary, tools: LanguageTools): Vocabulary {
  debug('tokenizing %d characters', text.length);
  const tokens = tools.tokenize(prepareText(text));
  const wordCounts = countTokens(normalizeTokens(tokens));
  debug('%d tokens, %d distinct words', tokens.length, wordCounts.size);

  const counts: WordCounts = new Map();
  const links: LinkMap = new Map();

  for (const [word, count] of wordCounts) {
    const candidates = candidateForms(word, dictionary, tools);
    if (candidates.length === 0) continue;

    if (!dictionary.has(word)) {
      links.set(word, candidates[0]);
    }

    for (const form of candidates) {
      counts.set(form, (counts.get(form) ?? 0) + count);
    }
  }

  debug('%d dictionary words, %d links', counts.size, links.size);
  return { counts, links };
}
