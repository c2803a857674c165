import { Dictionary } from './dictionary.js';
import { WordCounts } from './types.js';

export const LITERARY_REGISTER = 'literary';

/**
 * Crude rarity score per word: its count, halved when the dictionary marks
 * the word as literary. Lower means rarer.
 * @throws WordNotFoundError if a counted word does not resolve
 */
export function computeScores(counts: WordCounts, dictionary: Dictionary): Map<string, number> {
  const scores = new Map<string, number>();
  for (const [word, count] of counts) {
    const literary = dictionary.get(word).info.has(LITERARY_REGISTER);
    scores.set(word, literary ? count / 2 : count);
  }
  return scores;
}
