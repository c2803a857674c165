import * as test from 'node:test';
import * as assert from 'node:assert';
import {
  candidateForms,
  countTokens,
  extractVocabulary,
  normalizeTokens,
  prepareText
} from '../vocabulary.js';
import { Dictionary } from '../dictionary.js';
import { entryXml, stubTools } from './fixtures.js';

const { describe, it } = test;

function dictionaryOf(...keys: string[]): Dictionary {
  return Dictionary.fromRecords(keys.map(key => ({ key, content: entryXml(key) })));
}

describe('prepareText', () => {

  it('should lower-case and join wrapped lines but keep paragraph breaks', () => {
    assert.strictEqual(prepareText('The End\nof it\n\nNext'), 'the end of it \nnext');
  });

  it('should treat Windows line endings like Unix ones', () => {
    assert.strictEqual(prepareText('a\r\nb'), 'a b');
  });
});

describe('normalizeTokens', () => {

  it('should strip edge punctuation and possessives and drop non-words', () => {
    const tokens = ["'quoted'", 'e.g.', 'x', '1984', "dog's", '--', 'well-known', '`tick`', '"said."'];
    assert.deepStrictEqual(normalizeTokens(tokens), ['quoted', 'dog', 'well-known', 'tick', 'said']);
  });

  it('should keep words that merely contain digits', () => {
    assert.deepStrictEqual(normalizeTokens(['4th', '42']), ['4th']);
  });
});

describe('countTokens', () => {

  it('should count exact strings in order of first appearance', () => {
    assert.deepStrictEqual(Array.from(countTokens(['b', 'a', 'b'])), [['b', 2], ['a', 1]]);
  });
});

describe('candidateForms', () => {

  it('should include the word itself and differing known lemmas once each', () => {
    const tools = stubTools({ belonging: { verb: 'belong' } });
    const dictionary = dictionaryOf('belong', 'belonging');

    assert.deepStrictEqual(candidateForms('belonging', dictionary, tools), ['belonging', 'belong']);
  });

  it('should ignore lemmas the dictionary does not know', () => {
    const tools = stubTools({ geese: { noun: 'goose' } });
    assert.deepStrictEqual(candidateForms('geese', dictionaryOf('gander'), tools), []);
  });
});

describe('extractVocabulary', () => {

  it('should count lemmatized forms and drop unknown words', () => {
    const tools = stubTools({ houses: { noun: 'house', verb: 'house' } });
    const dictionary = dictionaryOf('house', 'stay');

    const { counts, links } = extractVocabulary("The houses were old.\nThey'll stay.", dictionary, tools);

    assert.deepStrictEqual(Array.from(counts), [['house', 1], ['stay', 1]]);
    assert.deepStrictEqual(Array.from(links), [['houses', 'house']]);
  });

  it('should add a word count to every dictionary form it reaches', () => {
    const tools = stubTools({
      belonging: { verb: 'belong' },
      belongs: { verb: 'belong' }
    });
    const dictionary = dictionaryOf('belong', 'belonging');

    const { counts, links } = extractVocabulary('belonging belonging belongs', dictionary, tools);

    assert.deepStrictEqual(Array.from(counts), [['belonging', 2], ['belong', 3]]);
    assert.deepStrictEqual(Array.from(links), [['belongs', 'belong']]);
  });

  it('should link to the first candidate in part-of-speech order', () => {
    const tools = stubTools({ axes: { noun: 'axis', verb: 'axe' } });
    const dictionary = dictionaryOf('axe', 'axis');

    const { counts, links } = extractVocabulary('axes', dictionary, tools);

    assert.deepStrictEqual(Array.from(links), [['axes', 'axis']]);
    assert.deepStrictEqual(Array.from(counts), [['axis', 1], ['axe', 1]]);
  });

  it('should resolve words through existing dictionary links', () => {
    const dictionary = Dictionary.fromRecords([
      { key: 'house', content: entryXml('house', { derivatives: ['housing'] }) }
    ]);
    const tools = stubTools({ housings: { noun: 'housing' } });

    const { counts, links } = extractVocabulary('housing housings', dictionary, tools);

    assert.deepStrictEqual(Array.from(counts), [['housing', 2]]);
    assert.deepStrictEqual(Array.from(links), [['housings', 'housing']]);
  });

  it('should return nothing for text without dictionary words', () => {
    const { counts, links } = extractVocabulary('42 a . ...', dictionaryOf('house'), stubTools());
    assert.strictEqual(counts.size, 0);
    assert.strictEqual(links.size, 0);
  });
});
