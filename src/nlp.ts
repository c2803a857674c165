import lemmatizer from 'wink-lemmatizer';

export type PartOfSpeech = 'noun' | 'verb' | 'adjective';

export const PARTS_OF_SPEECH: readonly PartOfSpeech[] = ['noun', 'verb', 'adjective'];

/**
 * Tokenization and lemmatization, as needed by vocabulary extraction.
 * Anything that can split text into words and give a base form per part of
 * speech will do; tests use fixed tables.
 */
export interface LanguageTools {
  /** Parts of speech to try, in order of preference */
  readonly partsOfSpeech: readonly PartOfSpeech[];
  tokenize(text: string): string[];
  lemmatize(word: string, pos: PartOfSpeech): string;
}

/**
 * English tools: Intl word segmentation plus WordNet-based lemmas.
 */
export function createEnglishTools(locale = 'en'): LanguageTools {
  const segmenter = new Intl.Segmenter(locale, { granularity: 'word' });

  return {
    partsOfSpeech: PARTS_OF_SPEECH,

    tokenize(text: string): string[] {
      const words: string[] = [];
      for (const { segment, isWordLike } of segmenter.segment(text)) {
        if (isWordLike) {
          words.push(segment);
        }
      }
      return words;
    },

    lemmatize(word: string, pos: PartOfSpeech): string {
      switch (pos) {
        case 'noun':
          return lemmatizer.noun(word);
        case 'verb':
          return lemmatizer.verb(word);
        case 'adjective':
          return lemmatizer.adjective(word);
      }
    }
  };
}
